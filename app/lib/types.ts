export interface Chapter {
  readonly number: number;
  readonly title: string;
  readonly content: string;
}

export interface BookMetadata {
  readonly title: string;
  readonly author: string;
  readonly language: string;
}

/**
 * Everything one export needs. Built once with `createBook` and never mutated;
 * `addChapter` hands back a new value.
 */
export interface EpubBook {
  readonly metadata: BookMetadata;
  readonly chapters: readonly Chapter[];
}

/**
 * A generated part of the EPUB package, path relative to the container root.
 */
export interface EpubDocument {
  path: string;
  content: string;
}

export type ExportStage = "prepare-scratch" | "write-documents" | "pack-archive" | "cleanup";

export type StageResult<T = void> =
  | { success: true; value: T }
  | { success: false; stage: ExportStage; error: string };

export type ExportResult =
  | { success: true; outputPath: string; chapterCount: number }
  | { success: false; stage: ExportStage; error: string };

export interface ExportOptions {
  /** Fixed `urn:uuid:` identifier; a fresh v4 UUID is generated when omitted */
  identifier?: string;
  /** Timestamp printed on the title page, defaults to now */
  generatedAt?: Date;
  onProgress?: (percent: number, message: string) => void;
}
