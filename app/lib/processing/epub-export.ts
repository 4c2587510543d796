import JSZip from "jszip";
import { mkdir, readdir, readFile, rm, writeFile } from "fs/promises";
import { dirname, join, relative, resolve, sep } from "path";
import { v4 as uuid } from "uuid";
import { findDuplicateNumbers } from "../book";
import type { EpubBook, ExportOptions, ExportResult, ExportStage, StageResult } from "../types";
import { buildEpubDocuments, EPUB_MIMETYPE } from "./epub-documents";

const SCRATCH_DIR_NAME = "epub_temp";

/**
 * Scratch directory for an export. Derived from the output path alone, so two
 * exports into the same directory at once would trample each other.
 */
export function scratchDirFor(outputPath: string): string {
  return join(dirname(resolve(outputPath)), SCRATCH_DIR_NAME);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runStage<T>(stage: ExportStage, fn: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return { success: true, value: await fn() };
  } catch (error) {
    return { success: false, stage, error: errorMessage(error) };
  }
}

/**
 * Assemble `book` into an EPUB 2 file at `outputPath`.
 *
 * Parts are rendered into a scratch directory beside the output, packed with
 * `mimetype` as the first, stored entry, and the scratch directory is removed
 * whatever happened. Failures come back as a result naming the stage; this
 * function does not throw, and neither does a failing `onProgress`.
 */
export async function exportEpub(
  book: EpubBook,
  outputPath: string,
  options?: ExportOptions,
): Promise<ExportResult> {
  const progress = (percent: number, message: string) => {
    try {
      options?.onProgress?.(percent, message);
    } catch (error) {
      console.warn(`[EPUB] Progress callback failed at ${percent}%:`, errorMessage(error));
    }
  };
  const scratchDir = scratchDirFor(outputPath);
  const chapterCount = book.chapters.length;

  const duplicates = findDuplicateNumbers(book.chapters);
  if (duplicates.length > 0) {
    console.warn(`[EPUB] Duplicate chapter numbers ${duplicates.join(", ")}; package will contain duplicate ids`);
  }

  const result = await runStages(book, outputPath, scratchDir, options, progress);

  progress(95, "Cleaning up...");
  const cleanup = await runStage("cleanup", () => rm(scratchDir, { recursive: true, force: true }));

  if (!result.success) {
    if (!cleanup.success) {
      console.error(`[EPUB] Failed to remove scratch directory ${scratchDir}:`, cleanup.error);
    }
    console.error(`[EPUB] Export failed at ${result.stage}:`, result.error);
    return result;
  }

  if (!cleanup.success) {
    console.error(`[EPUB] Export failed at cleanup:`, cleanup.error);
    return cleanup;
  }

  progress(100, "Export complete");
  console.log(`[EPUB] Exported ${chapterCount} chapters to ${outputPath}`);
  return { success: true, outputPath, chapterCount };
}

async function runStages(
  book: EpubBook,
  outputPath: string,
  scratchDir: string,
  options: ExportOptions | undefined,
  progress: (percent: number, message: string) => void,
): Promise<StageResult> {
  progress(5, "Preparing scratch directory...");
  const prepared = await runStage("prepare-scratch", () => prepareScratchDir(scratchDir));
  if (!prepared.success) return prepared;

  progress(20, "Writing documents...");
  const written = await runStage("write-documents", () =>
    writeDocuments(book, scratchDir, {
      identifier: options?.identifier ?? `urn:uuid:${uuid()}`,
      generatedAt: options?.generatedAt ?? new Date(),
    }),
  );
  if (!written.success) return written;

  progress(60, "Packing archive...");
  return runStage("pack-archive", () => packArchive(scratchDir, outputPath));
}

async function prepareScratchDir(scratchDir: string): Promise<void> {
  await mkdir(dirname(scratchDir), { recursive: true });
  // Leftovers from an earlier failed run
  await rm(scratchDir, { recursive: true, force: true });
  await mkdir(join(scratchDir, "META-INF"), { recursive: true });
  await mkdir(join(scratchDir, "OEBPS"), { recursive: true });
}

async function writeDocuments(
  book: EpubBook,
  scratchDir: string,
  context: { identifier: string; generatedAt: Date },
): Promise<void> {
  await writeFile(join(scratchDir, "mimetype"), EPUB_MIMETYPE, "utf-8");
  for (const doc of buildEpubDocuments(book, context)) {
    await writeFile(join(scratchDir, ...doc.path.split("/")), doc.content, "utf-8");
  }
}

/**
 * Every file under `root` as an archive entry name (forward slashes), sorted.
 */
export async function listArchiveEntries(root: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        files.push(relative(root, fullPath).split(sep).join("/"));
      }
    }
  }

  await walk(root);
  return files.sort();
}

/**
 * Zip `scratchDir` into `outputPath`. The mimetype entry goes in first and
 * uncompressed; readers reject the container otherwise.
 */
async function packArchive(scratchDir: string, outputPath: string): Promise<void> {
  const zip = new JSZip();

  zip.file("mimetype", await readFile(join(scratchDir, "mimetype")), { compression: "STORE" });

  for (const name of await listArchiveEntries(scratchDir)) {
    if (name === "mimetype") continue;
    zip.file(name, await readFile(join(scratchDir, ...name.split("/"))));
  }

  const epubBuffer = await zip.generateAsync({
    type: "nodebuffer",
    mimeType: EPUB_MIMETYPE,
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });

  await writeFile(outputPath, epubBuffer);
}

/**
 * Boolean form of exportEpub: true when the archive was written and the
 * scratch directory removed. Details of a failure are only logged.
 */
export async function exportTo(book: EpubBook, outputPath: string, options?: ExportOptions): Promise<boolean> {
  const result = await exportEpub(book, outputPath, options);
  return result.success;
}
