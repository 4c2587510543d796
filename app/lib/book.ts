import type { Chapter, EpubBook } from "./types";

export const DEFAULT_AUTHOR = "AI Novel Generator";
export const DEFAULT_LANGUAGE = "zh-CN";

interface CreateBookInput {
  title: string;
  author?: string | null;
  language?: string | null;
  chapters?: readonly Chapter[];
}

/**
 * Build an immutable book value from metadata and an optional chapter list.
 * Blank author/language fall back to the defaults.
 */
export function createBook(input: CreateBookInput): EpubBook {
  const author = input.author && input.author.trim() ? input.author : DEFAULT_AUTHOR;
  const language = input.language && input.language.trim() ? input.language : DEFAULT_LANGUAGE;

  return Object.freeze({
    metadata: Object.freeze({ title: input.title, author, language }),
    chapters: Object.freeze((input.chapters ?? []).map((ch) => Object.freeze({ ...ch }))),
  });
}

/**
 * Return a copy of `book` with one more chapter appended.
 * Chapter numbers are not checked for uniqueness; duplicates flow through to
 * the package as duplicate ids (see findDuplicateNumbers).
 */
export function addChapter(book: EpubBook, number: number, title: string, content: string): EpubBook {
  return Object.freeze({
    metadata: book.metadata,
    chapters: Object.freeze([...book.chapters, Object.freeze({ number, title, content })]),
  });
}

export function chapterId(number: number): string {
  return `chapter_${number}`;
}

export function chapterHref(number: number): string {
  return `${chapterId(number)}.xhtml`;
}

/**
 * Ascending by chapter number. Array.prototype.sort is stable, so chapters
 * sharing a number keep the order they were added in.
 */
export function sortChapters(chapters: readonly Chapter[]): Chapter[] {
  return [...chapters].sort((a, b) => a.number - b.number);
}

export function findDuplicateNumbers(chapters: readonly Chapter[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const ch of chapters) {
    if (seen.has(ch.number)) duplicates.add(ch.number);
    seen.add(ch.number);
  }
  return [...duplicates].sort((a, b) => a - b);
}

export interface PageLabels {
  cover: string;
  titlePage: string;
  generated: string;
  chapterCount: string;
  chapter: (number: number) => string;
}

const ENGLISH_LABELS: PageLabels = {
  cover: "Cover",
  titlePage: "Title Page",
  generated: "Generated",
  chapterCount: "Chapters",
  chapter: (number) => `Chapter ${number}`,
};

const CHINESE_LABELS: PageLabels = {
  cover: "封面",
  titlePage: "标题页",
  generated: "生成时间",
  chapterCount: "总章节数",
  chapter: (number) => `第${number}章`,
};

/** Chinese labels for any `zh` tag, English otherwise */
export function labelsFor(language: string): PageLabels {
  return /^zh(?:-|$)/i.test(language.trim()) ? CHINESE_LABELS : ENGLISH_LABELS;
}

/**
 * Heading used for the content page and navigation label:
 * "Chapter 3 The Storm" / "第3章 The Storm", or just the prefix when the
 * title is blank.
 */
export function chapterHeading(chapter: Chapter, language: string): string {
  const prefix = labelsFor(language).chapter(chapter.number);
  const title = chapter.title.trim();
  return title ? `${prefix} ${title}` : prefix;
}
