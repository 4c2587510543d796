import { existsSync } from "fs";
import { readdir, readFile } from "fs/promises";
import { join } from "path";
import { createBook } from "../book";
import type { Chapter, ExportOptions } from "../types";
import { exportTo } from "./epub-export";

const CHAPTER_FILE_PATTERN = /^chapter_(\d+)\.txt$/;

export function parseChapterFileName(fileName: string): number | null {
  const match = fileName.match(CHAPTER_FILE_PATTERN);
  if (!match) return null;
  const number = parseInt(match[1], 10);
  return Number.isSafeInteger(number) ? number : null;
}

/**
 * Split a chapter file into title and body.
 *
 * The first non-blank line is the heading. A "第3章" or "Chapter 3" prefix
 * matching the chapter's own number is stripped (with an optional : - . after
 * it) and the rest is the title; any other line is taken whole as the title.
 * The body is everything after the heading line.
 */
export function parseChapterText(number: number, text: string): { title: string; content: string } {
  const lines = text.split(/\r?\n/);
  const headingIndex = lines.findIndex((line) => line.trim().length > 0);
  if (headingIndex === -1) {
    return { title: "", content: "" };
  }

  const heading = lines[headingIndex].trim();
  const prefix = new RegExp(`^(?:第\\s*${number}\\s*章|chapter\\s+${number}(?!\\d))\\s*[:：.\\-]?\\s*`, "i");
  const title = heading.replace(prefix, "").trim();

  return {
    title,
    content: lines.slice(headingIndex + 1).join("\n"),
  };
}

/**
 * Read `<novelDir>/chapters/chapter_<N>.txt` files, ascending by N.
 * Unreadable files are skipped with a warning.
 */
export async function loadChapters(novelDir: string): Promise<Chapter[]> {
  const chaptersDir = join(novelDir, "chapters");
  const numbered = (await readdir(chaptersDir))
    .map((fileName) => ({ fileName, number: parseChapterFileName(fileName) }))
    .filter((entry): entry is { fileName: string; number: number } => entry.number !== null)
    .sort((a, b) => a.number - b.number);

  const chapters: Chapter[] = [];
  for (const { fileName, number } of numbered) {
    const chapterPath = join(chaptersDir, fileName);
    try {
      const text = await readFile(chapterPath, "utf-8");
      chapters.push({ number, ...parseChapterText(number, text) });
    } catch (error) {
      console.warn(`[Chapters] Failed to read ${chapterPath}:`, error instanceof Error ? error.message : error);
    }
  }

  return chapters;
}

interface ExportNovelInput {
  novelDir: string;
  outputPath: string;
  title: string;
  author?: string | null;
  language?: string | null;
}

/**
 * Load a novel's chapter files and export them as one EPUB.
 * Returns false when there is nothing to export or the export fails.
 */
export async function exportNovelToEpub(input: ExportNovelInput, options?: ExportOptions): Promise<boolean> {
  const chaptersDir = join(input.novelDir, "chapters");
  if (!existsSync(chaptersDir)) {
    console.error(`[Chapters] Chapters directory not found: ${chaptersDir}`);
    return false;
  }

  let chapters: Chapter[];
  try {
    chapters = await loadChapters(input.novelDir);
  } catch (error) {
    console.error(`[Chapters] Failed to list ${chaptersDir}:`, error instanceof Error ? error.message : error);
    return false;
  }

  if (chapters.length === 0) {
    console.error(`[Chapters] No chapter files found in ${chaptersDir}`);
    return false;
  }

  const book = createBook({
    title: input.title,
    author: input.author,
    language: input.language,
    chapters,
  });

  return exportTo(book, input.outputPath, options);
}
