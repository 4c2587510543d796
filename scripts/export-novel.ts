/**
 * Export a novel directory to EPUB from the command line.
 *
 *   npm run export -- <novelDir> <output.epub> --title "My Novel" [--author "Name"] [--language zh-CN]
 */

import { parseArgs } from "util";
import { resolve } from "path";
import { exportNovelToEpub } from "../app/lib/processing/chapter-loader";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    title: { type: "string" },
    author: { type: "string" },
    language: { type: "string" },
  },
});

const [novelDir, outputPath] = positionals;

if (!novelDir || !outputPath || !values.title) {
  console.error("Usage: export-novel <novelDir> <output.epub> --title <title> [--author <name>] [--language <tag>]");
  process.exit(1);
}

const ok = await exportNovelToEpub(
  {
    novelDir: resolve(novelDir),
    outputPath: resolve(outputPath),
    title: values.title,
    author: values.author,
    language: values.language,
  },
  {
    onProgress: (percent, message) => console.log(`[${String(percent).padStart(3)}%] ${message}`),
  },
);

process.exit(ok ? 0 : 1);
