import { XMLBuilder } from "fast-xml-parser";
import { chapterHeading, chapterHref, chapterId, labelsFor, sortChapters } from "../book";
import type { Chapter, EpubBook, EpubDocument } from "../types";

export const EPUB_MIMETYPE = "application/epub+zip";
const OPF_PATH = "OEBPS/content.opf";

const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;
const XHTML_NS = "http://www.w3.org/1999/xhtml";

const CHAPTER_CSS = `
body { font-family: serif; margin: 2em; line-height: 1.6; }
h1 { text-align: center; margin-bottom: 1em; }
p { text-indent: 2em; margin: 0.5em 0; }
`;

const COVER_CSS = `
body { font-family: serif; margin: 0; padding: 0; text-align: center; background: #5a4f9a; color: #fff; }
.cover-content { max-width: 600px; margin: 0 auto; padding: 30% 2em 2em; }
h1 { font-size: 2.5em; margin-bottom: 0.5em; }
h2 { font-size: 1.5em; margin-top: 0; font-weight: normal; }
`;

const TITLE_PAGE_CSS = `
body { font-family: serif; margin: 2em; line-height: 1.6; }
.title-page { text-align: center; margin-top: 4em; }
h1 { font-size: 2.5em; margin-bottom: 0.5em; }
h2 { font-size: 1.5em; margin-bottom: 2em; font-weight: normal; }
.info { margin: 3em auto 0; max-width: 400px; text-align: left; }
`;

type XmlNode = Record<string, unknown>;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

function serialize(tree: XmlNode): string {
  return `${XML_DECLARATION}\n${builder.build(tree).trim()}\n`;
}

interface BuildContext {
  identifier: string;
  generatedAt: Date;
}

/**
 * Render every part of the package except `mimetype`, which the archive
 * writer handles itself. Chapters are emitted in ascending number order.
 */
export function buildEpubDocuments(book: EpubBook, context: BuildContext): EpubDocument[] {
  const chapters = sortChapters(book.chapters);

  return [
    { path: "META-INF/container.xml", content: buildContainerXml() },
    { path: OPF_PATH, content: buildContentOpf(book, chapters, context.identifier) },
    { path: "OEBPS/toc.ncx", content: buildTocNcx(book, chapters, context.identifier) },
    { path: "OEBPS/cover.xhtml", content: buildCoverPage(book) },
    { path: "OEBPS/title.xhtml", content: buildTitlePage(book, context.generatedAt) },
    ...chapters.map((ch) => ({
      path: `OEBPS/${chapterHref(ch.number)}`,
      content: buildChapterPage(book, ch),
    })),
  ];
}

export function buildContainerXml(): string {
  return serialize({
    container: {
      "@_version": "1.0",
      "@_xmlns": "urn:oasis:names:tc:opendocument:xmlns:container",
      rootfiles: {
        rootfile: {
          "@_full-path": OPF_PATH,
          "@_media-type": "application/oebps-package+xml",
        },
      },
    },
  });
}

export function buildContentOpf(book: EpubBook, chapters: Chapter[], identifier: string): string {
  const { title, author, language } = book.metadata;

  const manifestItems = [
    { "@_id": "ncx", "@_href": "toc.ncx", "@_media-type": "application/x-dtbncx+xml" },
    { "@_id": "cover", "@_href": "cover.xhtml", "@_media-type": "application/xhtml+xml" },
    { "@_id": "title", "@_href": "title.xhtml", "@_media-type": "application/xhtml+xml" },
    ...chapters.map((ch) => ({
      "@_id": chapterId(ch.number),
      "@_href": chapterHref(ch.number),
      "@_media-type": "application/xhtml+xml",
    })),
  ];

  const spineItems = [
    { "@_idref": "cover" },
    { "@_idref": "title" },
    ...chapters.map((ch) => ({ "@_idref": chapterId(ch.number) })),
  ];

  return serialize({
    package: {
      "@_version": "2.0",
      "@_xmlns": "http://www.idpf.org/2007/opf",
      "@_unique-identifier": "bookid",
      metadata: {
        "@_xmlns:dc": "http://purl.org/dc/elements/1.1/",
        "@_xmlns:opf": "http://www.idpf.org/2007/opf",
        "dc:title": title,
        "dc:creator": author,
        "dc:language": language,
        "dc:identifier": { "@_id": "bookid", "#text": identifier },
        meta: { "@_name": "cover", "@_content": "cover" },
      },
      manifest: { item: manifestItems },
      spine: { "@_toc": "ncx", itemref: spineItems },
      guide: {
        reference: { "@_type": "cover", "@_title": labelsFor(language).cover, "@_href": "cover.xhtml" },
      },
    },
  });
}

export function buildTocNcx(book: EpubBook, chapters: Chapter[], identifier: string): string {
  const { language } = book.metadata;
  const labels = labelsFor(language);
  const entries = [
    { id: "cover", label: labels.cover, src: "cover.xhtml" },
    { id: "title", label: labels.titlePage, src: "title.xhtml" },
    ...chapters.map((ch) => ({
      id: chapterId(ch.number),
      label: chapterHeading(ch, language),
      src: chapterHref(ch.number),
    })),
  ];

  return serialize({
    ncx: {
      "@_version": "2005-1",
      "@_xmlns": "http://www.daisy.org/z3986/2005/ncx/",
      head: {
        meta: [
          { "@_name": "dtb:uid", "@_content": identifier },
          { "@_name": "dtb:depth", "@_content": "1" },
          { "@_name": "dtb:totalPageCount", "@_content": "0" },
          { "@_name": "dtb:maxPageNumber", "@_content": "0" },
        ],
      },
      docTitle: { text: book.metadata.title },
      navMap: {
        navPoint: entries.map((entry, i) => ({
          "@_id": entry.id,
          "@_playOrder": String(i + 1),
          navLabel: { text: entry.label },
          content: { "@_src": entry.src },
        })),
      },
    },
  });
}

function xhtmlPage(language: string, title: string, css: string, body: XmlNode): string {
  return serialize({
    html: {
      "@_xmlns": XHTML_NS,
      "@_xml:lang": language,
      head: {
        title,
        meta: {
          "@_http-equiv": "Content-Type",
          "@_content": "application/xhtml+xml; charset=utf-8",
        },
        style: { "@_type": "text/css", "#text": css },
      },
      body,
    },
  });
}

// Control characters XML 1.0 does not allow in documents
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

/**
 * Content lines are trimmed and blank ones dropped; each remaining line is
 * its own paragraph. Text goes in as character data, so markup in the source
 * ends up escaped rather than interpreted.
 */
export function chapterParagraphs(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(XML_INVALID_CHARS, "").trim())
    .filter((line) => line.length > 0);
}

export function buildChapterPage(book: EpubBook, chapter: Chapter): string {
  const heading = chapterHeading(chapter, book.metadata.language);
  const paragraphs = chapterParagraphs(chapter.content);
  const body: XmlNode = { h1: heading };
  if (paragraphs.length > 0) {
    body.p = paragraphs;
  }
  return xhtmlPage(book.metadata.language, heading, CHAPTER_CSS, body);
}

export function buildCoverPage(book: EpubBook): string {
  const { title, author, language } = book.metadata;
  return xhtmlPage(language, labelsFor(language).cover, COVER_CSS, {
    div: { "@_class": "cover-content", h1: title, h2: author },
  });
}

export function buildTitlePage(book: EpubBook, generatedAt: Date): string {
  const { title, author, language } = book.metadata;
  const labels = labelsFor(language);
  return xhtmlPage(language, labels.titlePage, TITLE_PAGE_CSS, {
    div: [
      { "@_class": "title-page", h1: title, h2: author },
      {
        "@_class": "info",
        p: [
          `${labels.generated}: ${formatTimestamp(generatedAt)}`,
          `${labels.chapterCount}: ${book.chapters.length}`,
        ],
      },
    ],
  });
}

/** Local time as YYYY-MM-DD HH:mm */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}
