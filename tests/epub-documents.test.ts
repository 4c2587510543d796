import { describe, it, expect } from "vitest";
import { XMLValidator } from "fast-xml-parser";
import { createBook } from "../app/lib/book";
import {
  buildChapterPage,
  buildContainerXml,
  buildEpubDocuments,
  chapterParagraphs,
  formatTimestamp,
} from "../app/lib/processing/epub-documents";
import { parseXml } from "./helpers";

const context = {
  identifier: "urn:uuid:00000000-0000-4000-8000-000000000001",
  generatedAt: new Date(2024, 0, 5, 9, 7),
};

const demoBook = createBook({
  title: "Demo",
  author: "Tester",
  chapters: [
    { number: 2, title: "Two", content: "Line A\nLine B" },
    { number: 1, title: "One", content: "Only line" },
  ],
});

interface NavPointNode {
  "@_id": string;
  "@_playOrder": string;
  navLabel: { text: string };
  content: { "@_src": string };
}

function documentMap(book = demoBook): Map<string, string> {
  return new Map(buildEpubDocuments(book, context).map((doc) => [doc.path, doc.content]));
}

describe("epub-documents", () => {
  it("should generate every required part except mimetype", () => {
    const paths = buildEpubDocuments(demoBook, context).map((doc) => doc.path);

    expect(paths).toEqual([
      "META-INF/container.xml",
      "OEBPS/content.opf",
      "OEBPS/toc.ncx",
      "OEBPS/cover.xhtml",
      "OEBPS/title.xhtml",
      "OEBPS/chapter_1.xhtml",
      "OEBPS/chapter_2.xhtml",
    ]);
  });

  it("should produce well-formed XML with a declaration for every part", () => {
    for (const doc of buildEpubDocuments(demoBook, context)) {
      expect(XMLValidator.validate(doc.content)).toBe(true);
      expect(doc.content.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n')).toBe(true);
    }
  });

  describe("container.xml", () => {
    it("should point at the package document", () => {
      const doc = parseXml(buildContainerXml());
      const rootfile = doc.container.rootfiles.rootfile;

      expect(doc.container["@_xmlns"]).toBe("urn:oasis:names:tc:opendocument:xmlns:container");
      expect(rootfile["@_full-path"]).toBe("OEBPS/content.opf");
      expect(rootfile["@_media-type"]).toBe("application/oebps-package+xml");
    });
  });

  describe("content.opf", () => {
    const opf = parseXml(documentMap().get("OEBPS/content.opf") ?? "").package;

    it("should carry title, author, language and identifier", () => {
      expect(opf["@_version"]).toBe("2.0");
      expect(opf["@_unique-identifier"]).toBe("bookid");
      expect(opf.metadata["dc:title"]).toBe("Demo");
      expect(opf.metadata["dc:creator"]).toBe("Tester");
      expect(opf.metadata["dc:language"]).toBe("zh-CN");
      expect(opf.metadata["dc:identifier"]["#text"]).toBe(context.identifier);
      expect(opf.metadata["dc:identifier"]["@_id"]).toBe("bookid");
      expect(opf.metadata.meta[0]["@_name"]).toBe("cover");
    });

    it("should list fixed items then chapters in ascending order", () => {
      const items = opf.manifest.item.map((item: Record<string, string>) => [
        item["@_id"],
        item["@_href"],
        item["@_media-type"],
      ]);

      expect(items).toEqual([
        ["ncx", "toc.ncx", "application/x-dtbncx+xml"],
        ["cover", "cover.xhtml", "application/xhtml+xml"],
        ["title", "title.xhtml", "application/xhtml+xml"],
        ["chapter_1", "chapter_1.xhtml", "application/xhtml+xml"],
        ["chapter_2", "chapter_2.xhtml", "application/xhtml+xml"],
      ]);
    });

    it("should order the spine cover, title, then chapters", () => {
      expect(opf.spine["@_toc"]).toBe("ncx");
      expect(opf.spine.itemref.map((ref: Record<string, string>) => ref["@_idref"])).toEqual([
        "cover",
        "title",
        "chapter_1",
        "chapter_2",
      ]);
    });

    it("should reference the cover in the guide", () => {
      expect(opf.guide.reference["@_type"]).toBe("cover");
      expect(opf.guide.reference["@_href"]).toBe("cover.xhtml");
    });
  });

  describe("toc.ncx", () => {
    const ncx = parseXml(documentMap().get("OEBPS/toc.ncx") ?? "").ncx;

    it("should share the package identifier", () => {
      const metas = Object.fromEntries(
        ncx.head.meta.map((meta: Record<string, string>) => [meta["@_name"], meta["@_content"]]),
      );
      expect(metas).toEqual({
        "dtb:uid": context.identifier,
        "dtb:depth": "1",
        "dtb:totalPageCount": "0",
        "dtb:maxPageNumber": "0",
      });
      expect(ncx.docTitle.text).toBe("Demo");
    });

    it("should number nav points from 1 in reading order", () => {
      const points = ncx.navMap.navPoint.map((point: NavPointNode) => [
        point["@_id"],
        point["@_playOrder"],
        point.navLabel.text,
        point.content["@_src"],
      ]);

      expect(points).toEqual([
        ["cover", "1", "封面", "cover.xhtml"],
        ["title", "2", "标题页", "title.xhtml"],
        ["chapter_1", "3", "第1章 One", "chapter_1.xhtml"],
        ["chapter_2", "4", "第2章 Two", "chapter_2.xhtml"],
      ]);
    });
  });

  describe("chapter pages", () => {
    it("should render the heading and one paragraph per line", () => {
      const docs = documentMap();
      const one = parseXml(docs.get("OEBPS/chapter_1.xhtml") ?? "").html;
      const two = parseXml(docs.get("OEBPS/chapter_2.xhtml") ?? "").html;

      expect(one["@_xmlns"]).toBe("http://www.w3.org/1999/xhtml");
      expect(one["@_xml:lang"]).toBe("zh-CN");
      expect(one.head.title).toBe("第1章 One");
      expect(one.body.h1).toBe("第1章 One");
      expect(one.body.p).toEqual(["Only line"]);
      expect(two.body.p).toEqual(["Line A", "Line B"]);
    });

    it("should escape markup in chapter text instead of interpreting it", () => {
      const book = createBook({ title: "Escapes" });
      const xhtml = buildChapterPage(book, { number: 1, title: "A & B", content: "<b>bold</b> & more" });

      expect(xhtml).toContain("<p>&lt;b&gt;bold&lt;/b&gt; &amp; more</p>");
      expect(XMLValidator.validate(xhtml)).toBe(true);
      expect(parseXml(xhtml).html.body.p).toEqual(["<b>bold</b> & more"]);
      expect(parseXml(xhtml).html.body.h1).toBe("第1章 A & B");
    });

    it("should render a chapter with no text as a heading only", () => {
      const book = createBook({ title: "Empty" });
      const body = parseXml(buildChapterPage(book, { number: 4, title: "", content: "\n  \n" })).html.body;

      expect(body.h1).toBe("第4章");
      expect(body.p).toBeUndefined();
    });
  });

  describe("cover and title pages", () => {
    it("should show title and author on the cover", () => {
      const cover = parseXml(documentMap().get("OEBPS/cover.xhtml") ?? "").html;

      expect(cover.head.title).toBe("封面");
      expect(cover.body.div[0]["@_class"]).toBe("cover-content");
      expect(cover.body.div[0].h1).toBe("Demo");
      expect(cover.body.div[0].h2).toBe("Tester");
    });

    it("should show the generation time and chapter count on the title page", () => {
      const page = parseXml(documentMap().get("OEBPS/title.xhtml") ?? "").html;
      const [heading, info] = page.body.div;

      expect(heading.h1).toBe("Demo");
      expect(heading.h2).toBe("Tester");
      expect(info["@_class"]).toBe("info");
      expect(info.p).toEqual(["生成时间: 2024-01-05 09:07", "总章节数: 2"]);
    });

    it("should use English labels for a book in English", () => {
      const book = createBook({
        title: "Demo",
        author: "Tester",
        language: "en",
        chapters: [{ number: 1, title: "One", content: "x" }],
      });
      const docs = documentMap(book);

      const ncx = parseXml(docs.get("OEBPS/toc.ncx") ?? "").ncx;
      expect(ncx.navMap.navPoint.map((point: NavPointNode) => point.navLabel.text)).toEqual([
        "Cover",
        "Title Page",
        "Chapter 1 One",
      ]);
      expect(parseXml(docs.get("OEBPS/content.opf") ?? "").package.guide.reference["@_title"]).toBe("Cover");
      expect(parseXml(docs.get("OEBPS/cover.xhtml") ?? "").html.head.title).toBe("Cover");

      const title = parseXml(docs.get("OEBPS/title.xhtml") ?? "").html;
      expect(title.head.title).toBe("Title Page");
      expect(title.body.div[1].p).toEqual(["Generated: 2024-01-05 09:07", "Chapters: 1"]);
    });
  });

  describe("duplicate chapter numbers", () => {
    it("should keep duplicate ids in manifest, spine and navigation", () => {
      const book = createBook({
        title: "Dupes",
        chapters: [
          { number: 3, title: "A", content: "first" },
          { number: 3, title: "B", content: "second" },
        ],
      });
      const docs = buildEpubDocuments(book, context);
      const opf = parseXml(docs.find((d) => d.path === "OEBPS/content.opf")?.content ?? "").package;
      const ncx = parseXml(docs.find((d) => d.path === "OEBPS/toc.ncx")?.content ?? "").ncx;

      const manifestIds = opf.manifest.item.map((item: Record<string, string>) => item["@_id"]);
      expect(manifestIds.filter((id: string) => id === "chapter_3")).toHaveLength(2);
      expect(opf.spine.itemref.map((ref: Record<string, string>) => ref["@_idref"])).toEqual([
        "cover",
        "title",
        "chapter_3",
        "chapter_3",
      ]);
      expect(ncx.navMap.navPoint.map((p: Record<string, string>) => p["@_playOrder"])).toEqual(["1", "2", "3", "4"]);
      expect(docs.filter((d) => d.path === "OEBPS/chapter_3.xhtml")).toHaveLength(2);
    });
  });

  describe("helpers", () => {
    it("should drop blank lines and trim paragraphs", () => {
      expect(chapterParagraphs("  a \n\n b\r\n  ")).toEqual(["a", "b"]);
      expect(chapterParagraphs("")).toEqual([]);
    });

    it("should strip control characters XML does not allow", () => {
      expect(chapterParagraphs("a\u0001b\u0008\n\u000Bc\td")).toEqual(["ab", "c\td"]);

      const xhtml = buildChapterPage(createBook({ title: "Noise" }), { number: 1, title: "", content: "bad\u0001text" });
      expect(xhtml).toContain("<p>badtext</p>");
    });

    it("should format timestamps as local YYYY-MM-DD HH:mm", () => {
      expect(formatTimestamp(new Date(2024, 0, 5, 9, 7))).toBe("2024-01-05 09:07");
      expect(formatTimestamp(new Date(2023, 11, 31, 23, 59))).toBe("2023-12-31 23:59");
    });
  });
});
