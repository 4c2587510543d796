import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";

const ARRAY_TAGS = new Set(["item", "itemref", "navPoint", "p", "meta", "div"]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  isArray: (name, _jPath, _isLeaf, isAttribute) => !isAttribute && ARRAY_TAGS.has(name),
});

export function parseXml(xml: string) {
  return xmlParser.parse(xml);
}

export async function makeTempDir(prefix = "novel-epub-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function readEntry(zip: JSZip, name: string): Promise<string> {
  const file = zip.file(name);
  if (!file) {
    throw new Error(`Missing archive entry ${name}`);
  }
  return file.async("string");
}

/** Names of file entries (folders excluded) in archive order */
export function fileEntries(zip: JSZip): string[] {
  return Object.values(zip.files)
    .filter((f) => !f.dir)
    .map((f) => f.name);
}

export interface LocalEntry {
  name: string;
  /** 0 = stored, 8 = deflate */
  method: number;
  /** Raw entry bytes as UTF-8, only readable text when stored */
  data: string;
}

/**
 * Walk the local file headers of a zip in the order they were written.
 * Assumes sizes are in the headers (no data descriptors), which is how JSZip
 * writes unless streamFiles is set.
 */
export function localEntries(buffer: Buffer): LocalEntry[] {
  const entries: LocalEntry[] = [];
  let offset = 0;

  while (offset + 30 <= buffer.length && buffer.readUInt32LE(offset) === 0x04034b50) {
    const method = buffer.readUInt16LE(offset + 8);
    const compressedSize = buffer.readUInt32LE(offset + 18);
    const nameLength = buffer.readUInt16LE(offset + 26);
    const extraLength = buffer.readUInt16LE(offset + 28);
    const nameStart = offset + 30;
    const dataStart = nameStart + nameLength + extraLength;

    entries.push({
      name: buffer.toString("utf-8", nameStart, nameStart + nameLength),
      method,
      data: buffer.toString("utf-8", dataStart, dataStart + compressedSize),
    });
    offset = dataStart + compressedSize;
  }

  return entries;
}
