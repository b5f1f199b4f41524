import fs from "node:fs/promises";
import matter from "gray-matter";
import { errorMessage } from "./errors";

/** Front-matter blocks above this size are treated as corrupt. */
export const MAX_FRONT_MATTER_SIZE = 8 * 1024;

export interface ParsedMarkdown {
  /** Parsed YAML front matter; empty when absent or unparseable. */
  frontMatter: Record<string, unknown>;
  /** Markdown body with the front-matter block removed. */
  body: string;
  /** Set when a front-matter block was present but could not be used. */
  frontMatterError?: string;
}

export interface MarkdownFile extends ParsedMarkdown {
  raw: string;
  /** UTF-8 byte length of `raw`. */
  size: number;
  modifiedTime: Date;
}

const FRONT_MATTER_BLOCK = /^---[ \t]*\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split raw markdown into front matter + body. Never throws: a broken YAML
 * block degrades to empty front matter so the document can still be indexed.
 */
export function parseMarkdown(raw: string): ParsedMarkdown {
  if (!matter.test(raw)) return { frontMatter: {}, body: raw };
  try {
    // Passing options bypasses gray-matter's module-level memo keyed by input.
    const parsed = matter(raw, {});
    if (Buffer.byteLength(parsed.matter) > MAX_FRONT_MATTER_SIZE) {
      return {
        frontMatter: {},
        body: parsed.content,
        frontMatterError: `front matter exceeds ${MAX_FRONT_MATTER_SIZE} bytes`,
      };
    }
    const data: unknown = parsed.data;
    return { frontMatter: isRecord(data) ? data : {}, body: parsed.content };
  } catch (e) {
    return {
      frontMatter: {},
      body: raw.replace(FRONT_MATTER_BLOCK, ""),
      frontMatterError: errorMessage(e),
    };
  }
}

/** Read and parse a markdown file. Rejects on I/O errors (missing file, permissions). */
export async function readMarkdownFile(filePath: string): Promise<MarkdownFile> {
  const [raw, st] = await Promise.all([fs.readFile(filePath, "utf8"), fs.stat(filePath)]);
  return {
    ...parseMarkdown(raw),
    raw,
    size: Buffer.byteLength(raw, "utf8"),
    modifiedTime: st.mtime,
  };
}
