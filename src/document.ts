import { createHash } from "node:crypto";
import path from "node:path";
import type { MarkdownFile } from "./markdown";
import type { Document, DocumentType } from "./types";

/** Characters of body text kept for search previews. */
export const CONTENT_PREVIEW_LENGTH = 200;

const HEADING = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const FENCE = /^(```|~~~)/;

function segments(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter(Boolean);
}

/**
 * Path of `filePath` below `docsRoot`, so directories above the corpus never
 * influence category or type. Paths outside the root are used as given.
 */
export function layoutPath(filePath: string, docsRoot?: string): string {
  if (!docsRoot) return filePath;
  const rel = path.relative(docsRoot, filePath);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return filePath;
  return rel;
}

/** `categories/<name>/` wins; `core/` and `tenets/` both map to `core`. */
export function deriveCategory(filePath: string): string {
  const parts = segments(filePath);
  const idx = parts.lastIndexOf("categories");
  // The segment after `categories` must be a directory, not the file itself.
  if (idx >= 0 && idx + 2 < parts.length) return parts[idx + 1];
  if (parts.includes("core") || parts.includes("tenets")) return "core";
  return "unknown";
}

/** Everything outside `tenets/` is a binding. */
export function deriveType(filePath: string): DocumentType {
  return segments(filePath).includes("tenets") ? "tenet" : "binding";
}

/** `no-any_rule.md` -> `No any rule`. */
export function titleFromFilename(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath)).replace(/[-_]+/g, " ").trim();
  if (!base) return "Untitled";
  return base.charAt(0).toUpperCase() + base.slice(1).toLowerCase();
}

/** First ATX heading outside fenced code, or undefined. */
export function firstHeading(body: string): string | undefined {
  let inFence = false;
  for (const line of body.split(/\r?\n/)) {
    const stripped = line.trim();
    if (FENCE.test(stripped)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    const m = HEADING.exec(stripped);
    if (m && m[1].trim()) return m[1].trim();
  }
  return undefined;
}

export function extractTitle(
  body: string,
  frontMatter: Record<string, unknown>,
  filePath: string,
): string {
  const heading = firstHeading(body);
  if (heading) return heading;
  const fmTitle = frontMatter.title;
  if (typeof fmTitle === "string" && fmTitle.trim()) return fmTitle.trim();
  return titleFromFilename(filePath);
}

/**
 * Collect non-empty, non-heading lines until the preview length is reached,
 * then cut back to a word boundary and mark the truncation.
 */
export function extractContentPreview(body: string): string {
  let preview = "";
  for (const line of body.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped || stripped.startsWith("#")) continue;
    preview += stripped + " ";
    if (preview.length >= CONTENT_PREVIEW_LENGTH) break;
  }
  if (preview.length > CONTENT_PREVIEW_LENGTH) {
    preview = preview.slice(0, CONTENT_PREVIEW_LENGTH);
    const lastSpace = preview.lastIndexOf(" ");
    if (lastSpace > 0) preview = preview.slice(0, lastSpace);
    return preview.trim() + "...";
  }
  return preview.trim();
}

function metadataValue(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
  }
  if (Array.isArray(value)) {
    return value
      .map(metadataValue)
      .filter((v): v is string => v !== undefined)
      .join(", ");
  }
  return JSON.stringify(value);
}

/** Flatten YAML front matter into string pairs. */
export function normalizeMetadata(frontMatter: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(frontMatter)) {
    const v = metadataValue(value);
    if (v !== undefined) out[key] = v;
  }
  return out;
}

function documentId(frontMatter: Record<string, unknown>, filePath: string): string {
  const id = frontMatter.id;
  if (typeof id === "string" && id.trim()) return id.trim();
  if (typeof id === "number") return String(id);
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Assemble a {@link Document} from a parsed file. Category and type come from
 * the part of the path below `docsRoot` when one is given.
 */
export function buildDocument(
  filePath: string,
  file: MarkdownFile,
  scanTime = new Date(),
  docsRoot?: string,
): Document {
  const layout = layoutPath(filePath, docsRoot);
  return {
    id: documentId(file.frontMatter, filePath),
    title: extractTitle(file.body, file.frontMatter, filePath),
    path: filePath,
    category: deriveCategory(layout),
    type: deriveType(layout),
    metadata: normalizeMetadata(file.frontMatter),
    contentPreview: extractContentPreview(file.body),
    contentHash: createHash("sha256").update(file.raw).digest("hex"),
    size: file.size,
    modifiedTime: file.modifiedTime,
    scanTime,
  };
}
