/** Kind of standards document, derived from its directory (`tenets/` vs `bindings/`). */
export type DocumentType = "tenet" | "binding";

/**
 * A scanned markdown document. One entry per `path` lives in the cache index;
 * re-scanning a path replaces it.
 */
export interface Document {
  /** Front-matter `id`, or the file name without extension. */
  readonly id: string;
  /** First markdown heading, else front-matter `title`, else the normalized file name. */
  readonly title: string;
  /** File location; primary key of cache entries. */
  readonly path: string;
  /** `core`, or the directory name under `categories/`. */
  readonly category: string;
  readonly type: DocumentType;
  /** Front-matter key/value pairs normalized to strings. */
  readonly metadata: Readonly<Record<string, string>>;
  /** Leading body text used for search scoring and display. */
  readonly contentPreview: string;
  /** SHA-256 of the raw file content. */
  readonly contentHash: string;
  /** Byte length of the raw (uncompressed) content. */
  readonly size: number;
  readonly modifiedTime: Date;
  readonly scanTime: Date;
}

/** Field a search match was found in. */
export type SearchField = "title" | "id" | "content" | "category";

export interface SearchMatch {
  readonly field: SearchField;
  readonly kind: "exact" | "fuzzy";
  /** Text that matched: the field value for exact hits, the closest title words for fuzzy ones. */
  readonly term: string;
}

export interface SearchResult {
  readonly document: Document;
  readonly score: number;
  readonly matches: readonly SearchMatch[];
}

/** Background warm-up lifecycle. */
export type WarmState = "cold" | "warming" | "warm";

/** Outcome of one freshness pass over the discovered document paths. */
export interface RefreshSummary {
  /** Paths returned by discovery. */
  discovered: number;
  /** Files whose recorded mtime/size matched and were served from memory. */
  hits: number;
  /** Files that required a fresh scan. */
  misses: number;
  /** Entries dropped because their file vanished or could no longer be scanned. */
  removed: number;
  /** True when this pass was the first one or changed the index. */
  scanned: boolean;
  elapsedMs: number;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
