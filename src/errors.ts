/**
 * Failures at the cache boundary, as a tagged union rather than a class
 * hierarchy. Per-file scan problems never reach this level; they are isolated
 * inside the scanner.
 */
export type CacheError =
  | { kind: "scan-failure"; message: string; path?: string }
  | { kind: "capacity-exceeded"; path: string; size: number; limit: number }
  | { kind: "not-found"; key: string };

/** Human-readable one-liner for a {@link CacheError}. */
export function describeCacheError(error: CacheError): string {
  switch (error.kind) {
    case "scan-failure":
      return error.path ? `${error.message} (${error.path})` : error.message;
    case "capacity-exceeded":
      return `Document ${error.path} needs ${error.size} bytes, more than the ${error.limit} byte cache limit`;
    case "not-found":
      return `Document not found: ${error.key}`;
  }
}

/** Thrown when a query cannot be answered at all (e.g. the corpus root is unreachable). */
export class CacheFailure extends Error {
  public readonly detail: CacheError;

  constructor(detail: CacheError) {
    super(describeCacheError(detail));
    this.name = "CacheFailure";
    this.detail = detail;
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
