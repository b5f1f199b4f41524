import { deflateRawSync, inflateRawSync } from "node:zlib";

/** Document text as held in the cache: verbatim, or raw-DEFLATE bytes. */
export type StoredText =
  | { readonly kind: "plain"; readonly text: string }
  | { readonly kind: "deflated"; readonly bytes: Buffer; readonly originalBytes: number };

export interface CompressionStats {
  enabled: boolean;
  /** compressedBytes / originalBytes over live entries; 1 when nothing is compressed. */
  compressionRatio: number;
  compressedDocuments: number;
  originalBytes: number;
  compressedBytes: number;
}

/**
 * Packs document previews for storage and keeps byte totals for the entries
 * currently tracked. The enabled flag is fixed for the lifetime of a cache.
 */
export class ContentCompressor {
  public readonly enabled: boolean;
  private originalBytes = 0;
  private compressedBytes = 0;
  private compressedDocuments = 0;

  public constructor(enabled: boolean) {
    this.enabled = enabled;
  }

  public pack(text: string): StoredText {
    if (!this.enabled) return { kind: "plain", text };
    return {
      kind: "deflated",
      bytes: deflateRawSync(Buffer.from(text, "utf8")),
      originalBytes: Buffer.byteLength(text, "utf8"),
    };
  }

  public unpack(stored: StoredText): string {
    return stored.kind === "plain" ? stored.text : inflateRawSync(stored.bytes).toString("utf8");
  }

  /** Count a stored value that entered the cache. */
  public track(stored: StoredText): void {
    if (stored.kind !== "deflated") return;
    this.originalBytes += stored.originalBytes;
    this.compressedBytes += stored.bytes.length;
    this.compressedDocuments++;
  }

  /** Reverse {@link track} for a value leaving the cache. */
  public untrack(stored: StoredText): void {
    if (stored.kind !== "deflated") return;
    this.originalBytes -= stored.originalBytes;
    this.compressedBytes -= stored.bytes.length;
    this.compressedDocuments--;
  }

  public reset(): void {
    this.originalBytes = 0;
    this.compressedBytes = 0;
    this.compressedDocuments = 0;
  }

  public stats(): CompressionStats {
    return {
      enabled: this.enabled,
      compressionRatio: this.originalBytes > 0 ? this.compressedBytes / this.originalBytes : 1,
      compressedDocuments: this.compressedDocuments,
      originalBytes: this.originalBytes,
      compressedBytes: this.compressedBytes,
    };
  }
}
