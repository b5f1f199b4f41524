import { describe, expect, it } from "vitest";
import { ContentCompressor } from "./compression";

describe("ContentCompressor", () => {
  const text = "lorem ipsum ".repeat(16);

  it("stores text verbatim when disabled", () => {
    const c = new ContentCompressor(false);
    const stored = c.pack(text);
    expect(stored).toEqual({ kind: "plain", text });
    c.track(stored);
    expect(c.stats()).toEqual({
      enabled: false,
      compressionRatio: 1,
      compressedDocuments: 0,
      originalBytes: 0,
      compressedBytes: 0,
    });
  });

  it("deflates and restores text", () => {
    const c = new ContentCompressor(true);
    const stored = c.pack(text);
    expect(stored.kind).toBe("deflated");
    expect(c.unpack(stored)).toBe(text);
  });

  it("tracks totals for live entries only", () => {
    const c = new ContentCompressor(true);
    const a = c.pack(text);
    const b = c.pack("short");
    c.track(a);
    c.track(b);
    expect(c.stats().compressedDocuments).toBe(2);
    expect(c.stats().originalBytes).toBe(text.length + 5);

    c.untrack(b);
    const stats = c.stats();
    expect(stats.compressedDocuments).toBe(1);
    expect(stats.originalBytes).toBe(text.length);
    expect(stats.compressionRatio).toBeLessThanOrEqual(0.5);

    c.reset();
    expect(c.stats().compressionRatio).toBe(1);
  });
});
