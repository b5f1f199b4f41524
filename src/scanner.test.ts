import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { DocumentScanner } from "./scanner";
import { makeCorpus, removeCorpus } from "./test-helpers";

describe("DocumentScanner", () => {
  let root = "";
  const many: Record<string, string> = {};
  for (let i = 0; i < 15; i++) {
    const n = String(i).padStart(2, "0");
    many[`bindings/core/rule-${n}.md`] = `# Rule ${n}\n\nBody ${n}.\n`;
  }

  beforeAll(async () => {
    root = await makeCorpus({
      ...many,
      "tenets/broken.md": "---\ntitle: [unclosed\n---\n# Broken Front Matter\n\nStill indexed.\n",
    });
  });

  afterAll(async () => {
    await removeCorpus(root);
  });

  const abs = (rel: string) => path.join(root, rel);

  it("clamps pool settings", () => {
    const scanner = new DocumentScanner({ parallelThreshold: 1, maxWorkers: 99 });
    expect(scanner.parallelThreshold).toBe(5);
    expect(scanner.maxWorkers).toBe(8);
  });

  it("scans small batches sequentially and skips missing files", async () => {
    const scanner = new DocumentScanner();
    const docs = await scanner.scanDocuments([
      abs("bindings/core/rule-00.md"),
      abs("bindings/core/gone.md"),
      abs("bindings/core/rule-01.md"),
    ]);
    expect(docs.map((d) => d.title)).toEqual(["Rule 00", "Rule 01"]);
    expect(scanner.scanStatistics()).toMatchObject({
      filesScanned: 3,
      sequentialBatches: 1,
      parallelBatches: 0,
      failedFiles: 1,
    });
  });

  it("uses the worker pool for large batches and keeps input order", async () => {
    const scanner = new DocumentScanner({ maxWorkers: 3 });
    const paths = Object.keys(many).reverse().map(abs);
    const docs = await scanner.scanDocuments(paths);
    expect(docs.map((d) => d.path)).toEqual(paths);
    const stats = scanner.scanStatistics();
    expect(stats.parallelBatches).toBe(1);
    expect(stats.sequentialBatches).toBe(0);
    expect(stats.filesScanned).toBe(15);
    expect(stats.totalBytesProcessed).toBe(
      Object.values(many).reduce((n, s) => n + Buffer.byteLength(s), 0),
    );
  });

  it("switches to the pool at exactly the threshold", async () => {
    const paths = Object.keys(many).map(abs);
    const cases: [number, { sequentialBatches: number; parallelBatches: number }][] = [
      [5, { sequentialBatches: 1, parallelBatches: 0 }],
      [9, { sequentialBatches: 1, parallelBatches: 0 }],
      [10, { sequentialBatches: 0, parallelBatches: 1 }],
      [15, { sequentialBatches: 0, parallelBatches: 1 }],
    ];
    for (const [count, batches] of cases) {
      const scanner = new DocumentScanner();
      const docs = await scanner.scanDocuments(paths.slice(0, count));
      expect(docs).toHaveLength(count);
      expect(scanner.scanStatistics()).toMatchObject({ ...batches, filesScanned: count, failedFiles: 0 });
    }
  });

  it("derives category and type below its docs root", async () => {
    const scanner = new DocumentScanner({ docsRoot: root });
    const doc = await scanner.scanDocument(abs("bindings/core/rule-03.md"));
    expect(doc).toMatchObject({ type: "binding", category: "core", title: "Rule 03" });
  });

  it("indexes documents with corrupt front matter", async () => {
    const scanner = new DocumentScanner();
    const doc = await scanner.scanDocument(abs("tenets/broken.md"));
    expect(doc?.title).toBe("Broken Front Matter");
    expect(doc?.metadata).toEqual({});
    expect(scanner.scanStatistics().frontMatterErrors).toBe(1);
  });

  it("resolves undefined for a missing file and resets counters", async () => {
    const scanner = new DocumentScanner();
    expect(await scanner.scanDocument(abs("nope.md"))).toBeUndefined();
    expect(scanner.scanStatistics().filesScanned).toBe(1);
    scanner.resetStatistics();
    expect(scanner.scanStatistics()).toEqual({
      filesScanned: 0,
      parallelBatches: 0,
      sequentialBatches: 0,
      failedFiles: 0,
      frontMatterErrors: 0,
      totalBytesProcessed: 0,
      avgScanTimeMs: 0,
    });
  });
});
