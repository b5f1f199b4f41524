import { describe, expect, it } from "vitest";
import { buildPerformanceStats, OperationTimer, ratio, summarizeOperations } from "./stats";

describe("OperationTimer", () => {
  it("aggregates samples and keeps the last ten", () => {
    const timer = new OperationTimer();
    for (let i = 1; i <= 12; i++) timer.record("search", i);
    const search = timer.snapshot().search;
    expect(search).toEqual({
      count: 12,
      totalMs: 78,
      avgMs: 6.5,
      minMs: 1,
      maxMs: 12,
      recentMs: [3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
    });
  });

  it("records failed operations too", async () => {
    const timer = new OperationTimer();
    await expect(timer.time("findDocument", () => Promise.reject(new Error("nope")))).rejects.toThrow(
      "nope",
    );
    expect(timer.snapshot().findDocument?.count).toBe(1);
  });
});

describe("summarizeOperations", () => {
  it("flags operations averaging over the target", () => {
    const timer = new OperationTimer();
    timer.record("search", 10);
    timer.record("suggest", 1500);
    expect(summarizeOperations(timer.snapshot())).toEqual({
      totalOperations: 2,
      totalOperationTimeMs: 1510,
      avgOperationTimeMs: 755,
      performanceTargetMet: false,
    });
  });

  it("treats no operations as on target", () => {
    expect(summarizeOperations({})).toEqual({
      totalOperations: 0,
      totalOperationTimeMs: 0,
      avgOperationTimeMs: 0,
      performanceTargetMet: true,
    });
  });
});

it("derives ratios from counters", () => {
  expect(ratio(1, 0)).toBe(0);
  const stats = buildPerformanceStats({
    counters: {
      hitCount: 3,
      missCount: 1,
      scanCount: 1,
      evictionCount: 0,
      queryCount: 4,
      indexServedCount: 1,
    },
    documentCount: 2,
    categoryCount: 1,
    memoryUsage: 100,
    memoryLimit: 1000,
    lastScan: undefined,
    warmState: "cold",
    compressionStats: {
      enabled: false,
      compressionRatio: 1,
      compressedDocuments: 0,
      originalBytes: 0,
      compressedBytes: 0,
    },
    operationMetrics: {},
  });
  expect(stats.hitRatio).toBe(0.75);
  expect(stats.indexServedRatio).toBe(0.25);
  expect(stats.lastScan).toBeNull();
});
