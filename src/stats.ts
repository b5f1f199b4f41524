import type { CompressionStats } from "./compression";
import type { WarmState } from "./types";

export type OperationName =
  | "listCategories"
  | "showCategory"
  | "search"
  | "suggest"
  | "findDocument";

/** Samples retained per operation; the snapshot reports the most recent few. */
const MAX_SAMPLES = 100;
const RECENT_SAMPLES = 10;
/** Every operation should average below this to count as on target. */
export const OPERATION_TARGET_MS = 1000;

export interface OperationMetrics {
  count: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  recentMs: number[];
}

export interface PerformanceSummary {
  totalOperations: number;
  totalOperationTimeMs: number;
  avgOperationTimeMs: number;
  performanceTargetMet: boolean;
}

export interface PerformanceStats {
  /** File-level: checks that found a file unchanged / all file checks. */
  hitRatio: number;
  hitCount: number;
  missCount: number;
  /** Freshness passes that were the first one or changed the index. */
  scanCount: number;
  documentCount: number;
  categoryCount: number;
  memoryUsage: number;
  memoryLimit: number;
  evictionCount: number;
  queryCount: number;
  /** Query-level: queries answered without scanning or dropping anything / all queries. */
  indexServedRatio: number;
  lastScan: string | null;
  warmState: WarmState;
  compressionStats: CompressionStats;
  operationMetrics: Partial<Record<OperationName, OperationMetrics>>;
  performanceSummary: PerformanceSummary;
}

export interface CacheCounters {
  hitCount: number;
  missCount: number;
  scanCount: number;
  evictionCount: number;
  queryCount: number;
  indexServedCount: number;
}

export interface PerformanceInput {
  counters: CacheCounters;
  documentCount: number;
  categoryCount: number;
  memoryUsage: number;
  memoryLimit: number;
  lastScan: Date | undefined;
  warmState: WarmState;
  compressionStats: CompressionStats;
  operationMetrics: Partial<Record<OperationName, OperationMetrics>>;
}

export function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

interface Series {
  samples: number[];
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

/** Wall-clock timings per discovery operation. */
export class OperationTimer {
  private readonly series = new Map<OperationName, Series>();

  public async time<T>(name: OperationName, fn: () => Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      return await fn();
    } finally {
      this.record(name, performance.now() - started);
    }
  }

  public record(name: OperationName, ms: number): void {
    let s = this.series.get(name);
    if (!s) {
      s = { samples: [], count: 0, totalMs: 0, minMs: Infinity, maxMs: 0 };
      this.series.set(name, s);
    }
    s.samples.push(ms);
    if (s.samples.length > MAX_SAMPLES) s.samples.shift();
    s.count++;
    s.totalMs += ms;
    s.minMs = Math.min(s.minMs, ms);
    s.maxMs = Math.max(s.maxMs, ms);
  }

  public snapshot(): Partial<Record<OperationName, OperationMetrics>> {
    const out: Partial<Record<OperationName, OperationMetrics>> = {};
    for (const [name, s] of this.series) {
      out[name] = {
        count: s.count,
        totalMs: s.totalMs,
        avgMs: s.totalMs / s.count,
        minMs: s.minMs,
        maxMs: s.maxMs,
        recentMs: s.samples.slice(-RECENT_SAMPLES),
      };
    }
    return out;
  }
}

export function summarizeOperations(
  metrics: Partial<Record<OperationName, OperationMetrics>>,
): PerformanceSummary {
  const all = Object.values(metrics).filter((m): m is OperationMetrics => m !== undefined);
  const totalOperations = all.reduce((n, m) => n + m.count, 0);
  const totalOperationTimeMs = all.reduce((n, m) => n + m.totalMs, 0);
  return {
    totalOperations,
    totalOperationTimeMs,
    avgOperationTimeMs: ratio(totalOperationTimeMs, totalOperations),
    performanceTargetMet: all.every((m) => m.avgMs < OPERATION_TARGET_MS),
  };
}

/** Fold raw cache state into the snapshot served to tools and /health. */
export function buildPerformanceStats(input: PerformanceInput): PerformanceStats {
  const { counters } = input;
  return {
    hitRatio: ratio(counters.hitCount, counters.hitCount + counters.missCount),
    hitCount: counters.hitCount,
    missCount: counters.missCount,
    scanCount: counters.scanCount,
    documentCount: input.documentCount,
    categoryCount: input.categoryCount,
    memoryUsage: input.memoryUsage,
    memoryLimit: input.memoryLimit,
    evictionCount: counters.evictionCount,
    queryCount: counters.queryCount,
    indexServedRatio: ratio(counters.indexServedCount, counters.queryCount),
    lastScan: input.lastScan ? input.lastScan.toISOString() : null,
    warmState: input.warmState,
    compressionStats: input.compressionStats,
    operationMetrics: input.operationMetrics,
    performanceSummary: summarizeOperations(input.operationMetrics),
  };
}
