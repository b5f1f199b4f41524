import { APP_VERSION } from "./config";
import type { PerformanceStats } from "./stats";
import type { WarmState } from "./types";

/**
 * Snapshot of server lifecycle plus live cache statistics, served at GET /health.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Docs directory the cache indexes. */
  corpusRoot: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  warmState: WarmState;
  /** Null until a cache is attached. */
  cache: PerformanceStats | null;
}

interface StaticStatus {
  version: string;
  corpusRoot: string;
  transport: string;
  startedAt: string;
}

/**
 * Holds the mutable parts of server status. Cache figures are pulled from the
 * attached stats source on every read rather than copied in.
 */
export class StatusManager {
  private readonly data: StaticStatus;
  private statsSource: (() => PerformanceStats) | undefined;

  public constructor(initial?: Partial<StaticStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      corpusRoot: initial?.corpusRoot ?? "",
      transport: initial?.transport ?? "unknown",
      startedAt: initial?.startedAt ?? new Date().toISOString(),
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setCorpusRoot(root: string) {
    this.data.corpusRoot = root;
  }

  /** Attach the cache whose statistics the status should report. */
  public setStatsSource(source: () => PerformanceStats) {
    this.statsSource = source;
  }

  public getStatus(): ServerStatus {
    const cache = this.statsSource ? this.statsSource() : null;
    return {
      ...this.data,
      warmState: cache ? cache.warmState : "cold",
      cache,
    };
  }

  public toJSON() {
    return this.getStatus();
  }
}

// Singleton instance shared by the entry point and the HTTP health check.
export const statusManager = new StatusManager();
