import { buildDocument } from "./document";
import { errorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { readMarkdownFile } from "./markdown";
import type { Document } from "./types";

/** Batches of at least this many paths are scanned through the worker pool. */
export const PARALLEL_THRESHOLD = 10;
/** Upper bound on concurrently scanned files in a parallel batch. */
export const MAX_WORKERS = 4;

export const PARALLEL_THRESHOLD_RANGE = [5, 20] as const;
export const MAX_WORKERS_RANGE = [1, 8] as const;

export interface ScanStatistics {
  /** Attempted scans, including files that turned out missing or unreadable. */
  filesScanned: number;
  parallelBatches: number;
  sequentialBatches: number;
  /** Files that could not be read. */
  failedFiles: number;
  /** Files indexed with degraded metadata because their front matter was unusable. */
  frontMatterErrors: number;
  totalBytesProcessed: number;
  /** Rolling mean over successfully scanned files. */
  avgScanTimeMs: number;
}

export interface ScannerOptions {
  /** Corpus root; category and type are derived from paths below it. */
  docsRoot?: string;
  parallelThreshold?: number;
  maxWorkers?: number;
  logger?: Logger;
}

function clamp(n: number, [min, max]: readonly [number, number]): number {
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function emptyStatistics(): ScanStatistics {
  return {
    filesScanned: 0,
    parallelBatches: 0,
    sequentialBatches: 0,
    failedFiles: 0,
    frontMatterErrors: 0,
    totalBytesProcessed: 0,
    avgScanTimeMs: 0,
  };
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Reads markdown files into {@link Document}s. Small batches run one file at a
 * time; larger ones fan out over a bounded pool of async workers since the
 * pool's setup only pays off once there is enough I/O to overlap.
 *
 * Failures are isolated per file: a missing or unreadable path is left out of
 * the results and never rejects the batch.
 */
export class DocumentScanner {
  public readonly parallelThreshold: number;
  public readonly maxWorkers: number;
  public readonly docsRoot: string | undefined;
  private readonly logger: Logger;
  private stats: ScanStatistics = emptyStatistics();
  private succeeded = 0;

  public constructor(opts: ScannerOptions = {}) {
    this.parallelThreshold = clamp(opts.parallelThreshold ?? PARALLEL_THRESHOLD, PARALLEL_THRESHOLD_RANGE);
    this.maxWorkers = clamp(opts.maxWorkers ?? MAX_WORKERS, MAX_WORKERS_RANGE);
    this.docsRoot = opts.docsRoot;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Scan a single file; resolves `undefined` when it cannot be read. */
  public async scanDocument(filePath: string): Promise<Document | undefined> {
    this.stats.filesScanned++;
    return this.scanOne(filePath);
  }

  /**
   * Scan a batch of files. Results keep input order with failed paths
   * dropped; `filesScanned` grows by `filePaths.length` regardless.
   */
  public async scanDocuments(filePaths: readonly string[]): Promise<Document[]> {
    this.stats.filesScanned += filePaths.length;
    if (filePaths.length < this.parallelThreshold) {
      this.stats.sequentialBatches++;
      const out: Document[] = [];
      for (const p of filePaths) {
        const doc = await this.scanOne(p);
        if (doc) out.push(doc);
      }
      return out;
    }

    this.stats.parallelBatches++;
    const slots: (Document | undefined)[] = new Array(filePaths.length);
    let next = 0;
    const worker = async () => {
      while (next < filePaths.length) {
        const i = next++;
        slots[i] = await this.scanOne(filePaths[i]);
      }
    };
    const workers = Math.min(this.maxWorkers, filePaths.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));
    this.logger.debug(`Parallel scan of ${filePaths.length} files across ${workers} workers`);
    return slots.filter((d): d is Document => d !== undefined);
  }

  /** Snapshot copy of the running counters. */
  public scanStatistics(): ScanStatistics {
    return { ...this.stats };
  }

  public resetStatistics(): void {
    this.stats = emptyStatistics();
    this.succeeded = 0;
  }

  private async scanOne(filePath: string): Promise<Document | undefined> {
    const started = performance.now();
    try {
      const file = await readMarkdownFile(filePath);
      if (file.frontMatterError) {
        this.stats.frontMatterErrors++;
        this.logger.warn(`Front-matter parse error in ${filePath}: ${file.frontMatterError}`);
      }
      const doc = buildDocument(filePath, file, new Date(), this.docsRoot);
      this.stats.totalBytesProcessed += file.size;
      this.recordScanTime(performance.now() - started);
      return doc;
    } catch (e) {
      this.stats.failedFiles++;
      if (isMissingFile(e)) {
        this.logger.debug(`Skipping missing document ${filePath}`);
      } else {
        this.logger.warn(`Document scan error for ${filePath}: ${errorMessage(e)}`);
      }
      return undefined;
    }
  }

  private recordScanTime(ms: number): void {
    this.succeeded++;
    this.stats.avgScanTimeMs += (ms - this.stats.avgScanTimeMs) / this.succeeded;
  }
}
