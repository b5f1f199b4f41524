import fs from "node:fs/promises";
import path from "node:path";
import { ContentCompressor, type StoredText } from "./compression";
import { discoverDocumentPaths } from "./discovery";
import { CacheFailure, describeCacheError, errorMessage, type CacheError } from "./errors";
import { fuzzyTitleMatch, editDistance, maxEditsFor, MIN_FUZZY_LENGTH, splitWords } from "./fuzzy";
import { SerialLock } from "./lock";
import { silentLogger, type Logger } from "./logger";
import { RecencyList } from "./lru";
import { DocumentScanner } from "./scanner";
import {
  buildPerformanceStats,
  OperationTimer,
  type CacheCounters,
  type PerformanceStats,
} from "./stats";
import {
  err,
  ok,
  type Document,
  type RefreshSummary,
  type Result,
  type SearchMatch,
  type SearchResult,
  type WarmState,
} from "./types";

/** Default ceiling on bytes attributed to cached documents (10 MiB). */
export const MAX_MEMORY_USAGE = 10 * 1024 * 1024;

/** Relevance weights for exact, case-insensitive substring hits. */
export const SCORE_WEIGHTS = {
  title: 100,
  id: 50,
  content: 25,
  category: 10,
  /** Ceiling for a fuzzy title hit; always below an exact title hit. */
  fuzzyTitle: 90,
} as const;

export const DEFAULT_SUGGESTION_LIMIT = 5;

export interface MetadataCacheOptions {
  /** Lists document paths to index. Defaults to scanning `docsRoot`. */
  discover?: () => Promise<string[]>;
  /** Corpus docs directory used by the default `discover`. Defaults to `<cwd>/docs`. */
  docsRoot?: string;
  compressionEnabled?: boolean;
  maxMemoryUsage?: number;
  /** Skip the file-change check when the last one ran less than this long ago. */
  freshnessIntervalMs?: number;
  /** Pre-built scanner; otherwise one is created from the two options below. */
  scanner?: DocumentScanner;
  parallelThreshold?: number;
  maxWorkers?: number;
  logger?: Logger;
}

type DocumentFields = Omit<Document, "contentPreview">;

interface CacheEntry {
  fields: DocumentFields;
  text: StoredText;
  /** Bytes this entry contributes to `memoryUsage`. */
  accountedSize: number;
}

interface FileState {
  mtimeMs: number;
  size: number;
}

function compareByTitle(a: Document, b: Document): number {
  return a.title.localeCompare(b.title) || a.path.localeCompare(b.path);
}

/**
 * In-memory metadata index over the standards corpus.
 *
 * Queries first run a cheap freshness pass: discovered paths are stat'ed and
 * compared against the mtime/size recorded at scan time. Unchanged files are
 * hits and stay in memory; new or changed ones are misses and go through the
 * {@link DocumentScanner}. Files that disappear are dropped.
 *
 * Memory is budgeted by accounted bytes per entry (the compressed preview
 * length when compression is on, the document size otherwise). Inserts that
 * would exceed the budget evict least-recently-accessed entries first.
 *
 * All index mutations from async paths run through one {@link SerialLock}, so
 * a background warm-up and a foreground query never interleave their scans.
 */
export class MetadataCache {
  private readonly discover: () => Promise<string[]>;
  private readonly scanner: DocumentScanner;
  private readonly compressor: ContentCompressor;
  private readonly maxMemoryUsage: number;
  private readonly freshnessIntervalMs: number;
  private readonly logger: Logger;
  private readonly lock = new SerialLock();
  private readonly timer = new OperationTimer();

  private readonly entries = new Map<string, CacheEntry>();
  private readonly categoryIndex = new Map<string, Set<string>>();
  private readonly recency = new RecencyList<string>();
  private readonly fileStates = new Map<string, FileState>();
  private memoryUsage = 0;

  private readonly counters: CacheCounters = {
    hitCount: 0,
    missCount: 0,
    scanCount: 0,
    evictionCount: 0,
    queryCount: 0,
    indexServedCount: 0,
  };
  private lastRefreshAt: number | undefined;
  private lastScanAt: Date | undefined;

  private warmState: WarmState = "cold";
  private warmup: Promise<boolean> | undefined;
  /** Bumped by invalidate() so an in-flight warm-up does not mark a cleared cache warm. */
  private generation = 0;

  public constructor(opts: MetadataCacheOptions = {}) {
    const docsRoot = opts.docsRoot ?? path.resolve(process.cwd(), "docs");
    this.discover = opts.discover ?? (() => discoverDocumentPaths(docsRoot));
    this.logger = opts.logger ?? silentLogger;
    this.scanner =
      opts.scanner ??
      new DocumentScanner({
        docsRoot,
        parallelThreshold: opts.parallelThreshold,
        maxWorkers: opts.maxWorkers,
        logger: this.logger,
      });
    this.compressor = new ContentCompressor(opts.compressionEnabled ?? false);
    this.maxMemoryUsage = opts.maxMemoryUsage ?? MAX_MEMORY_USAGE;
    this.freshnessIntervalMs = Math.max(0, opts.freshnessIntervalMs ?? 0);
  }

  // -------------------- Queries --------------------

  /** Distinct categories, sorted. */
  public categories(): Promise<string[]> {
    return this.timer.time("listCategories", async () => {
      await this.ensureFresh();
      return [...this.categoryIndex.keys()].sort();
    });
  }

  /** Documents in `category` sorted by title; empty for an unknown category. */
  public documentsForCategory(category: string): Promise<Document[]> {
    return this.timer.time("showCategory", async () => {
      await this.ensureFresh();
      const paths = this.categoryIndex.get(category);
      if (!paths) return [];
      const docs: Document[] = [];
      for (const p of paths) {
        const doc = this.read(p);
        if (doc) docs.push(doc);
      }
      return docs.sort(compareByTitle);
    });
  }

  /**
   * Rank documents against `query`. Exact substring hits on title, id,
   * preview and category add fixed weights; a title without an exact hit can
   * still score through edit-distance matching, always below an exact title.
   */
  public search(query?: string | null): Promise<SearchResult[]> {
    return this.timer.time("search", async () => {
      await this.ensureFresh();
      const q = query?.trim().toLowerCase() ?? "";
      if (!q) return [];

      const results: SearchResult[] = [];
      for (const p of this.entries.keys()) {
        const document = this.materialize(p);
        if (!document) continue;
        const scored = scoreDocument(document, q);
        if (scored.score > 0) results.push({ document, ...scored });
      }
      results.sort((a, b) => b.score - a.score || a.document.path.localeCompare(b.document.path));
      // Touch lowest-ranked first so the best hit ends up most recent.
      for (let i = results.length - 1; i >= 0; i--) this.recency.touch(results[i].document.path);
      return results;
    });
  }

  /** "Did you mean" candidates from title words, closest first. */
  public suggestCorrections(
    query?: string | null,
    limit = DEFAULT_SUGGESTION_LIMIT,
  ): Promise<string[]> {
    return this.timer.time("suggest", async () => {
      await this.ensureFresh();
      const q = query?.trim().toLowerCase() ?? "";
      if (q.length < MIN_FUZZY_LENGTH || limit <= 0) return [];

      const vocabulary = new Map<string, string>();
      for (const entry of this.entries.values()) {
        for (const word of splitWords(entry.fields.title)) {
          const key = word.toLowerCase();
          if (key.length >= MIN_FUZZY_LENGTH && !vocabulary.has(key)) vocabulary.set(key, word);
        }
      }

      const bound = maxEditsFor(q.length);
      const candidates: { word: string; distance: number }[] = [];
      for (const [key, word] of vocabulary) {
        const distance = editDistance(q, key);
        if (distance <= bound) candidates.push({ word, distance });
      }
      return candidates
        .sort((a, b) => a.distance - b.distance || a.word.localeCompare(b.word))
        .slice(0, limit)
        .map((c) => c.word);
    });
  }

  /** Look a document up by id or path. */
  public findDocument(key: string): Promise<Result<Document, CacheError>> {
    return this.timer.time("findDocument", async () => {
      await this.ensureFresh();
      const direct = this.read(key);
      if (direct) return ok(direct);
      const byId = [...this.entries.entries()]
        .filter(([, e]) => e.fields.id === key)
        .map(([p]) => p)
        .sort();
      const doc = byId.length ? this.read(byId[0]) : undefined;
      return doc ? ok(doc) : err<CacheError>({ kind: "not-found", key });
    });
  }

  // -------------------- Index maintenance --------------------

  /**
   * Insert or replace the entry for `document.path`. The previous entry's
   * contribution is removed before the new one is counted. Fails only when
   * the document alone exceeds the memory ceiling, in which case the stale
   * entry for that path is dropped and nothing is inserted.
   */
  public cacheDocument(document: Document): Result<void, CacheError> {
    const text = this.compressor.pack(document.contentPreview);
    const accountedSize = text.kind === "deflated" ? text.bytes.length : document.size;
    this.removeEntry(document.path);

    if (accountedSize > this.maxMemoryUsage) {
      return err<CacheError>({
        kind: "capacity-exceeded",
        path: document.path,
        size: accountedSize,
        limit: this.maxMemoryUsage,
      });
    }

    while (this.memoryUsage + accountedSize > this.maxMemoryUsage) {
      const victim = this.recency.oldest();
      if (victim === undefined) break;
      this.removeEntry(victim);
      this.fileStates.delete(victim);
      this.counters.evictionCount++;
      this.logger.debug(`Evicted ${victim} from metadata cache`);
    }

    const { contentPreview: _preview, ...fields } = document;
    this.entries.set(document.path, { fields, text, accountedSize });
    this.memoryUsage += accountedSize;
    this.compressor.track(text);
    let paths = this.categoryIndex.get(document.category);
    if (!paths) {
      paths = new Set();
      this.categoryIndex.set(document.category, paths);
    }
    paths.add(document.path);
    this.recency.touch(document.path);
    return ok(undefined);
  }

  /** Drop every entry and reset memory accounting. Hit/miss/scan counters are cumulative. */
  public invalidate(): void {
    this.entries.clear();
    this.categoryIndex.clear();
    this.recency.clear();
    this.fileStates.clear();
    this.compressor.reset();
    this.memoryUsage = 0;
    this.lastRefreshAt = undefined;
    this.warmState = "cold";
    this.warmup = undefined;
    this.generation++;
  }

  /**
   * One freshness pass: re-list paths, scan what changed, drop what vanished.
   * Serialized with every other pass.
   */
  public refresh(): Promise<Result<RefreshSummary, CacheError>> {
    return this.lock.run(() => this.refreshUnlocked());
  }

  // -------------------- Warm-up --------------------

  /**
   * Start populating the index in the background. Returns false when a
   * warm-up is already running or the cache is already warm. Never throws;
   * failures are logged and leave the cache cold (and queryable).
   */
  public warmCacheInBackground(): boolean {
    if (this.warmState !== "cold") return false;
    this.warmState = "warming";
    const generation = this.generation;
    const started = performance.now();

    this.warmup = this.refresh()
      .then((result) => {
        if (generation !== this.generation) return false;
        if (!result.ok) {
          this.warmState = "cold";
          this.logger.warn(`Cache warm-up failed: ${describeCacheError(result.error)}`);
          return false;
        }
        this.warmState = "warm";
        this.logger.info(
          `Cache warm: ${this.entries.size} documents in ${(performance.now() - started).toFixed(0)}ms`,
        );
        return true;
      })
      .catch((e: unknown) => {
        if (generation === this.generation) this.warmState = "cold";
        this.logger.warn(`Cache warm-up failed: ${errorMessage(e)}`);
        return false;
      });
    return true;
  }

  public isCacheWarm(): boolean {
    return this.warmState === "warm";
  }

  /** Resolves once the current warm-up settles: true if it left the cache warm. */
  public whenWarm(): Promise<boolean> {
    return this.warmup ?? Promise.resolve(this.warmState === "warm");
  }

  // -------------------- Introspection --------------------

  public performanceStats(): PerformanceStats {
    return buildPerformanceStats({
      counters: this.counters,
      documentCount: this.entries.size,
      categoryCount: this.categoryIndex.size,
      memoryUsage: this.memoryUsage,
      memoryLimit: this.maxMemoryUsage,
      lastScan: this.lastScanAt,
      warmState: this.warmState,
      compressionStats: this.compressor.stats(),
      operationMetrics: this.timer.snapshot(),
    });
  }

  public scanStatistics() {
    return this.scanner.scanStatistics();
  }

  public memoryUsageBytes(): number {
    return this.memoryUsage;
  }

  public documentCount(): number {
    return this.entries.size;
  }

  public hasDocument(filePath: string): boolean {
    return this.entries.has(filePath);
  }

  // -------------------- Internals --------------------

  private async ensureFresh(): Promise<void> {
    this.counters.queryCount++;
    if (
      this.lastRefreshAt !== undefined &&
      Date.now() - this.lastRefreshAt < this.freshnessIntervalMs
    ) {
      this.counters.indexServedCount++;
      return;
    }

    const result = await this.refresh();
    if (result.ok) {
      if (!result.value.scanned) this.counters.indexServedCount++;
      if (this.warmState === "cold") this.warmState = "warm";
      return;
    }
    if (this.entries.size === 0) throw new CacheFailure(result.error);
    this.logger.warn(
      `${describeCacheError(result.error)}; serving ${this.entries.size} cached documents`,
    );
  }

  /**
   * An invalidate() while this pass is suspended clears the state it was
   * diffing against, so the pass starts over instead of committing a partial
   * index.
   */
  private async refreshUnlocked(): Promise<Result<RefreshSummary, CacheError>> {
    const started = performance.now();
    const generation = this.generation;
    let paths: string[];
    try {
      paths = await this.discover();
    } catch (e) {
      if (e instanceof CacheFailure) return err(e.detail);
      return err<CacheError>({
        kind: "scan-failure",
        message: `Document discovery failed: ${errorMessage(e)}`,
      });
    }

    if (generation !== this.generation) return this.refreshUnlocked();

    let removed = 0;
    const discovered = new Set(paths);
    for (const tracked of [...this.fileStates.keys()]) {
      if (discovered.has(tracked)) continue;
      this.fileStates.delete(tracked);
      if (this.removeEntry(tracked)) removed++;
    }

    const probes = await Promise.all(paths.map((p) => probeFile(p)));
    if (generation !== this.generation) return this.refreshUnlocked();
    const changed: { path: string; state: FileState | undefined }[] = [];
    let hits = 0;
    paths.forEach((p, i) => {
      const state = probes[i];
      const known = this.fileStates.get(p);
      const unchanged =
        state !== undefined &&
        known !== undefined &&
        known.mtimeMs === state.mtimeMs &&
        known.size === state.size &&
        this.entries.has(p);
      if (unchanged) hits++;
      else changed.push({ path: p, state });
    });

    if (changed.length) {
      const documents = await this.scanner.scanDocuments(changed.map((c) => c.path));
      if (generation !== this.generation) return this.refreshUnlocked();
      const byPath = new Map<string, Document>(documents.map((d) => [d.path, d]));
      for (const { path: p, state } of changed) {
        const doc = byPath.get(p);
        const stored = doc ? this.cacheDocument(doc) : undefined;
        if (doc && stored?.ok && state) {
          this.fileStates.set(p, state);
          continue;
        }
        if (stored && !stored.ok) this.logger.warn(describeCacheError(stored.error));
        this.fileStates.delete(p);
        if (!doc && this.removeEntry(p)) removed++;
      }
    }

    this.counters.hitCount += hits;
    this.counters.missCount += changed.length;
    const scanned = this.lastRefreshAt === undefined || changed.length > 0 || removed > 0;
    if (scanned) {
      this.counters.scanCount++;
      this.lastScanAt = new Date();
    }
    this.lastRefreshAt = Date.now();

    const elapsedMs = performance.now() - started;
    if (scanned) {
      this.logger.debug(
        `Refresh: ${paths.length} paths, ${hits} unchanged, ${changed.length} scanned, ${removed} removed (${elapsedMs.toFixed(1)}ms)`,
      );
    }
    return ok({
      discovered: paths.length,
      hits,
      misses: changed.length,
      removed,
      scanned,
      elapsedMs,
    });
  }

  private removeEntry(filePath: string): boolean {
    const entry = this.entries.get(filePath);
    if (!entry) return false;
    this.entries.delete(filePath);
    this.memoryUsage -= entry.accountedSize;
    this.compressor.untrack(entry.text);
    const paths = this.categoryIndex.get(entry.fields.category);
    if (paths) {
      paths.delete(filePath);
      if (!paths.size) this.categoryIndex.delete(entry.fields.category);
    }
    this.recency.delete(filePath);
    return true;
  }

  /** Rebuild the full document for an entry without touching recency. */
  private materialize(filePath: string): Document | undefined {
    const entry = this.entries.get(filePath);
    if (!entry) return undefined;
    return { ...entry.fields, contentPreview: this.compressor.unpack(entry.text) };
  }

  /** Materialize and mark as recently used. */
  private read(filePath: string): Document | undefined {
    const doc = this.materialize(filePath);
    if (doc) this.recency.touch(filePath);
    return doc;
  }
}

async function probeFile(filePath: string): Promise<FileState | undefined> {
  try {
    const st = await fs.stat(filePath);
    return st.isFile() ? { mtimeMs: st.mtimeMs, size: st.size } : undefined;
  } catch {
    // Vanished between discovery and stat; the scan will confirm and drop it.
    return undefined;
  }
}

/** Relevance of one document for a lower-cased, trimmed query. */
export function scoreDocument(
  document: Document,
  query: string,
): { score: number; matches: SearchMatch[] } {
  let score = 0;
  const matches: SearchMatch[] = [];

  if (document.title.toLowerCase().includes(query)) {
    score += SCORE_WEIGHTS.title;
    matches.push({ field: "title", kind: "exact", term: document.title });
  } else {
    const fuzzy = fuzzyTitleMatch(query, document.title);
    if (fuzzy) {
      score += SCORE_WEIGHTS.fuzzyTitle * fuzzy.similarity;
      matches.push({ field: "title", kind: "fuzzy", term: fuzzy.term });
    }
  }
  if (document.id.toLowerCase().includes(query)) {
    score += SCORE_WEIGHTS.id;
    matches.push({ field: "id", kind: "exact", term: document.id });
  }
  if (document.contentPreview.toLowerCase().includes(query)) {
    score += SCORE_WEIGHTS.content;
    matches.push({ field: "content", kind: "exact", term: query });
  }
  if (document.category.toLowerCase().includes(query)) {
    score += SCORE_WEIGHTS.category;
    matches.push({ field: "category", kind: "exact", term: document.category });
  }
  return { score, matches };
}
