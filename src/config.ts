import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { MAX_MEMORY_USAGE, type MetadataCacheOptions } from "./cache";
import type { Logger } from "./logger";
import {
  MAX_WORKERS,
  MAX_WORKERS_RANGE,
  PARALLEL_THRESHOLD,
  PARALLEL_THRESHOLD_RANGE,
} from "./scanner";

// Centralized single dotenv.config() call.
// Prefer the project-root .env next to src/, otherwise fall back to the cwd lookup.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[MCP] Could not resolve project .env, using working directory:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type Env = Record<string, string | undefined>;

export interface Config {
  DOCS_ROOT: string;
  CORPUS_LABEL: string;
  VERBOSE: boolean;
  MAX_MEMORY_USAGE: number;
  COMPRESSION_ENABLED: boolean;
  PARALLEL_THRESHOLD: number;
  MAX_WORKERS: number;
  FRESHNESS_INTERVAL_MS: number;
  WARM_ON_START: boolean;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

/** Tolerant truthy parsing: 1/true/yes/on, 0/false/no/off, anything else is the fallback. */
function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return fallback;
}

/** Integer env value clamped to [min, max]; blank or non-numeric gives the fallback. */
function parseInteger(
  raw: string | undefined,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

export function getConfig(env: Env = process.env): Config {
  // Corpus docs directory: tenets/ and bindings/ live directly beneath it.
  const DOCS_ROOT = path.resolve(env.DOCS_ROOT?.trim() || path.join(process.cwd(), "docs"));

  // Human-friendly label used in tool descriptions only.
  const CORPUS_LABEL = env.CORPUS_LABEL?.trim() || "DOCS_ROOT";

  const ALLOWED_HOSTS = env.ALLOWED_HOSTS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  return {
    DOCS_ROOT,
    CORPUS_LABEL,
    VERBOSE: parseFlag(env.VERBOSE, false),
    MAX_MEMORY_USAGE: parseInteger(env.MAX_MEMORY_USAGE, MAX_MEMORY_USAGE, 1024),
    COMPRESSION_ENABLED: parseFlag(env.COMPRESSION_ENABLED, false),
    PARALLEL_THRESHOLD: parseInteger(
      env.PARALLEL_THRESHOLD,
      PARALLEL_THRESHOLD,
      PARALLEL_THRESHOLD_RANGE[0],
      PARALLEL_THRESHOLD_RANGE[1],
    ),
    MAX_WORKERS: parseInteger(env.MAX_WORKERS, MAX_WORKERS, MAX_WORKERS_RANGE[0], MAX_WORKERS_RANGE[1]),
    FRESHNESS_INTERVAL_MS: parseInteger(env.FRESHNESS_INTERVAL_MS, 2000, 0),
    WARM_ON_START: parseFlag(env.WARM_ON_START, true),
    // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: parseInteger(env.MCP_PORT, 3000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: ALLOWED_HOSTS?.length ? ALLOWED_HOSTS : undefined,
    ENABLE_DNS_REBINDING_PROTECTION: parseFlag(env.ENABLE_DNS_REBINDING_PROTECTION, true),
  };
}

/** Map server configuration onto {@link MetadataCacheOptions}. */
export function toCacheOptions(config: Config, logger: Logger): MetadataCacheOptions {
  return {
    docsRoot: config.DOCS_ROOT,
    compressionEnabled: config.COMPRESSION_ENABLED,
    maxMemoryUsage: config.MAX_MEMORY_USAGE,
    freshnessIntervalMs: config.FRESHNESS_INTERVAL_MS,
    parallelThreshold: config.PARALLEL_THRESHOLD,
    maxWorkers: config.MAX_WORKERS,
    logger,
  };
}
