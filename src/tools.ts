import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { MetadataCache } from "./cache";
import { describeCacheError } from "./errors";
import type { Document, SearchMatch } from "./types";

export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 100;
/** Raw score that maps to a normalized score of 1 (exact title plus id). */
const SCORE_NORMALIZER = 200;

type ToolArgs = Record<string, unknown>;

const statsProperty = {
  type: "boolean",
  description: "Include cache performance statistics in the response (default false).",
} as const;

const verboseProperty = {
  type: "boolean",
  description: "Include each document's content preview (default false).",
} as const;

/** Tool schemas advertised by ListTools. `label` names the corpus in descriptions. */
export function toolDefinitions(label: string): Tool[] {
  return [
    {
      name: "list_categories",
      description: `List the categories of tenets and bindings found under '${label}'.`,
      inputSchema: {
        type: "object",
        properties: { stats: statsProperty },
      },
    },
    {
      name: "show_category",
      description: `List the documents in one category under '${label}', sorted by title.`,
      inputSchema: {
        type: "object",
        properties: {
          category: {
            type: "string",
            description: "Category name as returned by list_categories (e.g. 'core', 'typescript').",
          },
          verbose: verboseProperty,
          stats: statsProperty,
        },
        required: ["category"],
      },
    },
    {
      name: "search_documents",
      description: `Search titles, ids, previews and categories under '${label}'. Tolerates typos in titles and suggests corrections when nothing matches.`,
      inputSchema: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "Search terms. Matching is case-insensitive.",
          },
          limit: {
            type: "number",
            description: `Maximum number of results (1-${MAX_SEARCH_LIMIT}). Defaults to ${DEFAULT_SEARCH_LIMIT}.`,
            minimum: 1,
            maximum: MAX_SEARCH_LIMIT,
          },
          verbose: verboseProperty,
          stats: statsProperty,
        },
        required: ["query"],
      },
    },
    {
      name: "show_document",
      description: `Show one document under '${label}' with its metadata, by id or path.`,
      inputSchema: {
        type: "object",
        properties: {
          id: { type: "string", description: "Document id or path." },
        },
        required: ["id"],
      },
    },
    {
      name: "cache_stats",
      description: "Report metadata cache and scanner statistics.",
      inputSchema: { type: "object", properties: {} },
    },
  ];
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const v = args[key];
  return typeof v === "string" ? v : undefined;
}

function requiredString(args: ToolArgs, key: string, what: string): string {
  const v = optionalString(args, key)?.trim();
  if (!v) throw new McpError(ErrorCode.InvalidRequest, `Missing ${what}`);
  return v;
}

function flag(args: ToolArgs, key: string): boolean {
  return args[key] === true;
}

function searchLimit(args: ToolArgs): number {
  const v = args.limit;
  if (typeof v !== "number" || !Number.isFinite(v)) return DEFAULT_SEARCH_LIMIT;
  return Math.max(1, Math.min(MAX_SEARCH_LIMIT, Math.floor(v)));
}

function documentSummary(doc: Document, verbose: boolean) {
  return {
    id: doc.id,
    title: doc.title,
    type: doc.type,
    path: doc.path,
    ...(verbose ? { preview: doc.contentPreview } : {}),
  };
}

function documentDetail(doc: Document) {
  return {
    ...doc,
    modifiedTime: doc.modifiedTime.toISOString(),
    scanTime: doc.scanTime.toISOString(),
  };
}

export function normalizeScore(raw: number): number {
  return Number(Math.min(1, raw / SCORE_NORMALIZER).toFixed(3));
}

function matchSummary(match: SearchMatch) {
  return { field: match.field, kind: match.kind, term: match.term };
}

/**
 * Execute a discovery tool against the cache and return its JSON payload.
 * Invalid arguments raise InvalidRequest and unknown tools MethodNotFound;
 * cache failures propagate to the SDK, which reports them as internal errors.
 */
export async function callTool(
  cache: MetadataCache,
  name: string,
  args: ToolArgs = {},
): Promise<unknown> {
  const withStats = <T extends object>(payload: T) =>
    flag(args, "stats") ? { ...payload, stats: cache.performanceStats() } : payload;

  switch (name) {
    case "list_categories": {
      const categories = await cache.categories();
      return withStats({ categories, total: categories.length });
    }

    case "show_category": {
      const category = requiredString(args, "category", "category");
      const verbose = flag(args, "verbose");
      const documents = await cache.documentsForCategory(category);
      const payload = {
        category,
        documentCount: documents.length,
        documents: documents.map((d) => documentSummary(d, verbose)),
      };
      if (documents.length) return withStats(payload);
      return withStats({ ...payload, availableCategories: await cache.categories() });
    }

    case "search_documents": {
      const query = requiredString(args, "query", "query");
      const limit = searchLimit(args);
      const verbose = flag(args, "verbose");
      const results = await cache.search(query);
      const shown = results.slice(0, limit);
      const suggestions = results.length ? [] : await cache.suggestCorrections(query);
      return withStats({
        query,
        totalResults: results.length,
        shownResults: shown.length,
        limit,
        results: shown.map((r) => ({
          id: r.document.id,
          title: r.document.title,
          path: r.document.path,
          category: r.document.category,
          type: r.document.type,
          score: normalizeScore(r.score),
          rawScore: r.score,
          matches: r.matches.map(matchSummary),
          ...(verbose ? { preview: r.document.contentPreview } : {}),
        })),
        suggestions,
      });
    }

    case "show_document": {
      const id = requiredString(args, "id", "id");
      const found = await cache.findDocument(id);
      if (!found.ok) throw new McpError(ErrorCode.InvalidRequest, describeCacheError(found.error));
      return documentDetail(found.value);
    }

    case "cache_stats":
      return { cache: cache.performanceStats(), scanner: cache.scanStatistics() };

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}
