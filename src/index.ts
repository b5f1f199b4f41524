/**
 * Application entry point.
 *
 * 1. Load environment configuration (see `.env.example`).
 * 2. Build the metadata cache over DOCS_ROOT and, unless WARM_ON_START is off,
 *    start populating it in the background so the first query is served from memory.
 * 3. Start the MCP server over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http), which also exposes GET /health.
 *
 * Exposed tools: list_categories, show_category, search_documents,
 * show_document, cache_stats.
 */
import { MetadataCache } from "./cache";
import { getConfig, toCacheOptions } from "./config";
import { createConsoleLogger } from "./logger";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
const logger = createConsoleLogger(config.VERBOSE);

const cache = new MetadataCache(toCacheOptions(config, logger));
statusManager.setCorpusRoot(config.DOCS_ROOT);
statusManager.setStatsSource(() => cache.performanceStats());

logger.info(
  `Indexing ${config.DOCS_ROOT} (memory limit ${config.MAX_MEMORY_USAGE} bytes, compression ${config.COMPRESSION_ENABLED ? "on" : "off"})`,
);
if (config.WARM_ON_START) cache.warmCacheInBackground();

const factory = () => createServer({ cache, label: config.CORPUS_LABEL });
const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(factory, {
    port: config.MCP_PORT,
    host: config.HOST,
    allowedHosts: config.ALLOWED_HOSTS,
    enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
  });
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(factory);
}
