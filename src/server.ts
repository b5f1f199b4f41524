import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { MetadataCache } from "./cache";
import { APP_VERSION } from "./config";
import { callTool, toolDefinitions } from "./tools";

export interface ServerOptions {
  cache: MetadataCache;
  /** Corpus name shown in tool descriptions. */
  label: string;
}

/**
 * Factory for a fresh MCP Server bound to the shared cache.
 *
 * One server is created per transport session (HTTP mode may host several
 * clients at once); the cache itself is shared, so every session sees the
 * same index.
 */
export function createServer({ cache, label }: ServerOptions): Server {
  const server = new Server(
    { name: "standards-discovery-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  const tools = toolDefinitions(label);
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const payload = await callTool(cache, req.params.name, req.params.arguments ?? {});
    return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
  });

  return server;
}
