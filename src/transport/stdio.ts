import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve a single MCP session over stdin/stdout. Logging must stay on stderr
 * while this transport is active.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
