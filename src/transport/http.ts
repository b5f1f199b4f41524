/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client starts with a JSON-RPC `initialize` request to POST /mcp without an
 *    `mcp-session-id` header. A new transport + MCP Server pair is created and the
 *    generated session id is returned in the response headers.
 *  - Every later request for that session carries the same `mcp-session-id`.
 *  - When the transport closes, the session is dropped from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming channel for an existing session.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Server status and live cache statistics.
 *
 * DNS rebinding protection is on by default, with allowed hosts limited to
 * localhost and the bound host/port unless ALLOWED_HOSTS overrides them.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

export interface HttpTransportOptions {
  port: number;
  host: string;
  /** Explicit host[:port] allow-list; defaults to local-only names. */
  allowedHosts?: string[];
  enableDnsRebindingProtection: boolean;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

export function defaultAllowedHosts(host: string, port: number): string[] {
  return Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @returns Resolves once the HTTP listener is bound and ready.
 */
export async function startHttpTransport(
  createServer: () => Server,
  { port, host, allowedHosts, enableDnsRebindingProtection }: HttpTransportOptions,
) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports[sid] = transport;
      },
      enableDnsRebindingProtection,
      allowedHosts: allowedHosts ?? defaultAllowedHosts(host, port),
    });

    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return;
      closing = true;
      if (transport.sessionId) delete transports[transport.sessionId];
      // server.close() closes the transport again, which would re-enter this handler.
      transport.onclose = undefined;
      server.close().catch((e: unknown) => console.error("[MCP] Failed to close session:", e));
    };
    await server.connect(transport);
    return transport;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports[sessionId] : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
