import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { MetadataCache } from "./cache";
import { createServer } from "./server";
import { makeCorpus, removeCorpus, SAMPLE_CORPUS } from "./test-helpers";

describe("MCP server", () => {
  let root = "";
  let client: Client;

  beforeAll(async () => {
    root = await makeCorpus(SAMPLE_CORPUS);
    const server = createServer({ cache: new MetadataCache({ docsRoot: root }), label: "standards" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterAll(async () => {
    await client.close();
    await removeCorpus(root);
  });

  it("lists tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toContain("search_documents");
    expect(tools.find((t) => t.name === "show_category")?.description).toContain("'standards'");
  });

  it("returns tool payloads as JSON text", async () => {
    const result = await client.request(
      { method: "tools/call", params: { name: "list_categories", arguments: {} } },
      CallToolResultSchema,
    );
    const [first] = result.content;
    expect(first?.type).toBe("text");
    if (first?.type !== "text") return;
    expect(JSON.parse(first.text)).toEqual({ categories: ["core", "go", "typescript"], total: 3 });
  });

  it("surfaces invalid requests as errors", async () => {
    await expect(
      client.request(
        { method: "tools/call", params: { name: "search_documents", arguments: {} } },
        CallToolResultSchema,
      ),
    ).rejects.toThrow("Missing query");
  });
});
