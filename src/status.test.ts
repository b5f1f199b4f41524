import { describe, expect, it } from "vitest";
import { MetadataCache } from "./cache";
import { StatusManager } from "./status";

describe("StatusManager", () => {
  it("reports no cache until a source is attached", () => {
    const status = new StatusManager({ version: "1.2.3", startedAt: "2024-01-01T00:00:00.000Z" });
    status.markTransport("http");
    status.setCorpusRoot("/srv/docs");
    expect(status.getStatus()).toEqual({
      version: "1.2.3",
      corpusRoot: "/srv/docs",
      transport: "http",
      startedAt: "2024-01-01T00:00:00.000Z",
      warmState: "cold",
      cache: null,
    });
  });

  it("pulls live statistics from the cache", async () => {
    const cache = new MetadataCache({ discover: () => Promise.resolve([]) });
    const status = new StatusManager();
    status.setStatsSource(() => cache.performanceStats());

    await cache.categories();
    const snapshot = status.getStatus();
    expect(snapshot.warmState).toBe("warm");
    expect(snapshot.cache?.queryCount).toBe(1);
    expect(JSON.parse(JSON.stringify(status))).toMatchObject({ warmState: "warm" });
  });
});
