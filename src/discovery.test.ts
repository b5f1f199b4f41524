import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { discoverDocumentPaths } from "./discovery";
import { CacheFailure } from "./errors";
import { makeCorpus, removeCorpus } from "./test-helpers";

describe("discoverDocumentPaths", () => {
  let root = "";

  beforeAll(async () => {
    root = await makeCorpus({
      "tenets/a.md": "# A\n",
      "tenets/index.md": "# Index\n",
      "bindings/core/b.md": "# B\n",
      "bindings/core/notes.txt": "not markdown\n",
      "bindings/categories/ts/c.md": "# C\n",
      "bindings/categories/ts/00-index.md": "# Index\n",
      "bindings/extra/d.md": "# D\n",
      "other.md": "# Other\n",
    });
  });

  afterAll(async () => {
    await removeCorpus(root);
  });

  it("lists tenets and bindings, sorted, without index pages", async () => {
    expect(await discoverDocumentPaths(root)).toEqual([
      path.join(root, "bindings/categories/ts/c.md"),
      path.join(root, "bindings/core/b.md"),
      path.join(root, "tenets/a.md"),
    ]);
  });

  it("fails with a scan-failure when the root is missing", async () => {
    const missing = path.join(root, "does-not-exist");
    const failure = await discoverDocumentPaths(missing).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(failure).toBeInstanceOf(CacheFailure);
    expect(failure).toMatchObject({ detail: { kind: "scan-failure", path: missing } });
  });
});
