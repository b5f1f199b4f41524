import fs from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { parseMarkdown, readMarkdownFile } from "./markdown";
import { makeCorpus, removeCorpus } from "./test-helpers";

describe("parseMarkdown", () => {
  it("returns the whole file when there is no front matter", () => {
    expect(parseMarkdown("# Title\nbody\n")).toEqual({ frontMatter: {}, body: "# Title\nbody\n" });
  });

  it("splits YAML front matter from the body", () => {
    const parsed = parseMarkdown("---\nid: x\ntitle: T\n---\n# Heading\ntext\n");
    expect(parsed.frontMatter).toEqual({ id: "x", title: "T" });
    expect(parsed.body.trim()).toBe("# Heading\ntext");
    expect(parsed.frontMatterError).toBeUndefined();
  });

  it("degrades on invalid YAML", () => {
    const parsed = parseMarkdown("---\ntitle: [unclosed\n---\n# Body\n");
    expect(parsed.frontMatter).toEqual({});
    expect(parsed.body).toBe("# Body\n");
    expect(parsed.frontMatterError).toBeDefined();
  });

  it("rejects oversized front matter", () => {
    const parsed = parseMarkdown(`---\nnote: ${"x".repeat(9000)}\n---\nBody\n`);
    expect(parsed.frontMatter).toEqual({});
    expect(parsed.body.trim()).toBe("Body");
    expect(parsed.frontMatterError).toBe("front matter exceeds 8192 bytes");
  });
});

describe("readMarkdownFile", () => {
  let root = "";

  beforeAll(async () => {
    root = await makeCorpus({ "tenets/accents.md": "---\nid: café\n---\nCafé body\n" });
  });

  afterAll(async () => {
    await removeCorpus(root);
  });

  it("reports the UTF-8 byte size and mtime", async () => {
    const file = path.join(root, "tenets/accents.md");
    const parsed = await readMarkdownFile(file);
    const st = await fs.stat(file);
    expect(parsed.frontMatter).toEqual({ id: "café" });
    expect(parsed.size).toBe(Buffer.byteLength(parsed.raw, "utf8"));
    expect(parsed.size).toBe(parsed.raw.length + 2);
    expect(parsed.modifiedTime.getTime()).toBe(st.mtime.getTime());
  });

  it("rejects when the file is missing", async () => {
    await expect(readMarkdownFile(path.join(root, "missing.md"))).rejects.toThrow();
  });
});
