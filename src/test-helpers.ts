import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/** A small tenets/bindings layout shared by the cache, tool and server tests. */
export const SAMPLE_CORPUS: Record<string, string> = {
  "tenets/simplicity.md": "---\nid: simplicity\n---\n# Simplicity\n\nPrefer the simplest design that works.\n",
  "tenets/testing.md": "# Testing Best Practices\n\nWrite tests that describe behavior.\n",
  "bindings/core/caching.md":
    "---\nid: cache-strategies\nenforced_by: review\n---\n# Caching Strategies\n\nKeep hot data in memory close to readers.\n",
  "bindings/categories/typescript/no-any.md":
    "---\nid: no-any\nlast_modified: 2024-05-01\n---\n# TypeScript Configuration\n\nEnable strict mode and avoid any.\n",
  "bindings/categories/typescript/guidelines.md":
    "# Binding Guidelines\n\nHow bindings relate to tenets.\n",
  "bindings/categories/go/typo.md": "# Tesitng Document\n\nA deliberately misspelled title.\n",
};

/** Write `files` (relative path -> content) into a fresh temp directory. */
export async function makeCorpus(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "standards-corpus-"));
  await writeFiles(root, files);
  return root;
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, "utf8");
  }
}

export async function removeCorpus(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export function totalBytes(files: Record<string, string>): number {
  return Object.values(files).reduce((n, s) => n + Buffer.byteLength(s, "utf8"), 0);
}
