import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { CacheFailure, errorMessage } from "./errors";

/** Corpus layout relative to the docs root. */
export const DOCUMENT_PATTERNS = [
  "tenets/**/*.md",
  "bindings/core/**/*.md",
  "bindings/categories/**/*.md",
];

/** Navigation pages generated alongside the standards; not documents themselves. */
const INDEX_FILES = /^(index|glance|00-index)\.md$/i;

/**
 * List the markdown documents under `docsRoot`, sorted, as absolute paths.
 * Throws {@link CacheFailure} when the root itself is missing or unreadable;
 * an existing but empty layout yields an empty list.
 */
export async function discoverDocumentPaths(docsRoot: string): Promise<string[]> {
  const root = path.resolve(docsRoot);
  try {
    const st = await fs.stat(root);
    if (!st.isDirectory()) throw new Error("not a directory");
  } catch (e) {
    throw new CacheFailure({
      kind: "scan-failure",
      message: `Corpus root is not accessible: ${errorMessage(e)}`,
      path: root,
    });
  }

  const files = await fg(DOCUMENT_PATTERNS, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    unique: true,
  });
  return files
    .filter((f) => !INDEX_FILES.test(path.basename(f)))
    .map((f) => path.normalize(f))
    .sort();
}
