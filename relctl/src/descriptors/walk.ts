import fs from "node:fs";
import path from "node:path";

const ALWAYS_SKIPPED = new Set([".git", "node_modules"]);

/**
 * Depth-first walk in directory order: a directory's own files are visited
 * before its subdirectories, and entries are sorted so runs are repeatable.
 */
export function findFiles(root: string, fileName: string, skipDirs: readonly string[] = []): string[] {
  const skip = new Set([...ALWAYS_SKIPPED, ...skipDirs]);
  const found: string[] = [];

  const visit = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (entry.isFile() && entry.name === fileName) found.push(path.join(dir, entry.name));
    }
    for (const entry of entries) {
      if (entry.isDirectory() && !skip.has(entry.name)) visit(path.join(dir, entry.name));
    }
  };

  visit(root);
  return found;
}

/** First file with the given name by walk order, or null. */
export function findFirstFile(root: string, fileName: string): string | null {
  return findFiles(root, fileName)[0] ?? null;
}
