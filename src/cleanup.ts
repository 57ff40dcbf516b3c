import * as fs from "node:fs/promises";
import { log } from "./diagnostics.js";

export async function collectDirectories(paths: readonly string[]): Promise<string[]> {
  const directories: string[] = [];
  for (const p of paths) {
    try {
      const stat = await fs.stat(p);
      if (stat.isDirectory()) {
        directories.push(p);
      }
    } catch {
      continue;
    }
  }
  return directories;
}

/**
 * Removes the directories a remove-source transfer left empty. Deeper paths
 * go first so a parent emptied by removing its children is removed as well.
 */
export async function removeEmptiedDirectories(
  directories: readonly string[]
): Promise<string[]> {
  const ordered = [...new Set(directories)].sort(
    (a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0)
  );
  const removed: string[] = [];

  for (const dir of ordered) {
    try {
      const entries = await fs.readdir(dir);
      if (entries.length > 0) {
        continue;
      }
      await fs.rmdir(dir);
      removed.push(dir);
    } catch (err) {
      log(
        `Skipped directory cleanup for ${dir}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  return removed;
}
