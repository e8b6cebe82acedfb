import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { logger } from "../utils/logger.js";
import { FINGERPRINTS_FILE } from "../fingerprints/types.js";

const log = logger.child({ group: "FolderDiscovery" });

/**
 * Find every practice folder under `root` that already has a fingerprint cache
 *
 * `root` itself is included when it has one. Hidden directories are not
 * searched. Unreadable directories are logged and skipped.
 *
 * @returns Absolute folder paths, sorted
 */
export async function discoverPracticeFolders(root: string): Promise<string[]> {
  const start = path.resolve(root);
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === start && error instanceof Error && "code" in error && error.code === "ENOENT") {
        log.debug({ root: start }, "Library root does not exist");
      } else {
        log.warn({ dir, err: error }, "Skipping unreadable directory");
      }
      return;
    }

    if (entries.some((entry) => entry.isFile() && entry.name === FINGERPRINTS_FILE)) {
      found.push(dir);
    }

    const children = entries.filter(
      (entry) => entry.isDirectory() && !entry.name.startsWith(".")
    );
    for (const child of children) {
      await walk(path.join(dir, child.name));
    }
  }

  await walk(start);
  log.debug({ root: start, count: found.length }, "Discovered practice folders");
  return found.sort();
}
