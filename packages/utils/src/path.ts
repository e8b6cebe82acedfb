import path from "path";
import fs from "fs/promises";

/**
 * Validates that a file path is within the library root and safe to access
 */
export function validatePath(rootPath: string, relativePath: string): string {
  const absolutePath = path.resolve(rootPath, relativePath);
  const root = path.resolve(rootPath);

  // Prevent directory traversal (also rejects sibling dirs sharing a prefix)
  if (absolutePath !== root && !absolutePath.startsWith(root + path.sep)) {
    throw new Error(`Path outside library: ${relativePath}`);
  }

  return absolutePath;
}

/**
 * Checks if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file atomically: write a sibling temp file, then rename it over the target.
 *
 * A reader never observes a partially written file, and an interrupted write
 * leaves the previous contents in place.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    await fs.writeFile(tmpPath, data, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}
