import fs from "fs/promises";
import crypto from "crypto";
import type { SignatureMode } from "./types.js";

/**
 * Compute the content marker used to detect that a source file changed
 *
 * This is not the audio fingerprint: it only answers "is this the same
 * file we fingerprinted last time?".
 */
export async function computeSignature(
  filePath: string,
  mode: SignatureMode = "stat"
): Promise<string> {
  if (mode === "content") {
    const data = await fs.readFile(filePath);
    return `sha256:${crypto.createHash("sha256").update(data).digest("hex")}`;
  }

  const stats = await fs.stat(filePath);
  return `stat:${stats.size}:${Math.trunc(stats.mtimeMs)}`;
}
