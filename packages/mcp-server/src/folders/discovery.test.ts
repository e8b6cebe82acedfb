import fs from "fs/promises";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { discoverPracticeFolders } from "./discovery.js";
import { FINGERPRINTS_FILE } from "../fingerprints/types.js";

describe("discoverPracticeFolders", () => {
  let root: string;

  async function addCache(...segments: string[]): Promise<void> {
    const dir = path.join(root, ...segments);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, FINGERPRINTS_FILE), "{}");
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "take-finder-discovery-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("should find nested folders with a fingerprint cache, sorted", async () => {
    await addCache("2024-03-01");
    await addCache("2023", "2023-12-24");
    await fs.mkdir(path.join(root, "empty"));

    expect(await discoverPracticeFolders(root)).toEqual([
      path.join(root, "2023", "2023-12-24"),
      path.join(root, "2024-03-01"),
    ]);
  });

  it("should include the root when it has a cache", async () => {
    await addCache();
    await addCache("b");

    expect(await discoverPracticeFolders(root)).toEqual([root, path.join(root, "b")]);
  });

  it("should not search hidden directories", async () => {
    await addCache(".trash", "old");
    await addCache("visible");

    expect(await discoverPracticeFolders(root)).toEqual([path.join(root, "visible")]);
  });

  it("should return nothing for a missing root", async () => {
    expect(await discoverPracticeFolders(path.join(root, "nope"))).toEqual([]);
  });
});
