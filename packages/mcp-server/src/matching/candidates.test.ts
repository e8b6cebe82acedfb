import { describe, it, expect } from "vitest";
import { collectCandidates } from "./candidates.js";
import { createEmptyFolderSet, type FolderFingerprintSet } from "../fingerprints/types.js";

function folderSet(folder: string, files: string[]): FolderFingerprintSet {
  const set = createEmptyFolderSet(folder);
  for (const file of files) {
    set.entries.set(file, {
      file,
      signature: "stat:1:1",
      vectors: { spectral: [1, 0] },
      generatedAt: "2024-01-01T00:00:00.000Z",
    });
  }
  return set;
}

describe("collectCandidates", () => {
  it("should flatten every folder's entries", () => {
    const candidates = collectCandidates(
      [folderSet("/library/one", ["a.wav", "b.wav"]), folderSet("/library/two", ["a.wav"])],
      "spectral"
    );

    expect(candidates.map((c) => `${c.folder}/${c.file}`)).toEqual([
      "/library/one/a.wav",
      "/library/one/b.wav",
      "/library/two/a.wav",
    ]);
  });

  it("should skip ignored folders and excluded files", () => {
    const ignored = folderSet("/library/ignored", ["a.wav"]);
    ignored.ignored = true;
    const partial = folderSet("/library/partial", ["a.wav", "b.wav"]);
    partial.excludedFiles.add("b.wav");

    const candidates = collectCandidates([ignored, partial], "spectral");
    expect(candidates.map((c) => `${c.folder}/${c.file}`)).toEqual(["/library/partial/a.wav"]);
  });

  it("should offer only the vectors of the requested algorithm", () => {
    const set = folderSet("/library/one", ["a.wav", "b.wav"]);
    set.entries.set("c.wav", {
      file: "c.wav",
      signature: "stat:1:1",
      vectors: { spectral: [1, 0], chroma: [0, 1] },
      generatedAt: "2024-01-01T00:00:00.000Z",
    });

    const candidates = collectCandidates([set], "chroma");

    expect(candidates.map((c) => [c.file, c.vector])).toEqual([
      ["c.wav", { algorithm: "chroma", values: [0, 1] }],
    ]);
  });

  it("should never offer the target as its own candidate", () => {
    const candidates = collectCandidates([folderSet("/library/one", ["a.wav", "b.wav"])], "spectral", {
      exclude: "/library/one/a.wav",
    });
    expect(candidates.map((c) => c.file)).toEqual(["b.wav"]);
  });

  it("should carry the trust flags", () => {
    const flagged = folderSet("/library/flagged", ["a.wav", "b.wav"]);
    flagged.referenceFolder = true;
    flagged.referenceSongs.add("b.wav");

    const candidates = collectCandidates(
      [flagged, folderSet("/library/designated", ["c.wav"])],
      "spectral",
      {
        referenceFolders: ["/library/designated"],
      }
    );

    expect(
      candidates.map(({ file, isReferenceFolder, isPerFolderReference, isReferenceSong }) => ({
        file,
        isReferenceFolder,
        isPerFolderReference,
        isReferenceSong,
      }))
    ).toEqual([
      { file: "a.wav", isReferenceFolder: false, isPerFolderReference: true, isReferenceSong: false },
      { file: "b.wav", isReferenceFolder: false, isPerFolderReference: true, isReferenceSong: true },
      { file: "c.wav", isReferenceFolder: true, isPerFolderReference: false, isReferenceSong: false },
    ]);
  });
});
