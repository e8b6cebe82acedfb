import path from "path";
import {
  vectorFor,
  type FingerprintAlgorithm,
  type FolderFingerprintSet,
} from "../fingerprints/types.js";
import type { MatchCandidate } from "./matcher.js";

export interface CollectCandidatesOptions {
  /** Designated reference folders (absolute or relative to cwd) */
  referenceFolders?: Iterable<string>;
  /** Absolute path of the file being matched, never its own candidate */
  exclude?: string;
}

/**
 * Flatten folder fingerprint sets into match candidates for one algorithm
 *
 * Ignored folders, excluded files and files without a vector for
 * `algorithm` contribute nothing.
 */
export function collectCandidates(
  sets: Iterable<FolderFingerprintSet>,
  algorithm: FingerprintAlgorithm,
  options: CollectCandidatesOptions = {}
): MatchCandidate[] {
  const referenceFolders = new Set(
    [...(options.referenceFolders ?? [])].map((folder) => path.resolve(folder))
  );
  const exclude = options.exclude ? path.resolve(options.exclude) : undefined;

  const candidates: MatchCandidate[] = [];
  for (const set of sets) {
    if (set.ignored) continue;

    const folder = path.resolve(set.folder);
    for (const entry of set.entries.values()) {
      if (set.excludedFiles.has(entry.file)) continue;
      if (exclude && path.join(folder, entry.file) === exclude) continue;
      const vector = vectorFor(entry, algorithm);
      if (!vector) continue;

      candidates.push({
        file: entry.file,
        folder,
        vector,
        isReferenceFolder: referenceFolders.has(folder),
        isPerFolderReference: set.referenceFolder,
        isReferenceSong: set.referenceSongs.has(entry.file),
      });
    }
  }
  return candidates;
}
