import { allFinite, isZeroVector } from "@take-finder/utils";
import { logger } from "../utils/logger.js";
import { FingerprintError, InvalidInputError, errorMessage } from "../fingerprints/errors.js";
import { ALGORITHMS } from "../fingerprints/algorithms/index.js";
import { isFingerprintAlgorithm, type FingerprintVector } from "../fingerprints/types.js";
import { compare } from "./scorer.js";
import {
  compareRanked,
  type AppliedBoosts,
  type MatchDiagnostics,
  type ScoredCandidate,
  type SkippedCandidate,
} from "./diagnostics.js";

const log = logger.child({ group: "CrossFolderMatcher" });

/**
 * A cached fingerprint from some folder, with its trust flags
 */
export interface MatchCandidate {
  /** Filename, the file's identity within its folder */
  file: string;
  folder: string;
  vector: FingerprintVector;
  /** Folder is a designated reference folder */
  isReferenceFolder: boolean;
  /** Folder carries its own per-folder reference flag */
  isPerFolderReference?: boolean;
  /** File is flagged as a reference song */
  isReferenceSong: boolean;
}

/**
 * Additive trust boosts; a candidate's boosts are summed
 */
export interface BoostWeights {
  referenceFolder: number;
  perFolderReference: number;
  referenceSong: number;
}

export const DEFAULT_BOOSTS: Readonly<BoostWeights> = {
  referenceFolder: 0.15,
  perFolderReference: 0.1,
  referenceSong: 0.1,
};

export const DEFAULT_TOP_N = 10;

export interface MatchResult {
  targetFile: string;
  matchedFile: string;
  matchedFolder: string;
  /** Unweighted similarity in [0, 1] */
  rawScore: number;
  /** raw × (1 + boost), clamped to 1 */
  weightedScore: number;
  boost: number;
  isReference: boolean;
  /** Distinct folders containing a fingerprint for the matched filename */
  folderCount: number;
}

export interface MatchOutcome {
  match: MatchResult | null;
  diagnostics: MatchDiagnostics;
}

export interface MatchOptions {
  /** Name of the file being matched, echoed in the result */
  targetFile?: string;
  boosts?: BoostWeights;
  /** How many candidates to keep in diagnostics */
  topN?: number;
}

export function appliedBoosts(candidate: MatchCandidate): AppliedBoosts {
  return {
    referenceFolder: candidate.isReferenceFolder,
    perFolderReference: candidate.isPerFolderReference ?? false,
    referenceSong: candidate.isReferenceSong,
  };
}

export function computeBoost(applied: AppliedBoosts, weights: BoostWeights = DEFAULT_BOOSTS): number {
  let boost = 0;
  if (applied.referenceFolder) boost += weights.referenceFolder;
  if (applied.perFolderReference) boost += weights.perFolderReference;
  if (applied.referenceSong) boost += weights.referenceSong;
  return boost;
}

/**
 * Apply a boost to a raw score
 *
 * The reported weighted score is capped at 1 so it stays on the same scale
 * as the threshold; ranking uses the uncapped value.
 */
export function weightScore(rawScore: number, boost: number): { boosted: number; weighted: number } {
  const boosted = rawScore * (1 + boost);
  return { boosted, weighted: Math.min(1, boosted) };
}

function validateTarget(target: FingerprintVector): void {
  if (!isFingerprintAlgorithm(target.algorithm)) {
    throw new InvalidInputError(`Unknown fingerprint algorithm: ${String(target.algorithm)}`);
  }
  if (target.values.length === 0) {
    throw new InvalidInputError("Target fingerprint is empty");
  }
  const expected = ALGORITHMS[target.algorithm].length;
  if (target.values.length !== expected) {
    throw new InvalidInputError(
      `Target ${target.algorithm} fingerprint has ${target.values.length} values, expected ${expected}`
    );
  }
  if (!allFinite(target.values)) {
    throw new InvalidInputError("Target fingerprint contains non-finite values");
  }
}

/**
 * Pick the candidate that most likely is the same recording as `target`
 *
 * Candidates that cannot be compared (other algorithm, other length,
 * non-finite values) are skipped and noted in the diagnostics. The best candidate is accepted only
 * when its weighted score reaches `threshold`; otherwise `match` is null.
 *
 * @throws InvalidInputError when the target is empty, has the wrong length
 * for its algorithm or holds non-finite values, or the threshold is outside [0, 1]
 */
export function findBestMatch(
  target: FingerprintVector,
  candidates: Iterable<MatchCandidate>,
  threshold: number,
  options: MatchOptions = {}
): MatchOutcome {
  validateTarget(target);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidInputError(`Threshold must be between 0 and 1, got ${threshold}`);
  }

  const { targetFile, boosts = DEFAULT_BOOSTS, topN = DEFAULT_TOP_N } = options;
  const pool = [...candidates];

  // Same filename in several session folders means the song has been
  // labeled consistently more than once
  const foldersByFile = new Map<string, Set<string>>();
  for (const candidate of pool) {
    let folders = foldersByFile.get(candidate.file);
    if (!folders) {
      folders = new Set();
      foldersByFile.set(candidate.file, folders);
    }
    folders.add(candidate.folder);
  }

  const scored: ScoredCandidate[] = [];
  const skipped: SkippedCandidate[] = [];
  let degenerate = 0;

  for (const candidate of pool) {
    if (!allFinite(candidate.vector.values)) {
      skipped.push({
        file: candidate.file,
        folder: candidate.folder,
        reason: "Fingerprint contains non-finite values",
      });
      continue;
    }

    let rawScore: number;
    try {
      const result = compare(target, candidate.vector, { warnOnDegenerate: false });
      rawScore = result.score;
      if (result.degenerate) degenerate++;
    } catch (error) {
      if (!(error instanceof FingerprintError)) throw error;
      skipped.push({ file: candidate.file, folder: candidate.folder, reason: errorMessage(error) });
      continue;
    }

    const applied = appliedBoosts(candidate);
    const boost = computeBoost(applied, boosts);
    const { boosted, weighted } = weightScore(rawScore, boost);

    scored.push({
      file: candidate.file,
      folder: candidate.folder,
      rawScore,
      boost,
      boostedScore: boosted,
      weightedScore: weighted,
      isReference: applied.referenceFolder || applied.perFolderReference || applied.referenceSong,
      folderCount: foldersByFile.get(candidate.file)?.size ?? 1,
      applied,
    });
  }

  scored.sort(compareRanked);

  const warnings: string[] = [];
  if (isZeroVector(target.values)) {
    warnings.push("Target fingerprint has zero norm (silent audio?); all similarities are 0");
  } else if (degenerate > 0) {
    warnings.push(`${degenerate} candidate fingerprint(s) have zero norm; scored as 0`);
  }
  if (warnings.length > 0) {
    log.warn({ targetFile, degenerate }, warnings[0]);
  }

  const selection = scored.length > 0 ? scored[0] : null;
  const accepted = selection !== null && selection.weightedScore >= threshold;

  const diagnostics: MatchDiagnostics = {
    targetFile,
    algorithm: target.algorithm,
    targetLength: target.values.length,
    threshold,
    candidateCount: pool.length,
    scoredCount: scored.length,
    skipped,
    warnings,
    topCandidates: scored.slice(0, topN),
    nearThreshold: scored.filter(
      (c) => c.weightedScore >= threshold * 0.5 && c.weightedScore < threshold
    ),
    selection,
    accepted,
  };

  log.debug(
    {
      targetFile,
      candidates: pool.length,
      skipped: skipped.length,
      best: selection?.weightedScore,
      accepted,
    },
    "Cross-folder match complete"
  );

  if (!selection || !accepted) {
    return { match: null, diagnostics };
  }

  return {
    match: {
      targetFile: targetFile ?? "",
      matchedFile: selection.file,
      matchedFolder: selection.folder,
      rawScore: selection.rawScore,
      weightedScore: selection.weightedScore,
      boost: selection.boost,
      isReference: selection.isReference,
      folderCount: selection.folderCount,
    },
    diagnostics,
  };
}
