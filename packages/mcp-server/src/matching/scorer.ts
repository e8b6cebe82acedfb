import { clamp, dot, norm } from "@take-finder/utils";
import { logger } from "../utils/logger.js";
import { AlgorithmMismatchError, DimensionMismatchError } from "../fingerprints/errors.js";
import type { FingerprintVector } from "../fingerprints/types.js";

const log = logger.child({ group: "SimilarityScorer" });

export interface SimilarityResult {
  /** Cosine similarity clamped to [0, 1] */
  score: number;
  /** True when either vector has zero norm (e.g. silent audio); score is 0 */
  degenerate: boolean;
}

/**
 * Check that two fingerprints can be compared
 *
 * @throws AlgorithmMismatchError when algorithms differ
 * @throws DimensionMismatchError when lengths differ
 */
export function assertComparable(a: FingerprintVector, b: FingerprintVector): void {
  if (a.algorithm !== b.algorithm) {
    throw new AlgorithmMismatchError(a.algorithm, b.algorithm);
  }
  if (a.values.length !== b.values.length) {
    throw new DimensionMismatchError(a.values.length, b.values.length);
  }
}

/**
 * Cosine similarity between two fingerprints of the same algorithm
 *
 * Every built-in algorithm emits non-negative components, so the cosine
 * already lies in [0, 1]; the clamp only absorbs floating-point error and
 * keeps the range fixed for any future signed algorithm.
 */
export function compare(
  a: FingerprintVector,
  b: FingerprintVector,
  options: { warnOnDegenerate?: boolean } = {}
): SimilarityResult {
  assertComparable(a, b);

  const na = norm(a.values);
  const nb = norm(b.values);
  if (na === 0 || nb === 0) {
    // The matcher reports these in its diagnostics instead of once per pair
    if (options.warnOnDegenerate ?? true) {
      log.warn({ algorithm: a.algorithm }, "Zero-norm fingerprint, similarity defined as 0");
    }
    return { score: 0, degenerate: true };
  }

  return { score: clamp(dot(a.values, b.values) / (na * nb), 0, 1), degenerate: false };
}

export function score(a: FingerprintVector, b: FingerprintVector): number {
  return compare(a, b).score;
}
