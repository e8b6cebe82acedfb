/**
 * take-finder utilities
 *
 * Shared helpers for the fingerprint engine:
 * - Vector math for similarity scoring
 * - Path validation and atomic writes
 * - Audio filename helpers
 * - Bounded concurrency and serialized operation queues
 *
 * @packageDocumentation
 */

// Vector math exports
export type { NumericVector } from "./vector.js";
export {
  dot,
  norm,
  l2Normalize,
  isZeroVector,
  allFinite,
  clamp,
} from "./vector.js";

// Path utility exports
export { validatePath, fileExists, writeFileAtomic } from "./path.js";

// Audio filename exports
export { isAudioFile, extractSongName } from "./audio-files.js";

// Concurrency exports
export type { RunBoundedOptions } from "./concurrency.js";
export { runBounded, defaultConcurrency } from "./concurrency.js";
export { OperationQueue } from "./operation-queue.js";
