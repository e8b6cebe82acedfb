/**
 * take-finder engine
 *
 * Audio fingerprinting and cross-folder matching for practice recordings:
 * - Fingerprint generation (four algorithms) and per-folder caching
 * - Similarity scoring and trust-weighted best-match selection
 * - Label suggestions for unlabeled takes
 *
 * @packageDocumentation
 */

// Data model
export type {
  FingerprintAlgorithm,
  FingerprintVector,
  AudioSamples,
  DecodedAudio,
  FingerprintAlgorithmImpl,
  SignatureMode,
  FingerprintCacheEntry,
  FolderFingerprintSet,
} from "./fingerprints/types.js";
export {
  FINGERPRINT_ALGORITHMS,
  DEFAULT_ALGORITHM,
  FINGERPRINTS_FILE,
  CACHE_FORMAT_VERSION,
  isFingerprintAlgorithm,
  vectorFor,
  createEmptyFolderSet,
} from "./fingerprints/types.js";

// Errors
export type { FingerprintErrorCode } from "./fingerprints/errors.js";
export {
  FingerprintError,
  DecodeError,
  EmptyAudioError,
  AlgorithmMismatchError,
  DimensionMismatchError,
  InvalidInputError,
  ConfigError,
} from "./fingerprints/errors.js";

// Generation and caching
export type { AlgorithmRegistry } from "./fingerprints/algorithms/index.js";
export { ALGORITHMS, describeAlgorithms } from "./fingerprints/algorithms/index.js";
export { FingerprintGenerator } from "./fingerprints/generator.js";
export type { AudioDecoder } from "./fingerprints/decoder.js";
export { WavDecoder, decodeWavBuffer } from "./fingerprints/decoder.js";
export { computeSignature } from "./fingerprints/signature.js";
export type {
  FingerprintCacheOptions,
  FolderFingerprintInfo,
  LookupStatus,
  LookupResult,
} from "./fingerprints/cache.js";
export { FingerprintCache, parseFolderSet, serializeFolderSet } from "./fingerprints/cache.js";
export type {
  FileOutcome,
  FileOutcomeStatus,
  BatchProgress,
  BatchResult,
  GenerateFolderOptions,
} from "./fingerprints/batch.js";
export { generateFolder, listAudioFiles } from "./fingerprints/batch.js";

// Matching
export type { SimilarityResult } from "./matching/scorer.js";
export { compare, score, assertComparable } from "./matching/scorer.js";
export type {
  AppliedBoosts,
  ScoredCandidate,
  SkippedCandidate,
  MatchDiagnostics,
} from "./matching/diagnostics.js";
export { formatDiagnostics } from "./matching/diagnostics.js";
export type {
  MatchCandidate,
  BoostWeights,
  MatchResult,
  MatchOutcome,
  MatchOptions,
} from "./matching/matcher.js";
export {
  DEFAULT_BOOSTS,
  DEFAULT_TOP_N,
  computeBoost,
  weightScore,
  findBestMatch,
} from "./matching/matcher.js";
export type { CollectCandidatesOptions } from "./matching/candidates.js";
export { collectCandidates } from "./matching/candidates.js";
export type {
  AutoLabelerOptions,
  SuggestOptions,
  LabelSuggestion,
  FolderSuggestions,
  FolderSuggestionFailure,
} from "./matching/autolabel.js";
export { AutoLabeler, DEFAULT_THRESHOLD } from "./matching/autolabel.js";

// Folders and configuration
export { discoverPracticeFolders } from "./folders/discovery.js";
export type { EngineConfig } from "./config.js";
export { loadConfig } from "./config.js";
