/**
 * Fingerprint algorithms. Vectors are only comparable within one algorithm.
 */
export const FINGERPRINT_ALGORITHMS = [
  "spectral",
  "lightweight",
  "chroma",
  "constellation",
] as const;

export type FingerprintAlgorithm = (typeof FINGERPRINT_ALGORITHMS)[number];

export const DEFAULT_ALGORITHM: FingerprintAlgorithm = "spectral";

export function isFingerprintAlgorithm(value: string): value is FingerprintAlgorithm {
  return FINGERPRINT_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Fixed-length feature vector summarizing a recording
 */
export interface FingerprintVector {
  algorithm: FingerprintAlgorithm;
  values: number[];
}

/**
 * PCM input: a single mono channel or one array per channel
 */
export type AudioSamples = Float32Array | readonly Float32Array[];

/**
 * Output of an audio decoder
 */
export interface DecodedAudio {
  /** One entry per channel, samples in [-1, 1] */
  channels: Float32Array[];
  sampleRate: number;
}

/**
 * A single fingerprint algorithm
 *
 * `compute` receives mono samples and must return exactly `length` values,
 * independent of the input duration.
 */
export interface FingerprintAlgorithmImpl {
  id: FingerprintAlgorithm;
  name: string;
  description: string;
  length: number;
  compute(mono: Float32Array, sampleRate: number): number[];
}

/**
 * How source files are checked for modification
 * - stat: file size and modification time (cheap)
 * - content: SHA-256 of the file bytes
 */
export type SignatureMode = "stat" | "content";

/**
 * Cached fingerprints for one file in a folder
 *
 * A file can hold one vector per algorithm. All of them belong to the
 * source file as it was when `signature` was taken.
 */
export interface FingerprintCacheEntry {
  /** Filename, relative to the owning folder */
  file: string;
  /**
   * Content marker of the source file, used only for invalidation. Empty for
   * entries imported from a cache that recorded none.
   */
  signature: string;
  vectors: Partial<Record<FingerprintAlgorithm, number[]>>;
  /** When the newest vector was computed */
  generatedAt: string;
  /** Fields written by newer versions, preserved on save */
  extra?: Record<string, unknown>;
  /** Vectors of algorithms this version does not know, preserved on save */
  extraVectors?: Record<string, unknown>;
}

/**
 * The entry's fingerprint for one algorithm, if it has one
 */
export function vectorFor(
  entry: FingerprintCacheEntry,
  algorithm: FingerprintAlgorithm
): FingerprintVector | undefined {
  const values = entry.vectors[algorithm];
  return values ? { algorithm, values } : undefined;
}

/**
 * All cached fingerprints and flags for one practice folder
 */
export interface FolderFingerprintSet {
  /** Absolute folder path */
  folder: string;
  entries: Map<string, FingerprintCacheEntry>;
  /** Folder's own "per-folder reference" flag */
  referenceFolder: boolean;
  /** Folder excluded from matching */
  ignored: boolean;
  /** Files skipped by generation and matching */
  excludedFiles: Set<string>;
  /** Files flagged as reference songs */
  referenceSongs: Set<string>;
  /** Top-level fields written by newer versions, preserved on save */
  extra: Record<string, unknown>;
  /** File records that could not be read, written back unchanged */
  unreadable: Record<string, unknown>;
}

export function createEmptyFolderSet(folder: string): FolderFingerprintSet {
  return {
    folder,
    entries: new Map(),
    referenceFolder: false,
    ignored: false,
    excludedFiles: new Set(),
    referenceSongs: new Set(),
    extra: {},
    unreadable: {},
  };
}

/**
 * Cache file name written inside every practice folder
 */
export const FINGERPRINTS_FILE = ".audio_fingerprints.json";

export const CACHE_FORMAT_VERSION = 1;
