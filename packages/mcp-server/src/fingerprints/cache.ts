import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { fileExists, OperationQueue, writeFileAtomic } from "@take-finder/utils";
import { logger } from "../utils/logger.js";
import type { AudioDecoder } from "./decoder.js";
import { DecodeError, errorMessage } from "./errors.js";
import { FingerprintGenerator } from "./generator.js";
import { computeSignature } from "./signature.js";
import {
  CACHE_FORMAT_VERSION,
  DEFAULT_ALGORITHM,
  FINGERPRINT_ALGORITHMS,
  FINGERPRINTS_FILE,
  createEmptyFolderSet,
  isFingerprintAlgorithm,
  vectorFor,
  type FingerprintAlgorithm,
  type FingerprintCacheEntry,
  type FingerprintVector,
  type FolderFingerprintSet,
  type SignatureMode,
} from "./types.js";

const log = logger.child({ group: "FingerprintCache" });

// Files written by the desktop app share these key names; `fingerprint`
// is its older single-vector layout, which always held a spectral vector.
const entrySchema = z.looseObject({
  signature: z.string().optional(),
  generated_at: z.string().optional(),
  fingerprints: z.record(z.string(), z.unknown()).optional(),
  fingerprint: z.unknown().optional(),
});

const valuesSchema = z.array(z.number()).min(1);

const LEGACY_ALGORITHM: FingerprintAlgorithm = "spectral";

const cacheFileSchema = z.looseObject({
  version: z.number().optional(),
  is_reference_folder: z.boolean().optional(),
  ignore_fingerprints: z.boolean().optional(),
  excluded_files: z.array(z.string()).optional(),
  reference_songs: z.array(z.string()).optional(),
  files: z.record(z.string(), z.unknown()),
});

const ENTRY_KEYS = new Set(["signature", "generated_at", "fingerprints", "fingerprint"]);
const FILE_KEYS = new Set([
  "version",
  "is_reference_folder",
  "ignore_fingerprints",
  "excluded_files",
  "reference_songs",
  "files",
]);

function pickExtra(
  record: Record<string, unknown>,
  known: Set<string>
): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!known.has(key)) extra[key] = value;
  }
  return extra;
}

export type LookupStatus = "cached" | "generated";

export interface LookupResult {
  vector: FingerprintVector;
  status: LookupStatus;
  /** The in-memory set changed and needs saving */
  changed: boolean;
}

interface PendingLookup {
  promise: Promise<LookupResult>;
  persist: boolean;
}

export interface FingerprintCacheOptions {
  decoder: AudioDecoder;
  generator?: FingerprintGenerator;
  signatureMode?: SignatureMode;
}

/**
 * Summary of a folder's fingerprint cache
 */
export interface FolderFingerprintInfo {
  folder: string;
  totalFiles: number;
  algorithmCoverage: Record<FingerprintAlgorithm, number>;
  excludedFiles: string[];
  referenceSongs: string[];
  referenceFolder: boolean;
  ignored: boolean;
}

/**
 * Per-folder fingerprint cache with signature-based invalidation
 *
 * Each practice folder keeps its fingerprints in `.audio_fingerprints.json`.
 * Loaded sets stay in memory; every write to a folder goes through that
 * folder's queue, so saves never interleave.
 */
export class FingerprintCache {
  private readonly decoder: AudioDecoder;
  private readonly generator: FingerprintGenerator;
  private readonly signatureMode: SignatureMode;

  private sets = new Map<string, FolderFingerprintSet>();
  private loading = new Map<string, Promise<FolderFingerprintSet>>();
  private writers = new Map<string, OperationQueue>();
  private inFlight = new Map<string, PendingLookup>();

  constructor(options: FingerprintCacheOptions) {
    this.decoder = options.decoder;
    this.generator = options.generator ?? new FingerprintGenerator();
    this.signatureMode = options.signatureMode ?? "stat";
  }

  /**
   * Location of the cache file for a folder
   */
  static cachePath(folder: string): string {
    return path.join(path.resolve(folder), FINGERPRINTS_FILE);
  }

  /**
   * Get the fingerprint set for a folder, reading it from disk on first use
   *
   * A missing or corrupt cache file yields an empty set.
   */
  async loadAll(folder: string): Promise<FolderFingerprintSet> {
    const key = path.resolve(folder);

    const loaded = this.sets.get(key);
    if (loaded) return loaded;

    // Concurrent first loads share one read
    const pending = this.loading.get(key);
    if (pending) return pending;

    const promise = this.readFromDisk(key)
      .then((set) => {
        this.sets.set(key, set);
        return set;
      })
      .finally(() => {
        this.loading.delete(key);
      });
    this.loading.set(key, promise);
    return promise;
  }

  /**
   * Persist a folder's fingerprint set (write-to-temp-then-rename)
   *
   * Passing `set` replaces the in-memory copy for that folder.
   */
  async save(folder: string, set?: FolderFingerprintSet): Promise<void> {
    const key = path.resolve(folder);
    if (set) this.sets.set(key, set);

    await this.writerFor(key).run(async () => {
      // Serialize inside the queue so the latest state is written
      const current = this.sets.get(key) ?? createEmptyFolderSet(key);
      const data = JSON.stringify(serializeFolderSet(current), null, 2);
      try {
        await writeFileAtomic(FingerprintCache.cachePath(key), data);
        log.debug({ folder: key, count: current.entries.size }, "Saved fingerprint cache");
      } catch (error) {
        log.error({ folder: key, err: error }, "Failed to save fingerprint cache");
        throw error;
      }
    });
  }

  /**
   * Return the cached fingerprint for a file, generating it when the file
   * is new, has changed, or has no vector for `algorithm` yet
   *
   * Vectors of other algorithms for the same unchanged file are kept.
   *
   * @throws DecodeError when the file cannot be read or decoded
   * @throws EmptyAudioError when the decoded audio is empty (no entry is written)
   */
  async getOrGenerate(
    filePath: string,
    algorithm: FingerprintAlgorithm = DEFAULT_ALGORITHM
  ): Promise<FingerprintVector> {
    const { vector } = await this.lookup(filePath, algorithm, { persist: true });
    return vector;
  }

  /**
   * Like getOrGenerate, but also reports whether the vector was regenerated
   *
   * With `persist: false` the new entry is only stored in memory; batch
   * generation uses this and saves once at the end.
   */
  async lookup(
    filePath: string,
    algorithm: FingerprintAlgorithm,
    options: { persist?: boolean } = {}
  ): Promise<LookupResult> {
    const absolute = path.resolve(filePath);
    const persist = options.persist ?? true;
    const flightKey = `${algorithm}:${absolute}`;

    const existing = this.inFlight.get(flightKey);
    if (existing) {
      const result = await existing.promise;
      // The joined lookup left its change in memory only
      if (persist && !existing.persist && result.changed) {
        await this.save(path.dirname(absolute));
      }
      return result;
    }

    const promise = this.resolveVector(absolute, algorithm, persist).finally(() => {
      this.inFlight.delete(flightKey);
    });
    this.inFlight.set(flightKey, { promise, persist });
    return promise;
  }

  private async resolveVector(
    absolute: string,
    algorithm: FingerprintAlgorithm,
    persist: boolean
  ): Promise<LookupResult> {
    const folder = path.dirname(absolute);
    const file = path.basename(absolute);
    const set = await this.loadAll(folder);

    let signature: string;
    try {
      signature = await computeSignature(absolute, this.signatureMode);
    } catch (error) {
      throw new DecodeError(absolute, errorMessage(error), { cause: error });
    }

    const cached = set.entries.get(file);

    // Imported entries carry no signature; their vectors are taken to
    // describe the file as it is now
    let adopted = false;
    if (cached && cached.signature === "") {
      cached.signature = signature;
      adopted = true;
      log.debug({ file: absolute }, "Adopted unsigned fingerprint entry");
    }

    const current = cached && cached.signature === signature ? cached : undefined;
    const hit = current && vectorFor(current, algorithm);
    if (hit) {
      if (adopted && persist) await this.save(folder);
      return { vector: hit, status: "cached", changed: adopted };
    }

    const audio = await this.decoder.decode(absolute);
    const vector = this.generator.generate(audio.channels, audio.sampleRate, algorithm);

    const vectors: FingerprintCacheEntry["vectors"] = current ? { ...current.vectors } : {};
    vectors[algorithm] = vector.values;
    set.entries.set(file, {
      file,
      signature,
      vectors,
      generatedAt: new Date().toISOString(),
      extra: cached?.extra,
      extraVectors: current?.extraVectors,
    });
    log.debug(
      { file: absolute, algorithm },
      current ? "Added fingerprint" : cached ? "Regenerated fingerprint" : "Generated fingerprint"
    );

    if (persist) await this.save(folder);

    return { vector, status: "generated", changed: true };
  }

  /**
   * Remove entries whose source file no longer exists
   *
   * Never runs automatically.
   *
   * @returns Names of removed entries
   */
  async cleanup(folder: string): Promise<string[]> {
    const set = await this.loadAll(folder);
    const removed: string[] = [];

    for (const file of [...set.entries.keys()]) {
      if (!(await fileExists(path.join(set.folder, file)))) {
        set.entries.delete(file);
        removed.push(file);
      }
    }

    if (removed.length > 0) {
      await this.save(folder);
      log.info({ folder: set.folder, removed: removed.length }, "Removed stale fingerprints");
    }
    return removed.sort();
  }

  async setFolderReference(folder: string, value: boolean): Promise<void> {
    const set = await this.loadAll(folder);
    set.referenceFolder = value;
    await this.save(folder);
  }

  async setFolderIgnored(folder: string, value: boolean): Promise<void> {
    const set = await this.loadAll(folder);
    set.ignored = value;
    await this.save(folder);
  }

  async setFileExcluded(folder: string, file: string, value: boolean): Promise<void> {
    const set = await this.loadAll(folder);
    toggleMember(set.excludedFiles, file, value);
    await this.save(folder);
  }

  async setReferenceSong(folder: string, file: string, value: boolean): Promise<void> {
    const set = await this.loadAll(folder);
    toggleMember(set.referenceSongs, file, value);
    await this.save(folder);
  }

  /**
   * Per-algorithm coverage and flags for a folder
   */
  async info(folder: string): Promise<FolderFingerprintInfo> {
    const set = await this.loadAll(folder);

    const algorithmCoverage: Record<FingerprintAlgorithm, number> = {
      spectral: 0,
      lightweight: 0,
      chroma: 0,
      constellation: 0,
    };
    for (const entry of set.entries.values()) {
      for (const algorithm of FINGERPRINT_ALGORITHMS) {
        if (entry.vectors[algorithm]) algorithmCoverage[algorithm] += 1;
      }
    }

    return {
      folder: set.folder,
      totalFiles: set.entries.size,
      algorithmCoverage,
      excludedFiles: [...set.excludedFiles].sort(),
      referenceSongs: [...set.referenceSongs].sort(),
      referenceFolder: set.referenceFolder,
      ignored: set.ignored,
    };
  }

  private writerFor(key: string): OperationQueue {
    let queue = this.writers.get(key);
    if (!queue) {
      queue = new OperationQueue();
      this.writers.set(key, queue);
    }
    return queue;
  }

  private async readFromDisk(folder: string): Promise<FolderFingerprintSet> {
    const cachePath = FingerprintCache.cachePath(folder);

    let raw: string;
    try {
      raw = await fs.readFile(cachePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        log.debug({ folder }, "No fingerprint cache, starting fresh");
      } else {
        log.warn({ folder, err: error }, "Failed to read fingerprint cache, starting fresh");
      }
      return createEmptyFolderSet(folder);
    }

    try {
      const set = parseFolderSet(folder, JSON.parse(raw), this.generator);
      log.debug({ folder, count: set.entries.size }, "Loaded fingerprint cache");
      return set;
    } catch (error) {
      log.warn({ folder, err: error }, "Corrupt fingerprint cache, starting fresh");
      return createEmptyFolderSet(folder);
    }
  }
}

function toggleMember(members: Set<string>, value: string, present: boolean): void {
  if (present) members.add(value);
  else members.delete(value);
}

/**
 * Build a folder set from parsed cache JSON
 *
 * Vectors that fail validation, or whose length no longer matches their
 * algorithm, are dropped and will be regenerated. File records that are not
 * objects are kept as they are. Vectors of unknown algorithms and unknown
 * fields are kept. A record in the older single-vector layout is migrated.
 *
 * @throws when the top-level structure is not a cache file
 */
export function parseFolderSet(
  folder: string,
  data: unknown,
  generator: FingerprintGenerator = new FingerprintGenerator()
): FolderFingerprintSet {
  const parsed = cacheFileSchema.parse(data);
  const set = createEmptyFolderSet(folder);

  if (parsed.version !== undefined && parsed.version > CACHE_FORMAT_VERSION) {
    log.warn(
      { folder, version: parsed.version },
      "Fingerprint cache written by a newer version, reading known fields"
    );
  }

  set.referenceFolder = parsed.is_reference_folder ?? false;
  set.ignored = parsed.ignore_fingerprints ?? false;
  set.excludedFiles = new Set(parsed.excluded_files ?? []);
  set.referenceSongs = new Set(parsed.reference_songs ?? []);
  set.extra = pickExtra(parsed, FILE_KEYS);

  for (const [file, rawEntry] of Object.entries(parsed.files)) {
    const result = entrySchema.safeParse(rawEntry);
    if (!result.success) {
      log.warn({ folder, file }, "Keeping unreadable fingerprint entry as is");
      set.unreadable[file] = rawEntry;
      continue;
    }
    const entry = result.data;

    const extra = pickExtra(entry, ENTRY_KEYS);
    let stored: Record<string, unknown>;
    if (entry.fingerprints) {
      stored = entry.fingerprints;
      if (entry.fingerprint !== undefined) extra.fingerprint = entry.fingerprint;
    } else if (entry.fingerprint !== undefined) {
      stored = { [LEGACY_ALGORITHM]: entry.fingerprint };
      log.debug({ folder, file }, "Migrated single-vector fingerprint entry");
    } else {
      stored = {};
    }

    const vectors: FingerprintCacheEntry["vectors"] = {};
    const extraVectors: Record<string, unknown> = {};
    for (const [algorithm, rawValues] of Object.entries(stored)) {
      if (!isFingerprintAlgorithm(algorithm)) {
        extraVectors[algorithm] = rawValues;
        continue;
      }
      const values = valuesSchema.safeParse(rawValues);
      if (!values.success || values.data.length !== generator.lengthOf(algorithm)) {
        log.warn({ folder, file, algorithm }, "Dropping invalid fingerprint vector");
        continue;
      }
      vectors[algorithm] = values.data;
    }

    const cacheEntry: FingerprintCacheEntry = {
      file,
      signature: entry.signature ?? "",
      vectors,
      generatedAt: entry.generated_at ?? "",
    };
    if (Object.keys(extra).length > 0) cacheEntry.extra = extra;
    if (Object.keys(extraVectors).length > 0) cacheEntry.extraVectors = extraVectors;
    set.entries.set(file, cacheEntry);
  }

  return set;
}

/**
 * Convert a folder set to its on-disk JSON shape
 */
export function serializeFolderSet(set: FolderFingerprintSet): Record<string, unknown> {
  const records = new Map<string, unknown>(Object.entries(set.unreadable));
  for (const [name, entry] of set.entries) {
    const fingerprints: Record<string, unknown> = { ...entry.extraVectors };
    for (const algorithm of FINGERPRINT_ALGORITHMS) {
      const values = entry.vectors[algorithm];
      if (values) fingerprints[algorithm] = values;
    }
    records.set(name, {
      ...entry.extra,
      ...(entry.signature !== "" && { signature: entry.signature }),
      ...(entry.generatedAt !== "" && { generated_at: entry.generatedAt }),
      fingerprints,
    });
  }

  const files: Record<string, unknown> = {};
  for (const name of [...records.keys()].sort()) {
    files[name] = records.get(name);
  }

  return {
    ...set.extra,
    version: CACHE_FORMAT_VERSION,
    is_reference_folder: set.referenceFolder,
    ignore_fingerprints: set.ignored,
    excluded_files: [...set.excludedFiles].sort(),
    reference_songs: [...set.referenceSongs].sort(),
    files,
  };
}
