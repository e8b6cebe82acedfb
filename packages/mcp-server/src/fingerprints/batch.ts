import fs from "fs/promises";
import path from "path";
import { isAudioFile, runBounded } from "@take-finder/utils";
import { logger } from "../utils/logger.js";
import type { FingerprintCache } from "./cache.js";
import { FingerprintError, errorMessage, type FingerprintErrorCode } from "./errors.js";
import { DEFAULT_ALGORITHM, type FingerprintAlgorithm } from "./types.js";

const log = logger.child({ group: "FingerprintBatch" });

export type FileOutcomeStatus = "generated" | "cached" | "skipped" | "failed";

export interface FileOutcome {
  file: string;
  status: FileOutcomeStatus;
  error?: string;
  errorCode?: FingerprintErrorCode;
}

export interface BatchProgress {
  completed: number;
  total: number;
  file: string;
  status: FileOutcomeStatus;
}

export interface GenerateFolderOptions {
  algorithm?: FingerprintAlgorithm;
  /** Filenames inside the folder; defaults to every audio file in it */
  files?: string[];
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchResult {
  folder: string;
  algorithm: FingerprintAlgorithm;
  outcomes: FileOutcome[];
  /** Files never started because the run was cancelled */
  notStarted: string[];
  cancelled: boolean;
  counts: Record<FileOutcomeStatus, number>;
}

/**
 * List audio files directly inside a folder, sorted by name
 */
export async function listAudioFiles(folder: string): Promise<string[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isAudioFile(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Fingerprint every file in a folder
 *
 * Files are processed in parallel up to `concurrency`. A file that fails
 * is reported and the rest continue. The folder's cache is saved once at
 * the end, including after cancellation, so finished work is kept and
 * unstarted files are picked up by the next run.
 */
export async function generateFolder(
  cache: FingerprintCache,
  folder: string,
  options: GenerateFolderOptions = {}
): Promise<BatchResult> {
  const { algorithm = DEFAULT_ALGORITHM, concurrency, signal, onProgress } = options;
  const root = path.resolve(folder);

  const files = options.files
    ? [...new Set(options.files.map((file) => path.basename(file)))]
    : await listAudioFiles(root);
  const set = await cache.loadAll(root);

  log.info({ folder: root, algorithm, files: files.length }, "Generating fingerprints");

  let completed = 0;
  let dirty = false;

  const processFile = async (file: string): Promise<FileOutcome> => {
    let outcome: FileOutcome;

    if (set.excludedFiles.has(file)) {
      outcome = { file, status: "skipped" };
    } else {
      try {
        const { status, changed } = await cache.lookup(path.join(root, file), algorithm, {
          persist: false,
        });
        if (changed) dirty = true;
        outcome = { file, status };
      } catch (error) {
        log.warn({ folder: root, file, err: error }, "Could not fingerprint file");
        outcome = {
          file,
          status: "failed",
          error: errorMessage(error),
          ...(error instanceof FingerprintError && { errorCode: error.code }),
        };
      }
    }

    completed++;
    onProgress?.({ completed, total: files.length, file, status: outcome.status });
    return outcome;
  };

  const results = await runBounded(files, processFile, { concurrency, signal });

  if (dirty) await cache.save(root);

  const outcomes: FileOutcome[] = [];
  const notStarted: string[] = [];
  results.forEach((outcome, index) => {
    if (outcome) outcomes.push(outcome);
    else notStarted.push(files[index]);
  });

  const counts: Record<FileOutcomeStatus, number> = {
    generated: 0,
    cached: 0,
    skipped: 0,
    failed: 0,
  };
  for (const outcome of outcomes) counts[outcome.status] += 1;

  const cancelled = signal?.aborted ?? false;
  log.info({ folder: root, algorithm, cancelled, ...counts }, "Fingerprint generation finished");

  return { folder: root, algorithm, outcomes, notStarted, cancelled, counts };
}
