import path from "path";
import { extractSongName } from "@take-finder/utils";
import { logger } from "../utils/logger.js";
import type { FingerprintCache } from "../fingerprints/cache.js";
import { generateFolder, type BatchResult } from "../fingerprints/batch.js";
import {
  FingerprintError,
  InvalidInputError,
  errorMessage,
  type FingerprintErrorCode,
} from "../fingerprints/errors.js";
import { DEFAULT_ALGORITHM, type FingerprintAlgorithm } from "../fingerprints/types.js";
import { discoverPracticeFolders } from "../folders/discovery.js";
import { collectCandidates } from "./candidates.js";
import type { MatchDiagnostics } from "./diagnostics.js";
import {
  DEFAULT_BOOSTS,
  DEFAULT_TOP_N,
  findBestMatch,
  type BoostWeights,
  type MatchResult,
} from "./matcher.js";

const log = logger.child({ group: "AutoLabeler" });

export const DEFAULT_THRESHOLD = 0.7;

export interface AutoLabelerOptions {
  /** Library searched for practice folders */
  libraryRoot: string;
  referenceFolders?: string[];
  algorithm?: FingerprintAlgorithm;
  threshold?: number;
  topN?: number;
  concurrency?: number;
  boosts?: BoostWeights;
}

export interface SuggestOptions {
  algorithm?: FingerprintAlgorithm;
  threshold?: number;
  /** Folders to search; defaults to every practice folder in the library */
  folders?: string[];
}

/**
 * A proposed label for one recording. The engine never applies it.
 */
export interface LabelSuggestion {
  file: string;
  suggestedName: string | null;
  /** Raw similarity of the match as a percentage, 0 when there is none */
  confidence: number;
  sourceFolder: string | null;
  match: MatchResult | null;
  diagnostics: MatchDiagnostics;
}

export interface FolderSuggestionFailure {
  file: string;
  error: string;
  errorCode?: FingerprintErrorCode;
}

export interface FolderSuggestions {
  folder: string;
  algorithm: FingerprintAlgorithm;
  generation: BatchResult;
  suggestions: LabelSuggestion[];
  failures: FolderSuggestionFailure[];
}

/**
 * Suggests song names for unlabeled takes by matching them against every
 * fingerprinted practice folder in the library
 */
export class AutoLabeler {
  private readonly libraryRoot: string;
  private readonly referenceFolders: string[];
  private readonly algorithm: FingerprintAlgorithm;
  private readonly threshold: number;
  private readonly topN: number;
  private readonly concurrency?: number;
  private readonly boosts: BoostWeights;

  constructor(
    private readonly cache: FingerprintCache,
    options: AutoLabelerOptions
  ) {
    this.libraryRoot = path.resolve(options.libraryRoot);
    this.referenceFolders = (options.referenceFolders ?? []).map((folder) =>
      path.resolve(this.libraryRoot, folder)
    );
    this.algorithm = options.algorithm ?? DEFAULT_ALGORITHM;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.topN = options.topN ?? DEFAULT_TOP_N;
    this.concurrency = options.concurrency;
    this.boosts = options.boosts ?? DEFAULT_BOOSTS;
  }

  /**
   * Suggest a label for one file
   *
   * The file is fingerprinted through the cache first, so repeated calls
   * reuse the stored vector.
   *
   * @throws DecodeError / EmptyAudioError when the file cannot be fingerprinted
   */
  async suggest(filePath: string, options: SuggestOptions = {}): Promise<LabelSuggestion> {
    const target = path.resolve(filePath);
    const algorithm = options.algorithm ?? this.algorithm;
    const threshold = options.threshold ?? this.threshold;

    const vector = await this.cache.getOrGenerate(target, algorithm);

    const folders = new Set(options.folders ?? (await discoverPracticeFolders(this.libraryRoot)));
    folders.add(path.dirname(target));
    const sets = await Promise.all([...folders].map((folder) => this.cache.loadAll(folder)));

    const candidates = collectCandidates(sets, algorithm, {
      referenceFolders: this.referenceFolders,
      exclude: target,
    });

    const { match, diagnostics } = findBestMatch(vector, candidates, threshold, {
      targetFile: path.basename(target),
      boosts: this.boosts,
      topN: this.topN,
    });

    log.info(
      {
        file: target,
        folders: folders.size,
        candidates: candidates.length,
        matched: match?.matchedFile ?? null,
        score: match?.weightedScore,
      },
      match ? "Label suggested" : "No label above threshold"
    );

    return {
      file: target,
      suggestedName: match ? extractSongName(match.matchedFile) : null,
      confidence: match ? Math.round(match.rawScore * 100) : 0,
      sourceFolder: match?.matchedFolder ?? null,
      match,
      diagnostics,
    };
  }

  /**
   * Fingerprint a folder, then suggest a label for each of its files
   *
   * A file that cannot be fingerprinted or matched is reported in
   * `failures`; the others still get suggestions.
   */
  async suggestFolder(
    folder: string,
    options: SuggestOptions & { signal?: AbortSignal } = {}
  ): Promise<FolderSuggestions> {
    const root = path.resolve(folder);
    const algorithm = options.algorithm ?? this.algorithm;

    const generation = await generateFolder(this.cache, root, {
      algorithm,
      concurrency: this.concurrency,
      signal: options.signal,
    });

    const folders = options.folders ?? (await discoverPracticeFolders(this.libraryRoot));
    const suggestions: LabelSuggestion[] = [];
    const failures: FolderSuggestionFailure[] = [];

    for (const outcome of generation.outcomes) {
      if (outcome.status === "skipped") continue;
      if (outcome.status === "failed") {
        failures.push({
          file: outcome.file,
          error: outcome.error ?? "Unknown error",
          ...(outcome.errorCode && { errorCode: outcome.errorCode }),
        });
        continue;
      }

      try {
        suggestions.push(
          await this.suggest(path.join(root, outcome.file), { ...options, algorithm, folders })
        );
      } catch (error) {
        if (error instanceof InvalidInputError) throw error;
        log.warn({ folder: root, file: outcome.file, err: error }, "Could not suggest label");
        failures.push({
          file: outcome.file,
          error: errorMessage(error),
          ...(error instanceof FingerprintError && { errorCode: error.code }),
        });
      }
    }

    return { folder: root, algorithm, generation, suggestions, failures };
  }
}
