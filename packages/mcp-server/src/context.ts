import { validatePath } from "@take-finder/utils";
import type { EngineConfig } from "./config.js";
import { FingerprintCache } from "./fingerprints/cache.js";
import { WavDecoder, type AudioDecoder } from "./fingerprints/decoder.js";
import { AutoLabeler } from "./matching/autolabel.js";
import type { ToolContext } from "./types.js";

/**
 * Wire the engine together from a configuration
 *
 * `decoder` defaults to the WAV decoder; tests pass their own.
 */
export function createToolContext(
  config: EngineConfig,
  options: { decoder?: AudioDecoder } = {}
): ToolContext {
  const cache = new FingerprintCache({
    decoder: options.decoder ?? new WavDecoder(),
    signatureMode: config.signatureMode,
  });

  const autoLabeler = new AutoLabeler(cache, {
    libraryRoot: config.libraryRoot,
    referenceFolders: config.referenceFolders,
    algorithm: config.algorithm,
    threshold: config.threshold,
    topN: config.topN,
    concurrency: config.concurrency,
  });

  return {
    config,
    cache,
    autoLabeler,
    resolvePath: (relativeOrAbsolute) => validatePath(config.libraryRoot, relativeOrAbsolute),
  };
}
