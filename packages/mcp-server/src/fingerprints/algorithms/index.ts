import type { FingerprintAlgorithm, FingerprintAlgorithmImpl } from "../types.js";
import { spectral } from "./spectral.js";
import { lightweight } from "./lightweight.js";
import { chroma } from "./chroma.js";
import { constellation } from "./constellation.js";

export type AlgorithmRegistry = Readonly<Record<FingerprintAlgorithm, FingerprintAlgorithmImpl>>;

/**
 * Built-in fingerprint algorithms, keyed by id
 */
export const ALGORITHMS: AlgorithmRegistry = {
  spectral,
  lightweight,
  chroma,
  constellation,
};

/**
 * Public description of each algorithm, for listing to users
 */
export function describeAlgorithms(
  registry: AlgorithmRegistry = ALGORITHMS
): Array<{ id: FingerprintAlgorithm; name: string; description: string; length: number }> {
  return Object.values(registry).map(({ id, name, description, length }) => ({
    id,
    name,
    description,
    length,
  }));
}
