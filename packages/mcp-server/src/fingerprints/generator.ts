import { allFinite } from "@take-finder/utils";
import { ALGORITHMS, type AlgorithmRegistry } from "./algorithms/index.js";
import { downmix } from "./dsp.js";
import { EmptyAudioError, InvalidInputError } from "./errors.js";
import {
  DEFAULT_ALGORITHM,
  type AudioSamples,
  type FingerprintAlgorithm,
  type FingerprintVector,
} from "./types.js";

/** Anything shorter than this is treated as empty audio */
const MIN_DURATION_SECONDS = 0.001;

/**
 * Turns decoded PCM into fixed-length fingerprint vectors
 *
 * Pure: no I/O, no caching. The same samples and algorithm always produce
 * the same vector.
 */
export class FingerprintGenerator {
  constructor(private readonly algorithms: AlgorithmRegistry = ALGORITHMS) {}

  /**
   * Fingerprint decoded audio
   *
   * @param samples - Mono samples, or one array per channel (downmixed)
   * @throws InvalidInputError for a non-positive sample rate
   * @throws EmptyAudioError when the audio is effectively zero-length
   */
  generate(
    samples: AudioSamples,
    sampleRate: number,
    algorithm: FingerprintAlgorithm = DEFAULT_ALGORITHM
  ): FingerprintVector {
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new InvalidInputError(`Invalid sample rate: ${sampleRate}`);
    }

    const mono = downmix(samples);
    const minSamples = Math.max(1, Math.ceil(sampleRate * MIN_DURATION_SECONDS));
    if (mono.length < minSamples) {
      throw new EmptyAudioError(mono.length);
    }

    const impl = this.algorithms[algorithm];
    const values = impl.compute(mono, sampleRate);

    if (values.length !== impl.length || !allFinite(values)) {
      throw new Error(
        `Algorithm ${algorithm} produced an invalid vector (length ${values.length}, expected ${impl.length})`
      );
    }

    return { algorithm, values };
  }

  /**
   * Vector length produced by an algorithm
   */
  lengthOf(algorithm: FingerprintAlgorithm): number {
    return this.algorithms[algorithm].length;
  }
}
