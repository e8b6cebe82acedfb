import fs from "fs/promises";
import type { AudioDecoder } from "./fingerprints/decoder.js";
import { DecodeError } from "./fingerprints/errors.js";
import type { DecodedAudio } from "./fingerprints/types.js";

export const TEST_SAMPLE_RATE = 22050;

export function sine(
  freq: number,
  seconds: number,
  amplitude = 0.5,
  rate = TEST_SAMPLE_RATE
): Float32Array {
  const samples = new Float32Array(Math.round(seconds * rate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * freq * i) / rate);
  }
  return samples;
}

/**
 * Decoder for tests: each "audio" file holds a short text recipe
 *
 * - a number: a half-second sine at that frequency
 * - "silence": half a second of zeros
 * - "empty": no samples
 * - anything else: DecodeError
 */
export class FakeDecoder implements AudioDecoder {
  calls = 0;
  decoded: string[] = [];

  async decode(filePath: string): Promise<DecodedAudio> {
    this.calls++;
    this.decoded.push(filePath);

    const recipe = (await fs.readFile(filePath, "utf-8")).trim();
    if (recipe === "silence") {
      return { channels: [new Float32Array(TEST_SAMPLE_RATE / 2)], sampleRate: TEST_SAMPLE_RATE };
    }
    if (recipe === "empty") {
      return { channels: [new Float32Array(0)], sampleRate: TEST_SAMPLE_RATE };
    }

    const freq = Number(recipe);
    if (!Number.isFinite(freq) || freq <= 0) {
      throw new DecodeError(filePath, "not a test recipe");
    }
    return { channels: [sine(freq, 0.5)], sampleRate: TEST_SAMPLE_RATE };
  }
}
