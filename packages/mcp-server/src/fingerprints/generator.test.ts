import { describe, it, expect } from "vitest";
import { FingerprintGenerator } from "./generator.js";
import { EmptyAudioError, InvalidInputError } from "./errors.js";
import { FINGERPRINT_ALGORITHMS } from "./types.js";
import { pitchClass } from "./algorithms/chroma.js";
import { landmarkBucket } from "./algorithms/constellation.js";
import { compare } from "../matching/scorer.js";

const RATE = 22050;

function sine(freq: number, seconds: number, amplitude = 0.5, rate = RATE): Float32Array {
  const samples = new Float32Array(Math.round(seconds * rate));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * freq * i) / rate);
  }
  return samples;
}

describe("FingerprintGenerator", () => {
  const generator = new FingerprintGenerator();

  it("should produce the fixed length of each algorithm", () => {
    const audio = sine(440, 1);
    const lengths = Object.fromEntries(
      FINGERPRINT_ALGORITHMS.map((algorithm) => [
        algorithm,
        generator.generate(audio, RATE, algorithm).values.length,
      ])
    );
    expect(lengths).toEqual({ spectral: 144, lightweight: 32, chroma: 144, constellation: 256 });
  });

  it("should not depend on duration for its length", () => {
    expect(generator.generate(sine(440, 0.2), RATE).values).toHaveLength(144);
    expect(generator.generate(sine(440, 3), RATE).values).toHaveLength(144);
  });

  it("should default to the spectral algorithm", () => {
    expect(generator.generate(sine(440, 0.5), RATE).algorithm).toBe("spectral");
  });

  it("should be deterministic", () => {
    const audio = sine(330, 1);
    for (const algorithm of FINGERPRINT_ALGORITHMS) {
      expect(generator.generate(audio, RATE, algorithm)).toEqual(
        generator.generate(audio, RATE, algorithm)
      );
    }
  });

  it("should return an all-zero vector for silence", () => {
    const silence = new Float32Array(RATE);
    for (const algorithm of FINGERPRINT_ALGORITHMS) {
      const { values } = generator.generate(silence, RATE, algorithm);
      expect(values.every((v) => v === 0)).toBe(true);
    }
  });

  it("should downmix identical channels to the same fingerprint as mono", () => {
    const mono = sine(523.25, 1);
    expect(generator.generate([mono, mono], RATE)).toEqual(generator.generate(mono, RATE));
  });

  it("should reject a non-positive sample rate", () => {
    expect(() => generator.generate(sine(440, 0.1), 0)).toThrow(InvalidInputError);
    expect(() => generator.generate(sine(440, 0.1), Number.NaN)).toThrow(InvalidInputError);
  });

  it("should reject empty audio", () => {
    expect(() => generator.generate(new Float32Array(0), RATE)).toThrow(EmptyAudioError);
    // Under a millisecond at 22.05 kHz
    expect(() => generator.generate(new Float32Array(10), RATE)).toThrow(EmptyAudioError);
  });

  it("should report algorithm lengths", () => {
    expect(generator.lengthOf("lightweight")).toBe(32);
    expect(generator.lengthOf("constellation")).toBe(256);
  });

  it("should score the same tone at another level above a different tone", () => {
    const quiet = generator.generate(sine(440, 1, 0.1), RATE);
    const loud = generator.generate(sine(440, 1, 0.8), RATE);
    const other = generator.generate(sine(3000, 1, 0.5), RATE);

    expect(compare(quiet, loud).score).toBeGreaterThan(0.99);
    expect(compare(quiet, loud).score).toBeGreaterThan(compare(quiet, other).score);
  });

  it("should fold octaves together in the chroma fingerprint", () => {
    const a4 = generator.generate(sine(440, 1), RATE, "chroma");
    const a5 = generator.generate(sine(880, 1), RATE, "chroma");
    const dSharp = generator.generate(sine(622.25, 1), RATE, "chroma");

    expect(compare(a4, a5).score).toBeGreaterThan(compare(a4, dSharp).score);
  });
});

describe("pitchClass", () => {
  it("should map frequencies to the nearest pitch class", () => {
    expect(pitchClass(440)).toBe(9);
    expect(pitchClass(880)).toBe(9);
    expect(pitchClass(261.63)).toBe(0);
    expect(pitchClass(246.94)).toBe(11);
  });
});

describe("landmarkBucket", () => {
  it("should stay inside the histogram and be stable", () => {
    const bucket = landmarkBucket(40, 60, 3);
    expect(bucket).toBeGreaterThanOrEqual(0);
    expect(bucket).toBeLessThan(256);
    expect(landmarkBucket(40, 60, 3)).toBe(bucket);
  });
});
