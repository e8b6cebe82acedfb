import { l2Normalize } from "@take-finder/utils";
import type { FingerprintAlgorithmImpl } from "../types.js";
import { forEachMagnitudeFrame } from "../dsp.js";

const FRAME_SIZE = 2048;
const HOP_SIZE = 512;
const MIN_HZ = 300;
const MAX_HZ = 2000;
const PEAKS_PER_FRAME = 5;
const PEAK_THRESHOLD_RATIO = 0.3;
const MAX_PAIR_FRAMES = 10;
const MAX_PAIRS_PER_ANCHOR = 8;
const BUCKETS = 256;

interface Peak {
  frame: number;
  bin: number;
}

/**
 * Hash a (f1, f2, dt) landmark into a histogram bucket
 */
export function landmarkBucket(f1: number, f2: number, dt: number): number {
  let h = Math.imul(f1, 73856093) ^ Math.imul(f2, 19349663) ^ Math.imul(dt, 83492791);
  h ^= h >>> 13;
  h = Math.imul(h, 0x5bd1e995);
  h ^= h >>> 15;
  return (h >>> 0) % BUCKETS;
}

function framePeaks(magnitude: Float64Array, minBin: number, maxBin: number): number[] {
  let frameMax = 0;
  for (let k = minBin; k < maxBin; k++) frameMax = Math.max(frameMax, magnitude[k]);
  if (frameMax === 0) return [];

  const candidates: number[] = [];
  const last = Math.min(maxBin, magnitude.length - 2);
  for (let k = Math.max(minBin, 2); k < last; k++) {
    const m = magnitude[k];
    if (
      m > magnitude[k - 1] &&
      m > magnitude[k + 1] &&
      m > magnitude[k - 2] &&
      m > magnitude[k + 2] &&
      m > PEAK_THRESHOLD_RATIO * frameMax
    ) {
      candidates.push(k);
    }
  }

  // Strongest first; lower bin wins ties so the result is deterministic
  candidates.sort((a, b) => magnitude[b] - magnitude[a] || a - b);
  return candidates.slice(0, PEAKS_PER_FRAME);
}

/**
 * Constellation fingerprint
 *
 * Spectral peaks are paired into (f1, f2, Δt) landmarks and counted in a
 * hashed histogram. Two copies of the same recording share nearly all
 * landmarks; different takes of a song share few, so this suits duplicate
 * and exact-clip detection.
 */
export const constellation: FingerprintAlgorithmImpl = {
  id: "constellation",
  name: "Constellation",
  description: "Spectral peak landmarks, for duplicate and exact-clip detection",
  length: BUCKETS,

  compute(mono, sampleRate) {
    const minBin = Math.floor((MIN_HZ * FRAME_SIZE) / sampleRate);
    const maxBin = Math.min(Math.floor((MAX_HZ * FRAME_SIZE) / sampleRate), FRAME_SIZE / 2);

    const peaks: Peak[] = [];
    forEachMagnitudeFrame(mono, { frameSize: FRAME_SIZE, hopSize: HOP_SIZE }, (magnitude, frame) => {
      for (const bin of framePeaks(magnitude, minBin, maxBin)) {
        peaks.push({ frame, bin });
      }
    });

    const histogram = new Array<number>(BUCKETS).fill(0);
    for (let i = 0; i < peaks.length; i++) {
      const anchor = peaks[i];
      let pairs = 0;
      for (let j = i + 1; j < peaks.length && pairs < MAX_PAIRS_PER_ANCHOR; j++) {
        const dt = peaks[j].frame - anchor.frame;
        if (dt > MAX_PAIR_FRAMES) break;
        if (dt <= 0) continue;
        histogram[landmarkBucket(anchor.bin, peaks[j].bin, dt)] += 1;
        pairs++;
      }
    }

    return l2Normalize(histogram);
  },
};
