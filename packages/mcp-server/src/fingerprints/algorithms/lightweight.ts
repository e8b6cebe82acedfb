import { l2Normalize } from "@take-finder/utils";
import type { FingerprintAlgorithmImpl } from "../types.js";
import { bandMeans, centerCrop, decimate, forEachMagnitudeFrame, logBandEdges } from "../dsp.js";

const TARGET_RATE = 11025;
const MAX_SECONDS = 60;
const FRAME_SIZE = 2048;
const HOP_SIZE = 512;
const BANDS = 32;
const MIN_HZ = 60;
const MAX_HZ = 6000;

/**
 * Lightweight STFT fingerprint
 *
 * Downsampled to ~11 kHz, only the middle minute is analysed (intros and
 * outros vary most between takes), and time is averaged away entirely.
 */
export const lightweight: FingerprintAlgorithmImpl = {
  id: "lightweight",
  name: "Lightweight STFT",
  description: "Downsampled STFT with log-spaced bands, averaged over time",
  length: BANDS,

  compute(mono, sampleRate) {
    const factor = sampleRate > TARGET_RATE ? Math.floor(sampleRate / TARGET_RATE) : 1;
    const rate = sampleRate / factor;
    const signal = centerCrop(decimate(mono, factor), Math.floor(MAX_SECONDS * rate));

    const edges = logBandEdges(MIN_HZ, MAX_HZ, BANDS, FRAME_SIZE, rate);
    const sums = new Array<number>(BANDS).fill(0);

    const frameCount = forEachMagnitudeFrame(
      signal,
      { frameSize: FRAME_SIZE, hopSize: HOP_SIZE },
      (magnitude) => {
        const energies = bandMeans(magnitude, edges);
        for (let b = 0; b < BANDS; b++) sums[b] += energies[b];
      }
    );

    // log(1 + x) compresses loud bands; zero stays zero
    const averaged = sums.map((sum) => Math.log1p(sum / frameCount));
    return l2Normalize(averaged);
  },
};
