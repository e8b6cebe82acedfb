import { l2Normalize } from "@take-finder/utils";
import type { FingerprintAlgorithmImpl } from "../types.js";
import { averageIntoSections, forEachMagnitudeFrame } from "../dsp.js";

const FRAME_SIZE = 4096;
const HOP_SIZE = 1024;
const PITCH_CLASSES = 12;
const SECTIONS = 12;
const MIN_HZ = 80;
const MAX_HZ = 5000;

/**
 * Pitch class (0 = C ... 9 = A ... 11 = B) nearest to a frequency, with A4 = 440 Hz
 */
export function pitchClass(freq: number): number {
  const midi = Math.round(12 * Math.log2(freq / 440)) + 69;
  return ((midi % 12) + 12) % 12;
}

/**
 * Map each FFT bin in range to its pitch class, or -1 when out of range
 */
function binPitchClasses(sampleRate: number): Int8Array {
  const bins = FRAME_SIZE / 2 + 1;
  const top = Math.min(MAX_HZ, sampleRate / 2);
  const classes = new Int8Array(bins).fill(-1);
  for (let k = 1; k < bins; k++) {
    const freq = (k * sampleRate) / FRAME_SIZE;
    if (freq >= MIN_HZ && freq <= top) classes[k] = pitchClass(freq);
  }
  return classes;
}

/**
 * Chroma fingerprint
 *
 * Energy folded onto the 12 pitch classes, so the same song played on a
 * different guitar or mic still lines up. Averaged into 12 time sections.
 */
export const chroma: FingerprintAlgorithmImpl = {
  id: "chroma",
  name: "Chroma",
  description: "Pitch-class energy over time, robust to timbre differences",
  length: PITCH_CLASSES * SECTIONS,

  compute(mono, sampleRate) {
    const classes = binPitchClasses(sampleRate);
    const frames: number[][] = [];

    forEachMagnitudeFrame(mono, { frameSize: FRAME_SIZE, hopSize: HOP_SIZE }, (magnitude) => {
      const bins = new Array<number>(PITCH_CLASSES).fill(0);
      for (let k = 0; k < classes.length; k++) {
        const pc = classes[k];
        if (pc >= 0) bins[pc] += magnitude[k];
      }
      frames.push(l2Normalize(bins));
    });

    return averageIntoSections(frames, SECTIONS, PITCH_CLASSES);
  },
};
