import type { FingerprintAlgorithmImpl } from "../types.js";
import { averageIntoSections, bandMeans, forEachMagnitudeFrame, logBandEdges } from "../dsp.js";

const FRAME_SIZE = 4096;
const HOP_SIZE = 2048;
const BANDS = 12;
const SECTIONS = 12;
const MIN_HZ = 60;
const MAX_HZ = 8000;

/**
 * Spectral band fingerprint (default)
 *
 * 12 log-spaced bands over the musical range, normalized per frame so the
 * result does not depend on recording level, averaged into 12 time sections.
 */
export const spectral: FingerprintAlgorithmImpl = {
  id: "spectral",
  name: "Spectral Analysis",
  description: "Spectral band energies over time (default)",
  length: BANDS * SECTIONS,

  compute(mono, sampleRate) {
    const edges = logBandEdges(MIN_HZ, MAX_HZ, BANDS, FRAME_SIZE, sampleRate);
    const frames: number[][] = [];

    forEachMagnitudeFrame(mono, { frameSize: FRAME_SIZE, hopSize: HOP_SIZE }, (magnitude) => {
      const energies = bandMeans(magnitude, edges);
      const total = energies.reduce((sum, e) => sum + e, 0);
      frames.push(total > 0 ? energies.map((e) => e / total) : energies);
    });

    return averageIntoSections(frames, SECTIONS, BANDS);
  },
};
