import FFT from "fft.js";
import type { AudioSamples } from "./types.js";

/**
 * Hann window of the given size
 */
export function hannWindow(size: number): Float64Array {
  const window = new Float64Array(size);
  if (size === 1) {
    window[0] = 1;
    return window;
  }
  for (let n = 0; n < size; n++) {
    window[n] = 0.5 * (1 - Math.cos((2 * Math.PI * n) / (size - 1)));
  }
  return window;
}

/**
 * Average all channels into one. Non-finite samples are treated as silence.
 */
export function downmix(samples: AudioSamples): Float32Array {
  const channels = samples instanceof Float32Array ? [samples] : samples;
  if (channels.length === 0) return new Float32Array(0);

  let length = channels[0].length;
  for (const channel of channels) {
    length = Math.min(length, channel.length);
  }

  const mono = new Float32Array(length);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      const sample = channel[i];
      if (Number.isFinite(sample)) mono[i] += sample;
    }
  }
  if (channels.length > 1) {
    for (let i = 0; i < length; i++) mono[i] /= channels.length;
  }
  return mono;
}

/**
 * Keep every `factor`-th sample
 */
export function decimate(signal: Float32Array, factor: number): Float32Array {
  if (factor <= 1) return signal;
  const out = new Float32Array(Math.ceil(signal.length / factor));
  for (let i = 0, j = 0; i < signal.length; i += factor, j++) {
    out[j] = signal[i];
  }
  return out;
}

/**
 * Keep at most `maxLength` samples from the middle of the signal
 */
export function centerCrop(signal: Float32Array, maxLength: number): Float32Array {
  if (signal.length <= maxLength) return signal;
  const start = Math.floor((signal.length - maxLength) / 2);
  return signal.subarray(start, start + maxLength);
}

export interface FrameOptions {
  /** FFT size, a power of two */
  frameSize: number;
  hopSize: number;
}

/**
 * Walk the magnitude spectrogram of a signal frame by frame
 *
 * Each frame is Hann-windowed; `visit` receives bins 0..frameSize/2. The
 * magnitude buffer is reused between calls. A signal shorter than one frame
 * is zero-padded into a single frame.
 *
 * @returns Number of frames visited
 */
export function forEachMagnitudeFrame(
  signal: Float32Array,
  { frameSize, hopSize }: FrameOptions,
  visit: (magnitude: Float64Array, frameIndex: number) => void
): number {
  const fft = new FFT(frameSize);
  const window = hannWindow(frameSize);
  const input = fft.createComplexArray();
  const spectrum = fft.createComplexArray();
  const bins = frameSize / 2 + 1;
  const magnitude = new Float64Array(bins);

  const frameCount =
    signal.length <= frameSize ? 1 : Math.floor((signal.length - frameSize) / hopSize) + 1;

  for (let frame = 0; frame < frameCount; frame++) {
    const start = frame * hopSize;
    for (let n = 0; n < frameSize; n++) {
      const index = start + n;
      const sample = index < signal.length ? signal[index] : 0;
      input[2 * n] = sample * window[n];
      input[2 * n + 1] = 0;
    }
    fft.transform(spectrum, input);

    for (let k = 0; k < bins; k++) {
      magnitude[k] = Math.hypot(spectrum[2 * k], spectrum[2 * k + 1]);
    }
    visit(magnitude, frame);
  }

  return frameCount;
}

/**
 * FFT bin boundaries for log-spaced bands between minHz and maxHz
 *
 * Returns `bands + 1` ascending bin indices; band `b` covers
 * [edges[b], edges[b + 1]). Every band spans at least one bin unless the
 * spectrum runs out.
 */
export function logBandEdges(
  minHz: number,
  maxHz: number,
  bands: number,
  frameSize: number,
  sampleRate: number
): number[] {
  const nyquistBin = frameSize / 2;
  const top = Math.min(maxHz, sampleRate / 2);
  const logMin = Math.log10(minHz);
  const logMax = Math.log10(Math.max(top, minHz));

  const edges: number[] = [];
  for (let b = 0; b <= bands; b++) {
    const freq = 10 ** (logMin + ((logMax - logMin) * b) / bands);
    edges.push(Math.min(nyquistBin, Math.round((freq * frameSize) / sampleRate)));
  }

  for (let b = 1; b <= bands; b++) {
    if (edges[b] <= edges[b - 1]) {
      edges[b] = Math.min(nyquistBin + 1, edges[b - 1] + 1);
    }
  }

  return edges;
}

/**
 * Mean magnitude in each band
 */
export function bandMeans(magnitude: Float64Array, edges: number[]): number[] {
  const out: number[] = [];
  for (let b = 0; b < edges.length - 1; b++) {
    const start = edges[b];
    const end = Math.min(edges[b + 1], magnitude.length);
    if (end <= start) {
      out.push(0);
      continue;
    }
    let sum = 0;
    for (let k = start; k < end; k++) sum += magnitude[k];
    out.push(sum / (end - start));
  }
  return out;
}

/**
 * Average per-frame feature rows into a fixed number of equal time sections
 *
 * This is what makes fingerprint length independent of duration: a 30 s
 * take and a 5 min take both produce `sections * width` values. When there
 * are fewer frames than sections, frames are repeated.
 */
export function averageIntoSections(
  frames: readonly number[][],
  sections: number,
  width: number
): number[] {
  const out = new Array<number>(sections * width).fill(0);
  const count = frames.length;
  if (count === 0) return out;

  for (let s = 0; s < sections; s++) {
    const start = Math.floor((s * count) / sections);
    const end = Math.max(start + 1, Math.floor(((s + 1) * count) / sections));
    for (let f = start; f < end; f++) {
      const row = frames[f];
      for (let i = 0; i < width; i++) out[s * width + i] += row[i];
    }
    for (let i = 0; i < width; i++) out[s * width + i] /= end - start;
  }

  return out;
}
