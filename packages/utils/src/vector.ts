/**
 * Dense vector helpers shared by the fingerprint scorer and the algorithms.
 *
 * All functions accept any array-like of numbers so they work on plain
 * arrays (as persisted in JSON) and on typed arrays (as produced by DSP code).
 */

export type NumericVector = ArrayLike<number>;

/**
 * Throw if two vectors do not have the same number of components
 */
function assertSameDim(a: NumericVector, b: NumericVector): void {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
}

export function dot(a: NumericVector, b: NumericVector): number {
  assertSameDim(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(a: NumericVector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * a[i];
  }
  return Math.sqrt(sum);
}

/**
 * Scale a vector to unit length. A zero vector is returned unchanged (as a copy).
 */
export function l2Normalize(values: NumericVector): number[] {
  const n = norm(values);
  const out = Array.from(values);
  if (n === 0) return out;
  for (let i = 0; i < out.length; i++) {
    out[i] /= n;
  }
  return out;
}

export function isZeroVector(values: NumericVector): boolean {
  for (let i = 0; i < values.length; i++) {
    if (values[i] !== 0) return false;
  }
  return true;
}

export function allFinite(values: NumericVector): boolean {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) return false;
  }
  return true;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
