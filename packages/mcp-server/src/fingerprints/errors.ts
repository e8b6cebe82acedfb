/**
 * Error kinds raised by the fingerprint engine
 *
 * Per-file failures (decode, empty audio) are reported per file by batch
 * operations; comparison failures are skipped by the matcher; invalid input
 * is a caller bug and always propagates.
 */

export type FingerprintErrorCode =
  | "DECODE_FAILED"
  | "EMPTY_AUDIO"
  | "ALGORITHM_MISMATCH"
  | "DIMENSION_MISMATCH"
  | "INVALID_INPUT"
  | "INVALID_CONFIG";

export class FingerprintError extends Error {
  constructor(
    readonly code: FingerprintErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Samples could not be obtained from the source file */
export class DecodeError extends FingerprintError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("DECODE_FAILED", `Could not decode ${filePath}: ${message}`, options);
  }
}

/** Decoded audio is too short to fingerprint */
export class EmptyAudioError extends FingerprintError {
  constructor(readonly sampleCount: number) {
    super("EMPTY_AUDIO", `Audio is empty (${sampleCount} samples)`);
  }
}

export class AlgorithmMismatchError extends FingerprintError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(
      "ALGORITHM_MISMATCH",
      `Cannot compare fingerprints of different algorithms: ${expected} vs ${actual}`
    );
  }
}

export class DimensionMismatchError extends FingerprintError {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(
      "DIMENSION_MISMATCH",
      `Cannot compare fingerprints of different lengths: ${expected} vs ${actual}`
    );
  }
}

export class InvalidInputError extends FingerprintError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class ConfigError extends FingerprintError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super("INVALID_CONFIG", message);
  }
}

/**
 * Format an unknown thrown value for logs and tool responses
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
