/**
 * Error hierarchy for fatal pipeline conditions
 *
 * Per-image problems are never thrown; they travel as `ItemOutcome` values.
 * Everything here terminates the run with a non-zero exit status.
 */

export type CalibrationErrorKind =
  | "validation"
  | "empty-result"
  | "io"
  | "interrupted";

/**
 * Base class for every error that ends a run
 */
export abstract class CalibrationError extends Error {
  abstract readonly kind: CalibrationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// ============================================================================
// Validation
// ============================================================================

export class ValidationError extends CalibrationError {
  readonly kind = "validation";
}

export class NotFoundError extends ValidationError {
  constructor(readonly path: string) {
    super(`Source directory not found: ${path}`);
  }
}

export class NotADirectoryError extends ValidationError {
  constructor(readonly path: string) {
    super(`Source path is not a directory: ${path}`);
  }
}

// ============================================================================
// Empty results
// ============================================================================

export class EmptyResultError extends CalibrationError {
  readonly kind = "empty-result";
}

export class EmptyCorpusError extends EmptyResultError {
  constructor(
    readonly path: string,
    readonly extensions: readonly string[],
  ) {
    super(`No images found in ${path} with extensions ${extensions.join(", ")}`);
  }
}

export class EmptyOutputError extends EmptyResultError {
  constructor(readonly attempted: number) {
    super(`No images were successfully processed (0/${attempted})`);
  }
}

export class EmptyManifestError extends EmptyResultError {
  constructor(readonly directory: string) {
    super(`No calibration images found to list in ${directory}`);
  }
}

// ============================================================================
// I/O
// ============================================================================

export class IOError extends CalibrationError {
  readonly kind = "io";

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown,
  ) {
    const details = cause instanceof Error ? `: ${cause.message}` : "";
    super(`${message} ${path}${details}`, { cause });
  }
}

// ============================================================================
// Interruption
// ============================================================================

export class InterruptedError extends CalibrationError {
  readonly kind = "interrupted";

  constructor(readonly completed: number, readonly total: number) {
    super(`Interrupted after ${completed}/${total} images`);
  }
}
