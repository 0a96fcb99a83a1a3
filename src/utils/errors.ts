/**
 * Error taxonomy.
 *
 * The core is deterministic, so nothing here is retried: an error either
 * describes bad input or a failure of the feature-extraction service.
 */

export class MixEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or degenerate track features, or a bad configuration primitive. */
export class InvalidInputError extends MixEngineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.field = field;
  }
}

/** Zero tracks where at least one is required. */
export class EmptyInputError extends MixEngineError {
  constructor(message = 'No tracks analyzed. Run analyzeBatch() first.') {
    super(message);
  }
}

/** The feature-extraction service could not produce features for a track. */
export class ExtractionError extends MixEngineError {
  readonly reference: string;

  constructor(reference: string, message: string, options?: { cause?: unknown }) {
    super(`Feature extraction failed for ${reference}: ${message}`, options);
    this.reference = reference;
  }
}

export const isMixEngineError = (value: unknown): value is MixEngineError =>
  value instanceof MixEngineError;
