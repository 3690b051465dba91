/**
 * Chunker Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Every detected condition stems from caller-supplied arguments, so nothing
 * here is retried or recovered.
 *
 * @module utils/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for chunking and preprocessing failures
 */
export type ErrorCategory =
  // Range queries and chunk bounds
  | 'INVALID_RANGE'
  | 'INVALID_INDEX'

  // Preprocess result validation
  | 'VALIDATION_ERROR'
  | 'CARDINALITY_ERROR'
  | 'INVALID_STAGE'
  | 'PREPROCESS_NOT_DONE'

  // Entity resolution
  | 'ENTITY_NOT_FOUND'

  // Configuration errors
  | 'CONFIGURATION_ERROR';

/**
 * Rule that a rejected input violated.
 * The first four are the segmentation rules, checked in this order.
 */
export type ValidationRule =
  | 'wrong-element-type'
  | 'not-sorted'
  | 'has-duplicates'
  | 'bad-endpoints'
  | 'invalid-input';

// ═══════════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * ChunkerError - Structured base class for every failure raised by this library
 */
export class ChunkerError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ChunkerError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Narrow an unknown caught value to a ChunkerError
 */
export function isChunkerError(error: unknown): error is ChunkerError {
  return error instanceof ChunkerError;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR SUBCLASSES
// ═══════════════════════════════════════════════════════════════════════════════

export class InvalidRangeError extends ChunkerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_RANGE', message, details);
    this.name = 'InvalidRangeError';
  }
}

export class InvalidIndexError extends ChunkerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INDEX', message, details);
    this.name = 'InvalidIndexError';
  }
}

export class ValidationError extends ChunkerError {
  constructor(
    message: string,
    public readonly rule: ValidationRule,
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, { rule, ...details });
    this.name = 'ValidationError';
  }
}

export class CardinalityError extends ChunkerError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super('CARDINALITY_ERROR', message, { expected, actual });
    this.name = 'CardinalityError';
  }
}

export class InvalidStageError extends ChunkerError {
  constructor(public readonly received: unknown) {
    super('INVALID_STAGE', `Unrecognized preprocess stage: ${String(received)}`, { received });
    this.name = 'InvalidStageError';
  }
}

export class PreprocessNotDoneError extends ChunkerError {
  constructor(
    public readonly stage: string,
    documentId: string
  ) {
    super(
      'PREPROCESS_NOT_DONE',
      `Preprocess stage "${stage}" has not been run for document ${documentId}`,
      { stage, documentId }
    );
    this.name = 'PreprocessNotDoneError';
  }
}

export class EntityNotFoundError extends ChunkerError {
  constructor(public readonly entityKey: string) {
    super('ENTITY_NOT_FOUND', `Entity not found: ${entityKey}`, { entityKey });
    this.name = 'EntityNotFoundError';
  }
}

export class ConfigurationError extends ChunkerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}
