/**
 * Preprocess State
 *
 * Records which pipeline stages have completed for a document, validates each
 * stage's output against the token sequence and stores it in the field the
 * stage maps to. Mutates the in-memory document only; saving it is the
 * caller's job.
 *
 * Stage ordering is not enforced here. Re-running a stage replaces both its
 * field and its timestamp.
 *
 * @module services/preprocess/preprocess-state
 */

import { z } from 'zod';
import {
  PreprocessStage,
  type IEDocument,
  type PreprocessRecord,
  type PreprocessResultMap,
} from '../../models/document.js';
import { CardinalityError, InvalidStageError, ValidationError } from '../../utils/errors.js';
import { validateInput } from '../../utils/validation.js';

const PreprocessStageSchema = z.nativeEnum(PreprocessStage);

const StringListSchema = z.array(z.string());

/**
 * Parse an untyped stage value
 *
 * @throws InvalidStageError for anything outside PreprocessStage
 */
export function parsePreprocessStage(value: unknown): PreprocessStage {
  const parsed = PreprocessStageSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidStageError(value);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STAGE RESULT VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate sentence boundaries. Rules are checked in order and the first
 * violation is reported.
 */
export function validateSegmentation(result: unknown, tokenCount: number): number[] {
  if (!Array.isArray(result) || !result.every((x): x is number => Number.isInteger(x))) {
    throw new ValidationError('Segmentation result shall only contain ints', 'wrong-element-type');
  }
  const boundaries: number[] = result;

  for (let i = 1; i < boundaries.length; i++) {
    if (boundaries[i] < boundaries[i - 1]) {
      throw new ValidationError('Segmentation result shall be ordered', 'not-sorted', {
        index: i,
      });
    }
  }
  for (let i = 1; i < boundaries.length; i++) {
    if (boundaries[i] === boundaries[i - 1]) {
      throw new ValidationError('Segmentation result shall not contain duplicates', 'has-duplicates', {
        value: boundaries[i],
      });
    }
  }
  if (
    boundaries.length === 0 ||
    boundaries[0] !== 0 ||
    boundaries[boundaries.length - 1] !== tokenCount
  ) {
    throw new ValidationError(
      `Segmentation result must start at 0 and end at the token count (${tokenCount})`,
      'bad-endpoints',
      { first: boundaries[0] ?? null, last: boundaries[boundaries.length - 1] ?? null, tokenCount }
    );
  }
  return [...boundaries];
}

/**
 * Validate one tag per token
 */
export function validateTagging(result: readonly string[], tokenCount: number): string[] {
  if (result.length !== tokenCount) {
    throw new CardinalityError(
      `Tagging result must have same cardinality as tokens (expected ${tokenCount}, got ${result.length})`,
      tokenCount,
      result.length
    );
  }
  return [...result];
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

export function wasPreprocessDone(document: IEDocument, stage: PreprocessStage): boolean {
  return stage in document.preprocess_metadata;
}

export function getPreprocessRecord(
  document: IEDocument,
  stage: PreprocessStage
): PreprocessRecord | null {
  return document.preprocess_metadata[stage] ?? null;
}

/**
 * Store a stage result on the document and mark the stage done.
 *
 * @returns the same document, so callers can chain their own save
 * @throws InvalidStageError, ValidationError or CardinalityError
 */
export function setPreprocessResult<S extends PreprocessStage>(
  document: IEDocument,
  stage: S,
  result: PreprocessResultMap[S]
): IEDocument {
  const checked = parsePreprocessStage(stage);
  const value: unknown = result;

  switch (checked) {
    case PreprocessStage.TOKENIZATION:
      document.tokens = validateInput(StringListSchema, value);
      break;
    case PreprocessStage.SEGMENTATION:
      document.sentences = validateSegmentation(value, document.tokens.length);
      break;
    case PreprocessStage.TAGGING:
      document.postags = validateTagging(
        validateInput(StringListSchema, value),
        document.tokens.length
      );
      break;
    case PreprocessStage.NERC:
      // Tracked by completion metadata only
      break;
  }

  document.preprocess_metadata[checked] = { done_at: new Date().toISOString() };
  return document;
}

/**
 * Stored result for a stage, or null when the stage has not run.
 * NERC has no stored field, so its result is always null; use
 * wasPreprocessDone to tell whether it ran.
 */
export function getPreprocessResult<S extends PreprocessStage>(
  document: IEDocument,
  stage: S
): PreprocessResultMap[S] | null;
export function getPreprocessResult(
  document: IEDocument,
  stage: PreprocessStage
): PreprocessResultMap[PreprocessStage] | null {
  const checked = parsePreprocessStage(stage);
  if (!wasPreprocessDone(document, checked)) {
    return null;
  }
  switch (checked) {
    case PreprocessStage.TOKENIZATION:
      return document.tokens;
    case PreprocessStage.SEGMENTATION:
      return document.sentences;
    case PreprocessStage.TAGGING:
      return document.postags;
    case PreprocessStage.NERC:
      return null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOKEN CHARACTER OFFSETS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Store the character offset of each token in the document text.
 * Offsets must be integers, non-decreasing, one per token.
 */
export function setTokenOffsets(document: IEDocument, offsets: readonly number[]): IEDocument {
  if (offsets.length !== document.tokens.length) {
    throw new CardinalityError(
      `Token offsets must have same cardinality as tokens (expected ${document.tokens.length}, got ${offsets.length})`,
      document.tokens.length,
      offsets.length
    );
  }
  if (!offsets.every((x) => Number.isInteger(x))) {
    throw new ValidationError('Token offsets shall only contain ints', 'wrong-element-type');
  }
  for (let i = 1; i < offsets.length; i++) {
    if (offsets[i] < offsets[i - 1]) {
      throw new ValidationError('Token offsets shall be ordered', 'not-sorted', { index: i });
    }
  }
  document.offsets = [...offsets];
  return document;
}
