/**
 * Chunk Planner
 *
 * Carves a whole document into chunks, either as fixed-size token windows or
 * as groups of consecutive sentences. Consecutive chunks may overlap; with
 * zero overlap the chunks partition the document.
 *
 * @module services/chunking/chunk-planner
 */

import { PreprocessStage, type IEDocument } from '../../models/document.js';
import type { SentenceChunkOptions, TextChunk, TokenWindowOptions } from '../../models/chunk.js';
import type { EntityLookup } from '../../models/entity.js';
import { ConfigurationError, PreprocessNotDoneError } from '../../utils/errors.js';
import { loadChunkerConfig } from '../../utils/config.js';
import { wasPreprocessDone } from '../preprocess/preprocess-state.js';
import { assertTokenRange, buildChunk } from './chunk-builder.js';
import type { Bounds } from './range-indexer.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RANGE PLANNING
// ═══════════════════════════════════════════════════════════════════════════════

function assertSizeAndOverlap(size: number, overlap: number, unit: string): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`${unit} per chunk must be a positive integer (got ${size})`, {
      size,
    });
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new ConfigurationError(
      `${unit} overlap must be an integer in [0, ${size}) (got ${overlap})`,
      { size, overlap }
    );
  }
}

/**
 * Token ranges of fixed-size windows over `tokenCount` tokens.
 * The last window is clipped to the token count.
 */
export function planTokenWindows(tokenCount: number, options: TokenWindowOptions): Bounds[] {
  const { windowSize, windowOverlap } = options;
  assertSizeAndOverlap(windowSize, windowOverlap, 'Tokens');

  const step = windowSize - windowOverlap;
  const windows: Bounds[] = [];
  for (let start = 0; start < tokenCount; start += step) {
    const end = Math.min(start + windowSize, tokenCount);
    windows.push([start, end]);
    if (end === tokenCount) break;
  }
  return windows;
}

/**
 * Token ranges covering groups of consecutive sentences.
 *
 * @param sentences - sentence boundaries, closed with the token count
 */
export function planSentenceGroups(
  sentences: readonly number[],
  options: SentenceChunkOptions
): Bounds[] {
  const { sentencesPerChunk, sentenceOverlap } = options;
  assertSizeAndOverlap(sentencesPerChunk, sentenceOverlap, 'Sentences');

  const sentenceCount = Math.max(sentences.length - 1, 0);
  const step = sentencesPerChunk - sentenceOverlap;
  const groups: Bounds[] = [];
  for (let first = 0; first < sentenceCount; first += step) {
    const last = Math.min(first + sentencesPerChunk, sentenceCount);
    groups.push([sentences[first], sentences[last]]);
    if (last === sentenceCount) break;
  }
  return groups;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNK TEXT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Human readable text for the tokens in [start, end).
 *
 * Slices the document text through the token character offsets when they are
 * available; otherwise joins the tokens with single spaces.
 */
export function chunkText(document: IEDocument, start: number, end: number): string {
  const tokenCount = document.tokens.length;
  assertTokenRange(start, end, tokenCount);

  if (document.text.length > 0 && tokenCount > 0 && document.offsets.length === tokenCount) {
    const from = start < tokenCount ? document.offsets[start] : document.text.length;
    const to = end < tokenCount ? document.offsets[end] : document.text.length;
    return document.text.slice(from, to).trimEnd();
  }
  return document.tokens.slice(start, end).join(' ');
}

// ═══════════════════════════════════════════════════════════════════════════════
// PLANNERS
// ═══════════════════════════════════════════════════════════════════════════════

function buildAll(document: IEDocument, ranges: Bounds[], entities: EntityLookup): TextChunk[] {
  return ranges.map(([start, end]) =>
    buildChunk(document, start, end, chunkText(document, start, end), entities)
  );
}

/**
 * Chunk a tokenized document into fixed-size token windows.
 *
 * @throws PreprocessNotDoneError when tokenization has not run
 * @throws ConfigurationError for a non-positive size or an overlap >= size
 */
export function chunkByTokenWindow(
  document: IEDocument,
  entities: EntityLookup,
  options: TokenWindowOptions = loadChunkerConfig()
): TextChunk[] {
  if (!wasPreprocessDone(document, PreprocessStage.TOKENIZATION)) {
    throw new PreprocessNotDoneError(PreprocessStage.TOKENIZATION, document.id);
  }

  const chunks = buildAll(document, planTokenWindows(document.tokens.length, options), entities);
  console.error(
    `[ChunkPlanner] Built ${chunks.length} token-window chunks for ${document.human_identifier} ` +
      `(size=${options.windowSize}, overlap=${options.windowOverlap})`
  );
  return chunks;
}

/**
 * Chunk a segmented document into groups of whole sentences.
 *
 * @throws PreprocessNotDoneError when segmentation has not run
 * @throws ConfigurationError for a non-positive group size or an overlap >= size
 */
export function chunkBySentences(
  document: IEDocument,
  entities: EntityLookup,
  options: SentenceChunkOptions = loadChunkerConfig()
): TextChunk[] {
  if (!wasPreprocessDone(document, PreprocessStage.SEGMENTATION)) {
    throw new PreprocessNotDoneError(PreprocessStage.SEGMENTATION, document.id);
  }

  const chunks = buildAll(document, planSentenceGroups(document.sentences, options), entities);
  console.error(
    `[ChunkPlanner] Built ${chunks.length} sentence chunks for ${document.human_identifier} ` +
      `(sentences=${options.sentencesPerChunk}, overlap=${options.sentenceOverlap})`
  );
  return chunks;
}
