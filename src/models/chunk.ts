/**
 * Chunk interfaces
 *
 * A chunk is a read-only projection of a document restricted to a token
 * range. Its lists are copies so the chunk can be serialized on its own.
 */

import type { EntityKind } from './entity.js';

/**
 * Entity occurrence projected into a chunk
 */
export interface EntityInChunk {
  key: string;
  canonical_form: string;
  kind: EntityKind;

  /** Offset in tokens wrt the chunk */
  offset: number;

  /** Surface text of the mention, if different from the canonical form */
  alias: string | null;
}

/**
 * Token-range projection of a document
 */
export interface TextChunk {
  /** Reference to parent document */
  document_id: string;

  /** Human readable text supplied by the caller */
  text: string;

  /** SHA-256 hash of text content */
  text_hash: string;

  /** Token offset where the chunk starts wrt the document */
  offset: number;

  /** Token offset where the chunk ends (exclusive) wrt the document */
  offset_end: number;

  // The following lists have the same length when tagging is done
  tokens: string[];
  postags: string[];

  entities: EntityInChunk[];
}

/**
 * Options for fixed-size token windows
 */
export interface TokenWindowOptions {
  /** Tokens per chunk */
  windowSize: number;

  /** Tokens shared by consecutive chunks */
  windowOverlap: number;
}

/**
 * Options for sentence-aligned chunks
 */
export interface SentenceChunkOptions {
  /** Sentences per chunk */
  sentencesPerChunk: number;

  /** Sentences shared by consecutive chunks */
  sentenceOverlap: number;
}
