/**
 * Document interfaces
 *
 * An IEDocument is created with identifying metadata and raw text, then
 * populated incrementally as each preprocess stage completes.
 */

import type { EntityOccurrence } from './entity.js';

/**
 * Preprocess pipeline stages
 * Values double as keys of IEDocument.preprocess_metadata
 */
export enum PreprocessStage {
  /** Splits text into tokens (populates `tokens`) */
  TOKENIZATION = 'tokenization',

  /** Sentence boundaries as token offsets (populates `sentences`) */
  SEGMENTATION = 'segmentation',

  /** One POS tag per token (populates `postags`) */
  TAGGING = 'tagging',

  /** Named entity recognition and classification (completion marker only) */
  NERC = 'nerc',
}

/**
 * Result type accepted and returned for each stage
 */
export interface PreprocessResultMap {
  [PreprocessStage.TOKENIZATION]: string[];
  [PreprocessStage.SEGMENTATION]: number[];
  [PreprocessStage.TAGGING]: string[];
  [PreprocessStage.NERC]: null;
}

/**
 * Completion record stored per stage
 */
export interface PreprocessRecord {
  /** ISO 8601 timestamp of the last successful run */
  done_at: string;
}

/**
 * A document travelling through the preprocess pipeline
 */
export interface IEDocument {
  /** UUID v4 identifier */
  id: string;

  /** Caller-facing unique name */
  human_identifier: string;

  title: string | null;

  url: string | null;

  /** Raw document text */
  text: string;

  /** ISO 8601 timestamp */
  creation_date: string;

  /** Opaque caller data; never read by this library */
  metadata: Record<string, unknown>;

  /** Completed stages; a stage is done iff its name is a key here */
  preprocess_metadata: Partial<Record<PreprocessStage, PreprocessRecord>>;

  // The following 3 lists have 1 item per token
  tokens: string[];
  /** Character offset of each token in `text` */
  offsets: number[];
  postags: string[];

  /** Token offsets where sentences start, closed with the token count */
  sentences: number[];

  /** Entity occurrences, sorted by offset */
  entities: EntityOccurrence[];
}
