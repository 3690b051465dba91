/**
 * IE Chunker
 *
 * Token-range chunking of tokenized, segmented, tagged and entity-annotated
 * documents, with per-stage preprocess state tracking.
 *
 * @module index
 */

export * from './models/index.js';

export {
  findBounds,
  lowerBound,
  type Bounds,
  type BoundsOptions,
  type KeyedBoundsOptions,
} from './services/chunking/range-indexer.js';
export {
  assertTokenRange,
  buildChunk,
  occurrencesInRange,
} from './services/chunking/chunk-builder.js';
export {
  chunkBySentences,
  chunkByTokenWindow,
  chunkText,
  planSentenceGroups,
  planTokenWindows,
} from './services/chunking/chunk-planner.js';

export {
  getPreprocessRecord,
  getPreprocessResult,
  parsePreprocessStage,
  setPreprocessResult,
  setTokenOffsets,
  validateSegmentation,
  validateTagging,
  wasPreprocessDone,
} from './services/preprocess/preprocess-state.js';

export { createDocument } from './services/documents/create-document.js';
export { InMemoryEntityRegistry, insertOccurrence } from './services/entities/entity-registry.js';

export {
  ChunkerConfigSchema,
  DEFAULT_CHUNKER_CONFIG,
  loadChunkerConfig,
  loadEnvFile,
  type ChunkerConfig,
} from './utils/config.js';
export * from './utils/errors.js';
export { computeHash, isValidHashFormat } from './utils/hash.js';
export {
  DocumentCreateInput,
  EntityInput,
  EntityKindSchema,
  validateInput,
  type DocumentCreateInputType,
} from './utils/validation.js';
