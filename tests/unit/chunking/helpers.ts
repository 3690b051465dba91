/**
 * Shared fixtures for chunking and preprocess tests
 *
 * Deterministic documents built through the public preprocess API.
 */

import { PreprocessStage, type Entity, type IEDocument } from '../../../src/models/index.js';
import { createDocument } from '../../../src/services/documents/create-document.js';
import {
  setPreprocessResult,
  setTokenOffsets,
} from '../../../src/services/preprocess/preprocess-state.js';
import { InMemoryEntityRegistry } from '../../../src/services/entities/entity-registry.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SALON DOCUMENT - OCCURRENCES AT OFFSETS [2, 5, 5, 9]
// ═══════════════════════════════════════════════════════════════════════════════

export const SALON_TOKENS = [
  'In',
  'June',
  'Ada',
  'visited',
  'the',
  'London',
  'salon',
  'of',
  'Mary',
  'Somerville',
];

export const SALON_TAGS = ['IN', 'NNP', 'NNP', 'VBD', 'DT', 'NNP', 'NN', 'IN', 'NNP', 'NNP'];

export const SALON_ENTITIES: Entity[] = [
  { key: 'ada-lovelace', canonical_form: 'Ada Lovelace', kind: 'person' },
  { key: 'london', canonical_form: 'London', kind: 'location' },
  { key: 'royal-society', canonical_form: 'Royal Society', kind: 'organization' },
  { key: 'mary-somerville', canonical_form: 'Mary Somerville', kind: 'person' },
];

export function createSalonRegistry(): InMemoryEntityRegistry {
  return new InMemoryEntityRegistry(SALON_ENTITIES);
}

/**
 * Tokenized, tagged document with occurrences at offsets 2, 5, 5 and 9
 */
export function createSalonDocument(): IEDocument {
  const doc = createDocument({ human_identifier: 'salon-1833' });
  setPreprocessResult(doc, PreprocessStage.TOKENIZATION, [...SALON_TOKENS]);
  setPreprocessResult(doc, PreprocessStage.TAGGING, [...SALON_TAGS]);
  doc.entities = [
    { entity_key: 'ada-lovelace', offset: 2, alias: 'Ada' },
    { entity_key: 'london', offset: 5, alias: null },
    { entity_key: 'royal-society', offset: 5, alias: 'London' },
    { entity_key: 'mary-somerville', offset: 9, alias: 'Somerville' },
  ];
  return doc;
}

// ═══════════════════════════════════════════════════════════════════════════════
// THREE-SENTENCE DOCUMENT WITH CHARACTER OFFSETS
// ═══════════════════════════════════════════════════════════════════════════════

export const VISIT_TEXT = 'Ada met Babbage. They talked. Then she left.';

export const VISIT_TOKENS = ['Ada', 'met', 'Babbage', '.', 'They', 'talked', '.', 'Then', 'she', 'left', '.'];

export const VISIT_OFFSETS = [0, 4, 8, 15, 17, 22, 28, 30, 35, 39, 43];

export const VISIT_SENTENCES = [0, 4, 7, 11];

export const VISIT_ENTITIES: Entity[] = [
  { key: 'ada-lovelace', canonical_form: 'Ada Lovelace', kind: 'person' },
  { key: 'charles-babbage', canonical_form: 'Charles Babbage', kind: 'person' },
];

export function createVisitRegistry(): InMemoryEntityRegistry {
  return new InMemoryEntityRegistry(VISIT_ENTITIES);
}

/**
 * Tokenized and segmented document; character offsets are set unless
 * `withOffsets` is false
 */
export function createVisitDocument(withOffsets = true): IEDocument {
  const doc = createDocument({ human_identifier: 'visit', text: VISIT_TEXT });
  setPreprocessResult(doc, PreprocessStage.TOKENIZATION, [...VISIT_TOKENS]);
  setPreprocessResult(doc, PreprocessStage.SEGMENTATION, [...VISIT_SENTENCES]);
  if (withOffsets) {
    setTokenOffsets(doc, VISIT_OFFSETS);
  }
  doc.entities = [
    { entity_key: 'ada-lovelace', offset: 0, alias: 'Ada' },
    { entity_key: 'charles-babbage', offset: 2, alias: 'Babbage' },
  ];
  return doc;
}
