/**
 * Chunk Builder
 *
 * Projects a token range of a document into a TextChunk: token and tag
 * sub-sequences plus the entity occurrences inside the range, re-based to
 * chunk-local offsets.
 *
 * @module services/chunking/chunk-builder
 */

import type { IEDocument } from '../../models/document.js';
import type { EntityInChunk, TextChunk } from '../../models/chunk.js';
import type { EntityLookup, EntityOccurrence } from '../../models/entity.js';
import { EntityNotFoundError, InvalidRangeError } from '../../utils/errors.js';
import { computeHash } from '../../utils/hash.js';
import { findBounds } from './range-indexer.js';

/**
 * Check 0 <= tokenOffset <= tokenOffsetEnd <= tokenCount
 *
 * @throws InvalidRangeError when the range is malformed or out of bounds
 */
export function assertTokenRange(tokenOffset: number, tokenOffsetEnd: number, tokenCount: number): void {
  if (!Number.isInteger(tokenOffset) || !Number.isInteger(tokenOffsetEnd)) {
    throw new InvalidRangeError(
      `Token range bounds must be integers (got [${tokenOffset}, ${tokenOffsetEnd}))`,
      { tokenOffset, tokenOffsetEnd }
    );
  }
  if (tokenOffset < 0 || tokenOffset > tokenOffsetEnd || tokenOffsetEnd > tokenCount) {
    throw new InvalidRangeError(
      `Token range [${tokenOffset}, ${tokenOffsetEnd}) is outside [0, ${tokenCount}]`,
      { tokenOffset, tokenOffsetEnd, tokenCount }
    );
  }
}

/**
 * Occurrences of `document` whose offset lies in [tokenOffset, tokenOffsetEnd),
 * in source order. The result is a contiguous slice of `document.entities`.
 */
export function occurrencesInRange(
  document: IEDocument,
  tokenOffset: number,
  tokenOffsetEnd: number
): EntityOccurrence[] {
  const [l, r] = findBounds(document.entities, tokenOffset, tokenOffsetEnd, {
    key: (occ) => occ.offset,
  });
  return document.entities.slice(l, r);
}

/**
 * Build a chunk from the tokens in [tokenOffset, tokenOffsetEnd).
 *
 * `text` is a human readable rendering of the range supplied by the caller;
 * it is stored as given and never checked against the tokens.
 *
 * @throws InvalidRangeError when the range is outside the document's tokens
 * @throws EntityNotFoundError when an occurrence references an unknown entity
 */
export function buildChunk(
  document: IEDocument,
  tokenOffset: number,
  tokenOffsetEnd: number,
  text: string,
  entities: EntityLookup
): TextChunk {
  assertTokenRange(tokenOffset, tokenOffsetEnd, document.tokens.length);

  const projected: EntityInChunk[] = [];
  for (const occurrence of occurrencesInRange(document, tokenOffset, tokenOffsetEnd)) {
    const entity = entities.getEntity(occurrence.entity_key);
    if (!entity) {
      throw new EntityNotFoundError(occurrence.entity_key);
    }
    projected.push({
      key: entity.key,
      canonical_form: entity.canonical_form,
      kind: entity.kind,
      offset: occurrence.offset - tokenOffset,
      alias: occurrence.alias,
    });
  }

  return {
    document_id: document.id,
    text,
    text_hash: computeHash(text),
    offset: tokenOffset,
    offset_end: tokenOffsetEnd,
    tokens: document.tokens.slice(tokenOffset, tokenOffsetEnd),
    postags: document.postags.slice(tokenOffset, tokenOffsetEnd),
    entities: projected,
  };
}
