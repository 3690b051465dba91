/**
 * In-memory entity registry and occurrence maintenance
 *
 * The registry is the in-process stand-in for the store that owns entities.
 * Key uniqueness is the store's concern: registering an existing key
 * replaces it.
 *
 * @module services/entities/entity-registry
 */

import type { IEDocument } from '../../models/document.js';
import type { Entity, EntityLookup, EntityOccurrence } from '../../models/entity.js';
import { InvalidRangeError } from '../../utils/errors.js';
import { EntityInput, validateInput } from '../../utils/validation.js';
import { lowerBound } from '../chunking/range-indexer.js';

export class InMemoryEntityRegistry implements EntityLookup {
  private readonly entities = new Map<string, Entity>();

  constructor(initial: Iterable<Entity> = []) {
    for (const entity of initial) {
      this.register(entity);
    }
  }

  /**
   * Validate and store an entity
   *
   * @throws ValidationError when key, canonical form or kind are invalid
   */
  register(entity: Entity): Entity {
    const validated = validateInput(EntityInput, entity);
    this.entities.set(validated.key, validated);
    return validated;
  }

  getEntity(key: string): Entity | null {
    return this.entities.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.entities.has(key);
  }

  get size(): number {
    return this.entities.size;
  }
}

/**
 * Insert an occurrence keeping `document.entities` sorted by offset.
 * Lands after existing occurrences at the same offset.
 *
 * @returns the index the occurrence was inserted at
 * @throws InvalidRangeError when the offset is not a token of the document
 */
export function insertOccurrence(document: IEDocument, occurrence: EntityOccurrence): number {
  const { offset } = occurrence;
  if (!Number.isInteger(offset) || offset < 0 || offset >= document.tokens.length) {
    throw new InvalidRangeError(
      `Occurrence offset ${offset} is outside [0, ${document.tokens.length})`,
      { offset, tokenCount: document.tokens.length, entityKey: occurrence.entity_key }
    );
  }

  const index = lowerBound(document.entities, offset + 1, { key: (occ) => occ.offset });
  document.entities.splice(index, 0, { ...occurrence });
  return index;
}
