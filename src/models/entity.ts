/**
 * Entity interfaces
 *
 * Entities are canonical, deduplicated referents owned by the external store.
 * Documents never embed them: an occurrence carries only the entity key.
 */

/**
 * Fixed set of entity kinds
 */
export const ENTITY_KINDS = ['person', 'location', 'organization'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/**
 * A real-world referent with a stable unique key
 */
export interface Entity {
  /** Unique key, enforced by the store */
  key: string;

  /** Canonical display form */
  canonical_form: string;

  kind: EntityKind;
}

/**
 * A mention of an entity inside a document's token coordinate system
 */
export interface EntityOccurrence {
  /** Key of the referenced entity */
  entity_key: string;

  /** Offset in tokens wrt the document */
  offset: number;

  /** Surface text of the mention, if different from the canonical form */
  alias: string | null;
}

/**
 * Read access to entities, implemented by the store that owns them
 */
export interface EntityLookup {
  /** Returns null when no entity has this key */
  getEntity(key: string): Entity | null;
}
