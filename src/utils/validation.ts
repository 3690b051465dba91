/**
 * Zod Validation Schemas
 *
 * Input validation for values that cross the library boundary: new documents,
 * entities and preprocess stage names.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { ENTITY_KINDS } from '../models/entity.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError (rule `invalid-input`) if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '), 'invalid-input');
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const EntityKindSchema = z.enum(ENTITY_KINDS);

/**
 * Schema for registering an entity
 */
export const EntityInput = z.object({
  key: z.string().min(1, 'Entity key is required'),
  canonical_form: z.string().min(1, 'Canonical form is required'),
  kind: EntityKindSchema,
});

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for creating a document before any preprocess stage has run
 */
export const DocumentCreateInput = z.object({
  human_identifier: z
    .string()
    .min(1, 'Human identifier is required')
    .max(256, 'Human identifier must be 256 characters or less'),
  title: z.string().nullable().default(null),
  url: z.string().url('URL must be a valid URL').nullable().default(null),
  text: z.string().default(''),
  metadata: z.record(z.unknown()).default({}),
});

export type DocumentCreateInputType = z.input<typeof DocumentCreateInput>;
