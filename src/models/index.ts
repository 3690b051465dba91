/**
 * Data Models
 *
 * Barrel export for all model interfaces.
 */

// Entity models
export * from './entity.js';

// Document models
export * from './document.js';

// Chunk models
export * from './chunk.js';
