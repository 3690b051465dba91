/**
 * SHA-256 content hashing for chunk text
 *
 * Hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Check that a value is a hash produced by computeHash
 */
export function isValidHashFormat(hash: unknown): boolean {
  return typeof hash === 'string' && HASH_PATTERN.test(hash);
}
