/**
 * Unit tests for chunker configuration
 *
 * @see src/utils/config.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  DEFAULT_CHUNKER_CONFIG,
  loadChunkerConfig,
  loadEnvFile,
} from '../../../src/utils/config.js';
import { ConfigurationError } from '../../../src/utils/errors.js';

const ENV_KEYS = [
  'IE_CHUNK_WINDOW_SIZE',
  'IE_CHUNK_WINDOW_OVERLAP',
  'IE_CHUNK_SENTENCES_PER_CHUNK',
  'IE_CHUNK_SENTENCE_OVERLAP',
];

beforeEach(() => {
  for (const key of ENV_KEYS) delete process.env[key];
});

afterEach(() => {
  for (const key of ENV_KEYS) delete process.env[key];
  vi.restoreAllMocks();
});

describe('loadChunkerConfig', () => {
  it('returns the defaults with no environment', () => {
    expect(loadChunkerConfig()).toEqual({
      windowSize: 200,
      windowOverlap: 20,
      sentencesPerChunk: 1,
      sentenceOverlap: 0,
    });
    expect(DEFAULT_CHUNKER_CONFIG).toEqual(loadChunkerConfig());
  });

  it('reads values from the environment', () => {
    process.env.IE_CHUNK_WINDOW_SIZE = '50';
    process.env.IE_CHUNK_SENTENCE_OVERLAP = '1';
    process.env.IE_CHUNK_SENTENCES_PER_CHUNK = '3';

    expect(loadChunkerConfig()).toEqual({
      windowSize: 50,
      windowOverlap: 20,
      sentencesPerChunk: 3,
      sentenceOverlap: 1,
    });
  });

  it('prefers overrides over the environment', () => {
    process.env.IE_CHUNK_WINDOW_SIZE = '50';
    expect(loadChunkerConfig({ windowSize: 80 }).windowSize).toBe(80);
  });

  it('throws ConfigurationError for a non-numeric variable', () => {
    process.env.IE_CHUNK_WINDOW_OVERLAP = 'many';
    expect(() => loadChunkerConfig()).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError for an out-of-range value', () => {
    expect(() => loadChunkerConfig({ windowSize: 0 })).toThrow(ConfigurationError);
  });
});

describe('loadEnvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ie-chunker-env-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the first existing candidate', () => {
    const envPath = path.join(dir, '.env');
    fs.writeFileSync(envPath, 'IE_CHUNK_WINDOW_SIZE=64\n');

    expect(loadEnvFile([path.join(dir, 'missing.env'), envPath])).toBe(envPath);
    expect(process.env.IE_CHUNK_WINDOW_SIZE).toBe('64');
    expect(loadChunkerConfig().windowSize).toBe(64);
  });

  it('returns null when no candidate exists', () => {
    expect(loadEnvFile([path.join(dir, 'missing.env')])).toBeNull();
  });
});
