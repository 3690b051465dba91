/**
 * Chunker Configuration
 *
 * Chunk planner defaults, overridable through environment variables:
 *   IE_CHUNK_WINDOW_SIZE        : tokens per window (default: 200)
 *   IE_CHUNK_WINDOW_OVERLAP     : tokens shared by consecutive windows (default: 20)
 *   IE_CHUNK_SENTENCES_PER_CHUNK: sentences per chunk (default: 1)
 *   IE_CHUNK_SENTENCE_OVERLAP   : sentences shared by consecutive chunks (default: 0)
 *
 * @module utils/config
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const ChunkerConfigSchema = z.object({
  windowSize: z.number().int().min(1).default(200),
  windowOverlap: z.number().int().min(0).default(20),
  sentencesPerChunk: z.number().int().min(1).default(1),
  sentenceOverlap: z.number().int().min(0).default(0),
});

export type ChunkerConfig = z.infer<typeof ChunkerConfigSchema>;

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = ChunkerConfigSchema.parse({});

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`, { name, raw });
  }
  return parsed;
}

/**
 * Load chunker configuration: overrides first, then environment, then defaults.
 *
 * @throws ConfigurationError for non-numeric env vars or out-of-range values
 */
export function loadChunkerConfig(overrides?: Partial<ChunkerConfig>): ChunkerConfig {
  const envConfig = {
    windowSize: parseIntEnv('IE_CHUNK_WINDOW_SIZE'),
    windowOverlap: parseIntEnv('IE_CHUNK_WINDOW_OVERLAP'),
    sentencesPerChunk: parseIntEnv('IE_CHUNK_SENTENCES_PER_CHUNK'),
    sentenceOverlap: parseIntEnv('IE_CHUNK_SENTENCE_OVERLAP'),
  };

  const parsed = ChunkerConfigSchema.safeParse({ ...envConfig, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid chunker configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Load the first .env file found (first found wins):
 * 1. IE_CHUNKER_ENV_FILE env var (explicit override)
 * 2. CWD/.env
 *
 * @returns the loaded path, or null when no candidate exists
 */
export function loadEnvFile(candidates?: string[]): string | null {
  const paths = (
    candidates ?? [process.env.IE_CHUNKER_ENV_FILE, path.resolve(process.cwd(), '.env')]
  ).filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of paths) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath, quiet: true });
      if (result.error) {
        throw new ConfigurationError(`Failed to load ${envPath}: ${result.error.message}`, {
          path: envPath,
        });
      }
      console.error(`[Config] Loaded environment from ${envPath}`);
      return envPath;
    }
  }
  return null;
}
