/**
 * Centralized Runtime Configuration
 * Single source of truth for service credentials, timeouts and paths
 */

import { resolve, isAbsolute } from 'path';
import { isLogLevel, type LogLevel } from '../content-engine/utils/logger.js';

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const logLevelEnv = process.env.LOG_LEVEL;
const LOG_LEVEL: LogLevel = isLogLevel(logLevelEnv) ? logLevelEnv : 'info';

/**
 * Settings with environment variable overrides
 */
export const SETTINGS = {
  // Text generation (any OpenAI-compatible endpoint)
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  GENERATION_TIMEOUT_MS: readNumber('GENERATION_TIMEOUT_MS', 120000),
  GENERATION_MAX_TOKENS: readNumber('GENERATION_MAX_TOKENS', 8192),

  // Image generation
  IMAGE_API_URL: process.env.IMAGE_API_URL || '',
  IMAGE_API_KEY: process.env.IMAGE_API_KEY || '',
  IMAGE_TIMEOUT_MS: readNumber('IMAGE_TIMEOUT_MS', 60000),

  // Reference documents
  MAX_DOCUMENT_SIZE_MB: readNumber('MAX_DOCUMENT_SIZE_MB', 10),

  // Rendering
  CACHE_TTL_SECONDS: readNumber('CACHE_TTL_SECONDS', 3600),
  CACHE_MAX_ENTRIES: readNumber('CACHE_MAX_ENTRIES', 50),

  // Server
  PORT: readNumber('PORT', 3001),
  LOG_LEVEL,
  REQUIRE_API_KEY: process.env.REQUIRE_API_KEY === 'true',
  API_KEYS: (process.env.API_KEYS || '').split(',').map(key => key.trim()).filter(key => key.length > 0),
  RATE_LIMIT_WINDOW_MS: readNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000),
  RATE_LIMIT_MAX: readNumber('RATE_LIMIT_MAX', 100),

  // Paths
  ROOT_DIR: process.cwd(),
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'output'
} as const;

export type Settings = typeof SETTINGS;

/**
 * Resolve path relative to project root
 */
export function resolvePath(...segments: string[]): string {
  return resolve(SETTINGS.ROOT_DIR, ...segments);
}

/**
 * Configuration validation
 */
export function validateConfiguration(settings: Settings = SETTINGS): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!settings.OPENAI_API_KEY) {
    errors.push('Missing required environment variable: OPENAI_API_KEY');
  }

  if (settings.IMAGE_API_KEY && !settings.IMAGE_API_URL) {
    errors.push('IMAGE_API_KEY is set but IMAGE_API_URL is missing');
  }

  if (isAbsolute(settings.OUTPUT_DIR)) {
    errors.push(`OUTPUT_DIR should be relative, got: ${settings.OUTPUT_DIR}`);
  }

  if (settings.REQUIRE_API_KEY && settings.API_KEYS.length === 0) {
    errors.push('REQUIRE_API_KEY is true but API_KEYS is empty');
  }

  if (settings.GENERATION_TIMEOUT_MS <= 0 || settings.IMAGE_TIMEOUT_MS <= 0) {
    errors.push('Timeouts must be positive');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
