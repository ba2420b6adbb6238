import path from 'path';

import { readEnvFile } from './env.js';
import { FillInError } from './errors.js';
import { DelimiterPairSchema } from './schemas.js';
import type { DelimiterPair } from './schemas.js';

// Read config values from .env (falls back to process.env).
const envConfig = readEnvFile([
  'FILLIN_LEFT_DELIM',
  'FILLIN_RIGHT_DELIM',
  'FILLIN_TEMPLATE_PATH',
  'LOG_LEVEL',
]);

export const LEFT_DELIM =
  process.env.FILLIN_LEFT_DELIM || envConfig.FILLIN_LEFT_DELIM || '[[';
export const RIGHT_DELIM =
  process.env.FILLIN_RIGHT_DELIM || envConfig.FILLIN_RIGHT_DELIM || ']]';

// Directories searched, in order, for templates loaded by name
export const TEMPLATE_PATH = parseSearchPath(
  process.env.FILLIN_TEMPLATE_PATH || envConfig.FILLIN_TEMPLATE_PATH || '.',
);

export const LOG_LEVEL = process.env.LOG_LEVEL || envConfig.LOG_LEVEL || 'info';

/**
 * Split a search path on the platform delimiter (`:` on POSIX), dropping
 * empty entries.
 */
export function parseSearchPath(value: string): string[] {
  return value
    .split(path.delimiter)
    .map((d) => d.trim())
    .filter(Boolean);
}

/**
 * Validate a delimiter pair, raising `INVALID_CONFIG` on failure.
 */
export function parseDelimiters(value: {
  left?: string;
  right?: string;
}): DelimiterPair {
  const parsed = DelimiterPairSchema.safeParse(value);
  if (!parsed.success) {
    throw new FillInError(
      `Invalid delimiters: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      'INVALID_CONFIG',
    );
  }
  return parsed.data;
}

/**
 * Process-wide delimiter pair used by templates that do not set their own.
 * Mutable; change it before interpreting, never during.
 */
export const defaultDelimiters: DelimiterPair = parseDelimiters({
  left: LEFT_DELIM,
  right: RIGHT_DELIM,
});
