/**
 * Application configuration
 */

import { z } from 'zod';
import { env } from './env.js';
import { DEFAULT_EXTRACTION_OPTIONS } from './defaults.js';
import type { ExtractionOptions } from '../types/index.js';

/**
 * Parse a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const extractionOptionsSchema = z.object({
  tagThreshold: z.number().min(0).max(1),
  tagDenylist: z.array(z.string()),
  minTextLength: z.number().int().min(0),
  dropCopyrightParagraphs: z.boolean(),
});

/**
 * Merge partial options over the defaults and validate the result
 */
export function resolveExtractionOptions(
  options: Partial<ExtractionOptions> = {},
  defaults: ExtractionOptions = DEFAULT_EXTRACTION_OPTIONS
): ExtractionOptions {
  const result = extractionOptionsSchema.safeParse({ ...defaults, ...options });

  if (!result.success) {
    throw new Error(
      `Invalid extraction options:\n${JSON.stringify(result.error.format(), null, 2)}`
    );
  }

  return result.data;
}

export const config = {
  app: {
    name: 'corpus-split',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  logging: {
    level: env.LOG_LEVEL,
  },

  extraction: resolveExtractionOptions({
    tagThreshold: env.TAG_FREQUENCY_THRESHOLD,
    tagDenylist: parseList(env.TAG_DENYLIST),
    minTextLength: env.MIN_TEXT_LENGTH,
    dropCopyrightParagraphs: env.DROP_COPYRIGHT_PARAGRAPHS,
  }),
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { DEFAULT_EXTRACTION_OPTIONS } from './defaults.js';
export { MONTHS, MONTH_LOOKUP } from './months.js';
