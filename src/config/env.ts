/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Extraction
  TAG_FREQUENCY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.2),
  TAG_DENYLIST: z.string().default('WELT'),
  MIN_TEXT_LENGTH: z.coerce.number().int().min(0).default(100),
  DROP_COPYRIGHT_PARAGRAPHS: booleanFlag.default('true'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
