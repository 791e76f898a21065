/**
 * Environment Validation Schema
 *
 * Zod-based schema providing type-safe validation for the environment
 * variables the read path and search engine consume.
 *
 * @module @config/schema
 */

import { z } from 'zod';

// ============================================================================
// Reusable validators
// ============================================================================

/** Accepts exactly true/false/1/0 (case-insensitive, trimmed) */
const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

  // -- Read cache --
  CACHE_ENABLED: booleanFlag.default('false'),
  /** Seconds an aggregation result stays fresh */
  CACHE_TIMEOUT: positiveInt.default(300),
  /** Optional LRU cap; unset means entries leave only by expiry or invalidation */
  CACHE_MAX_ENTRIES: positiveInt.optional(),
  CACHE_SWEEP_INTERVAL_MS: positiveInt.default(60000),

  // -- Store --
  DATABASE_URL: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;
