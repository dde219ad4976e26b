/**
 * Advisor configuration schema and defaults.
 *
 * @module @querylens/query-advisor/config
 */

import { ConfigError } from '@querylens/core';
import { z } from 'zod';
import { PATTERN_KINDS } from './types.js';

const patternKindSchema = z.enum(['n_plus_one', 'offset_pagination', 'full_scan']);

export const detectorConfigSchema = z
  .object({
    minRunLength: z.number().int().min(2).default(2),
    offsetThreshold: z.number().int().nonnegative().default(1000),
    fullScanRowThreshold: z.number().int().positive().default(10_000),
    slowQueryThresholdMs: z.number().nonnegative().default(100),
    enabledKinds: z
      .array(patternKindSchema)
      .default(() => [...PATTERN_KINDS]),
  })
  .strict();

export const advisorConfigSchema = detectorConfigSchema
  .extend({
    maxErrors: z.number().int().nonnegative().default(100),
    topShapes: z.number().int().nonnegative().default(10),
  })
  .strict();

export type ResolvedDetectorConfig = z.infer<typeof detectorConfigSchema>;
export type ResolvedAdvisorConfig = z.infer<typeof advisorConfigSchema>;

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(
    error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  );
}

/**
 * Validate detector settings and fill defaults.
 *
 * @throws ConfigError when a value is out of range or a key is unknown
 */
export function resolveDetectorConfig(config: unknown): ResolvedDetectorConfig {
  const result = detectorConfigSchema.safeParse(config ?? {});
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}

/**
 * Validate advisor settings (detector settings plus reporting limits).
 *
 * @throws ConfigError when a value is out of range or a key is unknown
 */
export function resolveAdvisorConfig(config: unknown): ResolvedAdvisorConfig {
  const result = advisorConfigSchema.safeParse(config ?? {});
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}
