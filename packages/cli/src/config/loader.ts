/**
 * @querylens/cli - Configuration Loader
 *
 * Discovers, validates and merges querylens.config.json.
 *
 * @module @querylens/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError } from '@querylens/core';
import { advisorConfigSchema } from '@querylens/query-advisor';
import { z } from 'zod';
import type { QueryLensConfig } from './types.js';

/**
 * Configuration file name searched for
 */
export const CONFIG_FILE = 'querylens.config.json';

/**
 * Default configuration values
 */
const DEFAULT_CONFIG = {
  format: 'text',
  failOnFindings: false,
} satisfies QueryLensConfig;

/** Advisor settings, all optional so that defaults stay with the advisor, plus CLI-only keys */
const configFileSchema = advisorConfigSchema
  .partial()
  .extend({
    format: z.enum(['text', 'json']).optional(),
    failOnFindings: z.boolean().optional(),
  })
  .strict();

/**
 * Find a configuration file in the given directory or its parents
 *
 * @param startDir - Directory to start searching from
 * @returns Path to config file, or null if not found
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Validate a parsed configuration object
 *
 * @throws ConfigError listing every invalid or unknown key
 */
export function validateConfig(value: unknown, source?: string): QueryLensConfig {
  const result = configFileSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      source ? { path: source } : undefined
    );
  }
  return result.data;
}

/**
 * Load configuration from a file
 *
 * @param configPath - Path to the configuration file
 * @throws ConfigError when the file cannot be read, is not JSON or fails validation
 */
export function loadConfig(configPath: string): QueryLensConfig {
  const absolutePath = path.resolve(configPath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      [`could not read ${absolutePath}`],
      { path: absolutePath },
      error instanceof Error ? error : new Error(String(error))
    );
  }

  return validateConfig(parsed, absolutePath);
}

/**
 * Load configuration from the project root
 *
 * @param cwd - Current working directory
 * @returns The loaded configuration, or null if not found
 */
export function loadProjectConfig(cwd: string = process.cwd()): QueryLensConfig | null {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return null;
  }

  return loadConfig(configPath);
}

/**
 * Merge configuration layers. Later layers win; undefined values are ignored.
 */
export function mergeConfig(...layers: (QueryLensConfig | null | undefined)[]): QueryLensConfig {
  const merged: QueryLensConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}
