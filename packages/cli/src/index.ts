/**
 * @querylens/cli - Programmatic API
 *
 * The QueryLens command line tool and the pieces it is built from.
 *
 * @example Running the analysis programmatically
 * ```typescript
 * import { analyze } from '@querylens/cli';
 *
 * const exitCode = await analyze({
 *   file: './queries.jsonl',
 *   overrides: { format: 'json', failOnFindings: true },
 * });
 * ```
 *
 * @example Checking a querylens.config.json
 * ```typescript
 * import { loadProjectConfig } from '@querylens/cli';
 *
 * const config = loadProjectConfig(); // null when none is found
 * ```
 *
 * @module @querylens/cli
 */

export { VERSION, flagsToConfig, parseArgs, run, type ParsedArgs } from './cli.js';
export { analyze, FINDINGS_EXIT_CODE, type AnalyzeOptions } from './commands/analyze.js';
export { normalize } from './commands/normalize.js';
export {
  CONFIG_FILE,
  findConfigFile,
  loadConfig,
  loadProjectConfig,
  mergeConfig,
  validateConfig,
} from './config/loader.js';
export type { QueryLensConfig, ReportFormat } from './config/types.js';
export { consoleOutput, type CliOutput } from './io.js';
export { formatJsonReport, formatTextReport } from './report/format.js';
