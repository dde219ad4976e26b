/**
 * @querylens/cli - Analyze Command
 *
 * Runs the advisor over a query log file and prints the report.
 *
 * @module @querylens/cli/commands
 */

import * as path from 'node:path';
import { createLogger, formatLogEntry } from '@querylens/core';
import { openQueryLog } from '@querylens/query-log';
import { type AdvisoryReport, createQueryAdvisor } from '@querylens/query-advisor';
import { loadConfig, loadProjectConfig, mergeConfig } from '../config/loader.js';
import type { QueryLensConfig } from '../config/types.js';
import { type CliOutput, consoleOutput } from '../io.js';
import { formatJsonReport, formatTextReport } from '../report/format.js';

/**
 * Analyze options
 */
export interface AnalyzeOptions {
  /** Query log path (JSON Lines, or a JSON array when it ends in .json) */
  file: string;
  /** Explicit config file; otherwise querylens.config.json is searched upward */
  configPath?: string;
  /** Settings from command line flags, applied over the config file */
  overrides?: QueryLensConfig;
  /** Route debug log entries to stderr */
  debug?: boolean;
  /** Working directory */
  cwd?: string;
  output?: CliOutput;
}

/**
 * Exit code when `failOnFindings` is set and a pattern was found
 */
export const FINDINGS_EXIT_CODE = 2;

/**
 * Analyze a query log file
 *
 * @returns Process exit code
 */
export async function analyze(options: AnalyzeOptions): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const output = options.output ?? consoleOutput;

  const fileConfig = options.configPath
    ? loadConfig(path.resolve(cwd, options.configPath))
    : loadProjectConfig(cwd);
  const config = mergeConfig(fileConfig, options.overrides);

  const logger = createLogger({
    module: 'querylens',
    level: options.debug ? 'debug' : 'warn',
    sink: (entry) => output.err(formatLogEntry(entry)),
  });

  const advisor = createQueryAdvisor({
    minRunLength: config.minRunLength,
    offsetThreshold: config.offsetThreshold,
    fullScanRowThreshold: config.fullScanRowThreshold,
    slowQueryThresholdMs: config.slowQueryThresholdMs,
    enabledKinds: config.enabledKinds,
    maxErrors: config.maxErrors,
    topShapes: config.topShapes,
    logger,
  });

  let report: AdvisoryReport;
  try {
    report = await advisor.analyzeAsync(openQueryLog(path.resolve(cwd, options.file)));
  } finally {
    advisor.destroy();
  }

  output.out(config.format === 'json' ? formatJsonReport(report) : formatTextReport(report));

  return config.failOnFindings && report.findings.length > 0 ? FINDINGS_EXIT_CODE : 0;
}
