/**
 * @querylens/cli - Command Line Interface
 *
 * The main entry point for the QueryLens CLI tool.
 *
 * @module @querylens/cli
 */

import { ensureQueryLensError, setDebugMode } from '@querylens/core';
import { analyze } from './commands/analyze.js';
import { normalize } from './commands/normalize.js';
import { validateConfig } from './config/loader.js';
import type { QueryLensConfig } from './config/types.js';
import { type CliOutput, consoleOutput } from './io.js';

/**
 * CLI version
 */
export const VERSION = '0.1.0';

/**
 * Flags that never take a value
 */
const BOOLEAN_FLAGS = new Set(['help', 'h', 'version', 'v', 'debug', 'fail-on-findings']);

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg.length > 1) {
      const key = arg.replace(/^--?/, '');
      const nextArg = args[i + 1];

      if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith('-')) {
        flags[key] = nextArg;
        i++;
      } else {
        flags[key] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

/** A flag given without a value becomes '' and fails validation */
function stringFlag(flags: ParsedArgs['flags'], key: string): string | undefined {
  const value = flags[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : '';
}

/** A flag given without a value becomes NaN and fails validation */
function numberFlag(flags: ParsedArgs['flags'], key: string): number | undefined {
  const value = flags[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? Number(value) : Number.NaN;
}

/**
 * Map analyze flags onto configuration keys
 */
export function flagsToConfig(flags: ParsedArgs['flags']): QueryLensConfig {
  const config = {
    format: stringFlag(flags, 'format'),
    offsetThreshold: numberFlag(flags, 'offset-threshold'),
    minRunLength: numberFlag(flags, 'min-run'),
    fullScanRowThreshold: numberFlag(flags, 'full-scan-rows'),
    slowQueryThresholdMs: numberFlag(flags, 'slow-ms'),
    failOnFindings: flags['fail-on-findings'] === true ? true : undefined,
  };

  const defined = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== undefined)
  );
  return validateConfig(defined, 'command line');
}

/**
 * Print main help message
 */
function printHelp(output: CliOutput): void {
  output.out(`
QueryLens - Query plan advisor for application query logs

Usage: querylens <command> [options]

Commands:
  analyze <file>          Detect N+1, deep OFFSET and full-scan patterns in a log
  normalize <sql>         Print the shape fingerprint of a statement

Analyze options:
  --format <text|json>    Report format (default: text)
  --offset-threshold <n>  Flag OFFSET values above n (default: 1000)
  --min-run <n>           Minimum same-shape run for N+1 (default: 2)
  --full-scan-rows <n>    Flag unfiltered reads of at least n rows (default: 10000)
  --slow-ms <n>           Duration that raises full-scan confidence (default: 100)
  --config <path>         Config file (default: nearest querylens.config.json)
  --fail-on-findings      Exit with code 2 when a pattern is found
  --debug                 Write debug logs to stderr

Options:
  --help, -h              Show help
  --version, -v           Show version

Examples:
  querylens analyze ./queries.jsonl
  querylens analyze ./queries.json --format json --offset-threshold 500
  querylens normalize "SELECT * FROM users WHERE id = 42"
`);
}

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function run(argv: string[], output: CliOutput = consoleOutput): Promise<number> {
  const args = parseArgs(argv);

  // Handle global flags
  if (args.flags.help || args.flags.h) {
    printHelp(output);
    return 0;
  }

  if (args.flags.version || args.flags.v) {
    output.out(`querylens v${VERSION}`);
    return 0;
  }

  const debug = args.flags.debug === true;
  setDebugMode(debug);

  try {
    switch (args.command) {
      case 'analyze': {
        const file = args.positional[0];
        if (!file) {
          output.err('Error: Query log path is required');
          output.err('Usage: querylens analyze <file>');
          return 1;
        }
        const configPath = stringFlag(args.flags, 'config');
        if (configPath === '') {
          output.err('Error: --config needs a path');
          return 1;
        }
        return await analyze({
          file,
          configPath,
          overrides: flagsToConfig(args.flags),
          debug,
          output,
        });
      }

      case 'normalize':
        if (args.positional.length === 0) {
          output.err('Error: SQL statement is required');
          output.err('Usage: querylens normalize <sql>');
          return 1;
        }
        return normalize(args.positional.join(' '), output);

      case '':
        printHelp(output);
        return 0;

      default:
        output.err(`Unknown command: ${args.command}`);
        output.err('Run "querylens --help" for usage information');
        return 1;
    }
  } catch (error) {
    const failure = ensureQueryLensError(error);
    output.err(debug ? failure.format() : `Error: ${failure.message}`);
    return 1;
  } finally {
    setDebugMode(false);
  }
}
