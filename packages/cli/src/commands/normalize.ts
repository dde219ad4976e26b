/**
 * @querylens/cli - Normalize Command
 *
 * @module @querylens/cli/commands
 */

import { normalizeStatement } from '@querylens/query-log';
import { type CliOutput, consoleOutput } from '../io.js';

/**
 * Print the shape fingerprint of a statement
 */
export function normalize(sql: string, output: CliOutput = consoleOutput): number {
  output.out(normalizeStatement(sql));
  return 0;
}
