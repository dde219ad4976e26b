/**
 * File-backed query log sources.
 *
 * @module @querylens/query-log/log-source
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import { LogSourceError } from '@querylens/core';
import { parseLogLine } from './log-line.js';

/**
 * Stream a JSON Lines query log. Blank lines are ignored; lines that are
 * not valid JSON are yielded as {@link UnparseableLine} values.
 */
export async function* readQueryLog(filePath: string): AsyncGenerator<unknown, void, undefined> {
  if (!fs.existsSync(filePath)) {
    throw new LogSourceError(filePath);
  }

  const stream = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      if (!line.trim()) continue;
      yield parseLogLine(line);
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}

/**
 * Read a log stored as one JSON array of entries.
 */
export async function readQueryLogArray(filePath: string): Promise<unknown[]> {
  if (!fs.existsSync(filePath)) {
    throw new LogSourceError(filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new LogSourceError(
      filePath,
      'QLENS_S301',
      error instanceof Error ? error : new Error(String(error))
    );
  }

  if (!Array.isArray(parsed)) {
    throw new LogSourceError(filePath, 'QLENS_S301', new Error('expected a JSON array'));
  }
  return parsed;
}

/**
 * Open a query log by extension: `.json` is read as an array, anything
 * else as JSON Lines.
 */
export function openQueryLog(filePath: string): AsyncIterable<unknown> {
  if (path.extname(filePath).toLowerCase() === '.json') {
    return (async function* () {
      yield* await readQueryLogArray(filePath);
    })();
  }
  return readQueryLog(filePath);
}
