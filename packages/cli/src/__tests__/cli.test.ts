import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { isDebugMode } from '@querylens/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { VERSION, flagsToConfig, parseArgs, run } from '../cli.js';
import type { CliOutput } from '../io.js';

function capture(): { out: string[]; err: string[]; output: CliOutput } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, output: { out: (text) => out.push(text), err: (text) => err.push(text) } };
}

const N_PLUS_ONE_LOG = [
  { timestamp: 1, sql: 'SELECT * FROM authors', rowCount: 2, durationMs: 3 },
  { timestamp: 2, sql: 'SELECT * FROM books WHERE author_id = 1', rowCount: 4, durationMs: 1 },
  { timestamp: 3, sql: 'SELECT * FROM books WHERE author_id = 2', rowCount: 1, durationMs: 1 },
];

describe('parseArgs', () => {
  it('should split command, positionals and flags', () => {
    expect(parseArgs(['analyze', 'log.jsonl', '--format', 'json', '--debug', '-h'])).toEqual({
      command: 'analyze',
      positional: ['log.jsonl'],
      flags: { format: 'json', debug: true, h: true },
    });
  });

  it('should not let boolean flags swallow the next argument', () => {
    expect(parseArgs(['analyze', '--fail-on-findings', 'log.jsonl'])).toEqual({
      command: 'analyze',
      positional: ['log.jsonl'],
      flags: { 'fail-on-findings': true },
    });
  });
});

describe('flagsToConfig', () => {
  it('should map flags to config keys', () => {
    expect(
      flagsToConfig({ 'offset-threshold': '500', 'min-run': '3', format: 'json', 'fail-on-findings': true })
    ).toEqual({ offsetThreshold: 500, minRunLength: 3, format: 'json', failOnFindings: true });
  });

  it('should reject non-numeric values', () => {
    expect(() => flagsToConfig({ 'slow-ms': 'fast' })).toThrow(/slowQueryThresholdMs/);
  });

  it('should reject a format flag without a value', () => {
    expect(() => flagsToConfig({ format: true })).toThrow(/^Invalid configuration: format: /);
  });
});

describe('run', () => {
  let tmpDir: string;
  let logFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'querylens-cli-'));
    logFile = path.join(tmpDir, 'queries.jsonl');
    fs.writeFileSync(logFile, N_PLUS_ONE_LOG.map((entry) => JSON.stringify(entry)).join('\n'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should print the version', async () => {
    const io = capture();

    expect(await run(['--version'], io.output)).toBe(0);
    expect(io.out).toEqual([`querylens v${VERSION}`]);
  });

  it('should print help without a command', async () => {
    const io = capture();

    expect(await run([], io.output)).toBe(0);
    expect(io.out[0]).toContain('Usage: querylens <command> [options]');
  });

  it('should normalize a statement', async () => {
    const io = capture();

    expect(await run(['normalize', 'SELECT * FROM users WHERE id = 42'], io.output)).toBe(0);
    expect(io.out).toEqual(['SELECT * FROM USERS WHERE ID = ?']);
  });

  it('should join unquoted statement words', async () => {
    const io = capture();

    await run(['normalize', 'select', '1'], io.output);

    expect(io.out).toEqual(['SELECT ?']);
  });

  it('should print a text report', async () => {
    const io = capture();

    expect(await run(['analyze', logFile], io.output)).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain('[WARNING] N+1 queries on books (confidence 1)');
    expect(io.err).toEqual([]);
  });

  it('should exit with 2 on findings when asked to', async () => {
    const io = capture();

    expect(await run(['analyze', logFile, '--format', 'json', '--fail-on-findings'], io.output)).toBe(2);
    expect(JSON.parse(io.out[0] ?? '')).toMatchObject({
      summary: { n_plus_one: 1, offset_pagination: 0, full_scan: 0 },
    });
  });

  it('should apply an explicit config file', async () => {
    const configFile = path.join(tmpDir, 'strict.json');
    fs.writeFileSync(configFile, JSON.stringify({ minRunLength: 3, failOnFindings: true }));
    const io = capture();

    expect(await run(['analyze', logFile, '--config', configFile], io.output)).toBe(0);
    expect(io.out[0]).toContain('No problematic patterns found.');
  });

  it('should write debug logs to stderr', async () => {
    const io = capture();

    await run(['analyze', logFile, '--debug'], io.output);

    expect(io.err.some((line) => line.startsWith('[debug] querylens: analysis completed'))).toBe(true);
    expect(isDebugMode()).toBe(false);
  });

  it('should report a missing log file', async () => {
    const missing = path.join(tmpDir, 'missing.jsonl');
    const io = capture();

    expect(await run(['analyze', missing], io.output)).toBe(1);
    expect(io.err).toEqual([`Error: Query log not found: ${missing}`]);
  });

  it('should report invalid flags', async () => {
    const io = capture();

    expect(await run(['analyze', logFile, '--offset-threshold', 'abc'], io.output)).toBe(1);
    expect(io.err[0]).toMatch(/^Error: Invalid configuration: offsetThreshold: /);
  });

  it('should fail when --format has no value', async () => {
    const io = capture();

    expect(await run(['analyze', logFile, '--format'], io.output)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err[0]).toMatch(/^Error: Invalid configuration: format: /);
  });

  it('should fail when --config has no path', async () => {
    const io = capture();

    expect(await run(['analyze', logFile, '--config'], io.output)).toBe(1);
    expect(io.err).toEqual(['Error: --config needs a path']);
  });

  it('should require a log path', async () => {
    const io = capture();

    expect(await run(['analyze'], io.output)).toBe(1);
    expect(io.err[0]).toBe('Error: Query log path is required');
  });

  it('should reject unknown commands', async () => {
    const io = capture();

    expect(await run(['optimize'], io.output)).toBe(1);
    expect(io.err[0]).toBe('Unknown command: optimize');
  });
});
