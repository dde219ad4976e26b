/**
 * QueryLens error codes: `QLENS_` + a category letter + a number.
 *
 * - I1xx ingestion
 * - C2xx configuration
 * - S3xx log sources
 * - D4xx detection
 * - X9xx internal
 */

interface ErrorCodeInfo {
  readonly message: string;
  readonly suggestion: string;
}

export const ERROR_CODES = {
  QLENS_I100: {
    message: 'Malformed query record',
    suggestion:
      'Each entry needs timestamp, sql, rowCount and durationMs, as an object or a 4-tuple.',
  },
  QLENS_I101: {
    message: 'Log line is not valid JSON',
    suggestion: 'Query logs are read as JSON Lines: one JSON object or array per line.',
  },
  QLENS_I102: {
    message: 'Record belongs to another ingestion session',
    suggestion: 'Feed each detector only with records produced by a single session.',
  },

  QLENS_C200: {
    message: 'Invalid configuration',
    suggestion: 'Check the reported configuration keys against their allowed ranges.',
  },
  QLENS_C201: {
    message: 'Configuration file could not be read',
    suggestion: 'Ensure querylens.config.json exists and contains a JSON object.',
  },

  QLENS_S300: {
    message: 'Query log not found',
    suggestion: 'Check the path passed to the analyze command.',
  },
  QLENS_S301: {
    message: 'Query log could not be read',
    suggestion: 'A .json log must hold a single array of entries; use .jsonl for line-delimited logs.',
  },

  QLENS_D400: {
    message: 'Records out of sequence',
    suggestion: 'Records must reach the detector in ascending sequence order.',
  },

  QLENS_X900: {
    message: 'Internal error',
    suggestion: 'This is unexpected. Re-run with --debug and report the output.',
  },
} as const satisfies Record<string, ErrorCodeInfo>;

export type ErrorCode = keyof typeof ERROR_CODES;
