/**
 * QueryLens error model.
 *
 * @example
 * ```typescript
 * import { LogSourceError } from '@querylens/core';
 *
 * try {
 *   await advisor.analyzeAsync(openQueryLog(path));
 * } catch (error) {
 *   if (error instanceof LogSourceError && error.code === 'QLENS_S300') {
 *     console.error(`No log at ${error.path}`);
 *   }
 * }
 * ```
 *
 * @module errors
 */

export type { ErrorCode } from './error-codes.js';
export {
  ConfigError,
  LogSourceError,
  MalformedRecordError,
  QueryLensError,
  ensureQueryLensError,
  type QueryLensErrorDetails,
} from './querylens-error.js';
