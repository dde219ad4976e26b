/**
 * @querylens/core — Shared error model and structured logger.
 *
 * @module @querylens/core
 */

export * from './errors/index.js';
export * from './observability/index.js';
