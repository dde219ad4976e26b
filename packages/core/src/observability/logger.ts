/**
 * Structured logging for QueryLens packages.
 *
 * Entries go to a sink supplied by the host (the CLI writes them to
 * stderr). Without a sink the logger is silent, so library code can log
 * unconditionally.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'warn';

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  /** `query-advisor`, `query-advisor:ingest`, ... */
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Module name (default: 'querylens') */
  readonly module?: string;
  /** Lowest level passed to the sink (default: 'warn') */
  readonly level?: LogLevel;
  readonly sink?: LogSink;
}

let debugEverywhere = false;

/** Let every logger through at debug level, whatever its own level */
export function setDebugMode(enabled: boolean): void {
  debugEverywhere = enabled;
}

export function isDebugMode(): boolean {
  return debugEverywhere;
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'query-advisor', level: 'debug', sink: console.error });
 * const ingest = log.child('ingest');
 *
 * ingest.debug('Skipped malformed record', { index: 4, code: 'QLENS_I100' });
 *
 * const done = log.time('analysis');
 * done({ records: 120, findings: 3 }); // "analysis completed" with durationMs
 * ```
 */
export class QueryLensLogger {
  constructor(
    readonly module: string,
    private readonly level: LogLevel,
    private readonly sink: LogSink | undefined
  ) {}

  /** Logger for a sub-module, sharing level and sink */
  child(scope: string): QueryLensLogger {
    return new QueryLensLogger(`${this.module}:${scope}`, this.level, this.sink);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  /**
   * Start timing an operation. The returned function logs
   * `<operation> completed` at debug level with `durationMs` added.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.emit('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.sink) return;
    if (level === 'debug' && this.level !== 'debug' && !debugEverywhere) return;

    this.sink({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    });
  }
}

export function createLogger(options: LoggerOptions = {}): QueryLensLogger {
  return new QueryLensLogger(options.module ?? 'querylens', options.level ?? 'warn', options.sink);
}

/** One-line rendering: `[warn] query-advisor: Skipped malformed records {"count":2}` */
export function formatLogEntry(entry: LogEntry): string {
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `[${entry.level}] ${entry.module}: ${entry.message}${context}`;
}
