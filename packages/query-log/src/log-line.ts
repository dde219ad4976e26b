/**
 * A log line that could not be decoded. Ingestion counts it as malformed
 * instead of stopping the stream.
 */
export class UnparseableLine {
  constructor(
    readonly line: string,
    readonly reason: string
  ) {}
}

/**
 * Decode one JSON Lines entry.
 */
export function parseLogLine(line: string): unknown {
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch (error) {
    return new UnparseableLine(line, error instanceof Error ? error.message : String(error));
  }
}
