/**
 * I/O type exports
 */

/**
 * Synchronous byte destination.
 *
 * `write` returns the number of bytes it consumed. Implementations may buffer;
 * `flush` pushes anything held back to the final destination.
 */
export interface ByteSink {
  write(chunk: Uint8Array): number;
  flush(): void;
}

/**
 * Logger interface for library operations
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
