/**
 * Mock sinks for testing comment injection
 */

import type { ByteSink } from '@yamlnote/types';

/**
 * Sink that records every write and flush call
 */
export interface RecordingSink extends ByteSink {
  /** Each write call, decoded as UTF-8 */
  readonly writes: string[];
  /** Number of flush calls */
  readonly flushes: number;
  /** Everything written, concatenated */
  text(): string;
}

export interface RecordingSinkConfig {
  /** Accept at most this many bytes per write call (default: all) */
  maxBytesPerWrite?: number;
}

/**
 * Create a sink that records writes
 */
export function createRecordingSink(config: RecordingSinkConfig = {}): RecordingSink {
  const decoder = new TextDecoder('utf-8', { ignoreBOM: true });
  const writes: string[] = [];
  let flushes = 0;

  return {
    writes,
    get flushes() {
      return flushes;
    },
    write(chunk: Uint8Array): number {
      const accepted = Math.min(chunk.byteLength, config.maxBytesPerWrite ?? chunk.byteLength);
      writes.push(decoder.decode(chunk.subarray(0, accepted), { stream: true }));
      return accepted;
    },
    flush(): void {
      flushes++;
    },
    text(): string {
      return writes.join('');
    },
  };
}

export interface FailingSinkConfig {
  /** Number of write calls that succeed before failing (default: 0) */
  failAfterWrites?: number;
  /** Fail on flush instead of write */
  failOnFlush?: boolean;
  /** Error thrown by the sink */
  error?: Error;
}

/**
 * Create a sink that fails like a broken pipe
 */
export function createFailingSink(config: FailingSinkConfig = {}): RecordingSink {
  const inner = createRecordingSink();
  const error = config.error ?? Object.assign(new Error('EPIPE: broken pipe, write'), { code: 'EPIPE' });
  let writeCount = 0;

  return {
    get writes() {
      return inner.writes;
    },
    get flushes() {
      return inner.flushes;
    },
    write(chunk: Uint8Array): number {
      if (!config.failOnFlush && writeCount >= (config.failAfterWrites ?? 0)) {
        throw error;
      }
      writeCount++;
      return inner.write(chunk);
    },
    flush(): void {
      if (config.failOnFlush) {
        throw error;
      }
      inner.flush();
    },
    text: () => inner.text(),
  };
}

/**
 * Create a sink that reports zero bytes written
 */
export function createStalledSink(): ByteSink {
  return {
    write: () => 0,
    flush: () => {},
  };
}
