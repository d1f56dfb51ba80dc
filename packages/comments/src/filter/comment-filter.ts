import type { ByteSink, CommentResolver, Logger } from '@yamlnote/types';
import { noopLogger } from '@yamlnote/utils';

import { IoError } from '../errors.js';

import { CommentInjector } from './comment-injector.js';
import { Utf8Decoder } from './utf8-decoder.js';

/**
 * Pass-through sink that injects comments in front of YAML keys.
 *
 * Wraps another ByteSink so it can stand in wherever the encoder writes its
 * output. `write` always reports the whole chunk as consumed even though a
 * partial line stays buffered until its newline arrives or `flush` is called.
 *
 * @example
 * const out = new BufferSink();
 * const filter = new CommentFilter(out, (key) => (key.text === 'age' ? 'In years.' : undefined));
 * filter.write('name: John\nage: 30\n');
 * filter.flush();
 * // name: John
 * // # In years.
 * // age: 30
 */
export class CommentFilter implements ByteSink {
  private readonly decoder = new Utf8Decoder();
  private readonly encoder = new TextEncoder();
  private readonly injector: CommentInjector;

  constructor(
    private readonly inner: ByteSink,
    resolver: CommentResolver,
    logger: Logger = noopLogger,
  ) {
    this.injector = new CommentInjector(resolver, (text) => this.forward(text), logger);
  }

  /**
   * Text buffered since the last forwarded newline
   */
  get pending(): string {
    return this.injector.pending;
  }

  /**
   * Accept a chunk of YAML output.
   *
   * @returns the size of the chunk in bytes
   * @throws EncodingError if the chunk is not valid UTF-8, or is a string following
   * an unfinished multi-byte sequence; nothing of it is forwarded
   */
  write(chunk: Uint8Array | string): number {
    if (typeof chunk === 'string') {
      // Bytes of an unfinished sequence cannot be completed by text
      this.injector.push(this.decoder.end());
      this.injector.push(chunk);
      return Buffer.byteLength(chunk, 'utf8');
    }

    const text = this.decoder.decode(chunk);
    this.injector.push(text);
    return chunk.byteLength;
  }

  /**
   * Forward the buffered line, with its comments, to the inner sink
   */
  flushLine(): void {
    this.injector.flushLine();
  }

  /**
   * Forward a trailing partial line and flush the inner sink
   */
  flush(): void {
    this.injector.push(this.decoder.end());
    this.injector.flushLine();
    this.inner.flush();
  }

  private forward(text: string): void {
    const bytes = this.encoder.encode(text);
    let offset = 0;
    while (offset < bytes.byteLength) {
      const written = this.inner.write(bytes.subarray(offset));
      if (written <= 0) {
        throw new IoError('Sink accepted no bytes');
      }
      offset += written;
    }
  }
}
