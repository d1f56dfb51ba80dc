import { Transform, type TransformCallback } from 'node:stream';

import type { CommentResolver, Logger } from '@yamlnote/types';
import { noopLogger } from '@yamlnote/utils';

import { CommentInjector } from './comment-injector.js';
import { Utf8Decoder } from './utf8-decoder.js';

/**
 * Options for the comment-injecting stream
 */
export interface CommentStreamOptions {
  logger?: Logger;
}

/**
 * Node.js stream version of CommentFilter, for use in stream pipelines:
 *
 *   await pipeline(source, createCommentStream(resolver), createWriteStream(path));
 *
 * Decoding and resolver errors destroy the stream with that error.
 */
export class CommentTransform extends Transform {
  private readonly decoder = new Utf8Decoder();
  private readonly injector: CommentInjector;

  constructor(resolver: CommentResolver, options: CommentStreamOptions = {}) {
    super();
    this.injector = new CommentInjector(
      resolver,
      (text) => {
        this.push(text);
      },
      options.logger ?? noopLogger,
    );
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    try {
      this.injector.push(this.decoder.decode(chunk));
      callback();
    } catch (error) {
      callback(asError(error));
    }
  }

  override _flush(callback: TransformCallback): void {
    try {
      this.injector.push(this.decoder.end());
      this.injector.flushLine();
      callback();
    } catch (error) {
      callback(asError(error));
    }
  }
}

/**
 * Create a Transform stream that injects comments in front of YAML keys
 */
export function createCommentStream(
  resolver: CommentResolver,
  options?: CommentStreamOptions,
): CommentTransform {
  return new CommentTransform(resolver, options);
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
