/**
 * Appending documents to multi-document YAML files
 */

import * as fs from 'node:fs';

import {
  FileSink,
  toIoError,
  writeWithComments,
  type SerializeOptions,
} from '@yamlnote/comments';
import type { ByteSink, CommentResolver } from '@yamlnote/types';
import { noopLogger, scopedLogger } from '@yamlnote/utils';

/**
 * Written between the existing content and an appended document
 */
export const APPEND_SEPARATOR = '\n---\n';

/**
 * Options for appending a document
 */
export interface AppendOptions extends SerializeOptions {
  /** Comments to place before keys of the appended document */
  resolver?: CommentResolver;
  /** fsync the file before closing it (default: false) */
  sync?: boolean;
}

const noComments: CommentResolver = () => undefined;

/**
 * Append a value as a new YAML document, creating the file if needed.
 *
 * A non-empty file gets a `---` separator line first. Nothing is written when
 * the value cannot be encoded.
 *
 * @example
 * appendOrNew('runs.yml', { run: 2, status: 'ok' }, {
 *   resolver: createKeyResolver({ status: 'Final status of the run' }),
 * });
 *
 * @throws IoError if the file cannot be opened, inspected or written
 * @throws FormatError if the value cannot be encoded
 * @throws ConfigValidationError if the options are invalid
 */
export function appendOrNew(path: string, value: unknown, options: AppendOptions = {}): void {
  const logger = scopedLogger(options.logger ?? noopLogger, 'documents');

  let fd: number;
  try {
    fd = fs.openSync(path, 'a');
  } catch (error) {
    throw toIoError(error, 'Failed to open document file', path);
  }

  try {
    const size = fileSize(fd, path);
    const file = new FileSink(fd, { sync: options.sync });
    const sink = size > 0 ? prefixedSink(file, Buffer.from(APPEND_SEPARATOR, 'utf-8')) : file;

    // Sink failures arrive as IoError; option and resolver errors pass through
    writeWithComments(sink, value, options.resolver ?? noComments, options);
    logger.debug(`appended document to ${path} (${size > 0 ? 'existing' : 'new'} file)`);
  } finally {
    fs.closeSync(fd);
  }
}

function fileSize(fd: number, path: string): number {
  try {
    return fs.fstatSync(fd).size;
  } catch (error) {
    throw toIoError(error, 'Failed to inspect document file', path);
  }
}

/**
 * Sink writing `prefix` just before its first chunk
 */
function prefixedSink(inner: ByteSink, prefix: Uint8Array): ByteSink {
  let pending = true;
  return {
    write: (chunk) => {
      if (pending) {
        inner.write(prefix);
        pending = false;
      }
      return inner.write(chunk);
    },
    flush: () => inner.flush(),
  };
}
