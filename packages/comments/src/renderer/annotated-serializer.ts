import type { ByteSink, CommentResolver } from '@yamlnote/types';
import { resolveAnnotateOptions, type AnnotateOptions } from '@yamlnote/utils';

import { createYamlEncoder, type Encoder } from '../encoder/yaml-encoder.js';
import { toIoError } from '../errors.js';
import { CommentFilter } from '../filter/comment-filter.js';
import { decodeUtf8 } from '../filter/utf8-decoder.js';
import { BufferSink } from '../sinks/buffer-sink.js';

/**
 * Options for annotated serialization
 */
export interface SerializeOptions extends AnnotateOptions {
  /** Replaces the default `yaml` encoder; indent and lineWidth are then ignored */
  encoder?: Encoder;
}

/**
 * Serialize a value as YAML into a sink, with a comment before every key the
 * resolver returns text for.
 *
 * This works by scanning the encoder output for lines that look like
 * `key: value`; quoted keys containing `:` or `#` are not recognized.
 *
 * @throws FormatError if the value cannot be encoded
 * @throws IoError if the sink fails
 * @throws ConfigValidationError if the options are invalid
 */
export function writeWithComments(
  sink: ByteSink,
  value: unknown,
  resolver: CommentResolver,
  options: SerializeOptions = {},
): void {
  const resolved = resolveAnnotateOptions(options);
  const encoder = options.encoder ?? createYamlEncoder(resolved);
  const filter = new CommentFilter(guardSink(sink), resolver, resolved.logger);

  encoder.encode(value, (chunk) => {
    filter.write(chunk);
  });
  filter.flush();
}

/**
 * Serialize a value to a YAML string with comments.
 *
 * @example
 * stringifyWithComments({ name: 'John Doe', age: 30 }, (key) =>
 *   key.text === 'age' ? 'The age of the person.\nIn years.' : undefined,
 * );
 * // name: John Doe
 * // # The age of the person.
 * // # In years.
 * // age: 30
 *
 * @throws EncodingError if the encoder produced bytes that are not UTF-8
 */
export function stringifyWithComments(
  value: unknown,
  resolver: CommentResolver,
  options?: SerializeOptions,
): string {
  const sink = new BufferSink();
  writeWithComments(sink, value, resolver, options);
  return decodeUtf8(sink.toUint8Array());
}

/**
 * Build a resolver that looks comments up by key name
 */
export function createKeyResolver(
  comments: Map<string, string> | Record<string, string>,
): CommentResolver {
  const byKey = comments instanceof Map ? comments : new Map(Object.entries(comments));
  return (key) => byKey.get(key.text);
}

/**
 * Report sink failures as IoError
 */
function guardSink(sink: ByteSink): ByteSink {
  return {
    write: (chunk) => {
      try {
        return sink.write(chunk);
      } catch (error) {
        throw toIoError(error, 'Failed to write to sink');
      }
    },
    flush: () => {
      try {
        sink.flush();
      } catch (error) {
        throw toIoError(error, 'Failed to flush sink');
      }
    },
  };
}
