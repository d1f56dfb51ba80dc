/**
 * @yamlnote/comments - Comment injection for generated YAML
 *
 * This package handles:
 * - Recognizing the mapping key opened by a line of YAML output
 * - Injecting resolver-supplied comments in front of keys, in a pass-through sink
 * - Serializing values to annotated YAML (sink or string)
 * - The error taxonomy shared with @yamlnote/documents
 */

export const VERSION = '0.1.0';

export type { KeyData, CommentResolver, ByteSink } from '@yamlnote/types';

// Key recognition
export { recognizeKey, COMMENT_MARKER, KEY_TERMINATOR } from './recognizer/key-recognizer.js';

// Comment injection
export {
  CommentInjector,
  splitCommentLines,
  renderCommentLines,
} from './filter/comment-injector.js';
export type { EmitFn } from './filter/comment-injector.js';
export { CommentFilter } from './filter/comment-filter.js';
export { CommentTransform, createCommentStream } from './filter/comment-transform.js';
export type { CommentStreamOptions } from './filter/comment-transform.js';
export { Utf8Decoder, decodeUtf8 } from './filter/utf8-decoder.js';

// Sinks
export { BufferSink, FileSink } from './sinks/index.js';
export type { FileSinkOptions } from './sinks/index.js';

// Serialization
export { createYamlEncoder } from './encoder/yaml-encoder.js';
export type { Encoder } from './encoder/yaml-encoder.js';
export {
  writeWithComments,
  stringifyWithComments,
  createKeyResolver,
} from './renderer/annotated-serializer.js';
export type { SerializeOptions } from './renderer/annotated-serializer.js';

// Errors
export {
  YamlNoteError,
  IoError,
  EncodingError,
  FormatError,
  toIoError,
  errorMessage,
} from './errors.js';
export type { YamlNoteErrorCode } from './errors.js';
