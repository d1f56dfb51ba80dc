/**
 * Error classes for annotation and document operations
 */

/**
 * Error codes for the yamlnote error taxonomy
 */
export type YamlNoteErrorCode = 'IO_ERROR' | 'ENCODING_ERROR' | 'FORMAT_ERROR';

/**
 * Base error class for yamlnote errors
 */
export class YamlNoteError extends Error {
  constructor(
    message: string,
    public readonly code: YamlNoteErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'YamlNoteError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a sink or file operation fails
 */
export class IoError extends YamlNoteError {
  /** errno code of the underlying failure, e.g. `EACCES` */
  public readonly errno?: string;

  constructor(
    message: string,
    public readonly path?: string,
    cause?: unknown,
  ) {
    super(`${message}${path ? ` (${path})` : ''}${describeCause(cause)}`, 'IO_ERROR', { cause });
    this.name = 'IoError';
    this.errno = errnoCode(cause);
  }
}

/**
 * Error thrown when bytes are not valid UTF-8
 */
export class EncodingError extends YamlNoteError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ENCODING_ERROR', { cause });
    this.name = 'EncodingError';
  }
}

/**
 * Error thrown when a value cannot be encoded to YAML or a document cannot be decoded
 */
export class FormatError extends YamlNoteError {
  constructor(message: string, cause?: unknown) {
    super(message, 'FORMAT_ERROR', { cause });
    this.name = 'FormatError';
  }
}

/**
 * Wrap a sink failure in an IoError unless it already belongs to the taxonomy
 */
export function toIoError(error: unknown, message: string, path?: string): YamlNoteError {
  if (error instanceof YamlNoteError) {
    return error;
  }
  return new IoError(message, path, error);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`;
}

function errnoCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const { code } = cause;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
