import { TextDecoder } from 'node:util';
import { EncodingError } from '../errors.js';

/**
 * Strict incremental UTF-8 decoder.
 *
 * A multi-byte sequence split across two chunks is joined; any invalid
 * sequence throws an EncodingError before a single character of the chunk is
 * returned. A byte-order mark is kept so the output is forwarded verbatim.
 */
export class Utf8Decoder {
  private decoder = createDecoder();

  /**
   * Decode one chunk, holding back an incomplete trailing sequence
   */
  decode(chunk: Uint8Array): string {
    try {
      return this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      this.decoder = createDecoder();
      throw new EncodingError('Stream is not valid UTF-8', error);
    }
  }

  /**
   * Finish the stream; an incomplete sequence still held back is an error
   */
  end(): string {
    try {
      return this.decoder.decode();
    } catch (error) {
      this.decoder = createDecoder();
      throw new EncodingError('Stream ended inside a UTF-8 sequence', error);
    }
  }
}

/**
 * Decode a complete buffer
 * @throws EncodingError if the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return createDecoder().decode(bytes);
  } catch (error) {
    throw new EncodingError('Output is not valid UTF-8', error);
  }
}

function createDecoder(): TextDecoder {
  return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
}
