/**
 * Line breaks for document files: `\r\n`, a lone `\r` or `\n`
 */

const LF = 0x0a;
const CR = 0x0d;

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split text into lines. A final line break does not open another line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Splits a byte stream into lines with the same rule as `splitLines`.
 *
 * Lines are returned as raw bytes so each one can be decoded strictly. CR and
 * LF never occur inside a multi-byte UTF-8 sequence, so splitting before
 * decoding is safe. A `\r\n` pair split across two chunks is one break.
 */
export class LineSplitter {
  private partial: Uint8Array[] = [];
  private afterCarriageReturn = false;

  /**
   * Feed a chunk; returns the lines it completed, without their breaks
   */
  push(chunk: Uint8Array): Uint8Array[] {
    const lines: Uint8Array[] = [];
    let start = 0;

    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i];
      if (this.afterCarriageReturn) {
        this.afterCarriageReturn = false;
        if (byte === LF) {
          start = i + 1;
          continue;
        }
      }
      if (byte === LF || byte === CR) {
        lines.push(this.take(chunk.subarray(start, i)));
        this.afterCarriageReturn = byte === CR;
        start = i + 1;
      }
    }

    if (start < chunk.length) {
      // Copy: the stream may reuse its buffer
      this.partial.push(chunk.slice(start));
    }
    return lines;
  }

  /**
   * The last line, when the input did not end with a line break
   */
  end(): Uint8Array | undefined {
    this.afterCarriageReturn = false;
    return this.partial.length > 0 ? this.take(new Uint8Array(0)) : undefined;
  }

  private take(tail: Uint8Array): Uint8Array {
    const line = Buffer.concat([...this.partial, tail]);
    this.partial = [];
    return line;
  }
}
