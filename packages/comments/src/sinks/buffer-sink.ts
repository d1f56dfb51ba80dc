import type { ByteSink } from '@yamlnote/types';

/**
 * In-memory sink that keeps everything written to it
 */
export class BufferSink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private length = 0;

  write(chunk: Uint8Array): number {
    // Copy: writers may reuse their buffers
    this.chunks.push(chunk.slice());
    this.length += chunk.byteLength;
    return chunk.byteLength;
  }

  flush(): void {}

  get byteLength(): number {
    return this.length;
  }

  /**
   * All bytes written so far, as one buffer
   */
  toUint8Array(): Uint8Array {
    return Buffer.concat(this.chunks, this.length);
  }

  clear(): void {
    this.chunks = [];
    this.length = 0;
  }
}
