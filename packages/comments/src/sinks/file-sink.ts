import * as fs from 'node:fs';

import type { ByteSink } from '@yamlnote/types';

/**
 * Options for FileSink
 */
export interface FileSinkOptions {
  /** fsync the descriptor on flush (default: false) */
  sync?: boolean;
}

/**
 * Sink writing synchronously to an open file descriptor.
 *
 * The descriptor is owned by the caller; FileSink never closes it.
 * Errors from the file system are thrown unchanged.
 */
export class FileSink implements ByteSink {
  constructor(
    private readonly fd: number,
    private readonly options: FileSinkOptions = {},
  ) {}

  write(chunk: Uint8Array): number {
    let offset = 0;
    while (offset < chunk.byteLength) {
      offset += fs.writeSync(this.fd, chunk, offset, chunk.byteLength - offset);
    }
    return chunk.byteLength;
  }

  flush(): void {
    if (this.options.sync) {
      fs.fsyncSync(this.fd);
    }
  }
}
