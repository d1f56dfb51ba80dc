/**
 * Stream helpers for tests
 */

import { Readable, type Transform } from 'node:stream';

/**
 * Feed chunks through a transform and collect its output as a string
 */
export async function runThrough(transform: Transform, chunks: Array<string | Uint8Array>): Promise<string> {
  const parts: Buffer[] = [];
  const source = Readable.from(chunks, { objectMode: false });

  const piped = source.pipe(transform);
  for await (const part of piped) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)));
  }
  return Buffer.concat(parts).toString('utf-8');
}
