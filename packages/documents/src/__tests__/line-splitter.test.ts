import { describe, it, expect } from 'vitest';

import { LineSplitter, splitLines } from '../reader/line-splitter.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array | undefined): string | undefined =>
  bytes === undefined ? undefined : new TextDecoder().decode(bytes);

describe('splitLines', () => {
  it('breaks on CRLF, lone CR and LF', () => {
    expect(splitLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('does not open a line after a final break', () => {
    expect(splitLines('a\r')).toEqual(['a']);
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });

  it('returns no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('LineSplitter', () => {
  it('splits with the same rule as splitLines', () => {
    const splitter = new LineSplitter();

    const lines = splitter.push(encode('a\r\nb\rc\nd')).map(decode);

    expect(lines).toEqual(['a', 'b', 'c']);
    expect(decode(splitter.end())).toBe('d');
  });

  it('treats a CRLF pair split across chunks as one break', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(encode('a\r')).map(decode)).toEqual(['a']);
    expect(splitter.push(encode('\nb')).map(decode)).toEqual([]);
    expect(decode(splitter.end())).toBe('b');
  });

  it('joins a line spread over several chunks', () => {
    const splitter = new LineSplitter();

    splitter.push(encode('ti'));
    splitter.push(encode('tle: '));

    expect(splitter.push(encode('x\n')).map(decode)).toEqual(['title: x']);
    expect(splitter.end()).toBeUndefined();
  });

  it('keeps empty lines', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(encode('a\n\nb\n')).map(decode)).toEqual(['a', '', 'b']);
  });

  it('copies partial lines so the caller may reuse its buffer', () => {
    const splitter = new LineSplitter();
    const chunk = encode('ab');

    splitter.push(chunk);
    chunk[0] = 0x7a;

    expect(decode(splitter.end())).toBe('ab');
  });

  it('leaves bytes undecoded', () => {
    const splitter = new LineSplitter();

    const [line] = splitter.push(Uint8Array.of(0x61, 0xff, 0x0a));

    expect(Array.from(line ?? [])).toEqual([0x61, 0xff]);
  });
});
