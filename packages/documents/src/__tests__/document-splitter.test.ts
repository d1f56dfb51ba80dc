import { describe, it, expect } from 'vitest';

import { DocumentSplitter } from '../index.js';

function split(lines: string[]): string[] {
  const splitter = new DocumentSplitter();
  const documents: string[] = [];
  for (const line of lines) {
    const document = splitter.push(line);
    if (document !== undefined) {
      documents.push(document);
    }
  }
  const last = splitter.end();
  if (last !== undefined) {
    documents.push(last);
  }
  return documents;
}

describe('DocumentSplitter', () => {
  it('closes a document at each separator line', () => {
    expect(split(['a: 1', '---', 'b: 2'])).toEqual(['a: 1', 'b: 2']);
  });

  it('keeps a leading separator as the start marker', () => {
    expect(split(['---', 'title: Doc 1', '---', 'title: Doc 2'])).toEqual([
      '---\ntitle: Doc 1',
      'title: Doc 2',
    ]);
  });

  it('produces nothing after a trailing separator', () => {
    expect(split(['a: 1', '---'])).toEqual(['a: 1']);
  });

  it('produces nothing for no lines', () => {
    expect(split([])).toEqual([]);
  });

  it('keeps blank lines inside the document they belong to', () => {
    expect(split(['a: 1', '', '---', 'b: 2'])).toEqual(['a: 1\n', 'b: 2']);
  });

  it('treats any line starting with the marker as a separator', () => {
    expect(split(['a: 1', '--- # next', 'b: 2'])).toEqual(['a: 1', 'b: 2']);
  });

  it('returns the completed document from push', () => {
    const splitter = new DocumentSplitter();

    expect(splitter.push('a: 1')).toBeUndefined();
    expect(splitter.push('---')).toBe('a: 1');
    expect(splitter.end()).toBeUndefined();
  });
});
