import { describe, it, expect } from 'vitest';

import { recognizeKey } from '../index.js';

describe('Key Recognizer', () => {
  describe('keys', () => {
    it('returns undefined for a line without a colon', () => {
      expect(recognizeKey('foo')).toBeUndefined();
    });

    it('recognizes a top-level key', () => {
      expect(recognizeKey('foo:')).toEqual({ text: 'foo', column: 0 });
    });

    it('uses the indentation as column', () => {
      expect(recognizeKey('  foo:')).toEqual({ text: 'foo', column: 2 });
    });

    it('keeps whitespace inside the key', () => {
      expect(recognizeKey('  foo bar:')).toEqual({ text: 'foo bar', column: 2 });
    });

    it('skips block sequence markers', () => {
      expect(recognizeKey('- foo bar:')).toEqual({ text: 'foo bar', column: 2 });
      expect(recognizeKey('  - - name: Ann')).toEqual({ text: 'name', column: 6 });
    });

    it('skips explicit key markers', () => {
      expect(recognizeKey('? foo bar:')).toEqual({ text: 'foo bar', column: 2 });
    });

    it('keeps dashes inside the key', () => {
      expect(recognizeKey('kebab-case: 1')).toEqual({ text: 'kebab-case', column: 0 });
    });

    it('ends the key at the first colon', () => {
      expect(recognizeKey('url: http://example.com')).toEqual({ text: 'url', column: 0 });
      expect(recognizeKey('time: 12:30')).toEqual({ text: 'time', column: 0 });
    });

    it('ignores a trailing comment after the key', () => {
      expect(recognizeKey('note: value # trailing')).toEqual({ text: 'note', column: 0 });
    });

    it('ignores the line terminator', () => {
      expect(recognizeKey('name: John\n')).toEqual({ text: 'name', column: 0 });
      expect(recognizeKey('name: John\r\n')).toEqual({ text: 'name', column: 0 });
    });

    it('keeps spaces before the colon', () => {
      expect(recognizeKey('foo :')).toEqual({ text: 'foo ', column: 0 });
    });

    it('does not strip quotes from quoted keys', () => {
      expect(recognizeKey('"quoted": x')).toEqual({ text: '"quoted"', column: 0 });
    });

    it('measures the column in UTF-8 bytes', () => {
      expect(recognizeKey('clé: x')).toEqual({ text: 'clé', column: 0 });
      expect(recognizeKey('　key: x')).toEqual({ text: 'key', column: 3 });
    });
  });

  describe('non-keys', () => {
    it('rejects comment lines', () => {
      expect(recognizeKey('# foo: bar')).toBeUndefined();
      expect(recognizeKey('  # foo: bar')).toBeUndefined();
      expect(recognizeKey('\t# foo:')).toBeUndefined();
    });

    it('rejects a comment marker inside the key', () => {
      expect(recognizeKey('key#1: x')).toBeUndefined();
    });

    it('rejects a line starting with a colon', () => {
      expect(recognizeKey(': value')).toBeUndefined();
      expect(recognizeKey('  - : x')).toBeUndefined();
    });

    it('rejects blank lines', () => {
      expect(recognizeKey('')).toBeUndefined();
      expect(recognizeKey('   \n')).toBeUndefined();
      expect(recognizeKey('\r\n')).toBeUndefined();
    });

    it('rejects document markers and scalar sequence entries', () => {
      expect(recognizeKey('---')).toBeUndefined();
      expect(recognizeKey('  - item')).toBeUndefined();
    });
  });

  describe('properties', () => {
    const indents = ['', '  ', '    '];
    const markers = ['', '- ', '? ', '- - '];
    const keys = ['name', 'foo bar', 'x', 'snake_case', 'kebab-case'];
    const suffixes = ['', ' value', ' a: b # c', '\n'];

    it('finds the key behind any indentation and markers', () => {
      for (const indent of indents) {
        for (const marker of markers) {
          for (const key of keys) {
            for (const suffix of suffixes) {
              const line = `${indent}${marker}${key}:${suffix}`;
              expect(recognizeKey(line), line).toEqual({
                text: key,
                column: indent.length + marker.length,
              });
            }
          }
        }
      }
    });

    it('never recognizes a line that starts with a comment marker', () => {
      for (const line of ['#', '# a: b', '\u0007# a: b', '#a:', '\u0000\u001f#key: value']) {
        expect(recognizeKey(line), JSON.stringify(line)).toBeUndefined();
      }
    });

    it('never recognizes a line without a colon', () => {
      for (const line of ['name', '  - name value', '? explicit', 'a # b', ' ']) {
        expect(recognizeKey(line), line).toBeUndefined();
      }
    });
  });
});
