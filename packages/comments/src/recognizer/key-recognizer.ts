import type { KeyData } from '@yamlnote/types';

/**
 * Marker that starts a YAML comment
 */
export const COMMENT_MARKER = '#';

/**
 * Separates a mapping key from its value
 */
export const KEY_TERMINATOR = ':';

const CONTROL_CHAR = /^\p{Cc}$/u;
const WHITESPACE = /^\s$/u;

/**
 * Characters skipped before a key starts: block sequence entries (`- key:`)
 * and explicit keys (`? key:`)
 */
const LEADING_MARKERS = new Set(['-', '?']);

/**
 * Recognize the mapping key opened by one line of emitted YAML.
 *
 * This is a lexical scan, not a parser: indentation, `-` and `?` markers are
 * skipped until the key starts, and the first `:` ends it. Lines that are
 * comments, start with a colon or contain no colon yield `undefined`.
 *
 * Quoted keys that contain `:` or `#` are not handled.
 *
 * @example
 * recognizeKey('  - name: John'); // { text: 'name', column: 4 }
 * recognizeKey('# name: John');   // undefined
 */
export function recognizeKey(line: string): KeyData | undefined {
  let start: number | undefined;
  let end: number | undefined;
  let index = 0;

  for (const char of line) {
    const at = index;
    index += char.length;

    if (CONTROL_CHAR.test(char)) {
      continue;
    }

    // The key is not bounded yet, so this line is a comment
    if (char === COMMENT_MARKER) {
      return undefined;
    }

    if (start === undefined && (LEADING_MARKERS.has(char) || WHITESPACE.test(char))) {
      continue;
    }

    if (char === KEY_TERMINATOR) {
      if (start === undefined) {
        return undefined;
      }
      end = at;
      break;
    }

    if (start === undefined) {
      start = at;
    }
  }

  if (start === undefined || end === undefined) {
    return undefined;
  }

  return {
    text: line.slice(start, end),
    column: Buffer.byteLength(line.slice(0, start), 'utf8'),
  };
}
