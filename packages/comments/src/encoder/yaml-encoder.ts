import type { AnnotateOptionsSchema } from '@yamlnote/utils';
import { stringify } from 'yaml';

import { FormatError, errorMessage } from '../errors.js';

/**
 * Turns a value into a stream of YAML text chunks.
 *
 * Any encoder works with the comment filter as long as it writes block-style
 * mappings, one key per line, with consistent indentation.
 */
export interface Encoder {
  encode(value: unknown, write: (chunk: string) => void): void;
}

/**
 * Encoder backed by the `yaml` package
 */
export function createYamlEncoder(options: AnnotateOptionsSchema): Encoder {
  return {
    encode(value, write) {
      if (value === undefined) {
        throw new FormatError('Cannot encode undefined as a YAML document');
      }

      let text: string;
      try {
        text = stringify(value, { indent: options.indent, lineWidth: options.lineWidth });
      } catch (error) {
        throw new FormatError(`Failed to encode value as YAML: ${errorMessage(error)}`, error);
      }

      write(text);
    },
  };
}
