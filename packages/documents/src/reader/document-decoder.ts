import { FormatError, errorMessage } from '@yamlnote/comments';
import type { Logger } from '@yamlnote/types';
import { parseDocument } from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Schema checking decoded documents
 */
export type DocumentSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Result of decoding one document; `undefined` for an empty one
 */
export type Decoded = { value: unknown } | undefined;

/**
 * Parses documents one at a time and numbers them in file order.
 * Empty documents (no content, e.g. a lone `---`) are skipped and not counted.
 */
export class DocumentDecoder {
  private count = 0;

  constructor(
    private readonly logger: Logger,
    private readonly schema?: DocumentSchema<unknown>,
  ) {}

  get decoded(): number {
    return this.count;
  }

  /**
   * @throws FormatError if the text is not valid YAML or fails the schema
   */
  decode(text: string): Decoded {
    const document = parseDocument(text);
    if (document.contents === null && document.errors.length === 0) {
      this.logger.debug('skipped empty document');
      return undefined;
    }

    const index = ++this.count;
    const [error] = document.errors;
    if (error) {
      throw new FormatError(`Document ${index} is not valid YAML: ${error.message}`, error);
    }

    let value: unknown;
    try {
      value = document.toJS();
    } catch (cause) {
      throw new FormatError(`Document ${index} is not valid YAML: ${errorMessage(cause)}`, cause);
    }

    if (this.schema) {
      const result = this.schema.safeParse(value);
      if (!result.success) {
        const issues = result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        );
        throw new FormatError(
          `Document ${index} does not match the expected shape: ${issues.join('; ')}`,
          result.error,
        );
      }
      value = result.data;
    }

    this.logger.debug(`decoded document ${index}`);
    return { value };
  }
}
