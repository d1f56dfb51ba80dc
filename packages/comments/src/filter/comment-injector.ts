import type { CommentResolver, Logger } from '@yamlnote/types';
import { noopLogger } from '@yamlnote/utils';

import { COMMENT_MARKER, recognizeKey } from '../recognizer/key-recognizer.js';

/**
 * Receives text that is ready to be forwarded
 */
export type EmitFn = (text: string) => void;

/**
 * Split a comment into its lines.
 *
 * `\r\n` counts as a line break and a trailing newline does not add an empty
 * line, so `'a\n'` and `'a'` render the same.
 */
export function splitCommentLines(comment: string): string[] {
  if (comment === '') {
    return [];
  }
  const lines = comment.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (comment.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

/**
 * Render a comment as YAML comment lines indented to `column`.
 * Empty comment lines become indentation-only lines.
 */
export function renderCommentLines(comment: string, column: number): string[] {
  const spacer = ' '.repeat(column);
  return splitCommentLines(comment).map((line) =>
    line === '' ? `${spacer}\n` : `${spacer}${COMMENT_MARKER} ${line}\n`,
  );
}

/**
 * Line-level core of comment injection.
 *
 * Text is buffered until a newline completes a line. Each complete line is
 * checked for a mapping key; when the resolver returns a comment for it, the
 * comment lines are emitted first, then the line itself is emitted unchanged.
 */
export class CommentInjector {
  private buffer = '';

  constructor(
    private readonly resolver: CommentResolver,
    private readonly emit: EmitFn,
    private readonly logger: Logger = noopLogger,
  ) {}

  /**
   * Text held back until its line is complete
   */
  get pending(): string {
    return this.buffer;
  }

  /**
   * Buffer text, flushing every line it completes
   */
  push(text: string): void {
    let lineStart = 0;
    let newline = text.indexOf('\n', lineStart);

    while (newline !== -1) {
      this.buffer += text.slice(lineStart, newline + 1);
      this.flushLine();
      lineStart = newline + 1;
      newline = text.indexOf('\n', lineStart);
    }

    this.buffer += text.slice(lineStart);
  }

  /**
   * Emit comments for the buffered line, then the line itself
   */
  flushLine(): void {
    if (this.buffer === '') {
      return;
    }

    // The buffer is empty before anything is emitted
    const line = this.buffer;
    this.buffer = '';

    const key = recognizeKey(line);
    if (key) {
      this.logger.debug(`key "${key.text}" at column ${key.column}`);
      const comment = this.resolver(key);
      if (comment !== null && comment !== undefined) {
        for (const commentLine of renderCommentLines(comment, key.column)) {
          this.emit(commentLine);
        }
      }
    }

    this.emit(line);
  }
}
