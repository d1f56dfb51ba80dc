/**
 * Line-fed splitting of multi-document YAML text
 */

/**
 * Lines starting with this marker separate documents
 */
export const DOCUMENT_SEPARATOR = '---';

/**
 * Groups lines into documents.
 *
 * A separator line closes the current document when it holds any lines. With
 * nothing buffered it is kept as the start marker of the next document, so a
 * leading `---` never produces an empty document.
 */
export class DocumentSplitter {
  private lines: string[] = [];

  /**
   * Feed one line (without its line break).
   * Returns the text of the document this line completed, if any.
   */
  push(line: string): string | undefined {
    if (line.startsWith(DOCUMENT_SEPARATOR) && this.lines.length > 0) {
      return this.take();
    }
    this.lines.push(line);
    return undefined;
  }

  /**
   * Text of the last document, if lines are still buffered
   */
  end(): string | undefined {
    return this.lines.length > 0 ? this.take() : undefined;
  }

  private take(): string {
    const text = this.lines.join('\n');
    this.lines = [];
    return text;
  }
}
