/**
 * Comment injection type exports
 *
 * Types shared by the key recognizer, the comment filter and the callers
 * that decide which keys get a comment.
 */

/**
 * A mapping key found on one line of emitted YAML
 */
export interface KeyData {
  /** Key name without indentation, sequence/explicit-key markers or the colon */
  text: string;
  /** Zero-based UTF-8 byte offset of the key name; injected comments are indented by this many spaces */
  column: number;
}

/**
 * Chooses the comment for a recognized key.
 *
 * The returned text may span several lines separated by `\n`. A nullish
 * result means the key gets no comment.
 */
export type CommentResolver = (key: KeyData) => string | null | undefined;
