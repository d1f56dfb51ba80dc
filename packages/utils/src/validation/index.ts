/**
 * Zod validation schemas for annotation options
 */

import type { Logger } from '@yamlnote/types';
import { z } from 'zod';

import { noopLogger } from '../logging/index.js';

/**
 * Spaces per nesting level (1-8)
 */
const indentSchema = z.number().int().min(1).max(8);

/**
 * Folding width for long scalars; 0 disables folding
 */
const lineWidthSchema = z
  .number()
  .int()
  .refine((width) => width === 0 || width >= 20, {
    message: 'lineWidth must be 0 or at least 20',
  });

/**
 * Annotation options schema
 */
export const annotateOptionsSchema = z.object({
  indent: indentSchema,
  lineWidth: lineWidthSchema,
});

/**
 * Partial annotation options schema (caller input)
 */
export const partialAnnotateOptionsSchema = annotateOptionsSchema.partial();

export type AnnotateOptionsSchema = z.infer<typeof annotateOptionsSchema>;

/**
 * Options accepted by the serialization entry points
 */
export interface AnnotateOptions {
  /** Spaces per nesting level of the emitted YAML (default: 2) */
  indent?: number;
  /** Maximum line width before long scalars are folded, 0 to disable (default: 80) */
  lineWidth?: number;
  logger?: Logger;
}

/**
 * Options after defaults have been applied
 */
export interface ResolvedAnnotateOptions extends AnnotateOptionsSchema {
  logger: Logger;
}

/**
 * Default annotation options
 */
export const DEFAULT_ANNOTATE_OPTIONS: AnnotateOptionsSchema = {
  indent: 2,
  lineWidth: 80,
};

/**
 * Options validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate caller-supplied annotation options
 * @throws ConfigValidationError if validation fails
 */
export function validateAnnotateOptions(options: unknown): void {
  const result = partialAnnotateOptionsSchema.safeParse(options);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigValidationError(errors);
  }
}

/**
 * Validate options and fill in defaults
 * @throws ConfigValidationError if validation fails
 */
export function resolveAnnotateOptions(options: AnnotateOptions = {}): ResolvedAnnotateOptions {
  const { indent, lineWidth, logger } = options;
  validateAnnotateOptions({ indent, lineWidth });

  return {
    indent: indent ?? DEFAULT_ANNOTATE_OPTIONS.indent,
    lineWidth: lineWidth ?? DEFAULT_ANNOTATE_OPTIONS.lineWidth,
    logger: logger ?? noopLogger,
  };
}
