/**
 * @yamlnote/utils - Shared utilities for yamlnote
 *
 * Usage:
 *   import { resolveAnnotateOptions, consoleLogger } from '@yamlnote/utils';
 */

export * from './validation/index.js';

export * from './logging/index.js';
