/**
 * @yamlnote/types - Shared type definitions for yamlnote
 *
 * This package provides a stable import location for types used across
 * multiple packages.
 *
 * Usage:
 *   import type { KeyData, CommentResolver } from '@yamlnote/types';
 */

export type { KeyData, CommentResolver } from './comments/index.js';

export type { ByteSink, Logger } from './io/index.js';
