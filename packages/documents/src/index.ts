/**
 * @yamlnote/documents - Multi-document YAML files
 *
 * This package handles:
 * - Appending values as new documents, with optional key comments
 * - Reading documents back lazily, optionally checked against a zod schema
 */

export { appendOrNew, APPEND_SEPARATOR } from './append/append-document.js';
export type { AppendOptions } from './append/append-document.js';

export { DocumentSplitter, DOCUMENT_SEPARATOR } from './reader/document-splitter.js';
export { DocumentDecoder } from './reader/document-decoder.js';
export type { DocumentSchema, Decoded } from './reader/document-decoder.js';
export { lazyDocs, readDocs, parseDocuments } from './reader/lazy-docs.js';
export type { ReadDocsOptions, TypedReadDocsOptions } from './reader/lazy-docs.js';
