/**
 * Reading multi-document YAML files back
 */

import type { ReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';

import { EncodingError, decodeUtf8, toIoError } from '@yamlnote/comments';
import type { Logger } from '@yamlnote/types';
import { noopLogger, scopedLogger } from '@yamlnote/utils';

import { DocumentDecoder, type Decoded, type DocumentSchema } from './document-decoder.js';
import { DocumentSplitter } from './document-splitter.js';
import { LineSplitter, splitLines } from './line-splitter.js';

/**
 * Options for reading documents
 */
export interface ReadDocsOptions {
  logger?: Logger;
}

/**
 * Options for reading documents checked against a schema
 */
export interface TypedReadDocsOptions<T> extends ReadDocsOptions {
  schema: DocumentSchema<T>;
}

/**
 * Read the documents of a multi-document YAML file one by one.
 *
 * The file is consumed line by line; each document is parsed on its own, so a
 * broken document is reported after every earlier one has been yielded.
 * Lines are decoded as strict UTF-8.
 *
 * @example
 * for await (const run of lazyDocs('runs.yml', { schema: runSchema })) {
 *   console.log(run.startedAt);
 * }
 *
 * @throws IoError if the file cannot be opened or read
 * @throws EncodingError if a line is not valid UTF-8
 * @throws FormatError if a document is not valid YAML or fails the schema
 */
export function lazyDocs(path: string, options?: ReadDocsOptions): AsyncGenerator<unknown>;
export function lazyDocs<T>(path: string, options: TypedReadDocsOptions<T>): AsyncGenerator<T>;
export async function* lazyDocs(
  path: string,
  options: ReadDocsOptions & { schema?: DocumentSchema<unknown> } = {},
): AsyncGenerator<unknown> {
  const logger = scopedLogger(options.logger ?? noopLogger, 'documents');
  const decoder = new DocumentDecoder(logger, options.schema);
  const splitter = new DocumentSplitter();
  const lines = new LineSplitter();
  let lineNumber = 0;

  const decodeLine = (bytes: Uint8Array): string => {
    lineNumber++;
    try {
      return decodeUtf8(bytes);
    } catch (error) {
      throw new EncodingError(
        `Document ${decoder.decoded + 1} is not valid UTF-8 (line ${lineNumber})`,
        error,
      );
    }
  };
  const completeDocument = (text: string | undefined): Decoded =>
    text === undefined ? undefined : decoder.decode(text);

  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw toIoError(error, 'Failed to open document file', path);
  }

  let input: ReadStream | undefined;
  try {
    input = handle.createReadStream({ autoClose: false });
    const chunks: AsyncIterable<Uint8Array> = input;

    for await (const chunk of chunks) {
      for (const line of lines.push(chunk)) {
        const document = completeDocument(splitter.push(decodeLine(line)));
        if (document) {
          yield document.value;
        }
      }
    }

    const tail = lines.end();
    if (tail !== undefined) {
      const document = completeDocument(splitter.push(decodeLine(tail)));
      if (document) {
        yield document.value;
      }
    }

    const last = completeDocument(splitter.end());
    if (last) {
      yield last.value;
    }
    logger.debug(`read ${decoder.decoded} documents from ${path}`);
  } catch (error) {
    throw toIoError(error, 'Failed to read document file', path);
  } finally {
    input?.destroy();
    await handle.close();
  }
}

/**
 * Read every document of a multi-document YAML file
 */
export function readDocs(path: string, options?: ReadDocsOptions): Promise<unknown[]>;
export function readDocs<T>(path: string, options: TypedReadDocsOptions<T>): Promise<T[]>;
export async function readDocs(
  path: string,
  options: ReadDocsOptions & { schema?: DocumentSchema<unknown> } = {},
): Promise<unknown[]> {
  const documents: unknown[] = [];
  for await (const document of lazyDocs(path, options)) {
    documents.push(document);
  }
  return documents;
}

/**
 * Split and decode multi-document YAML held in memory
 */
export function parseDocuments(text: string, options?: ReadDocsOptions): unknown[];
export function parseDocuments<T>(text: string, options: TypedReadDocsOptions<T>): T[];
export function parseDocuments(
  text: string,
  options: ReadDocsOptions & { schema?: DocumentSchema<unknown> } = {},
): unknown[] {
  const logger = scopedLogger(options.logger ?? noopLogger, 'documents');
  const decoder = new DocumentDecoder(logger, options.schema);
  const splitter = new DocumentSplitter();
  const documents: unknown[] = [];

  for (const line of splitLines(text)) {
    const completed = splitter.push(line);
    const document = completed === undefined ? undefined : decoder.decode(completed);
    if (document) {
      documents.push(document.value);
    }
  }
  const last = splitter.end();
  const document = last === undefined ? undefined : decoder.decode(last);
  if (document) {
    documents.push(document.value);
  }
  return documents;
}
