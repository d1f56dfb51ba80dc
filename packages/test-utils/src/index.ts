/**
 * @yamlnote/test-utils
 *
 * Shared test utilities for yamlnote testing infrastructure
 */

// Mock sinks
export {
  createRecordingSink,
  createFailingSink,
  createStalledSink,
  type RecordingSink,
  type RecordingSinkConfig,
  type FailingSinkConfig,
} from './sinks/mock-sinks.js';

// Temporary files
export { createTempDir, type TempDir } from './tmp/temp-files.js';

// Streams
export { runThrough } from './streams.js';
