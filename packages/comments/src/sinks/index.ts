export { BufferSink } from './buffer-sink.js';
export { FileSink } from './file-sink.js';
export type { FileSinkOptions } from './file-sink.js';
