export * from './huff-types.js';
export * from './bit-stream.js';
export * from './weight-queue.js';
export * from './frequency-counter.js';
export * from './huff-tree.js';
export * from './code-table.js';
export * from './header-codec.js';
export * from './stream-encoder.js';
export * from './stream-decoder.js';
export * from './huff-processor.js';
export * from './file-codec.js';

