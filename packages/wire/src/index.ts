/**
 * ZPR Wire Package
 *
 * The WriteTo serialization contract, byte sinks, big-endian readers and
 * writers, and digests over canonical bytes.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './sink.js';
export * from './byte-writer.js';
export * from './byte-reader.js';
export * from './write-to.js';
export * from './stream.js';
export * from './hash.js';
export * from './hex.js';
