/**
 * The WriteTo contract
 *
 * Implemented by every wire type. `writeTo` serializes the value into a
 * caller-supplied sink and returns the number of bytes written. Output is
 * deterministic: the same logical value always yields the same bytes.
 * Sink failures surface as WriteError with the sink's error as `cause`.
 */

import { ByteReader } from './byte-reader.js';
import { sha256Hex } from './hash.js';
import { BufferSink, type ByteSink } from './sink.js';

export interface WriteTo {
  writeTo(sink: ByteSink): number;
}

/**
 * Serialize a value into a fresh byte array
 */
export function toBytes(value: WriteTo): Uint8Array {
  const sink = new BufferSink();
  value.writeTo(sink);
  return sink.toBytes();
}

/**
 * Decode a value that must span the whole input
 *
 * @throws TruncatedError if the input ends early
 * @throws TrailingBytesError if input remains after the value
 */
export function decodeExact<T>(input: Uint8Array, read: (reader: ByteReader) => T): T {
  const reader = new ByteReader(input);
  const value = read(reader);
  reader.expectEnd();
  return value;
}

/**
 * SHA-256 of a value's canonical bytes, as lowercase hex
 */
export function canonicalDigest(value: WriteTo): string {
  return sha256Hex(toBytes(value));
}
