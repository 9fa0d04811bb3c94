/**
 * Byte sinks
 *
 * A sink is supplied by the caller and receives serialized bytes in order.
 * A sink signals failure by throwing; writers surface that as WriteError.
 */

import type { Writable } from 'node:stream';

export interface ByteSink {
  write(chunk: Uint8Array): void;
}

const INITIAL_CAPACITY = 64;

/**
 * Growable in-memory sink
 */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array;
  private used = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.used;
  }

  write(chunk: Uint8Array): void {
    this.reserve(chunk.length);
    this.buffer.set(chunk, this.used);
    this.used += chunk.length;
  }

  /**
   * Copy of everything written so far
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.used);
  }

  reset(): void {
    this.used = 0;
  }

  private reserve(extra: number): void {
    const needed = this.used + extra;
    if (needed <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length * 2;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.used));
    this.buffer = grown;
  }
}

/**
 * Fixed-capacity sink over a caller-owned buffer
 *
 * A write that does not fit is rejected whole; nothing of it is copied.
 */
export class FixedSink implements ByteSink {
  private used = 0;

  constructor(private readonly target: Uint8Array) {}

  get length(): number {
    return this.used;
  }

  get remaining(): number {
    return this.target.length - this.used;
  }

  write(chunk: Uint8Array): void {
    if (chunk.length > this.remaining) {
      throw new RangeError(`Sink full: ${chunk.length} bytes offered, ${this.remaining} free`);
    }
    this.target.set(chunk, this.used);
    this.used += chunk.length;
  }

  /**
   * View of the filled part of the target buffer
   */
  filled(): Uint8Array {
    return this.target.subarray(0, this.used);
  }
}

/**
 * Sink forwarding to a Node.js writable stream
 *
 * Backpressure is left to the caller: chunks are handed to `write()` and
 * buffered by the stream. Writing to a destroyed or ended stream fails.
 */
export class StreamSink implements ByteSink {
  constructor(private readonly stream: Writable) {}

  write(chunk: Uint8Array): void {
    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new Error('Stream is closed');
    }
    this.stream.write(chunk);
  }
}
