/**
 * Big-endian primitive writer over a ByteSink
 */

import { toWriteError } from './errors.js';
import type { ByteSink } from './sink.js';
import type { WriteTo } from './write-to.js';

const MAX_U64 = (1n << 64n) - 1n;

function assertUint(value: number, bits: 8 | 16 | 32): void {
  if (!Number.isInteger(value) || value < 0 || value > 2 ** bits - 1) {
    throw new RangeError(`Value ${value} is not a u${bits}`);
  }
}

export class ByteWriter {
  private written = 0;

  constructor(private readonly sink: ByteSink) {}

  /**
   * Bytes accepted by the sink through this writer, nested values included
   */
  get bytesWritten(): number {
    return this.written;
  }

  u8(value: number): this {
    assertUint(value, 8);
    return this.emit(Uint8Array.of(value));
  }

  u16(value: number): this {
    assertUint(value, 16);
    const chunk = new Uint8Array(2);
    new DataView(chunk.buffer).setUint16(0, value);
    return this.emit(chunk);
  }

  u32(value: number): this {
    assertUint(value, 32);
    const chunk = new Uint8Array(4);
    new DataView(chunk.buffer).setUint32(0, value);
    return this.emit(chunk);
  }

  u64(value: bigint): this {
    if (value < 0n || value > MAX_U64) {
      throw new RangeError(`Value ${value} is not a u64`);
    }
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigUint64(0, value);
    return this.emit(chunk);
  }

  bytes(value: Uint8Array): this {
    return value.length === 0 ? this : this.emit(value);
  }

  /**
   * u8 length followed by the bytes
   */
  bytes8(value: Uint8Array): this {
    if (value.length > 0xff) {
      throw new RangeError(`${value.length} bytes do not fit a u8 length prefix`);
    }
    return this.u8(value.length).bytes(value);
  }

  /**
   * u16 length followed by the bytes
   */
  bytes16(value: Uint8Array): this {
    if (value.length > 0xffff) {
      throw new RangeError(`${value.length} bytes do not fit a u16 length prefix`);
    }
    return this.u16(value.length).bytes(value);
  }

  /**
   * Serialize a nested value straight into the underlying sink
   */
  nested(value: WriteTo): this {
    this.written += value.writeTo(this.sink);
    return this;
  }

  private emit(chunk: Uint8Array): this {
    try {
      this.sink.write(chunk);
    } catch (cause) {
      throw toWriteError(cause);
    }
    this.written += chunk.length;
    return this;
  }
}
