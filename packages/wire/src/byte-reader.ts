/**
 * Big-endian primitive reader, the decoding counterpart of ByteWriter
 */

import { TrailingBytesError, TruncatedError } from './errors.js';

export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly input: Uint8Array) {
    this.view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.input.length - this.offset;
  }

  u8(): number {
    this.need(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    this.need(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.need(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    this.need(8);
    const value = this.view.getBigUint64(this.offset);
    this.offset += 8;
    return value;
  }

  /**
   * Copy of the next `length` bytes
   */
  bytes(length: number): Uint8Array {
    this.need(length);
    const value = this.input.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  bytes8(): Uint8Array {
    return this.bytes(this.u8());
  }

  bytes16(): Uint8Array {
    return this.bytes(this.u16());
  }

  /**
   * Copy of everything not yet read
   */
  rest(): Uint8Array {
    return this.bytes(this.remaining);
  }

  /**
   * @throws TrailingBytesError if input remains
   */
  expectEnd(): void {
    if (this.remaining > 0) {
      throw new TrailingBytesError(this.remaining);
    }
  }

  private need(length: number): void {
    if (length > this.remaining) {
      throw new TruncatedError(length, this.remaining);
    }
  }
}
