/**
 * Packet framing: a PacketInfo header immediately followed by its payload
 */

import { createLogger, loadConfig, type Logger } from '@zpr/kernel';
import { ByteReader, ByteWriter, type ByteSink } from '@zpr/wire';
import { LengthMismatchError, PayloadTooLargeError } from './errors.js';
import { PacketInfo } from './packet-info.js';

export interface Packet {
  readonly info: PacketInfo;
  readonly payload: Uint8Array;
}

export interface ReadPacketOptions {
  /** Defaults to `loadConfig().maxPayloadBytes` */
  maxPayloadBytes?: number;
  logger?: Logger;
}

/**
 * Check a header's declared length against the payload carried with it
 *
 * Headers without a declared length pass.
 *
 * @throws LengthMismatchError
 */
export function verifyPayloadLength(info: PacketInfo, payload: Uint8Array): void {
  if (info.length !== undefined && info.length !== payload.length) {
    throw new LengthMismatchError(info.length, payload.length);
  }
}

/**
 * Write header then payload
 *
 * A header without a declared length is stamped with the payload's length.
 *
 * @throws LengthMismatchError if the declared length differs from the payload
 * @throws WriteError if the sink fails
 */
export function writePacket(sink: ByteSink, info: PacketInfo, payload: Uint8Array): number {
  verifyPayloadLength(info, payload);
  const header = info.length === undefined ? info.withLength(payload.length) : info;
  return new ByteWriter(sink).nested(header).bytes(payload).bytesWritten;
}

/**
 * Decode a frame into header and payload
 *
 * The declared length is verified before the payload is handed out.
 * Rejections are logged at warn and thrown to the caller, which drops the
 * packet.
 *
 * @throws LengthMismatchError, PayloadTooLargeError, or a decode error from the header
 */
export function readPacket(frame: Uint8Array, options: ReadPacketOptions = {}): Packet {
  const log = options.logger ?? createLogger('packet');
  const maxPayloadBytes = options.maxPayloadBytes ?? loadConfig().maxPayloadBytes;

  const reader = new ByteReader(frame);
  const info = PacketInfo.readFrom(reader);
  const carried = reader.remaining;

  if (info.length !== undefined && info.length !== carried) {
    log.warn({ declared: info.length, actual: carried, command: info.command.code }, 'packet rejected: length mismatch');
    throw new LengthMismatchError(info.length, carried);
  }
  if (carried > maxPayloadBytes) {
    log.warn({ size: carried, limit: maxPayloadBytes, command: info.command.code }, 'packet rejected: payload too large');
    throw new PayloadTooLargeError(carried, maxPayloadBytes);
  }

  return { info, payload: reader.rest() };
}
