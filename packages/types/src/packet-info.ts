/**
 * Packet metadata envelope
 *
 * One PacketInfo describes one RPC unit: who sends it, who receives it, which
 * command it carries and where it sits in its stream. It is a plain value:
 * `build` performs no validation, and field ranges are checked only when the
 * header is serialized.
 *
 * Header layout (big-endian):
 *
 * | field | type |
 * | --- | --- |
 * | version | u8 |
 * | presence bits (length, source DN, destination DN) | u8 |
 * | flags | u8 |
 * | command | u32 |
 * | sequence | u64 |
 * | link id | u32 |
 * | stream id | u32 |
 * | source address, source DN? | Address, DistinguishedName |
 * | destination address, destination DN? | Address, DistinguishedName |
 * | payload length? | u32 |
 */

import { LINK_ID, NODE_TO_NODE_STREAM_ID, ProtocolError, WIRE_VERSION } from '@zpr/kernel';
import { ByteWriter, decodeExact, type ByteReader, type ByteSink, type WriteTo } from '@zpr/wire';
import { Address } from './address.js';
import { DistinguishedName } from './dn.js';
import { UnsupportedVersionError } from './errors.js';
import { RpcCommand } from './rpc-command.js';

export interface Endpoint {
  readonly address: Address;
  readonly dn?: DistinguishedName;
}

export interface PacketAux {
  /** Abstract message sequence number */
  sequence?: bigint;
  flags?: number;
  linkId?: number;
  streamId?: number;
}

const PRESENCE = {
  length: 0x01,
  sourceDn: 0x02,
  destinationDn: 0x04,
} as const;

const KNOWN_PRESENCE_BITS = PRESENCE.length | PRESENCE.sourceDn | PRESENCE.destinationDn;

function endpointEquals(a: Endpoint, b: Endpoint): boolean {
  if (!a.address.equals(b.address)) {
    return false;
  }
  if (a.dn === undefined || b.dn === undefined) {
    return a.dn === b.dn;
  }
  return a.dn.equals(b.dn);
}

function writeEndpoint(writer: ByteWriter, endpoint: Endpoint): void {
  writer.nested(endpoint.address);
  if (endpoint.dn) {
    writer.nested(endpoint.dn);
  }
}

function readEndpoint(reader: ByteReader, hasDn: boolean): Endpoint {
  const address = Address.readFrom(reader);
  return hasDn ? { address, dn: DistinguishedName.readFrom(reader) } : { address };
}

export class PacketInfo implements WriteTo {
  private constructor(
    readonly source: Endpoint,
    readonly destination: Endpoint,
    readonly command: RpcCommand,
    readonly sequence: bigint,
    readonly flags: number,
    readonly linkId: number,
    readonly streamId: number,
    /** Declared payload length, if set */
    readonly length: number | undefined
  ) {}

  static build(
    source: Endpoint,
    destination: Endpoint,
    command: RpcCommand,
    aux: PacketAux = {}
  ): PacketInfo {
    return new PacketInfo(
      Object.freeze({ ...source }),
      Object.freeze({ ...destination }),
      command,
      aux.sequence ?? 0n,
      aux.flags ?? 0,
      aux.linkId ?? LINK_ID.unknown,
      aux.streamId ?? NODE_TO_NODE_STREAM_ID,
      undefined
    );
  }

  /**
   * Copy declaring the payload length
   *
   * Callers must pass the true serialized length of the payload that travels
   * with this header; consumers reject packets where the two differ.
   */
  withLength(payloadLength: number): PacketInfo {
    return new PacketInfo(
      this.source,
      this.destination,
      this.command,
      this.sequence,
      this.flags,
      this.linkId,
      this.streamId,
      payloadLength
    );
  }

  /**
   * Decode a header; left inverse of writeTo
   *
   * @throws UnsupportedVersionError for other wire versions
   */
  static readFrom(reader: ByteReader): PacketInfo {
    const version = reader.u8();
    if (version !== WIRE_VERSION) {
      throw new UnsupportedVersionError(version);
    }
    const presence = reader.u8();
    if ((presence & ~KNOWN_PRESENCE_BITS) !== 0) {
      throw new ProtocolError(
        'E_UNSUPPORTED_VERSION',
        `Unknown header presence bits 0x${presence.toString(16).padStart(2, '0')}`
      );
    }
    const flags = reader.u8();
    const command = RpcCommand.readFrom(reader);
    const sequence = reader.u64();
    const linkId = reader.u32();
    const streamId = reader.u32();
    const source = readEndpoint(reader, (presence & PRESENCE.sourceDn) !== 0);
    const destination = readEndpoint(reader, (presence & PRESENCE.destinationDn) !== 0);
    const length = (presence & PRESENCE.length) !== 0 ? reader.u32() : undefined;
    return new PacketInfo(
      Object.freeze(source),
      Object.freeze(destination),
      command,
      sequence,
      flags,
      linkId,
      streamId,
      length
    );
  }

  static fromBytes(bytes: Uint8Array): PacketInfo {
    return decodeExact(bytes, PacketInfo.readFrom);
  }

  writeTo(sink: ByteSink): number {
    let presence = 0;
    if (this.length !== undefined) presence |= PRESENCE.length;
    if (this.source.dn) presence |= PRESENCE.sourceDn;
    if (this.destination.dn) presence |= PRESENCE.destinationDn;

    const writer = new ByteWriter(sink)
      .u8(WIRE_VERSION)
      .u8(presence)
      .u8(this.flags)
      .nested(this.command)
      .u64(this.sequence)
      .u32(this.linkId)
      .u32(this.streamId);
    writeEndpoint(writer, this.source);
    writeEndpoint(writer, this.destination);
    if (this.length !== undefined) {
      writer.u32(this.length);
    }
    return writer.bytesWritten;
  }

  equals(other: PacketInfo): boolean {
    return (
      endpointEquals(this.source, other.source) &&
      endpointEquals(this.destination, other.destination) &&
      RpcCommand.equals(this.command, other.command) &&
      this.sequence === other.sequence &&
      this.flags === other.flags &&
      this.linkId === other.linkId &&
      this.streamId === other.streamId &&
      this.length === other.length
    );
  }

  toString(): string {
    return `${this.command} #${this.sequence} ${this.source.address} -> ${this.destination.address}`;
  }
}
