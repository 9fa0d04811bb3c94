import { describe, it, expect } from 'vitest';
import { pino, type Logger } from 'pino';
import { Writable } from 'node:stream';
import { BufferSink, FixedSink, TruncatedError, WriteError, toBytes } from '@zpr/wire';
import { Address } from '../src/address.js';
import { DistinguishedName } from '../src/dn.js';
import { LengthMismatchError, PayloadTooLargeError, UnsupportedVersionError } from '../src/errors.js';
import { PacketInfo } from '../src/packet-info.js';
import { readPacket, verifyPayloadLength, writePacket } from '../src/packet.js';
import { RpcCommand } from '../src/rpc-command.js';

const source = { address: Address.parse('ipv4', '10.0.0.1') };
const destination = { address: Address.parse('ipv4', '10.0.0.2') };

function echoInfo(): PacketInfo {
  return PacketInfo.build(source, destination, RpcCommand.of('echo'), { sequence: 7n });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function captureLogs(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const destinationStream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const parsed: unknown = JSON.parse(chunk.toString('utf8'));
      if (isRecord(parsed)) {
        entries.push(parsed);
      }
      callback();
    },
  });
  return { logger: pino({ level: 'debug' }, destinationStream), entries };
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a);
  out.set(b, a.length);
  return out;
}

describe('PacketInfo.build', () => {
  it('applies defaults', () => {
    const info = PacketInfo.build(source, destination, RpcCommand.of('echo'));
    expect(info.sequence).toBe(0n);
    expect(info.flags).toBe(0);
    expect(info.linkId).toBe(0);
    expect(info.streamId).toBe(0);
    expect(info.length).toBeUndefined();
  });

  it('withLength returns a copy', () => {
    const info = echoInfo();
    const sized = info.withLength(5);
    expect(sized.length).toBe(5);
    expect(info.length).toBeUndefined();
    expect(sized.equals(info)).toBe(false);
  });

  it('prints command, sequence and endpoints', () => {
    expect(echoInfo().toString()).toBe('echo #7 10.0.0.1 -> 10.0.0.2');
  });
});

describe('PacketInfo header', () => {
  it('has a fixed big-endian layout', () => {
    const bytes = toBytes(echoInfo().withLength(5));
    expect(Array.from(bytes)).toEqual([
      1, // version
      0x01, // presence: length
      0, // flags
      0, 0, 0, 3, // command
      0, 0, 0, 0, 0, 0, 0, 7, // sequence
      0, 0, 0, 0, // link id
      0, 0, 0, 0, // stream id
      4, 4, 10, 0, 0, 1, // source
      4, 4, 10, 0, 0, 2, // destination
      0, 0, 0, 5, // length
    ]);
    expect(bytes).toHaveLength(39);
  });

  it('round-trips endpoints with DNs and unknown commands', () => {
    const info = PacketInfo.build(
      { address: Address.parse('ipv6', 'fd5a:5052::10'), dn: DistinguishedName.parse('O=Acme,CN=node1') },
      { address: Address.parse('service', 'visa'), dn: DistinguishedName.root() },
      RpcCommand.fromCode(0xdead),
      { sequence: 2n ** 64n - 1n, flags: 0x80, linkId: 2, streamId: 99 }
    ).withLength(0);

    const bytes = toBytes(info);
    expect(bytes[1]).toBe(0x07);
    const decoded = PacketInfo.fromBytes(bytes);
    expect(decoded.equals(info)).toBe(true);
    expect(decoded.command.kind).toBe('unknown');
    expect(decoded.command.code).toBe(0xdead);
    expect(decoded.source.dn?.commonName).toBe('node1');
    expect(decoded.destination.dn?.isRoot()).toBe(true);
  });

  it('tells an absent DN from the root DN', () => {
    const withoutDn = PacketInfo.build(source, destination, RpcCommand.of('echo'));
    const withRoot = PacketInfo.build(
      source,
      { ...destination, dn: DistinguishedName.root() },
      RpcCommand.of('echo')
    );
    expect(withoutDn.equals(withRoot)).toBe(false);
    expect(PacketInfo.fromBytes(toBytes(withRoot)).destination.dn?.isRoot()).toBe(true);
    expect(PacketInfo.fromBytes(toBytes(withoutDn)).destination.dn).toBeUndefined();
  });

  it('rejects other wire versions', () => {
    const bytes = toBytes(echoInfo());
    bytes[0] = 2;
    expect(() => PacketInfo.fromBytes(bytes)).toThrow(UnsupportedVersionError);
    expect(() => PacketInfo.fromBytes(bytes)).toThrow('Unsupported wire version 2');
  });

  it('rejects unknown presence bits', () => {
    const bytes = toBytes(echoInfo());
    bytes[1] = 0x08;
    expect(() => PacketInfo.fromBytes(bytes)).toThrow('Unknown header presence bits 0x08');
  });

  it('rejects truncated headers', () => {
    const bytes = toBytes(echoInfo());
    expect(() => PacketInfo.fromBytes(bytes.subarray(0, 20))).toThrow(TruncatedError);
  });

  it('rejects out-of-range fields at write time', () => {
    const info = PacketInfo.build(source, destination, RpcCommand.of('echo'), { flags: 256 });
    expect(() => toBytes(info)).toThrow(RangeError);
  });
});

describe('verifyPayloadLength', () => {
  it('passes matching and undeclared lengths', () => {
    expect(() => verifyPayloadLength(echoInfo(), new Uint8Array(3))).not.toThrow();
    expect(() => verifyPayloadLength(echoInfo().withLength(3), new Uint8Array(3))).not.toThrow();
  });

  it('throws on a mismatch', () => {
    expect(() => verifyPayloadLength(echoInfo().withLength(10), new Uint8Array(8))).toThrow(
      'Declared payload length 10 does not match actual length 8'
    );
  });
});

describe('writePacket', () => {
  it('stamps the payload length and writes header then payload', () => {
    const sink = new BufferSink();
    const payload = Uint8Array.from([9, 8, 7, 6, 5]);
    const written = writePacket(sink, echoInfo(), payload);
    expect(written).toBe(44);
    const frame = sink.toBytes();
    expect(Array.from(frame.subarray(0, 39))).toEqual(Array.from(toBytes(echoInfo().withLength(5))));
    expect(Array.from(frame.subarray(39))).toEqual([9, 8, 7, 6, 5]);
  });

  it('refuses a declared length that disagrees with the payload', () => {
    expect(() => writePacket(new BufferSink(), echoInfo().withLength(10), new Uint8Array(8))).toThrow(
      LengthMismatchError
    );
  });

  it('surfaces sink failures as WriteError', () => {
    let thrown: unknown;
    try {
      writePacket(new FixedSink(new Uint8Array(10)), echoInfo(), new Uint8Array(4));
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(WriteError);
    expect(thrown).toMatchObject({ code: 'E_WRITE_FAILED', retriable: true, cause: expect.any(RangeError) });
  });
});

describe('readPacket', () => {
  it('decodes a frame written by writePacket', () => {
    const sink = new BufferSink();
    writePacket(sink, echoInfo(), Uint8Array.from([1, 2, 3]));
    const packet = readPacket(sink.toBytes(), { maxPayloadBytes: 16 });
    expect(packet.info.equals(echoInfo().withLength(3))).toBe(true);
    expect(Array.from(packet.payload)).toEqual([1, 2, 3]);
  });

  it('accepts frames without a declared length', () => {
    const frame = concatBytes(toBytes(echoInfo()), Uint8Array.from([4, 5]));
    const packet = readPacket(frame, { maxPayloadBytes: 16 });
    expect(packet.info.length).toBeUndefined();
    expect(Array.from(packet.payload)).toEqual([4, 5]);
  });

  it('rejects and logs a length mismatch', () => {
    const { logger, entries } = captureLogs();
    const frame = concatBytes(toBytes(echoInfo().withLength(10)), new Uint8Array(8));

    expect(() => readPacket(frame, { logger, maxPayloadBytes: 16 })).toThrow(LengthMismatchError);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 40,
      msg: 'packet rejected: length mismatch',
      declared: 10,
      actual: 8,
      command: 3,
    });
  });

  it('rejects and logs oversized payloads', () => {
    const { logger, entries } = captureLogs();
    const frame = concatBytes(toBytes(echoInfo()), new Uint8Array(17));

    let thrown: unknown;
    try {
      readPacket(frame, { logger, maxPayloadBytes: 16 });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(PayloadTooLargeError);
    expect(thrown).toMatchObject({ code: 'E_PAYLOAD_TOO_LARGE', size: 17, limit: 16 });
    expect(entries[0]).toMatchObject({ msg: 'packet rejected: payload too large', size: 17, limit: 16 });
  });

  it('hands out a payload that does not alias the frame', () => {
    const frame = concatBytes(toBytes(echoInfo()), Uint8Array.from([1]));
    const packet = readPacket(frame, { maxPayloadBytes: 16 });
    frame[frame.length - 1] = 2;
    expect(packet.payload[0]).toBe(1);
  });
});
