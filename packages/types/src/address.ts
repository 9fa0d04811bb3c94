/**
 * Network and service endpoint addresses
 *
 * An address is a `(kind, value)` pair. Kinds and their wire tags come from
 * the ADDRESS_KINDS registry. Values are canonicalized on construction:
 * IPv6 text forms fold to their 16 bytes and host names fold to lower case;
 * everything else must match byte for byte to compare equal.
 *
 * Canonical bytes: `[tag u8][length u8][value]`.
 */

import ipaddr from 'ipaddr.js';
import { ADDRESS_KINDS, LIMITS, findAddressKind, findAddressKindByTag } from '@zpr/kernel';
import { ByteWriter, decodeExact, toHex, type ByteReader, type ByteSink, type WriteTo } from '@zpr/wire';
import { compareBytes } from './bytes.js';
import { InvalidAddressFormatError } from './errors.js';
import { L3Type } from './l3-type.js';

export type AddressKind = 'ipv4' | 'ipv6' | 'hostname' | 'service';

const HOSTNAME_LABEL_RE = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;
const SERVICE_RE = /^[A-Za-z0-9._:-]+$/;

const decoder = new TextDecoder();
const encoder = new TextEncoder();

function isAddressKind(kind: string): kind is AddressKind {
  return ADDRESS_KINDS.some((k) => k.id === kind);
}

function tagOf(kind: AddressKind): number {
  const entry = findAddressKind(kind);
  if (!entry) {
    throw new Error(`Address kind ${kind} missing from registry`);
  }
  return entry.tag;
}

function fail(kind: string, reason: string): never {
  throw new InvalidAddressFormatError(`Invalid ${kind} address: ${reason}`);
}

function textOf(kind: AddressKind, raw: Uint8Array): string {
  if (raw.some((b) => b > 0x7f)) {
    fail(kind, 'non-ASCII bytes');
  }
  return decoder.decode(raw);
}

function canonicalIpv4(raw: string | Uint8Array): Uint8Array {
  if (typeof raw !== 'string') {
    if (raw.length !== 4) {
      fail('ipv4', `expected 4 bytes, got ${raw.length}`);
    }
    return raw.slice();
  }
  if (!ipaddr.IPv4.isValidFourPartDecimal(raw)) {
    fail('ipv4', `"${raw}" is not a dotted quad`);
  }
  return Uint8Array.from(ipaddr.IPv4.parse(raw).toByteArray());
}

function canonicalIpv6(raw: string | Uint8Array): Uint8Array {
  if (typeof raw !== 'string') {
    if (raw.length !== 16) {
      fail('ipv6', `expected 16 bytes, got ${raw.length}`);
    }
    return raw.slice();
  }
  // Zone ids name a local interface and have no place in an identifier
  if (raw.includes('%') || !ipaddr.IPv6.isValid(raw)) {
    fail('ipv6', `"${raw}" is not an IPv6 address`);
  }
  return Uint8Array.from(ipaddr.IPv6.parse(raw).toByteArray());
}

function canonicalHostname(raw: string | Uint8Array): Uint8Array {
  const name = (typeof raw === 'string' ? raw : textOf('hostname', raw)).toLowerCase();
  if (name.length > LIMITS.maxHostnameBytes) {
    fail('hostname', `exceeds ${LIMITS.maxHostnameBytes} bytes`);
  }
  for (const label of name.split('.')) {
    if (label.length === 0 || label.length > LIMITS.maxHostnameLabelBytes) {
      fail('hostname', `label "${label}" must be 1-${LIMITS.maxHostnameLabelBytes} characters`);
    }
    if (!HOSTNAME_LABEL_RE.test(label)) {
      fail('hostname', `label "${label}" has invalid characters`);
    }
  }
  return encoder.encode(name);
}

function canonicalService(raw: string | Uint8Array): Uint8Array {
  const name = typeof raw === 'string' ? raw : textOf('service', raw);
  if (name.length > LIMITS.maxServiceBytes) {
    fail('service', `exceeds ${LIMITS.maxServiceBytes} bytes`);
  }
  if (!SERVICE_RE.test(name)) {
    fail('service', `"${name}" has invalid characters`);
  }
  return encoder.encode(name);
}

function canonicalValue(kind: AddressKind, raw: string | Uint8Array): Uint8Array {
  switch (kind) {
    case 'ipv4':
      return canonicalIpv4(raw);
    case 'ipv6':
      return canonicalIpv6(raw);
    case 'hostname':
      return canonicalHostname(raw);
    case 'service':
      return canonicalService(raw);
  }
}

export class Address implements WriteTo {
  private constructor(
    readonly kind: AddressKind,
    private readonly raw: Uint8Array
  ) {}

  /**
   * Validate and canonicalize an address of the given kind
   *
   * @throws InvalidAddressFormatError for unknown kinds and for empty,
   * oversized or malformed input
   */
  static parse(kind: string, raw: string | Uint8Array): Address {
    if (!isAddressKind(kind)) {
      throw new InvalidAddressFormatError(`Unknown address kind: ${kind}`);
    }
    if (raw.length === 0) {
      fail(kind, 'empty input');
    }
    return new Address(kind, canonicalValue(kind, raw));
  }

  /**
   * Parse an IP address in either family
   */
  static fromIp(text: string): Address {
    if (ipaddr.IPv4.isValidFourPartDecimal(text)) {
      return Address.parse('ipv4', text);
    }
    return Address.parse('ipv6', text);
  }

  /**
   * Decode one address from a reader; left inverse of writeTo
   */
  static readFrom(reader: ByteReader): Address {
    const tag = reader.u8();
    const entry = findAddressKindByTag(tag);
    if (!entry || !isAddressKind(entry.id)) {
      throw new InvalidAddressFormatError(`Unknown address tag 0x${tag.toString(16).padStart(2, '0')}`);
    }
    const value = reader.bytes8();
    if (value.length === 0) {
      fail(entry.id, 'empty input');
    }
    const address = new Address(entry.id, canonicalValue(entry.id, value));
    if (compareBytes(address.raw, value) !== 0) {
      fail(entry.id, 'value is not in canonical form');
    }
    return address;
  }

  static fromCanonicalBytes(bytes: Uint8Array): Address {
    return decodeExact(bytes, Address.readFrom);
  }

  get tag(): number {
    return tagOf(this.kind);
  }

  /**
   * Copy of the canonical value bytes
   */
  get value(): Uint8Array {
    return this.raw.slice();
  }

  toCanonicalBytes(): Uint8Array {
    const out = new Uint8Array(2 + this.raw.length);
    out[0] = this.tag;
    out[1] = this.raw.length;
    out.set(this.raw, 2);
    return out;
  }

  writeTo(sink: ByteSink): number {
    return new ByteWriter(sink).u8(this.tag).bytes8(this.raw).bytesWritten;
  }

  equals(other: Address): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Order by kind tag, then by value bytes
   */
  compare(other: Address): number {
    if (this.tag !== other.tag) {
      return this.tag < other.tag ? -1 : 1;
    }
    return compareBytes(this.raw, other.raw);
  }

  /**
   * Map key: hex of the canonical bytes
   */
  key(): string {
    return toHex(this.toCanonicalBytes());
  }

  isIp(): boolean {
    return this.kind === 'ipv4' || this.kind === 'ipv6';
  }

  l3Type(): L3Type | undefined {
    switch (this.kind) {
      case 'ipv4':
        return L3Type.IPV4;
      case 'ipv6':
        return L3Type.IPV6;
      default:
        return undefined;
    }
  }

  /**
   * Whether this IP address lies in `network/prefixLength`; false across families
   */
  inNetwork(network: Address, prefixLength: number): boolean {
    if (!this.isIp() || this.kind !== network.kind) {
      return false;
    }
    const max = this.raw.length * 8;
    if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > max) {
      throw new RangeError(`Prefix length ${prefixLength} out of range 0-${max}`);
    }
    const full = Math.floor(prefixLength / 8);
    for (let i = 0; i < full; i++) {
      if (this.raw[i] !== network.raw[i]) {
        return false;
      }
    }
    const rest = prefixLength % 8;
    if (rest === 0) {
      return true;
    }
    const mask = (0xff << (8 - rest)) & 0xff;
    return (this.raw[full] & mask) === (network.raw[full] & mask);
  }

  toString(): string {
    switch (this.kind) {
      case 'ipv4':
        return this.raw.join('.');
      case 'ipv6':
        return new ipaddr.IPv6(Array.from(this.raw)).toRFC5952String();
      case 'hostname':
      case 'service':
        return decoder.decode(this.raw);
    }
  }
}
