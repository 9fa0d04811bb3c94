/**
 * Distinguished names
 *
 * A DN is an ordered, root-first sequence of `type=value` components:
 * `O=Acme,OU=Ops,CN=server1` names server1 inside Ops inside Acme.
 *
 * Canonical string rules:
 * - components are joined with `,` and no surrounding whitespace;
 * - known attribute types (C, ST, L, O, OU, CN, DC, UID) are upper case,
 *   other types are kept as written;
 * - values are NFC-normalized and otherwise case-sensitive;
 * - `\ , = + " < > ;` in a value, a leading `#` and a leading or trailing
 *   space are escaped with a backslash.
 *
 * On input, `\XX` hex escapes are also accepted; runs of them are decoded as
 * UTF-8.
 */

import { DN_ATTRIBUTE_TYPES, LIMITS, findDnAttributeType } from '@zpr/kernel';
import { ByteWriter, decodeExact, type ByteReader, type ByteSink, type WriteTo } from '@zpr/wire';
import { compareStrings } from './bytes.js';
import { DER_TAG, concat, encodeOid, tlv } from './der.js';
import { MalformedDNError } from './errors.js';

export interface DnComponent {
  readonly type: string;
  readonly value: string;
}

const OPAQUE_TYPE_RE = /^[A-Za-z][A-Za-z0-9-]*$/;
const OID_TYPE_RE = /^[0-9]+(?:\.[0-9]+)+$/;
const HEX_PAIR_RE = /^[0-9A-Fa-f]{2}$/;
const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const ESCAPED_SPECIALS = '\\,=+"<>;';
const ESCAPABLE = ESCAPED_SPECIALS + '# ';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

function malformed(message: string, cause?: unknown): MalformedDNError {
  return new MalformedDNError(message, cause === undefined ? undefined : { cause });
}

function canonicalType(type: string): string {
  const known = findDnAttributeType(type);
  if (known) {
    return known.id;
  }
  if (type.length > LIMITS.maxDnTypeBytes) {
    throw malformed(`Attribute type exceeds ${LIMITS.maxDnTypeBytes} characters`);
  }
  if (!OPAQUE_TYPE_RE.test(type) && !OID_TYPE_RE.test(type)) {
    throw malformed(`Invalid attribute type "${type}"`);
  }
  return type;
}

function canonicalComponent(type: string, value: string): DnComponent {
  if (type.length === 0) {
    throw malformed('Empty attribute type');
  }
  if (value.length === 0) {
    throw malformed(`Empty value for attribute ${type}`);
  }
  if (LONE_SURROGATE_RE.test(value)) {
    throw malformed(`Value for attribute ${type} is not well-formed Unicode`);
  }
  const normalized = value.normalize('NFC');
  if (encoder.encode(normalized).length > LIMITS.maxDnValueBytes) {
    throw malformed(`Value for attribute ${type} exceeds ${LIMITS.maxDnValueBytes} bytes`);
  }
  return Object.freeze({ type: canonicalType(type), value: normalized });
}

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return strictDecoder.decode(bytes);
  } catch (cause) {
    throw malformed(`Invalid UTF-8 in ${what}`, cause);
  }
}

interface ValueChar {
  text: string;
  escaped: boolean;
}

/**
 * Read a value starting at `start`; stops at the first unescaped `,`
 */
function readValue(input: string, start: number, type: string): { value: string; end: number } {
  const chars: ValueChar[] = [];
  let pending: number[] = [];

  const flush = (): void => {
    if (pending.length > 0) {
      chars.push({ text: decodeUtf8(Uint8Array.from(pending), `value of ${type}`), escaped: true });
      pending = [];
    }
  };

  let i = start;
  for (; i < input.length; i++) {
    const ch = input[i];
    if (ch === ',') {
      break;
    }
    if (ch === '\\') {
      const pair = input.slice(i + 1, i + 3);
      if (HEX_PAIR_RE.test(pair)) {
        pending.push(parseInt(pair, 16));
        i += 2;
        continue;
      }
      flush();
      const next = input[i + 1];
      if (next === undefined) {
        throw malformed(`Dangling escape in value of ${type}`);
      }
      if (!ESCAPABLE.includes(next)) {
        throw malformed(`Invalid escape "\\${next}" in value of ${type}`);
      }
      chars.push({ text: next, escaped: true });
      i += 1;
      continue;
    }
    flush();
    if (ch === '=') {
      throw malformed(`Unescaped "=" in value of ${type}`);
    }
    if (ch === '+') {
      throw malformed(`Multi-valued component in ${type} is not supported; escape "+" as "\\+"`);
    }
    chars.push({ text: ch, escaped: false });
  }
  flush();

  let first = 0;
  let last = chars.length;
  while (first < last && !chars[first].escaped && chars[first].text === ' ') first++;
  while (last > first && !chars[last - 1].escaped && chars[last - 1].text === ' ') last--;

  return {
    value: chars
      .slice(first, last)
      .map((c) => c.text)
      .join(''),
    end: i,
  };
}

function parseComponents(input: string): DnComponent[] {
  const components: DnComponent[] = [];
  let i = 0;
  for (;;) {
    let j = i;
    while (j < input.length && input[j] !== '=' && input[j] !== ',') j++;
    const type = input.slice(i, j).trim();
    if (j >= input.length || input[j] === ',') {
      throw malformed(
        type.length === 0
          ? `Empty component at position ${i}`
          : `Component "${type}" has no "="`
      );
    }
    if (type.length === 0) {
      throw malformed(`Empty attribute type at position ${i}`);
    }

    const { value, end } = readValue(input, j + 1, type);
    components.push(canonicalComponent(type, value));
    if (components.length > LIMITS.maxDnComponents) {
      throw malformed(`More than ${LIMITS.maxDnComponents} components`);
    }
    if (end >= input.length) {
      return components;
    }
    i = end + 1;
  }
}

function escapeValue(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (
      ESCAPED_SPECIALS.includes(ch) ||
      (ch === '#' && i === 0) ||
      (ch === ' ' && (i === 0 || i === value.length - 1))
    ) {
      out += '\\';
    }
    out += ch;
  }
  return out;
}

function oidFor(type: string): string {
  const known = DN_ATTRIBUTE_TYPES.find((t) => t.id === type);
  if (known) {
    return known.oid;
  }
  if (OID_TYPE_RE.test(type)) {
    return type;
  }
  throw malformed(`No OID known for attribute type "${type}"`);
}

export class DistinguishedName implements WriteTo {
  private static readonly EMPTY = new DistinguishedName([]);

  private constructor(private readonly parts: readonly DnComponent[]) {}

  /**
   * Parse a DN string
   *
   * The empty string is the root DN with no components.
   *
   * @throws MalformedDNError on bad escaping, empty components or values,
   * invalid attribute types or invalid UTF-8
   */
  static parse(input: string): DistinguishedName {
    if (input === '') {
      return DistinguishedName.EMPTY;
    }
    return new DistinguishedName(Object.freeze(parseComponents(input)));
  }

  /**
   * Build a DN from components, canonicalizing each
   */
  static of(components: readonly DnComponent[]): DistinguishedName {
    if (components.length > LIMITS.maxDnComponents) {
      throw malformed(`More than ${LIMITS.maxDnComponents} components`);
    }
    return new DistinguishedName(
      Object.freeze(components.map((c) => canonicalComponent(c.type, c.value)))
    );
  }

  static root(): DistinguishedName {
    return DistinguishedName.EMPTY;
  }

  /**
   * Decode one DN from a reader; left inverse of writeTo
   *
   * Only canonical encodings are accepted.
   */
  static readFrom(reader: ByteReader): DistinguishedName {
    const count = reader.u8();
    const components: DnComponent[] = [];
    for (let n = 0; n < count; n++) {
      const type = decodeUtf8(reader.bytes8(), 'attribute type');
      const value = decodeUtf8(reader.bytes16(), `value of ${type}`);
      components.push({ type, value });
    }
    const dn = DistinguishedName.of(components);
    dn.parts.forEach((c, n) => {
      if (c.type !== components[n].type || c.value !== components[n].value) {
        throw malformed(`Component ${n} is not in canonical form`);
      }
    });
    return dn;
  }

  static fromBytes(bytes: Uint8Array): DistinguishedName {
    return decodeExact(bytes, DistinguishedName.readFrom);
  }

  get components(): readonly DnComponent[] {
    return this.parts;
  }

  get length(): number {
    return this.parts.length;
  }

  isRoot(): boolean {
    return this.parts.length === 0;
  }

  /**
   * Value of the first component with this attribute type
   */
  get(type: string): string | undefined {
    const wanted = findDnAttributeType(type)?.id ?? type;
    return this.parts.find((c) => c.type === wanted)?.value;
  }

  /**
   * Value of the last CN component
   */
  get commonName(): string | undefined {
    for (let i = this.parts.length - 1; i >= 0; i--) {
      if (this.parts[i].type === 'CN') {
        return this.parts[i].value;
      }
    }
    return undefined;
  }

  /**
   * The DN one level up; undefined for the root
   */
  parent(): DistinguishedName | undefined {
    if (this.parts.length === 0) {
      return undefined;
    }
    return new DistinguishedName(this.parts.slice(0, -1));
  }

  child(type: string, value: string): DistinguishedName {
    if (this.parts.length >= LIMITS.maxDnComponents) {
      throw malformed(`More than ${LIMITS.maxDnComponents} components`);
    }
    return new DistinguishedName(Object.freeze([...this.parts, canonicalComponent(type, value)]));
  }

  /**
   * True iff this DN's components are a strict prefix of `other`'s
   */
  isAncestorOf(other: DistinguishedName): boolean {
    if (this.parts.length >= other.parts.length) {
      return false;
    }
    return this.parts.every((c, i) => componentEquals(c, other.parts[i]));
  }

  isDescendantOf(other: DistinguishedName): boolean {
    return other.isAncestorOf(this);
  }

  equals(other: DistinguishedName): boolean {
    return (
      this.parts.length === other.parts.length &&
      this.parts.every((c, i) => componentEquals(c, other.parts[i]))
    );
  }

  /**
   * Component-wise order; an ancestor sorts before its descendants
   */
  compare(other: DistinguishedName): number {
    const n = Math.min(this.parts.length, other.parts.length);
    for (let i = 0; i < n; i++) {
      const byType = compareStrings(this.parts[i].type, other.parts[i].type);
      if (byType !== 0) {
        return byType;
      }
      const byValue = compareStrings(this.parts[i].value, other.parts[i].value);
      if (byValue !== 0) {
        return byValue;
      }
    }
    return Math.sign(this.parts.length - other.parts.length);
  }

  toCanonicalString(): string {
    return this.parts.map((c) => `${c.type}=${escapeValue(c.value)}`).join(',');
  }

  /**
   * Map key: the canonical string
   */
  key(): string {
    return this.toCanonicalString();
  }

  toString(): string {
    return this.toCanonicalString();
  }

  /**
   * Binary form: `[count u8]` then per component
   * `[type length u8][type][value length u16][value UTF-8]`
   */
  writeTo(sink: ByteSink): number {
    const writer = new ByteWriter(sink).u8(this.parts.length);
    for (const c of this.parts) {
      writer.bytes8(encoder.encode(c.type)).bytes16(encoder.encode(c.value));
    }
    return writer.bytesWritten;
  }

  /**
   * DER encoding as an X.501 Name (RDNSequence with one attribute per RDN)
   *
   * @throws MalformedDNError if a component's type has no OID
   */
  toDer(): Uint8Array {
    const rdns = this.parts.map((c) => {
      const attribute = tlv(
        DER_TAG.sequence,
        concat([
          tlv(DER_TAG.oid, encodeOid(oidFor(c.type))),
          tlv(DER_TAG.utf8String, encoder.encode(c.value)),
        ])
      );
      return tlv(DER_TAG.set, attribute);
    });
    return tlv(DER_TAG.sequence, concat(rdns));
  }
}

function componentEquals(a: DnComponent, b: DnComponent): boolean {
  return a.type === b.type && a.value === b.value;
}
