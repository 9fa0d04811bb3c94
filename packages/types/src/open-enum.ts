/**
 * Open enumerations
 *
 * Decoding an externally sourced discriminant never fails: codes outside the
 * known set become an `unknown` variant that keeps the raw code, so peers
 * running newer versions can be read, logged and passed through.
 */

import { ByteWriter, type ByteReader, type ByteSink, type WriteTo } from '@zpr/wire';

export type OpenEnumWidth = 8 | 16 | 32;

export interface OpenEnumMember<Name extends string> {
  readonly name: Name;
  readonly code: number;
  /** Display form; defaults to the name */
  readonly display?: string;
}

export interface KnownVariant<Name extends string> extends WriteTo {
  readonly kind: 'known';
  readonly name: Name;
  readonly code: number;
  toString(): string;
}

export interface UnknownVariant extends WriteTo {
  readonly kind: 'unknown';
  readonly code: number;
  toString(): string;
}

export type OpenEnumValue<Name extends string> = KnownVariant<Name> | UnknownVariant;

export class OpenEnum<Name extends string> {
  private readonly byCode = new Map<number, KnownVariant<Name>>();
  private readonly byName = new Map<string, KnownVariant<Name>>();
  private readonly max: number;

  constructor(
    readonly label: string,
    readonly width: OpenEnumWidth,
    members: readonly OpenEnumMember<Name>[]
  ) {
    this.max = 2 ** width - 1;
    for (const member of members) {
      this.assertCode(member.code);
      if (this.byCode.has(member.code) || this.byName.has(member.name)) {
        throw new Error(`Duplicate ${label} member ${member.name} (${member.code})`);
      }
      const variant = this.known(member);
      this.byCode.set(member.code, variant);
      this.byName.set(member.name, variant);
    }
  }

  /**
   * Map a code to its variant; codes outside the known set become `unknown`
   *
   * @throws RangeError if `code` does not fit the enum's width
   */
  fromCode(code: number): OpenEnumValue<Name> {
    this.assertCode(code);
    return this.byCode.get(code) ?? this.unknown(code);
  }

  /**
   * Inverse of fromCode; unknown variants give back their preserved code
   */
  toCode(value: OpenEnumValue<Name>): number {
    return value.code;
  }

  /**
   * The known variant for a name
   */
  of(name: Name): KnownVariant<Name> {
    const variant = this.byName.get(name);
    if (!variant) {
      throw new Error(`Unknown ${this.label} name: ${name}`);
    }
    return variant;
  }

  fromName(name: string): KnownVariant<Name> | undefined {
    return this.byName.get(name);
  }

  isKnown(code: number): boolean {
    return this.byCode.has(code);
  }

  values(): KnownVariant<Name>[] {
    return [...this.byCode.values()];
  }

  equals(a: OpenEnumValue<Name>, b: OpenEnumValue<Name>): boolean {
    return a.code === b.code;
  }

  readFrom(reader: ByteReader): OpenEnumValue<Name> {
    switch (this.width) {
      case 8:
        return this.fromCode(reader.u8());
      case 16:
        return this.fromCode(reader.u16());
      case 32:
        return this.fromCode(reader.u32());
    }
  }

  private write(sink: ByteSink, code: number): number {
    const writer = new ByteWriter(sink);
    switch (this.width) {
      case 8:
        return writer.u8(code).bytesWritten;
      case 16:
        return writer.u16(code).bytesWritten;
      case 32:
        return writer.u32(code).bytesWritten;
    }
  }

  private known(member: OpenEnumMember<Name>): KnownVariant<Name> {
    const display = member.display ?? member.name;
    return Object.freeze({
      kind: 'known' as const,
      name: member.name,
      code: member.code,
      writeTo: (sink: ByteSink) => this.write(sink, member.code),
      toString: () => display,
    });
  }

  private unknown(code: number): UnknownVariant {
    return Object.freeze({
      kind: 'unknown' as const,
      code,
      writeTo: (sink: ByteSink) => this.write(sink, code),
      toString: () => `[unknown ${this.label} ${code}]`,
    });
  }

  private assertCode(code: number): void {
    if (!Number.isInteger(code) || code < 0 || code > this.max) {
      throw new RangeError(`${this.label} code ${code} is not a u${this.width}`);
    }
  }
}
