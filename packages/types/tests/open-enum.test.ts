import { describe, it, expect } from 'vitest';
import { ByteReader, toBytes } from '@zpr/wire';
import { L3Type, Tcst } from '../src/l3-type.js';
import { OpenEnum } from '../src/open-enum.js';

describe('OpenEnum', () => {
  const colours = new OpenEnum<'red' | 'green'>('colour', 16, [
    { name: 'red', code: 1 },
    { name: 'green', code: 0x0102, display: 'Green' },
  ]);

  it('writes and reads at its width', () => {
    expect(Array.from(toBytes(colours.of('green')))).toEqual([0x01, 0x02]);
    expect(colours.readFrom(new ByteReader(Uint8Array.of(0x01, 0x02)))).toBe(colours.of('green'));
  });

  it('uses the display form when given', () => {
    expect(colours.of('green').toString()).toBe('Green');
    expect(colours.of('red').toString()).toBe('red');
  });

  it('narrows on kind', () => {
    const value = colours.fromCode(7);
    if (value.kind === 'known') {
      expect.fail('code 7 is not assigned');
    }
    expect(value.code).toBe(7);
    expect(colours.isKnown(7)).toBe(false);
  });

  it('rejects codes wider than the enum', () => {
    expect(() => colours.fromCode(0x10000)).toThrow('colour code 65536 is not a u16');
  });

  it('rejects duplicate members', () => {
    expect(
      () =>
        new OpenEnum<'a' | 'b'>('dup', 8, [
          { name: 'a', code: 1 },
          { name: 'b', code: 1 },
        ])
    ).toThrow('Duplicate dup member b (1)');
  });

  it('throws for an unregistered name passed to of()', () => {
    const partial = new OpenEnum<'a' | 'b'>('partial', 8, [{ name: 'a', code: 1 }]);
    expect(() => partial.of('b')).toThrow('Unknown partial name: b');
  });

  it('returns frozen variants', () => {
    expect(Object.isFrozen(colours.of('red'))).toBe(true);
    expect(Object.isFrozen(colours.fromCode(9))).toBe(true);
  });
});

describe('L3Type', () => {
  it('maps IP versions', () => {
    expect(L3Type.fromCode(4)).toBe(L3Type.IPV4);
    expect(L3Type.IPV6.toString()).toBe('IPv6');
    expect(Array.from(toBytes(L3Type.IPV6))).toEqual([6]);
  });

  it('keeps other codes as unknown', () => {
    expect(L3Type.fromCode(5).toString()).toBe('[unknown L3 type 5]');
    expect(() => L3Type.fromCode(256)).toThrow(RangeError);
  });
});

describe('Tcst', () => {
  it('maps the IP 5-tuple type', () => {
    expect(Tcst.fromCode(0)).toBe(Tcst.IP_5_TUPLE);
    expect(Tcst.IP_5_TUPLE.toString()).toBe('IP 5-Tuple');
    expect(Tcst.readFrom(new ByteReader(Uint8Array.of(1))).toString()).toBe('[unknown TCST 1]');
  });
});
