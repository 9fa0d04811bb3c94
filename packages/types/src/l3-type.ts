/**
 * Actor packet L3 type and traffic classification specification type
 */

import type { ByteReader } from '@zpr/wire';
import { OpenEnum, type KnownVariant, type OpenEnumValue } from './open-enum.js';

export type L3TypeName = 'ipv4' | 'ipv6';

const l3Types = new OpenEnum<L3TypeName>('L3 type', 8, [
  { name: 'ipv4', code: 4, display: 'IPv4' },
  { name: 'ipv6', code: 6, display: 'IPv6' },
]);

export type L3Type = OpenEnumValue<L3TypeName>;

export const L3Type = {
  IPV4: l3Types.of('ipv4'),
  IPV6: l3Types.of('ipv6'),

  fromCode(code: number): L3Type {
    return l3Types.fromCode(code);
  },

  readFrom(reader: ByteReader): L3Type {
    return l3Types.readFrom(reader);
  },
} as const;

export type TcstName = 'ip-5-tuple';

const tcsts = new OpenEnum<TcstName>('TCST', 8, [
  { name: 'ip-5-tuple', code: 0, display: 'IP 5-Tuple' },
]);

export type Tcst = OpenEnumValue<TcstName>;

export const Tcst = {
  IP_5_TUPLE: tcsts.of('ip-5-tuple'),

  fromCode(code: number): Tcst {
    return tcsts.fromCode(code);
  },

  readFrom(reader: ByteReader): Tcst {
    return tcsts.readFrom(reader);
  },
} as const;

export type KnownL3Type = KnownVariant<L3TypeName>;
