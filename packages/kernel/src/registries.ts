/**
 * ZPR Protocol Registries
 *
 * Append-only tables. An entry may become deprecated, but its code or tag is
 * never reassigned.
 */

import type { AddressKindEntry, DnAttributeTypeEntry, RpcCommandEntry } from './types.js';

/**
 * RPC commands accepted by a packet handler
 *
 * Names are literal types; the RpcCommandName union in @zpr/types derives from them.
 */
export const RPC_COMMANDS = [
  {
    code: 0,
    name: 'reserved',
    description: 'Never assigned; guards against zero-filled headers',
    status: 'reserved',
  },
  { code: 1, name: 'counters-reset', description: 'Reset packet handler counters', status: 'active' },
  { code: 2, name: 'counters', description: 'Report packet handler counters', status: 'active' },
  { code: 3, name: 'echo', description: 'Echo the request payload back', status: 'active' },
  { code: 4, name: 'perf-sample', description: 'Take a performance sample', status: 'active' },
  { code: 5, name: 'set-capture-file', description: 'Start capturing packets to a file', status: 'active' },
  { code: 6, name: 'flush-capture-file', description: 'Flush the packet capture file', status: 'active' },
  { code: 7, name: 'close-capture-file', description: 'Stop capturing and close the capture file', status: 'active' },
  { code: 8, name: 'set-capture-program', description: 'Install a capture filter program', status: 'active' },
  { code: 9, name: 'delete-capture-program', description: 'Remove the capture filter program', status: 'active' },
  { code: 10, name: 'configure-link', description: 'Configure a link', status: 'active' },
  { code: 11, name: 'start-link', description: 'Start a configured link', status: 'active' },
  { code: 12, name: 'stop-link', description: 'Stop a running link', status: 'active' },
  { code: 13, name: 'reset-link', description: 'Reset a link to its configured state', status: 'active' },
] as const;

/**
 * Address families
 */
export const ADDRESS_KINDS: readonly AddressKindEntry[] = [
  { id: 'ipv4', tag: 0x04, description: 'IPv4 address', fixedLength: 4, maxLength: 4 },
  { id: 'ipv6', tag: 0x06, description: 'IPv6 address', fixedLength: 16, maxLength: 16 },
  {
    id: 'hostname',
    tag: 0x10,
    description: 'DNS host name (RFC 1123), lower case',
    fixedLength: null,
    maxLength: 253,
  },
  {
    id: 'service',
    tag: 0x20,
    description: 'ZPR service identifier, case-sensitive',
    fixedLength: null,
    maxLength: 255,
  },
] as const;

/**
 * Distinguished name attribute types with a well-known meaning
 */
export const DN_ATTRIBUTE_TYPES: readonly DnAttributeTypeEntry[] = [
  { id: 'C', oid: '2.5.4.6', description: 'countryName' },
  { id: 'ST', oid: '2.5.4.8', description: 'stateOrProvinceName' },
  { id: 'L', oid: '2.5.4.7', description: 'localityName' },
  { id: 'O', oid: '2.5.4.10', description: 'organizationName' },
  { id: 'OU', oid: '2.5.4.11', description: 'organizationalUnitName' },
  { id: 'CN', oid: '2.5.4.3', description: 'commonName' },
  { id: 'DC', oid: '0.9.2342.19200300.100.1.25', description: 'domainComponent' },
  { id: 'UID', oid: '0.9.2342.19200300.100.1.1', description: 'userId' },
] as const;

/**
 * All registries grouped
 */
export const REGISTRIES = {
  rpcCommands: RPC_COMMANDS,
  addressKinds: ADDRESS_KINDS,
  dnAttributeTypes: DN_ATTRIBUTE_TYPES,
} as const;

/**
 * Find an RPC command by code
 */
export function findRpcCommand(code: number): RpcCommandEntry | undefined {
  return RPC_COMMANDS.find((c) => c.code === code);
}

/**
 * Find an RPC command by its kebab-case name
 */
export function findRpcCommandByName(name: string): RpcCommandEntry | undefined {
  return RPC_COMMANDS.find((c) => c.name === name);
}

/**
 * Find an address kind by id
 */
export function findAddressKind(id: string): AddressKindEntry | undefined {
  return ADDRESS_KINDS.find((k) => k.id === id);
}

/**
 * Find an address kind by wire tag
 */
export function findAddressKindByTag(tag: number): AddressKindEntry | undefined {
  return ADDRESS_KINDS.find((k) => k.tag === tag);
}

/**
 * Find a DN attribute type by short name (case-insensitive)
 */
export function findDnAttributeType(id: string): DnAttributeTypeEntry | undefined {
  const upper = id.toUpperCase();
  return DN_ATTRIBUTE_TYPES.find((t) => t.id === upper);
}
