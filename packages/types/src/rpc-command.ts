/**
 * RPC commands that can be sent to a packet handler
 *
 * Reading a code never fails: unassigned codes decode to an `unknown`
 * variant carrying the raw code. Writing a known command always uses its
 * registered code.
 */

import { RPC_COMMANDS, createLogger } from '@zpr/kernel';
import type { ByteReader } from '@zpr/wire';
import { OpenEnum, type KnownVariant, type OpenEnumValue } from './open-enum.js';

type RegisteredRpcCommand = (typeof RPC_COMMANDS)[number];
type AssignedRpcCommand = Exclude<RegisteredRpcCommand, { status: 'reserved' }>;

export type RpcCommandName = AssignedRpcCommand['name'];

function isAssigned(entry: RegisteredRpcCommand): entry is AssignedRpcCommand {
  return entry.status !== 'reserved';
}

const registry = new OpenEnum<RpcCommandName>('rpc command', 32, RPC_COMMANDS.filter(isAssigned));

function decode(code: number): OpenEnumValue<RpcCommandName> {
  const command = registry.fromCode(code);
  if (command.kind === 'unknown') {
    createLogger('rpc-command').debug({ code }, 'unknown rpc command code');
  }
  return command;
}

export type RpcCommand = OpenEnumValue<RpcCommandName>;
export type KnownRpcCommand = KnownVariant<RpcCommandName>;

export const RpcCommand = {
  /**
   * Decode a command code; never fails for a u32
   */
  fromCode(code: number): RpcCommand {
    return decode(code);
  },

  toCode(command: RpcCommand): number {
    return registry.toCode(command);
  },

  of(name: RpcCommandName): KnownRpcCommand {
    return registry.of(name);
  },

  /**
   * Look up a command by its kebab-case name
   */
  fromName(name: string): KnownRpcCommand | undefined {
    return registry.fromName(name);
  },

  equals(a: RpcCommand, b: RpcCommand): boolean {
    return registry.equals(a, b);
  },

  values(): KnownRpcCommand[] {
    return registry.values();
  },

  readFrom(reader: ByteReader): RpcCommand {
    return decode(reader.u32());
  },
} as const;
