import { describe, it, expect } from 'vitest';
import { ByteReader, toBytes } from '@zpr/wire';
import { RpcCommand } from '../src/rpc-command.js';

describe('RpcCommand.fromCode', () => {
  it('maps assigned codes to known commands', () => {
    const echo = RpcCommand.fromCode(3);
    expect(echo.kind).toBe('known');
    expect(echo.code).toBe(3);
    expect(echo.toString()).toBe('echo');
    expect(echo).toBe(RpcCommand.of('echo'));
  });

  it('keeps unassigned codes as unknown without failing', () => {
    const command = RpcCommand.fromCode(0xffff_ffff);
    expect(command.kind).toBe('unknown');
    expect(command.code).toBe(0xffff_ffff);
    expect(RpcCommand.toCode(command)).toBe(0xffff_ffff);
    expect(command.toString()).toBe('[unknown rpc command 4294967295]');
  });

  it('treats the reserved code 0 as unknown', () => {
    expect(RpcCommand.fromCode(0).kind).toBe('unknown');
  });

  it('rejects numbers that are not u32', () => {
    expect(() => RpcCommand.fromCode(-1)).toThrow(RangeError);
    expect(() => RpcCommand.fromCode(2 ** 32)).toThrow(RangeError);
    expect(() => RpcCommand.fromCode(1.5)).toThrow(RangeError);
  });
});

describe('RpcCommand.toCode', () => {
  it('inverts fromCode for every known command', () => {
    for (const command of RpcCommand.values()) {
      expect(RpcCommand.fromCode(RpcCommand.toCode(command))).toBe(command);
    }
  });

  it('knows all thirteen assigned commands', () => {
    expect(RpcCommand.values().map((c) => c.name)).toEqual([
      'counters-reset',
      'counters',
      'echo',
      'perf-sample',
      'set-capture-file',
      'flush-capture-file',
      'close-capture-file',
      'set-capture-program',
      'delete-capture-program',
      'configure-link',
      'start-link',
      'stop-link',
      'reset-link',
    ]);
  });
});

describe('RpcCommand.fromName', () => {
  it('parses kebab-case names', () => {
    expect(RpcCommand.fromName('perf-sample')?.code).toBe(4);
  });

  it('returns undefined for other spellings', () => {
    expect(RpcCommand.fromName('PerfSample')).toBeUndefined();
    expect(RpcCommand.fromName('reserved')).toBeUndefined();
  });
});

describe('RpcCommand wire form', () => {
  it('writes the code as a big-endian u32', () => {
    expect(Array.from(toBytes(RpcCommand.of('reset-link')))).toEqual([0, 0, 0, 13]);
  });

  it('reads unknown codes back unchanged', () => {
    const command = RpcCommand.readFrom(new ByteReader(Uint8Array.of(0xff, 0xff, 0xff, 0xff)));
    expect(command.kind).toBe('unknown');
    expect(Array.from(toBytes(command))).toEqual([0xff, 0xff, 0xff, 0xff]);
  });

  it('compares by code', () => {
    expect(RpcCommand.equals(RpcCommand.fromCode(99), RpcCommand.fromCode(99))).toBe(true);
    expect(RpcCommand.equals(RpcCommand.fromCode(99), RpcCommand.of('echo'))).toBe(false);
  });
});
