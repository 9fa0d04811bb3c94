/**
 * Typed errors for @zpr/wire
 */

import { ProtocolError } from '@zpr/kernel';

/**
 * A byte sink rejected a write
 *
 * The sink's own failure is kept as `cause`, unchanged.
 */
export class WriteError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('E_WRITE_FAILED', message, options);
    this.name = 'WriteError';
  }
}

/**
 * Input ended before a complete value was decoded
 */
export class TruncatedError extends ProtocolError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super('E_TRUNCATED', `Truncated input: needed ${needed} bytes, ${available} available`);
    this.name = 'TruncatedError';
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Input continued after a complete value was decoded
 */
export class TrailingBytesError extends ProtocolError {
  readonly trailing: number;

  constructor(trailing: number) {
    super('E_TRAILING_BYTES', `${trailing} trailing bytes after value`);
    this.name = 'TrailingBytesError';
    this.trailing = trailing;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Wrap a sink failure in a WriteError, leaving an existing WriteError as is
 */
export function toWriteError(cause: unknown): WriteError {
  if (cause instanceof WriteError) {
    return cause;
  }
  return new WriteError(`Sink write failed: ${describeCause(cause)}`, { cause });
}
