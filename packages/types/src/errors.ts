/**
 * Typed errors for @zpr/types
 */

import { ProtocolError } from '@zpr/kernel';

/**
 * Address input is empty, oversized or does not match the rules of its kind
 */
export class InvalidAddressFormatError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('E_INVALID_ADDRESS_FORMAT', message, options);
    this.name = 'InvalidAddressFormatError';
  }
}

/**
 * Distinguished name could not be parsed, decoded or encoded
 */
export class MalformedDNError extends ProtocolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('E_MALFORMED_DN', message, options);
    this.name = 'MalformedDNError';
  }
}

/**
 * Declared payload length differs from the payload actually carried
 */
export class LengthMismatchError extends ProtocolError {
  readonly declared: number;
  readonly actual: number;

  constructor(declared: number, actual: number) {
    super('E_LENGTH_MISMATCH', `Declared payload length ${declared} does not match actual length ${actual}`);
    this.name = 'LengthMismatchError';
    this.declared = declared;
    this.actual = actual;
  }
}

export class PayloadTooLargeError extends ProtocolError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super('E_PAYLOAD_TOO_LARGE', `Payload of ${size} bytes exceeds limit of ${limit}`);
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

export class UnsupportedVersionError extends ProtocolError {
  readonly version: number;

  constructor(version: number) {
    super('E_UNSUPPORTED_VERSION', `Unsupported wire version ${version}`);
    this.name = 'UnsupportedVersionError';
    this.version = version;
  }
}
