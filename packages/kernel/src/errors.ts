/**
 * ZPR Protocol Error Codes
 *
 * Every failure raised by the protocol packages carries one of these codes.
 */

import type { ErrorCategory, ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_INVALID_ADDRESS_FORMAT: 'E_INVALID_ADDRESS_FORMAT',
  E_MALFORMED_DN: 'E_MALFORMED_DN',
  E_WRITE_FAILED: 'E_WRITE_FAILED',
  E_LENGTH_MISMATCH: 'E_LENGTH_MISMATCH',
  E_TRUNCATED: 'E_TRUNCATED',
  E_TRAILING_BYTES: 'E_TRAILING_BYTES',
  E_UNSUPPORTED_VERSION: 'E_UNSUPPORTED_VERSION',
  E_PAYLOAD_TOO_LARGE: 'E_PAYLOAD_TOO_LARGE',
  E_INVALID_CONFIG: 'E_INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_INVALID_ADDRESS_FORMAT: {
    code: 'E_INVALID_ADDRESS_FORMAT',
    title: 'Invalid Address Format',
    description: 'Address input is empty, oversized or does not match the rules of its kind',
    retriable: false,
    category: 'validation',
  },
  E_MALFORMED_DN: {
    code: 'E_MALFORMED_DN',
    title: 'Malformed Distinguished Name',
    description: 'Distinguished name has bad escaping, an empty component or an invalid attribute type',
    retriable: false,
    category: 'validation',
  },
  E_WRITE_FAILED: {
    code: 'E_WRITE_FAILED',
    title: 'Write Failed',
    description: 'The byte sink rejected a write (full, closed or failed)',
    retriable: true,
    category: 'infrastructure',
  },
  E_LENGTH_MISMATCH: {
    code: 'E_LENGTH_MISMATCH',
    title: 'Length Mismatch',
    description: 'Declared packet payload length does not match the actual payload length',
    retriable: false,
    category: 'wire',
  },
  E_TRUNCATED: {
    code: 'E_TRUNCATED',
    title: 'Truncated Input',
    description: 'Input ended before a complete value could be decoded',
    retriable: false,
    category: 'wire',
  },
  E_TRAILING_BYTES: {
    code: 'E_TRAILING_BYTES',
    title: 'Trailing Bytes',
    description: 'Input continues after a complete value was decoded',
    retriable: false,
    category: 'wire',
  },
  E_UNSUPPORTED_VERSION: {
    code: 'E_UNSUPPORTED_VERSION',
    title: 'Unsupported Wire Version',
    description: 'Packet header carries a wire version this library does not decode',
    retriable: false,
    category: 'wire',
  },
  E_PAYLOAD_TOO_LARGE: {
    code: 'E_PAYLOAD_TOO_LARGE',
    title: 'Payload Too Large',
    description: 'Packet payload exceeds the configured maximum',
    retriable: false,
    category: 'wire',
  },
  E_INVALID_CONFIG: {
    code: 'E_INVALID_CONFIG',
    title: 'Invalid Configuration',
    description: 'A configuration value failed validation',
    retriable: false,
    category: 'configuration',
  },
};

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

/**
 * Base class for every error raised by the ZPR protocol packages
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class ProtocolError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly retriable: boolean;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
    this.code = code;
    this.category = ERRORS[code].category;
    this.retriable = ERRORS[code].retriable;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Type guard for ProtocolError, optionally narrowed to one code
 */
export function isProtocolError(err: unknown, code?: ErrorCode): err is ProtocolError {
  return err instanceof ProtocolError && (code === undefined || err.code === code);
}
