/**
 * SHA-256 over canonical bytes
 */

import { createHash } from 'node:crypto';

/**
 * Compute SHA-256 hash of data and return as lowercase hex string
 */
export function sha256Hex(data: Uint8Array | string): string {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  return createHash('sha256').update(bytes).digest('hex');
}
