/**
 * ZPR Kernel Types
 * Shared type definitions for kernel exports
 */

/**
 * Error category
 */
export type ErrorCategory = 'validation' | 'wire' | 'infrastructure' | 'configuration';

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: ErrorCategory;
}

/**
 * Registry entry status
 */
export type RegistryStatus = 'active' | 'reserved' | 'deprecated';

/**
 * RPC command registry entry
 *
 * Codes are stable across versions: never reused, never renumbered.
 */
export interface RpcCommandEntry {
  code: number;
  name: string;
  description: string;
  status: RegistryStatus;
}

/**
 * Address kind registry entry
 */
export interface AddressKindEntry {
  id: string;
  tag: number;
  description: string;
  /** Exact value length for binary families, null for textual ones */
  fixedLength: number | null;
  maxLength: number;
}

/**
 * DN attribute type registry entry
 */
export interface DnAttributeTypeEntry {
  id: string;
  oid: string;
  description: string;
}
