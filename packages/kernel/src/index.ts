/**
 * ZPR Kernel
 * Normative constants, errors, registries, configuration and logging for the ZPR protocol
 *
 * @packageDocumentation
 */

// Export types
export type {
  ErrorCategory,
  ErrorDefinition,
  RegistryStatus,
  RpcCommandEntry,
  AddressKindEntry,
  DnAttributeTypeEntry,
} from './types.js';

// Export constants
export {
  WIRE_VERSION,
  ZPRNET_PREFIX_LEN,
  WELL_KNOWN_ADDRESSES,
  PORTS,
  IP_PROTOCOL,
  VISA_SERVICE,
  ZPI,
  LINK_ID,
  NODE_TO_NODE_STREAM_ID,
  SPECIAL_VISA_ID,
  KM_ID,
  COMPRESSION_MODE,
  LIMITS,
  CONSTANTS,
} from './constants.js';

// Export errors
export {
  ERROR_CODES,
  ERRORS,
  ProtocolError,
  getError,
  isRetriable,
  isProtocolError,
  type ErrorCode,
} from './errors.js';

// Export registries
export {
  RPC_COMMANDS,
  ADDRESS_KINDS,
  DN_ATTRIBUTE_TYPES,
  REGISTRIES,
  findRpcCommand,
  findRpcCommandByName,
  findAddressKind,
  findAddressKindByTag,
  findDnAttributeType,
} from './registries.js';

// Export configuration and logging
export { ConfigSchema, loadConfig, type ProtocolConfig, type LogLevel } from './config.js';
export { createLogger, setRootLogger, type Logger } from './logger.js';
