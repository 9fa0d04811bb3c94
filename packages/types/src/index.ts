/**
 * ZPR Types
 *
 * Identifiers (addresses, distinguished names), RPC command codes and packet
 * metadata, each serializable through the WriteTo contract.
 *
 * @packageDocumentation
 */

// Errors
export {
  InvalidAddressFormatError,
  MalformedDNError,
  LengthMismatchError,
  PayloadTooLargeError,
  UnsupportedVersionError,
} from './errors.js';

// Open enumerations
export {
  OpenEnum,
  type OpenEnumWidth,
  type OpenEnumMember,
  type OpenEnumValue,
  type KnownVariant,
  type UnknownVariant,
} from './open-enum.js';
export { RpcCommand, type RpcCommandName, type KnownRpcCommand } from './rpc-command.js';
export { L3Type, Tcst, type L3TypeName, type TcstName, type KnownL3Type } from './l3-type.js';

// Identifiers
export { Address, type AddressKind } from './address.js';
export { DistinguishedName, type DnComponent } from './dn.js';

// Packets
export { PacketInfo, type Endpoint, type PacketAux } from './packet-info.js';
export {
  readPacket,
  writePacket,
  verifyPayloadLength,
  type Packet,
  type ReadPacketOptions,
} from './packet.js';

// Well-known identifiers
export {
  ZPR_INTERNAL_NETWORK,
  ZPR_TEMP_LOCAL_ADDRESS,
  VISA_SERVICE_ADDRESS,
  VISA_SERVICE_DN,
  isZprInternal,
} from './well-known.js';
