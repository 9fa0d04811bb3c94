/**
 * ZPR Protocol Constants
 *
 * Values shared by every ZPR service. Changing any of them is a wire break.
 */

/**
 * Version byte written at the head of every packet header
 */
export const WIRE_VERSION = 1 as const;

/**
 * Default prefix length for local tun IPv6 ZPR addresses
 */
export const ZPRNET_PREFIX_LEN = 32;

/**
 * Well-known network addresses (textual form)
 */
export const WELL_KNOWN_ADDRESSES = {
  internalNetwork: 'fd5a:5052::' as const,
  tempLocal: 'fc00:5a:50:52::1' as const,
  visaService: 'fd5a:5052::1' as const,
} as const;

/**
 * Well-known ports and protocols
 */
export const PORTS = {
  tether: 5000,
  link: 5001,
  visaService: 5002,
} as const;

/**
 * IP protocol numbers used by ZPR services
 */
export const IP_PROTOCOL = {
  icmp: 1,
  tcp: 6,
  udp: 17,
  ipv6Icmp: 58,
} as const;

export const VISA_SERVICE = {
  address: WELL_KNOWN_ADDRESSES.visaService,
  protocol: IP_PROTOCOL.tcp,
  port: PORTS.visaService,
  commonName: 'vs.zpr' as const,
} as const;

/**
 * ZPR Parameter Index values
 */
export const ZPI = {
  /** Used for keying and early ZARP */
  zero: 0,
  /** Distinguishes packets with plaintext payloads */
  encryptedHeaderFlag: 0x80,
} as const;

/**
 * Link (or docking session) identifiers with a fixed meaning
 */
export const LINK_ID = {
  /** Packet not associated with a link, typically link setup */
  unknown: 0,
  localActor: 1,
  /** On an adapter the dock it is connected to; on a node its internal dock */
  dock: 2,
} as const;

/**
 * Stream reserved for node-to-node / control-plane traffic
 */
export const NODE_TO_NODE_STREAM_ID = 0;

export const SPECIAL_VISA_ID = 0;

/**
 * Key management algorithm identifiers
 */
export const KM_ID = {
  null: 0,
  ikev2: 1,
  noise: 2,
  experimental: 255,
} as const;

/**
 * Actor packet compression mode bits
 */
export const COMPRESSION_MODE = {
  destinationPortPresent: 0x20,
  sourcePortPresent: 0x40,
} as const;

/**
 * Size limits
 */
export const LIMITS = {
  maxHostnameBytes: 253,
  maxHostnameLabelBytes: 63,
  maxServiceBytes: 255,
  maxDnComponents: 64,
  maxDnTypeBytes: 64,
  maxDnValueBytes: 1024,
  /** Default upper bound on a packet payload accepted by readPacket */
  defaultMaxPayloadBytes: 1024 * 1024,
} as const;

/**
 * All constants grouped
 */
export const CONSTANTS = {
  WIRE_VERSION,
  ZPRNET_PREFIX_LEN,
  WELL_KNOWN_ADDRESSES,
  PORTS,
  IP_PROTOCOL,
  VISA_SERVICE,
  ZPI,
  LINK_ID,
  NODE_TO_NODE_STREAM_ID,
  KM_ID,
  COMPRESSION_MODE,
  LIMITS,
} as const;
