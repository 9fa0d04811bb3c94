/**
 * Well-known ZPR identifiers
 */

import { VISA_SERVICE, WELL_KNOWN_ADDRESSES, ZPRNET_PREFIX_LEN } from '@zpr/kernel';
import { Address } from './address.js';
import { DistinguishedName } from './dn.js';

export const ZPR_INTERNAL_NETWORK = Address.parse('ipv6', WELL_KNOWN_ADDRESSES.internalNetwork);

export const ZPR_TEMP_LOCAL_ADDRESS = Address.parse('ipv6', WELL_KNOWN_ADDRESSES.tempLocal);

export const VISA_SERVICE_ADDRESS = Address.parse('ipv6', VISA_SERVICE.address);

export const VISA_SERVICE_DN = DistinguishedName.of([{ type: 'CN', value: VISA_SERVICE.commonName }]);

/**
 * True for addresses inside the ZPR internal network
 */
export function isZprInternal(address: Address): boolean {
  return address.inNetwork(ZPR_INTERNAL_NETWORK, ZPRNET_PREFIX_LEN);
}
