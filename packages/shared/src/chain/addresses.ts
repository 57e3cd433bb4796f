/**
 * Address helpers
 */

import {
  type Address,
  getAddress,
  isAddressEqual,
  keccak256,
  slice,
  toHex,
  zeroAddress,
} from "viem";

export { zeroAddress };

/**
 * Checksums an address so it can key a Map
 */
export function normalizeAddress(address: Address): Address {
  return getAddress(address);
}

export function isSameAddress(a: Address, b: Address): boolean {
  return isAddressEqual(a, b);
}

export function isZeroAddress(address: Address): boolean {
  return isAddressEqual(address, zeroAddress);
}

/**
 * Deterministic contract/account address derived from a label,
 * e.g. deriveAddress("treasury")
 */
export function deriveAddress(label: string): Address {
  return getAddress(slice(keccak256(toHex(label)), 12));
}
