/**
 * Address utilities
 * Addresses are kept in canonical lowercase form so they can key maps directly
 */

import type { Address, Hex } from './types.js';
import { isHex, padHex } from './hex.js';

/**
 * The zero address constant
 */
export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as Address;

/**
 * Check if a value is a 20-byte hex address (any case)
 */
export function isAddress(value: unknown): value is Address {
  if (typeof value !== 'string') return false;
  if (value.length !== 42) return false;
  return isHex(value);
}

/**
 * Validate and canonicalise an address
 */
export function toAddress(value: string, name = 'address'): Address {
  if (!isAddress(value)) {
    throw new Error(`${name} must be 0x followed by 40 hex characters, got: ${value}`);
  }
  return value.toLowerCase() as Address;
}

/**
 * Compare two addresses (case-insensitive)
 */
export function addressEquals(a: string, b: string): boolean {
  if (!isAddress(a) || !isAddress(b)) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Check if an address is the zero address
 */
export function isZeroAddress(address: string): boolean {
  return addressEquals(address, ZERO_ADDRESS);
}

/**
 * Left-pad an address into a 32-byte word (Hyperlane senders, LayerZero peers)
 */
export function addressToBytes32(address: Address): Hex {
  return padHex(address, 32);
}

/**
 * Extract address from a 32-byte word
 * Rejects words whose upper 12 bytes are not zero
 */
export function bytes32ToAddress(word: Hex): Address {
  if (!isHex(word) || word.length !== 66) {
    throw new Error(`Invalid 32-byte word: ${String(word)}`);
  }

  const hexPart = word.slice(2);
  if (!/^0{24}$/.test(hexPart.slice(0, 24))) {
    throw new Error(`Invalid address word (non-zero leading bytes): ${word}`);
  }

  return `0x${hexPart.slice(24).toLowerCase()}` as Address;
}
