/**
 * Cryptographic hash functions
 * Wrapper around @noble/hashes
 */

import { keccak_256 } from '@noble/hashes/sha3';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex, numberToHex, padHex, stringToHex } from './hex.js';

/**
 * Compute keccak256 hash
 * Hex input is hashed as bytes, any other string as UTF-8
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  let bytes: Uint8Array;

  if (data instanceof Uint8Array) {
    bytes = data;
  } else if (isHex(data)) {
    bytes = hexToBytes(data);
  } else {
    bytes = hexToBytes(stringToHex(data));
  }

  return bytesToHex(keccak_256(bytes)) as Hash;
}

/**
 * Compute event topic from event signature
 * e.g., "Transfer(address,address,uint256)" -> full keccak256 hash
 */
export function eventTopic(signature: string): Hash {
  return keccak256(signature);
}

/**
 * Left-pad an integer into a 32-byte word (sequence numbers used as ids)
 */
export function toBytes32(value: bigint): Hash {
  return padHex(numberToHex(value), 32) as Hash;
}
