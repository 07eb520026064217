/**
 * EIP-712 typed data hashing
 * Only the pieces ERC-2612 permits need: domain separator and the final digest
 */

import type { Address, Hash, Hex } from './types.js';
import { encodeParameters } from './abi.js';
import { keccak256 } from './hash.js';
import { concatHex } from './hex.js';

export interface TypedDataDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

export const EIP712_DOMAIN_TYPEHASH = keccak256(
  'EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)'
);

/**
 * Compute the domain separator for a typed data domain
 */
export function domainSeparator(domain: TypedDataDomain): Hash {
  return keccak256(
    encodeParameters(
      ['bytes32', 'bytes32', 'bytes32', 'uint256', 'address'],
      [
        EIP712_DOMAIN_TYPEHASH,
        keccak256(domain.name),
        keccak256(domain.version),
        BigInt(domain.chainId),
        domain.verifyingContract,
      ]
    )
  );
}

/**
 * Hash an ABI-encoded struct (type hash first) into its struct hash
 */
export function hashStruct(encodedStruct: Hex): Hash {
  return keccak256(encodedStruct);
}

/**
 * Final digest that gets signed: keccak256("\x19\x01" ++ domainSeparator ++ structHash)
 */
export function typedDataDigest(separator: Hash, structHash: Hash): Hash {
  return keccak256(concatHex('0x1901', separator, structHash));
}
