/**
 * ECDSA signature handling
 * Wrapper around @noble/secp256k1 for Ethereum signatures
 */

import * as secp256k1 from '@noble/secp256k1';
import type { Address, Hash, Hex, Signature } from './types.js';
import { bytesToHex, hexToBytes, padHex } from './hex.js';
import { keccak256 } from './hash.js';

/**
 * Derive Ethereum address from an uncompressed public key
 */
export function publicKeyToAddress(publicKey: Hex): Address {
  // Skip the 0x04 prefix of the uncompressed encoding
  const hash = keccak256(hexToBytes(publicKey).slice(1));
  return `0x${hash.slice(-40)}` as Address;
}

/**
 * Derive Ethereum address from private key
 */
export function privateKeyToAddress(privateKey: Hex): Address {
  const publicKey = secp256k1.getPublicKey(hexToBytes(privateKey), false);
  return publicKeyToAddress(bytesToHex(publicKey));
}

/**
 * Sign a 32-byte hash with a private key
 * Requires secp256k1.etc.hmacSha256Sync to be configured
 */
export function sign(hash: Hash, privateKey: Hex): Signature {
  const hashBytes = hexToBytes(hash);
  if (hashBytes.length !== 32) {
    throw new Error(`Hash must be 32 bytes, got ${String(hashBytes.length)}`);
  }

  const sig = secp256k1.sign(hashBytes, hexToBytes(privateKey));
  const compact = sig.toCompactRawBytes();
  const yParity = sig.recovery === 1 ? 1 : 0;

  return {
    r: padHex(bytesToHex(compact.slice(0, 32)), 32),
    s: padHex(bytesToHex(compact.slice(32, 64)), 32),
    v: yParity + 27,
    yParity,
  };
}

/**
 * Recover the signer address of a hash
 */
export function recoverAddress(hash: Hash, signature: Signature): Address {
  const sigBytes = new Uint8Array(64);
  sigBytes.set(hexToBytes(padHex(signature.r, 32)), 0);
  sigBytes.set(hexToBytes(padHex(signature.s, 32)), 32);

  const sig = secp256k1.Signature.fromCompact(sigBytes).addRecoveryBit(signature.yParity);
  const pubKey = sig.recoverPublicKey(hexToBytes(hash));

  return publicKeyToAddress(bytesToHex(pubKey.toRawBytes(false)));
}

/**
 * Build a signature from its on-chain (v, r, s) form
 */
export function signatureFromVrs(v: number, r: Hex, s: Hex): Signature {
  if (v !== 27 && v !== 28) {
    throw new Error(`Invalid signature v value: ${String(v)}`);
  }
  return { r, s, v, yParity: v === 28 ? 1 : 0 };
}
