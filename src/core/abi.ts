/**
 * ABI (Application Binary Interface) encoding/decoding
 * Implements the Ethereum ABI head/tail encoding for the types the relay wire formats use
 */

import type { Address, Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, padHex, concatHex, isHex, hexLength } from './hex.js';
import { isAddress, toAddress } from './address.js';

/**
 * Encode multiple parameters
 */
export function encodeParameters(types: readonly string[], values: readonly unknown[]): Hex {
  if (types.length !== values.length) {
    throw new Error(`Parameter count mismatch: ${String(types.length)} types, ${String(values.length)} values`);
  }

  if (types.length === 0) return '0x';

  const heads: Hex[] = [];
  const tails: Hex[] = [];
  let tailOffset = types.length * 32;

  for (let i = 0; i < types.length; i++) {
    const type = types[i];
    if (type === undefined) continue;
    const value = values[i];

    if (isDynamicType(type)) {
      // Dynamic type: head contains offset, tail contains data
      heads.push(encodeWord(BigInt(tailOffset)));
      const encoded = encodeParameter(type, value);
      tails.push(encoded);
      tailOffset += hexLength(encoded);
    } else {
      heads.push(padHex(encodeParameter(type, value), 32));
    }
  }

  return concatHex(...heads, ...tails);
}

/**
 * Decode multiple parameters
 * Throws when the data is too short for the requested types
 */
export function decodeParameters(types: readonly string[], data: Hex): unknown[] {
  const bytes = hexToBytes(data);
  const results: unknown[] = [];

  for (let i = 0; i < types.length; i++) {
    const type = types[i];
    if (type === undefined) continue;

    const headOffset = i * 32;

    if (isDynamicType(type)) {
      const offset = readOffset(bytes, headOffset);
      results.push(decodeParameter(type, bytes, offset));
    } else {
      results.push(decodeParameter(type, bytes, headOffset));
    }
  }

  return results;
}

/**
 * Encode a single parameter
 */
function encodeParameter(type: string, value: unknown): Hex {
  const arrayMatch = /^(.+)\[\]$/.exec(type);
  if (arrayMatch) {
    const baseType = arrayMatch[1];
    if (!baseType) throw new Error(`Invalid array type: ${type}`);
    if (!Array.isArray(value)) {
      throw new Error(`Expected array for type ${type}`);
    }
    const items: unknown[] = value;
    return concatHex(
      encodeWord(BigInt(items.length)),
      encodeParameters(
        items.map(() => baseType),
        items
      )
    );
  }

  if (type === 'address') {
    if (typeof value !== 'string' || !isAddress(value)) {
      throw new Error(`Invalid address: ${String(value)}`);
    }
    return padHex(toAddress(value), 32);
  }

  if (type === 'bool') {
    return encodeWord(value === true ? 1n : 0n);
  }

  if (type === 'string') {
    return encodeBytes(new TextEncoder().encode(String(value)));
  }

  if (type === 'bytes') {
    return encodeBytes(toBytes(value, type));
  }

  // Fixed bytes (bytes1 - bytes32), right-padded
  const bytesMatch = /^bytes(\d+)$/.exec(type);
  if (bytesMatch) {
    const size = parseInt(bytesMatch[1] ?? '0');
    if (size < 1 || size > 32) {
      throw new Error(`Invalid bytes size: ${String(size)}`);
    }
    const bytes = toBytes(value, type);
    if (bytes.length !== size) {
      throw new Error(`Expected ${String(size)} bytes, got ${String(bytes.length)}`);
    }
    const padded = new Uint8Array(32);
    padded.set(bytes);
    return bytesToHex(padded);
  }

  const uintMatch = /^uint(\d+)?$/.exec(type);
  if (uintMatch) {
    const bits = parseInt(uintMatch[1] ?? '256');
    if (bits < 8 || bits > 256 || bits % 8 !== 0) {
      throw new Error(`Invalid uint size: ${String(bits)}`);
    }
    const bigValue = toBigInt(value, type);
    if (bigValue < 0n) {
      throw new Error(`Negative value for uint: ${String(value)}`);
    }
    if (bigValue > (1n << BigInt(bits)) - 1n) {
      throw new Error(`Value ${String(value)} exceeds uint${String(bits)} max`);
    }
    return encodeWord(bigValue);
  }

  throw new Error(`Unknown type: ${type}`);
}

/**
 * Decode a single parameter
 */
function decodeParameter(type: string, data: Uint8Array, offset: number): unknown {
  const arrayMatch = /^(.+)\[\]$/.exec(type);
  if (arrayMatch) {
    const baseType = arrayMatch[1];
    if (!baseType) throw new Error(`Invalid array type: ${type}`);

    const length = readOffset(data, offset);
    const start = offset + 32;
    const elements: unknown[] = [];
    for (let i = 0; i < length; i++) {
      if (isDynamicType(baseType)) {
        elements.push(decodeParameter(baseType, data, start + readOffset(data, start + i * 32)));
      } else {
        elements.push(decodeParameter(baseType, data, start + i * 32));
      }
    }
    return elements;
  }

  if (type === 'address') {
    const word = readWord(data, offset);
    if (word.slice(0, 12).some((byte) => byte !== 0)) {
      throw new Error('Invalid address encoding: dirty upper bytes');
    }
    return bytesToHex(word.slice(12)) as Address;
  }

  if (type === 'bool') {
    const value = bytesToBigint(readWord(data, offset));
    if (value > 1n) {
      throw new Error(`Invalid boolean encoding: ${String(value)}`);
    }
    return value === 1n;
  }

  if (type === 'string' || type === 'bytes') {
    const length = readOffset(data, offset);
    const end = offset + 32 + length;
    if (end > data.length) {
      throw new Error(`ABI data too short for ${type} of length ${String(length)}`);
    }
    const bytes = data.slice(offset + 32, end);
    return type === 'string' ? new TextDecoder().decode(bytes) : bytesToHex(bytes);
  }

  const bytesMatch = /^bytes(\d+)$/.exec(type);
  if (bytesMatch) {
    const size = parseInt(bytesMatch[1] ?? '0');
    return bytesToHex(readWord(data, offset).slice(0, size));
  }

  const uintMatch = /^uint(\d+)?$/.exec(type);
  if (uintMatch) {
    const bits = parseInt(uintMatch[1] ?? '256');
    const value = bytesToBigint(readWord(data, offset));
    if (value > (1n << BigInt(bits)) - 1n) {
      throw new Error(`Value exceeds uint${String(bits)} max`);
    }
    return value;
  }

  throw new Error(`Unknown type: ${type}`);
}

// ============ Narrowing helpers for decoded values ============

export function asAddress(value: unknown): Address {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new Error(`Expected decoded address, got ${String(value)}`);
  }
  return toAddress(value);
}

export function asBigInt(value: unknown): bigint {
  if (typeof value !== 'bigint') {
    throw new Error(`Expected decoded integer, got ${String(value)}`);
  }
  return value;
}

export function asHex(value: unknown): Hex {
  if (!isHex(value)) {
    throw new Error(`Expected decoded bytes, got ${String(value)}`);
  }
  return value;
}

export function asHash(value: unknown): Hash {
  if (!isHex(value) || value.length !== 66) {
    throw new Error(`Expected decoded bytes32, got ${String(value)}`);
  }
  return value.toLowerCase() as Hash;
}

export function asBool(value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`Expected decoded boolean, got ${String(value)}`);
  }
  return value;
}

export function asString(value: unknown): string {
  if (typeof value !== 'string') {
    throw new Error(`Expected decoded string, got ${String(value)}`);
  }
  return value;
}

// ============ Internal helpers ============

function encodeWord(value: bigint): Hex {
  return padHex(bytesToHex(bigintToBytes(value)), 32);
}

/**
 * Encode bytes with length prefix, padded to a 32-byte boundary
 */
function encodeBytes(bytes: Uint8Array): Hex {
  const padded = new Uint8Array(Math.ceil(bytes.length / 32) * 32);
  padded.set(bytes);
  return concatHex(encodeWord(BigInt(bytes.length)), bytesToHex(padded));
}

function readWord(data: Uint8Array, offset: number): Uint8Array {
  if (offset < 0 || offset + 32 > data.length) {
    throw new Error(`ABI data too short: need ${String(offset + 32)} bytes, have ${String(data.length)}`);
  }
  return data.slice(offset, offset + 32);
}

function readOffset(data: Uint8Array, offset: number): number {
  const value = bytesToBigint(readWord(data, offset));
  if (value > BigInt(data.length)) {
    throw new Error(`ABI offset ${String(value)} out of range`);
  }
  return Number(value);
}

function isDynamicType(type: string): boolean {
  return type === 'string' || type === 'bytes' || type.endsWith('[]');
}

function toBytes(value: unknown, type: string): Uint8Array {
  if (isHex(value)) return hexToBytes(value);
  if (value instanceof Uint8Array) return value;
  throw new Error(`Expected hex or bytes for ${type}, got ${String(value)}`);
}

function toBigInt(value: unknown, type: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw new Error(`Expected integer for ${type}, got ${String(value)}`);
}

/**
 * Convert bigint to bytes (minimal encoding)
 */
function bigintToBytes(value: bigint): Uint8Array {
  if (value === 0n) return new Uint8Array([0]);
  const bytes: number[] = [];
  let v = value;
  while (v > 0n) {
    bytes.unshift(Number(v & 0xffn));
    v = v >> 8n;
  }
  return new Uint8Array(bytes);
}

function bytesToBigint(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}
