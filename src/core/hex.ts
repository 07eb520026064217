/**
 * Hex string utilities
 */

import type { Hex } from './types.js';

// Lookup tables for fast hex encoding/decoding
const hexChars = '0123456789abcdef';
const hexToByteMap = new Map<string, number>();
for (let i = 0; i < 256; i++) {
  const hex = i.toString(16).padStart(2, '0');
  hexToByteMap.set(hex, i);
}

/**
 * Check if a value is a valid hex string
 */
export function isHex(value: unknown): value is Hex {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  return /^[0-9a-fA-F]*$/.test(value.slice(2));
}

/**
 * Assert that a value is a valid hex string
 */
export function assertHex(value: unknown, name = 'value'): asserts value is Hex {
  if (!isHex(value)) {
    throw new Error(`${name} must be a valid hex string starting with 0x, got: ${String(value)}`);
  }
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '0x';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return hex as Hex;
}

/**
 * Convert hex string to bytes
 * Odd-length input is left-padded with a zero nibble
 */
export function hexToBytes(hex: Hex): Uint8Array {
  assertHex(hex);
  const hexStr = hex.slice(2).toLowerCase();
  const paddedHex = hexStr.length % 2 === 0 ? hexStr : '0' + hexStr;
  const bytes = new Uint8Array(paddedHex.length / 2);

  for (let i = 0; i < paddedHex.length; i += 2) {
    const byte = hexToByteMap.get(paddedHex.slice(i, i + 2));
    if (byte === undefined) {
      throw new Error(`Invalid hex character at position ${String(i)}`);
    }
    bytes[i / 2] = byte;
  }

  return bytes;
}

/**
 * Convert a non-negative number or bigint to hex string
 */
export function numberToHex(value: number | bigint): Hex {
  if (typeof value === 'number' && (!Number.isInteger(value) || value < 0)) {
    throw new Error(`Cannot convert ${String(value)} to hex: must be a non-negative integer`);
  }
  if (typeof value === 'bigint' && value < 0n) {
    throw new Error(`Cannot convert negative bigint to hex: ${String(value)}`);
  }
  return `0x${value.toString(16)}` as Hex;
}

/**
 * Convert hex string to bigint
 */
export function hexToBigInt(hex: Hex): bigint {
  assertHex(hex);
  if (hex === '0x') return 0n;
  return BigInt(hex);
}

/**
 * Pad hex string to a specific byte length (left-padded with zeros)
 */
export function padHex(hex: Hex, byteLength: number): Hex {
  assertHex(hex);
  const hexStr = hex.slice(2);
  const targetLength = byteLength * 2;
  if (hexStr.length > targetLength) {
    throw new Error(`Hex string ${hex} exceeds ${String(byteLength)} bytes`);
  }
  return `0x${hexStr.padStart(targetLength, '0')}` as Hex;
}

/**
 * Concatenate multiple hex strings
 */
export function concatHex(...hexStrings: Hex[]): Hex {
  let result = '0x';
  for (const hex of hexStrings) {
    assertHex(hex);
    result += hex.slice(2);
  }
  return result as Hex;
}

/**
 * Get byte length of hex string
 */
export function hexLength(hex: Hex): number {
  assertHex(hex);
  return Math.ceil((hex.length - 2) / 2);
}

/**
 * Slice hex string (byte positions)
 */
export function sliceHex(hex: Hex, start: number, end?: number): Hex {
  return bytesToHex(hexToBytes(hex).slice(start, end));
}

/**
 * Check if two hex strings are equal (case-insensitive)
 */
export function hexEquals(a: Hex, b: Hex): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Convert string to hex (UTF-8 encoding)
 */
export function stringToHex(str: string): Hex {
  return bytesToHex(new TextEncoder().encode(str));
}

/**
 * Convert hex to string (UTF-8 decoding)
 */
export function hexToString(hex: Hex): string {
  return new TextDecoder().decode(hexToBytes(hex));
}
