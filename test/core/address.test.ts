import { describe, it, expect } from 'vitest';
import {
  ZERO_ADDRESS,
  isAddress,
  toAddress,
  addressEquals,
  isZeroAddress,
  addressToBytes32,
  bytes32ToAddress,
} from '../../src/core/address.js';

const MIXED = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
const LOWER = '0xabcdef0123456789abcdef0123456789abcdef01';

describe('address', () => {
  it('recognises 20-byte hex addresses', () => {
    expect(isAddress(MIXED)).toBe(true);
    expect(isAddress('0x1234')).toBe(false);
    expect(isAddress(`0x${'g'.repeat(40)}`)).toBe(false);
    expect(isAddress(42)).toBe(false);
  });

  it('canonicalises to lowercase', () => {
    expect(toAddress(MIXED)).toBe(LOWER);
    expect(() => toAddress('0x12', 'recipient')).toThrow('recipient must be 0x followed by 40 hex characters, got: 0x12');
  });

  it('compares case-insensitively', () => {
    expect(addressEquals(MIXED, LOWER)).toBe(true);
    expect(addressEquals(LOWER, ZERO_ADDRESS)).toBe(false);
    expect(addressEquals('0x12', '0x12')).toBe(false);
  });

  it('detects the zero address', () => {
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
    expect(isZeroAddress(LOWER)).toBe(false);
  });

  describe('bytes32 words', () => {
    it('left-pads and strips', () => {
      const word = addressToBytes32(toAddress(LOWER));
      expect(word).toBe(`0x${'00'.repeat(12)}${LOWER.slice(2)}`);
      expect(bytes32ToAddress(word)).toBe(LOWER);
    });

    it('rejects dirty upper bytes', () => {
      expect(() => bytes32ToAddress(`0x${'ff'.repeat(12)}${LOWER.slice(2)}`)).toThrow('non-zero leading bytes');
    });

    it('rejects words of the wrong size', () => {
      expect(() => bytes32ToAddress('0x1234')).toThrow('Invalid 32-byte word');
    });
  });
});
