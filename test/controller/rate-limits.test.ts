import { describe, it, expect } from 'vitest';
import { currentLimitAt, limitAfterChange, type LimitParameters } from '../../src/controller/rate-limits.js';

const DURATION = 86_400n;

describe('rate limits', () => {
  const used: LimitParameters = { timestamp: 1_000n, ratePerSecond: 10n, maxLimit: 1_000n, currentLimit: 500n };

  describe('currentLimitAt', () => {
    it('refills linearly from the last use', () => {
      expect(currentLimitAt(used, DURATION, 1_000n)).toBe(500n);
      expect(currentLimitAt(used, DURATION, 1_010n)).toBe(600n);
    });

    it('never exceeds the maximum', () => {
      expect(currentLimitAt(used, DURATION, 1_100n)).toBe(1_000n);
    });

    it('is full once a whole duration passed', () => {
      const slow: LimitParameters = { ...used, ratePerSecond: 0n };
      expect(currentLimitAt(slow, DURATION, 1_000n + DURATION - 1n)).toBe(500n);
      expect(currentLimitAt(slow, DURATION, 1_000n + DURATION)).toBe(1_000n);
    });

    it('returns a full limit as is', () => {
      expect(currentLimitAt({ ...used, currentLimit: 1_000n }, DURATION, 0n)).toBe(1_000n);
    });
  });

  describe('limitAfterChange', () => {
    it('adds an increase to the current limit', () => {
      expect(limitAfterChange(400n, 1_000n, 100n)).toBe(700n);
    });

    it('subtracts a decrease, flooring at zero', () => {
      expect(limitAfterChange(1_000n, 400n, 700n)).toBe(100n);
      expect(limitAfterChange(1_000n, 400n, 500n)).toBe(0n);
    });
  });
});
