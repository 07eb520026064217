/**
 * Tiered wrapper fees
 *
 * Tiers are (threshold, rate) pairs in ascending threshold order. Each tier
 * but the last taxes the slice of the amount between the previous threshold
 * and its own; the last tier taxes everything above the previous threshold.
 * Rates are in RATE_DENOMINATOR units.
 */

import { MAX_FEE_RATE, MAX_FEE_TIERS, RATE_DENOMINATOR } from '../bridge/constants.js';
import { InvalidFeeRateError, LengthMismatchError, WrapperError } from './errors.js';

export interface FeeTier {
  threshold: bigint;
  rate: bigint;
}

export interface FeeQuote {
  fee: bigint;
  net: bigint;
}

/**
 * Everything the fee of one (controller, destination) pair depends on
 */
export interface FeeSchedule {
  tiers: readonly FeeTier[];
  /** Used when there are no tiers */
  feeRate: bigint;
  /** Added on top of the tiered or flat fee */
  premiumRate: bigint;
}

export function validateFeeRate(rate: bigint): void {
  if (rate < 0n || rate > MAX_FEE_RATE) {
    throw new InvalidFeeRateError(rate, MAX_FEE_RATE);
  }
}

/**
 * Build tiers from parallel arrays. An empty table is valid and clears the tiers.
 */
export function buildFeeTiers(thresholds: readonly bigint[], rates: readonly bigint[]): FeeTier[] {
  if (thresholds.length !== rates.length || thresholds.length > MAX_FEE_TIERS) {
    throw new LengthMismatchError({ thresholds: thresholds.length, rates: rates.length, max: MAX_FEE_TIERS });
  }

  const tiers: FeeTier[] = [];
  let previous: bigint | undefined;
  thresholds.forEach((threshold, i) => {
    const rate = rates[i] ?? 0n;
    validateFeeRate(rate);
    if (threshold < 0n || (i > 0 && threshold === 0n)) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', 'Only the first tier may have a zero threshold', { index: i, threshold });
    }
    if (previous !== undefined && threshold <= previous) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', 'Tier thresholds must be strictly ascending', {
        index: i,
        threshold,
        previous,
      });
    }
    previous = threshold;
    tiers.push({ threshold, rate });
  });
  return tiers;
}

export function tieredFee(tiers: readonly FeeTier[], amount: bigint): bigint {
  let fee = 0n;
  let remaining = amount;
  let previousThreshold = 0n;

  for (const [i, tier] of tiers.entries()) {
    if (remaining === 0n) break;
    const isLast = i === tiers.length - 1;
    const width = tier.threshold - previousThreshold;
    const slice = isLast || remaining < width ? remaining : width;
    fee += (slice * tier.rate) / RATE_DENOMINATOR;
    remaining -= slice;
    previousThreshold = tier.threshold;
  }
  return fee;
}

/**
 * Fee and net for `amount`; the same function serves quotes and transfers
 */
export function quoteFee(schedule: FeeSchedule, amount: bigint): FeeQuote {
  const base =
    schedule.tiers.length > 0 ? tieredFee(schedule.tiers, amount) : (amount * schedule.feeRate) / RATE_DENOMINATOR;
  const premium = (amount * schedule.premiumRate) / RATE_DENOMINATOR;
  const fee = base + premium;
  return { fee, net: amount - fee };
}

/**
 * Flat-rate fee of the deposit wrappers
 */
export function quoteFlatFee(feeRate: bigint, amount: bigint): FeeQuote {
  const fee = (amount * feeRate) / RATE_DENOMINATOR;
  return { fee, net: amount - fee };
}
