/**
 * Replenishing mint and burn limits per bridge (XERC20 style)
 *
 * A limit refills linearly from its last use to its maximum over `duration`
 * seconds. The zero address key holds the multi-bridge limit.
 */

import type { Address } from '../core/types.js';
import type { Chain } from '../chain/chain.js';
import type { StateMap } from '../chain/journal.js';
import { MAX_LIMIT } from '../bridge/constants.js';
import { ControllerError, NotHighEnoughLimitsError } from './errors.js';

export interface LimitParameters {
  /** Last time the limit was used or changed, in seconds */
  timestamp: bigint;
  ratePerSecond: bigint;
  maxLimit: bigint;
  currentLimit: bigint;
}

export interface BridgeParameters {
  minterParams: LimitParameters;
  burnerParams: LimitParameters;
}

export type LimitKind = 'minter' | 'burner';

const EMPTY_LIMIT: LimitParameters = { timestamp: 0n, ratePerSecond: 0n, maxLimit: 0n, currentLimit: 0n };

export function emptyBridgeParameters(): BridgeParameters {
  return { minterParams: { ...EMPTY_LIMIT }, burnerParams: { ...EMPTY_LIMIT } };
}

/**
 * Limit available at `now`
 */
export function currentLimitAt(params: LimitParameters, duration: bigint, now: bigint): bigint {
  if (params.currentLimit === params.maxLimit) return params.currentLimit;
  const elapsed = now - params.timestamp;
  if (params.timestamp + duration <= now) return params.maxLimit;
  const replenished = params.currentLimit + elapsed * params.ratePerSecond;
  return replenished > params.maxLimit ? params.maxLimit : replenished;
}

/**
 * New current limit after the maximum moves from `oldMax` to `newMax`
 */
export function limitAfterChange(oldMax: bigint, newMax: bigint, currentLimit: bigint): bigint {
  if (oldMax > newMax) {
    const difference = oldMax - newMax;
    return currentLimit > difference ? currentLimit - difference : 0n;
  }
  return currentLimit + (newMax - oldMax);
}

export class RateLimits {
  constructor(
    private readonly chain: Chain,
    private readonly params: StateMap<Address, BridgeParameters>,
    readonly duration: bigint
  ) {}

  parameters(bridge: Address): BridgeParameters {
    return this.params.get(bridge);
  }

  maxLimitOf(kind: LimitKind, bridge: Address): bigint {
    return this.select(kind, bridge).maxLimit;
  }

  currentLimitOf(kind: LimitKind, bridge: Address): bigint {
    return currentLimitAt(this.select(kind, bridge), this.duration, this.now());
  }

  /**
   * Set both maxima for a bridge; each is capped at MAX_LIMIT
   */
  set(bridge: Address, mintingLimit: bigint, burningLimit: bigint): void {
    if (mintingLimit > MAX_LIMIT || burningLimit > MAX_LIMIT) {
      throw new ControllerError({
        code: 'CONTROLLER_LIMITS_TOO_HIGH',
        message: `Limits above ${String(MAX_LIMIT)} are not allowed`,
        details: { bridge, mintingLimit, burningLimit },
      });
    }
    if (mintingLimit < 0n || burningLimit < 0n) {
      throw new ControllerError({
        code: 'CONTROLLER_INVALID_PARAMS',
        message: 'Limits cannot be negative',
        details: { bridge, mintingLimit, burningLimit },
      });
    }
    const current = this.params.get(bridge);
    this.params.set(bridge, {
      minterParams: this.changed(current.minterParams, mintingLimit),
      burnerParams: this.changed(current.burnerParams, burningLimit),
    });
  }

  /**
   * Spend `amount` of a bridge's limit
   */
  use(kind: LimitKind, bridge: Address, amount: bigint): void {
    const available = this.currentLimitOf(kind, bridge);
    if (available < amount) {
      throw new NotHighEnoughLimitsError(bridge, amount, available);
    }
    const current = this.params.get(bridge);
    const used: LimitParameters = {
      ...this.select(kind, bridge),
      timestamp: this.now(),
      currentLimit: available - amount,
    };
    this.params.set(
      bridge,
      kind === 'minter' ? { ...current, minterParams: used } : { ...current, burnerParams: used }
    );
  }

  private changed(params: LimitParameters, limit: bigint): LimitParameters {
    const now = this.now();
    const available = currentLimitAt(params, this.duration, now);
    return {
      timestamp: now,
      ratePerSecond: limit / this.duration,
      maxLimit: limit,
      currentLimit: limitAfterChange(params.maxLimit, limit, available),
    };
  }

  private select(kind: LimitKind, bridge: Address): LimitParameters {
    const params = this.params.get(bridge);
    return kind === 'minter' ? params.minterParams : params.burnerParams;
  }

  private now(): bigint {
    return BigInt(this.chain.now());
  }
}
