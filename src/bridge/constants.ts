/**
 * Protocol constants shared by adapters, controllers and wrappers
 */

import { eventTopic } from '../core/hash.js';

/**
 * Denominator of every adapter protocol fee: 1000 units is one percent
 */
export const FEE_DECIMALS = 100_000n;

/**
 * Denominator of wrapper fee rates and fee collector rates
 */
export const RATE_DENOMINATOR = 100_000n;

/**
 * Highest wrapper fee rate, 5%
 */
export const MAX_FEE_RATE = 5_000n;

/**
 * Highest fee collector rate, 10%
 */
export const MAX_FEE_BPS = 10_000n;

/**
 * Tiers per controller and destination chain
 */
export const MAX_FEE_TIERS = 3;

/**
 * Largest rate limit a controller accepts (2^255 - 1)
 */
export const MAX_LIMIT = (1n << 255n) - 1n;

export const RELAY_EVENT_SIGNATURE = 'RelayViaPolymer(uint256,address,bytes32,bytes)';
export const RELAY_EVENT_HASH = eventTopic(RELAY_EVENT_SIGNATURE);

/**
 * Executor gas when options carry no gas limit
 */
export const DEFAULT_GAS_LIMIT = 200_000n;
