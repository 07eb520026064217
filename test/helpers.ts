/**
 * Shared test fixtures
 */

import type { Address } from '../src/core/types.js';
import { Chain, type Deployed, type Receipt } from '../src/chain/chain.js';
import { isRelayError } from '../src/core/errors.js';

/**
 * Run `fn` as a transaction from `from` to `target`
 */
export function send<T>(from: Address, target: Deployed & { chain: Chain }, fn: () => T, value = 0n): Receipt<T> {
  return target.chain.transact({ from, to: target.address, value }, fn);
}

/**
 * Error code a call throws, or undefined when it succeeds
 */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (isRelayError(error)) return error.code;
    throw error;
  }
  return undefined;
}

export function newChain(chainId: number): Chain {
  return new Chain({ chainId, timestamp: 1_700_000_000 });
}

export interface Accounts {
  owner: Address;
  treasury: Address;
  alice: Address;
  bob: Address;
  relayer: Address;
  refund: Address;
}

export function accounts(chain: Chain): Accounts {
  return {
    owner: chain.createAccount('owner'),
    treasury: chain.createAccount('treasury'),
    alice: chain.createAccount('alice'),
    bob: chain.createAccount('bob'),
    relayer: chain.createAccount('relayer'),
    refund: chain.createAccount('refund'),
  };
}
