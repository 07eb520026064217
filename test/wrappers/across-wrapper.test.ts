import { describe, it, expect, beforeEach } from 'vitest';
import type { Address } from '../../src/core/types.js';
import { ZERO_ADDRESS } from '../../src/core/address.js';
import type { Chain } from '../../src/chain/chain.js';
import { AcrossV4Wrapper, type DepositParams } from '../../src/wrappers/across-wrapper.js';
import { MockSpokePool } from '../mocks/contracts.js';
import { TestToken } from '../mocks/tokens.js';
import { accounts, errorCode, newChain, send, type Accounts } from '../helpers.js';

describe('AcrossV4Wrapper', () => {
  let chain: Chain;
  let acct: Accounts;
  let token: TestToken;
  let spokePool: MockSpokePool;
  let wrapper: AcrossV4Wrapper;
  let alice: Address;

  const params = (overrides: Partial<DepositParams> = {}): DepositParams => ({
    depositor: alice,
    recipient: acct.bob,
    inputToken: token.address,
    outputToken: acct.relayer,
    inputAmount: 10_000n,
    outputAmount: 9_900n,
    destinationChainId: 42161,
    exclusiveRelayer: ZERO_ADDRESS,
    quoteTimestamp: chain.now(),
    fillDeadline: chain.now() + 3_600,
    exclusivityParameter: 0,
    message: '0xcafe',
    ...overrides,
  });

  const deposit = (p: DepositParams, value = 0n): void => {
    send(alice, wrapper, () => {
      wrapper.deposit(p);
    }, value);
  };

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    alice = acct.alice;
    token = new TestToken(chain, { name: 'USD Coin', symbol: 'USDC', decimals: 6 });
    spokePool = new MockSpokePool(chain);
    // 0.5%
    wrapper = new AcrossV4Wrapper(chain, { treasury: acct.treasury, feeRate: 500n, owner: acct.owner, spokePool });
    send(acct.owner, token, () => {
      token.mint(alice, 20_000n);
    });
    send(alice, token, () => token.approve(wrapper.address, 20_000n));
    chain.fund(alice, 20_000n);
  });

  describe('token deposits', () => {
    it('forwards the input amount net of the fee', () => {
      deposit(params());

      expect(token.balanceOf(alice)).toBe(10_000n);
      expect(token.balanceOf(acct.treasury)).toBe(50n);
      expect(token.balanceOf(spokePool.address)).toBe(9_950n);
      expect(token.allowance(wrapper.address, spokePool.address)).toBe(0n);
      expect(spokePool.events.FundsDeposited.last()).toEqual({ params: params({ inputAmount: 9_950n }), value: 0n });
      expect(wrapper.events.TransferSent.last()).toEqual({
        sender: alice,
        inputToken: token.address,
        destinationChainId: 42161,
        net: 9_950n,
        message: '0xcafe',
      });
    });

    it('rejects an output amount above the net input', () => {
      expect(errorCode(() => deposit(params({ outputAmount: 9_951n })))).toBe('WRAPPER_INVALID_PARAMS');
      expect(errorCode(() => deposit(params({ outputAmount: 9_950n })))).toBeUndefined();
    });

    it('rejects zero amounts and unknown tokens', () => {
      expect(errorCode(() => deposit(params({ inputAmount: 0n, outputAmount: 0n })))).toBe('WRAPPER_AMOUNT_ZERO');
      expect(errorCode(() => deposit(params({ inputToken: acct.relayer })))).toBe('WRAPPER_INVALID_PARAMS');
      expect(token.balanceOf(alice)).toBe(20_000n);
    });
  });

  describe('native deposits', () => {
    it('forwards msg.value net of the fee', () => {
      deposit(params({ inputToken: ZERO_ADDRESS }), 10_000n);

      expect(chain.balanceOf(alice)).toBe(10_000n);
      expect(chain.balanceOf(acct.treasury)).toBe(50n);
      expect(chain.balanceOf(spokePool.address)).toBe(9_950n);
      expect(spokePool.events.FundsDeposited.last()?.value).toBe(9_950n);
      expect(spokePool.events.FundsDeposited.last()?.params.inputAmount).toBe(9_950n);
    });

    it('requires msg.value to match the input amount', () => {
      expect(errorCode(() => deposit(params({ inputToken: ZERO_ADDRESS }), 9_999n))).toBe('WRAPPER_INVALID_PARAMS');
      expect(chain.balanceOf(alice)).toBe(20_000n);
    });
  });

  it('requires a spoke pool', () => {
    const poolAtZero = {
      address: ZERO_ADDRESS,
      contractName: 'SpokePool',
      onNativeReceived: () => undefined,
      deposit: () => undefined,
    };
    const config = { treasury: acct.treasury, feeRate: 0n, owner: acct.owner, spokePool: poolAtZero };
    expect(errorCode(() => new AcrossV4Wrapper(chain, config))).toBe('WRAPPER_SPOKE_POOL_ZERO_ADDRESS');
  });
});
