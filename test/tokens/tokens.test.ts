import { describe, it, expect, beforeEach } from 'vitest';
import type { Chain } from '../../src/chain/chain.js';
import type { Address, Hex } from '../../src/core/types.js';
import { ZERO_ADDRESS } from '../../src/core/address.js';
import { privateKeyToAddress, sign } from '../../src/core/signature.js';
import { MAX_UINT256 } from '../../src/tokens/erc20.js';
import { BridgedToken } from '../../src/tokens/bridged-token.js';
import { FiatToken } from '../../src/tokens/fiat-token.js';
import { Lockbox } from '../../src/tokens/lockbox.js';
import type { PermitSignature } from '../../src/tokens/permit-token.js';
import { TestPermitToken, TestToken } from '../mocks/tokens.js';
import { accounts, errorCode, newChain, send, type Accounts } from '../helpers.js';

describe('ERC20', () => {
  let chain: Chain;
  let acct: Accounts;
  let token: TestToken;

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    token = new TestToken(chain, { name: 'Test Token', symbol: 'TST' });
    token.mint(acct.alice, 1_000n);
  });

  it('tracks supply and balances', () => {
    expect(token.totalSupply()).toBe(1_000n);
    expect(token.decimals).toBe(18);
    send(acct.alice, token, () => token.transfer(acct.bob, 250n));
    expect(token.balanceOf(acct.alice)).toBe(750n);
    expect(token.balanceOf(acct.bob)).toBe(250n);
  });

  it('rejects transfers above the balance', () => {
    expect(errorCode(() => send(acct.bob, token, () => token.transfer(acct.alice, 1n)))).toBe('ERC20_INSUFFICIENT_BALANCE');
  });

  it('spends allowances on transferFrom', () => {
    send(acct.alice, token, () => token.approve(acct.bob, 300n));
    send(acct.bob, token, () => token.transferFrom(acct.alice, acct.owner, 100n));
    expect(token.allowance(acct.alice, acct.bob)).toBe(200n);
    expect(token.balanceOf(acct.owner)).toBe(100n);
    expect(errorCode(() => send(acct.bob, token, () => token.transferFrom(acct.alice, acct.owner, 201n)))).toBe(
      'ERC20_INSUFFICIENT_ALLOWANCE'
    );
  });

  it('never decreases an infinite allowance', () => {
    send(acct.alice, token, () => token.approve(acct.bob, MAX_UINT256));
    send(acct.bob, token, () => token.transferFrom(acct.alice, acct.bob, 500n));
    expect(token.allowance(acct.alice, acct.bob)).toBe(MAX_UINT256);
  });

  it('rejects the zero address as spender', () => {
    expect(errorCode(() => send(acct.alice, token, () => token.approve(ZERO_ADDRESS, 1n)))).toBe(
      'ERC20_INVALID_SPENDER'
    );
  });
});

describe('PermitERC20', () => {
  const ownerKey: Hex = `0x${'42'.repeat(32)}`;
  const otherKey: Hex = `0x${'43'.repeat(32)}`;

  let chain: Chain;
  let acct: Accounts;
  let token: TestPermitToken;
  let owner: Address;
  let deadline: bigint;

  function signPermit(key: Hex, value: bigint, nonce: bigint): PermitSignature {
    const digest = token.permitDigest(owner, acct.bob, value, nonce, deadline);
    const { v, r, s } = sign(digest, key);
    return { deadline, v, r, s };
  }

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    token = new TestPermitToken(chain, { name: 'Permit Token', symbol: 'PRM' });
    owner = privateKeyToAddress(ownerKey);
    deadline = BigInt(chain.now() + 3600);
  });

  it('approves from a signature submitted by anyone', () => {
    const permit = signPermit(ownerKey, 100n, 0n);
    send(acct.relayer, token, () => token.permit(owner, acct.bob, 100n, permit));
    expect(token.allowance(owner, acct.bob)).toBe(100n);
    expect(token.nonces(owner)).toBe(1n);
  });

  it('rejects a replayed signature', () => {
    const permit = signPermit(ownerKey, 100n, 0n);
    send(acct.relayer, token, () => token.permit(owner, acct.bob, 100n, permit));
    expect(errorCode(() => send(acct.relayer, token, () => token.permit(owner, acct.bob, 100n, permit)))).toBe(
      'PERMIT_INVALID_SIGNER'
    );
  });

  it('rejects a signature from another key', () => {
    const permit = signPermit(otherKey, 100n, 0n);
    expect(errorCode(() => send(acct.relayer, token, () => token.permit(owner, acct.bob, 100n, permit)))).toBe(
      'PERMIT_INVALID_SIGNER'
    );
  });

  it('rejects a signature for another value', () => {
    const permit = signPermit(ownerKey, 100n, 0n);
    expect(errorCode(() => send(acct.relayer, token, () => token.permit(owner, acct.bob, 101n, permit)))).toBe(
      'PERMIT_INVALID_SIGNER'
    );
  });

  it('rejects a permit after its deadline', () => {
    const permit = signPermit(ownerKey, 100n, 0n);
    chain.setTime(Number(deadline) + 1);
    expect(errorCode(() => send(acct.relayer, token, () => token.permit(owner, acct.bob, 100n, permit)))).toBe(
      'PERMIT_EXPIRED'
    );
  });

  it('binds the domain to chain and contract', () => {
    const other = new TestPermitToken(chain, { name: 'Permit Token', symbol: 'PRM' });
    expect(other.DOMAIN_SEPARATOR()).not.toBe(token.DOMAIN_SEPARATOR());
  });
});

describe('BridgedToken and Lockbox', () => {
  let chain: Chain;
  let acct: Accounts;
  let native: TestToken;
  let bridged: BridgedToken;
  let lockbox: Lockbox;

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    native = new TestToken(chain, { name: 'Native', symbol: 'NTV' });
    bridged = new BridgedToken(chain, { name: 'Bridged Native', symbol: 'xNTV', owner: acct.owner });
    lockbox = new Lockbox(chain, { erc20: native, bridgedToken: bridged });
    send(acct.owner, bridged, () => {
      bridged.setMinter(lockbox.address, true);
      bridged.setLockbox(lockbox.address);
    });
    native.mint(acct.alice, 100n);
  });

  it('restricts minting to minters', () => {
    expect(errorCode(() => send(acct.alice, bridged, () => bridged.mint(acct.alice, 1n)))).toBe('NOT_MINTER');
    expect(errorCode(() => send(acct.alice, bridged, () => bridged.setMinter(acct.alice, true)))).toBe(
      'OWNABLE_UNAUTHORIZED_ACCOUNT'
    );
    expect(bridged.lockbox).toBe(lockbox.address);
  });

  it('burns from others only through an allowance', () => {
    send(acct.owner, bridged, () => bridged.setMinter(acct.bob, true));
    send(acct.bob, bridged, () => bridged.mint(acct.alice, 50n));
    expect(errorCode(() => send(acct.bob, bridged, () => bridged.burn(acct.alice, 10n)))).toBe(
      'ERC20_INSUFFICIENT_ALLOWANCE'
    );
    send(acct.alice, bridged, () => bridged.approve(acct.bob, 10n));
    send(acct.bob, bridged, () => bridged.burn(acct.alice, 10n));
    expect(bridged.balanceOf(acct.alice)).toBe(40n);
    expect(bridged.totalSupply()).toBe(40n);
  });

  it('wraps and unwraps one to one', () => {
    send(acct.alice, native, () => native.approve(lockbox.address, 60n));
    send(acct.alice, lockbox, () => lockbox.deposit(60n));
    expect(bridged.balanceOf(acct.alice)).toBe(60n);
    expect(native.balanceOf(lockbox.address)).toBe(60n);

    send(acct.alice, bridged, () => bridged.approve(lockbox.address, 20n));
    send(acct.alice, lockbox, () => lockbox.withdrawTo(acct.bob, 20n));
    expect(native.balanceOf(acct.bob)).toBe(20n);
    expect(bridged.balanceOf(acct.alice)).toBe(40n);
    expect(lockbox.events.Withdraw.last()).toEqual({ sender: acct.alice, amount: 20n });
  });

  it('rejects zero amounts', () => {
    expect(errorCode(() => send(acct.alice, lockbox, () => lockbox.deposit(0n)))).toBe('LOCKBOX_AMOUNT_ZERO');
  });
});

describe('FiatToken', () => {
  let chain: Chain;
  let acct: Accounts;
  let token: FiatToken;

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    token = new FiatToken(chain, { name: 'USD Coin', symbol: 'USDC', owner: acct.owner });
    send(acct.owner, token, () => token.configureMinter(acct.bob, 100n));
  });

  it('draws mints down from the minter allowance', () => {
    send(acct.bob, token, () => token.mint(acct.alice, 70n));
    expect(token.decimals).toBe(6);
    expect(token.balanceOf(acct.alice)).toBe(70n);
    expect(token.minterAllowance(acct.bob)).toBe(30n);
    expect(errorCode(() => send(acct.bob, token, () => token.mint(acct.alice, 31n)))).toBe('MINT_ALLOWANCE_EXCEEDED');
    expect(token.supplyEvents.Mint.last()).toEqual({ minter: acct.bob, account: acct.alice, amount: 70n });
  });

  it('burns only from the minter itself', () => {
    send(acct.bob, token, () => token.mint(acct.bob, 50n));
    send(acct.bob, token, () => token.burn(20n));
    expect(token.balanceOf(acct.bob)).toBe(30n);
    expect(token.totalSupply()).toBe(30n);
    expect(errorCode(() => send(acct.alice, token, () => token.burn(1n)))).toBe('NOT_MINTER');
  });

  it('lets only the master minter manage minters', () => {
    expect(errorCode(() => send(acct.alice, token, () => token.configureMinter(acct.alice, 1n)))).toBe(
      'OWNABLE_UNAUTHORIZED_ACCOUNT'
    );
    send(acct.owner, token, () => token.removeMinter(acct.bob));
    expect(token.isMinter(acct.bob)).toBe(false);
    expect(token.minterAllowance(acct.bob)).toBe(0n);
    expect(errorCode(() => send(acct.bob, token, () => token.mint(acct.bob, 1n)))).toBe('NOT_MINTER');
  });
});
