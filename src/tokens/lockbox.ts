/**
 * Lockbox: one-to-one converter between a native ERC20 and its bridged token
 */

import type { Address } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import type { ERC20 } from './erc20.js';
import type { BridgedToken } from './bridged-token.js';
import { TokenError } from './errors.js';

export interface LockboxConfig {
  /** Native token held by the lockbox */
  erc20: ERC20;
  bridgedToken: BridgedToken;
  logger?: Logger;
}

export interface LockboxMovement {
  sender: Address;
  amount: bigint;
}

export class Lockbox extends Contract {
  readonly erc20: ERC20;
  readonly bridgedToken: BridgedToken;

  readonly events = {
    Deposit: this.event<LockboxMovement>('Deposit'),
    Withdraw: this.event<LockboxMovement>('Withdraw'),
  };

  constructor(chain: Chain, config: LockboxConfig) {
    super(chain, 'Lockbox', config.logger);
    this.erc20 = config.erc20;
    this.bridgedToken = config.bridgedToken;
  }

  deposit(amount: bigint): void {
    this.depositTo(this.msg.sender, amount);
  }

  /**
   * Lock native tokens from the caller and mint the bridged token to `to`
   */
  depositTo(to: Address, amount: bigint): void {
    requireAmount(amount, this.address);
    const sender = this.msg.sender;
    this.external(this.erc20, () => this.erc20.transferFrom(sender, this.address, amount));
    this.external(this.bridgedToken, () => {
      this.bridgedToken.mint(to, amount);
    });
    this.events.Deposit.emit({ sender, amount });
  }

  withdraw(amount: bigint): void {
    this.withdrawTo(this.msg.sender, amount);
  }

  /**
   * Burn the caller's bridged tokens (the lockbox needs an allowance) and release native tokens to `to`
   */
  withdrawTo(to: Address, amount: bigint): void {
    requireAmount(amount, this.address);
    const sender = this.msg.sender;
    this.external(this.bridgedToken, () => {
      this.bridgedToken.burn(sender, amount);
    });
    this.external(this.erc20, () => this.erc20.transfer(to, amount));
    this.events.Withdraw.emit({ sender, amount });
  }
}

function requireAmount(amount: bigint, lockbox: Address): void {
  if (amount <= 0n) {
    throw new TokenError('LOCKBOX_AMOUNT_ZERO', 'Lockbox: amount must be positive', { lockbox });
  }
}
