/**
 * ERC20 token
 */

import type { Address } from '../core/types.js';
import { isZeroAddress, ZERO_ADDRESS } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { InsufficientAllowanceError, InsufficientTokenBalanceError, TokenError } from './errors.js';

export interface TransferEvent {
  from: Address;
  to: Address;
  value: bigint;
}

export interface ApprovalEvent {
  owner: Address;
  spender: Address;
  value: bigint;
}

export interface ERC20Config {
  name: string;
  symbol: string;
  decimals?: number;
  logger?: Logger;
}

export const MAX_UINT256 = (1n << 256n) - 1n;

export class ERC20 extends Contract {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  readonly events = {
    Transfer: this.event<TransferEvent>('Transfer'),
    Approval: this.event<ApprovalEvent>('Approval'),
  };

  private readonly balances = this.map<Address, bigint>(() => 0n);
  private readonly allowances = this.map<string, bigint>(() => 0n);
  private readonly supply = this.value(0n);

  constructor(chain: Chain, config: ERC20Config) {
    super(chain, config.symbol, config.logger);
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals ?? 18;
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender));
  }

  transfer(to: Address, value: bigint): boolean {
    this._transfer(this.msg.sender, to, value);
    return true;
  }

  approve(spender: Address, value: bigint): boolean {
    this._approve(this.msg.sender, spender, value);
    return true;
  }

  transferFrom(from: Address, to: Address, value: bigint): boolean {
    this._spendAllowance(from, this.msg.sender, value);
    this._transfer(from, to, value);
    return true;
  }

  // ============ Internal ============

  protected _transfer(from: Address, to: Address, value: bigint): void {
    if (isZeroAddress(from)) {
      throw new TokenError('ERC20_INVALID_SENDER', 'ERC20: transfer from the zero address', { token: this.address });
    }
    if (isZeroAddress(to)) {
      throw new TokenError('ERC20_INVALID_RECEIVER', 'ERC20: transfer to the zero address', { token: this.address });
    }
    this._update(from, to, value);
  }

  protected _mint(to: Address, value: bigint): void {
    if (isZeroAddress(to)) {
      throw new TokenError('ERC20_INVALID_RECEIVER', 'ERC20: mint to the zero address', { token: this.address });
    }
    this._update(ZERO_ADDRESS, to, value);
  }

  protected _burn(from: Address, value: bigint): void {
    if (isZeroAddress(from)) {
      throw new TokenError('ERC20_INVALID_SENDER', 'ERC20: burn from the zero address', { token: this.address });
    }
    this._update(from, ZERO_ADDRESS, value);
  }

  protected _approve(owner: Address, spender: Address, value: bigint): void {
    if (isZeroAddress(spender)) {
      throw new TokenError('ERC20_INVALID_SPENDER', 'ERC20: approve to the zero address', { token: this.address });
    }
    this.allowances.set(allowanceKey(owner, spender), value);
    this.events.Approval.emit({ owner, spender, value });
  }

  /**
   * Infinite allowances are never decreased
   */
  protected _spendAllowance(owner: Address, spender: Address, value: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return;
    if (current < value) {
      throw new InsufficientAllowanceError(this.address, owner, spender, value, current);
    }
    this.allowances.set(allowanceKey(owner, spender), current - value);
  }

  private _update(from: Address, to: Address, value: bigint): void {
    if (value < 0n) {
      throw new TokenError('ERC20_INSUFFICIENT_BALANCE', `ERC20: negative amount ${String(value)}`, { token: this.address });
    }
    if (isZeroAddress(from)) {
      this.supply.set(this.supply.get() + value);
    } else {
      const balance = this.balances.get(from);
      if (balance < value) {
        throw new InsufficientTokenBalanceError(this.address, from, value, balance);
      }
      this.balances.set(from, balance - value);
    }

    if (isZeroAddress(to)) {
      this.supply.set(this.supply.get() - value);
    } else {
      this.balances.update(to, (balance) => balance + value);
    }

    this.events.Transfer.emit({ from, to, value });
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}
