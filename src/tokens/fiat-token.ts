/**
 * Fiat-backed token (USDC style)
 *
 * The owner acts as master minter: it configures minters, each with an
 * allowance that every mint draws down. Minters burn only their own balance.
 */

import type { Address } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Ownable } from '../chain/access-control.js';
import { PermitERC20 } from './permit-token.js';
import { TokenError } from './errors.js';

export interface FiatTokenConfig {
  name: string;
  symbol: string;
  /** Master minter */
  owner: Address;
  decimals?: number;
  logger?: Logger;
}

export interface MinterConfiguredEvent {
  minter: Address;
  allowance: bigint;
}

export interface SupplyChangeEvent {
  minter: Address;
  account: Address;
  amount: bigint;
}

export class FiatToken extends PermitERC20 {
  readonly ownable: Ownable;

  readonly supplyEvents = {
    MinterConfigured: this.event<MinterConfiguredEvent>('MinterConfigured'),
    MinterRemoved: this.event<{ minter: Address }>('MinterRemoved'),
    Mint: this.event<SupplyChangeEvent>('Mint'),
    Burn: this.event<SupplyChangeEvent>('Burn'),
  };

  private readonly minters = this.map<Address, boolean>(() => false);
  private readonly minterAllowances = this.map<Address, bigint>(() => 0n);

  constructor(chain: Chain, config: FiatTokenConfig) {
    super(chain, { name: config.name, symbol: config.symbol, decimals: config.decimals ?? 6, logger: config.logger });
    this.ownable = new Ownable(chain, this.address, config.owner);
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  isMinter(account: Address): boolean {
    return this.minters.get(account);
  }

  minterAllowance(minter: Address): bigint {
    return this.minterAllowances.get(minter);
  }

  configureMinter(minter: Address, allowance: bigint): void {
    this.ownable.checkOwner();
    this.minters.set(minter, true);
    this.minterAllowances.set(minter, allowance);
    this.supplyEvents.MinterConfigured.emit({ minter, allowance });
  }

  removeMinter(minter: Address): void {
    this.ownable.checkOwner();
    this.minters.set(minter, false);
    this.minterAllowances.set(minter, 0n);
    this.supplyEvents.MinterRemoved.emit({ minter });
  }

  mint(to: Address, amount: bigint): void {
    const minter = this.requireMinter();
    const allowance = this.minterAllowances.get(minter);
    if (amount > allowance) {
      throw new TokenError('MINT_ALLOWANCE_EXCEEDED', `Mint of ${String(amount)} exceeds allowance ${String(allowance)}`, {
        token: this.address,
        minter,
        amount,
        allowance,
      });
    }
    this.minterAllowances.set(minter, allowance - amount);
    this._mint(to, amount);
    this.supplyEvents.Mint.emit({ minter, account: to, amount });
  }

  /**
   * Burn from the caller's own balance
   */
  burn(amount: bigint): void {
    const minter = this.requireMinter();
    this._burn(minter, amount);
    this.supplyEvents.Burn.emit({ minter, account: minter, amount });
  }

  private requireMinter(): Address {
    const sender = this.msg.sender;
    if (!this.minters.get(sender)) {
      throw new TokenError('NOT_MINTER', `${sender} is not a minter of ${this.symbol}`, {
        token: this.address,
        caller: sender,
      });
    }
    return sender;
  }
}
