/**
 * Bridged token (XERC20 style)
 *
 * Supply is controlled by authorised bridges, which are the asset
 * controllers. Rate limits live in the controllers, not here.
 */

import type { Address } from '../core/types.js';
import { ZERO_ADDRESS } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Ownable } from '../chain/access-control.js';
import { PermitERC20 } from './permit-token.js';
import { TokenError } from './errors.js';

export interface BridgedTokenConfig {
  name: string;
  symbol: string;
  owner: Address;
  decimals?: number;
  logger?: Logger;
}

export interface MinterSetEvent {
  minter: Address;
  allowed: boolean;
}

export interface LockboxSetEvent {
  lockbox: Address;
}

export class BridgedToken extends PermitERC20 {
  readonly ownable: Ownable;

  readonly supplyEvents = {
    MinterSet: this.event<MinterSetEvent>('MinterSet'),
    LockboxSet: this.event<LockboxSetEvent>('LockboxSet'),
  };

  private readonly minters = this.map<Address, boolean>(() => false);
  private readonly lockboxAddress = this.value<Address>(ZERO_ADDRESS);

  constructor(chain: Chain, config: BridgedTokenConfig) {
    super(chain, config);
    this.ownable = new Ownable(chain, this.address, config.owner);
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  /**
   * Lockbox converting the native token into this one; zero when there is none
   */
  get lockbox(): Address {
    return this.lockboxAddress.get();
  }

  isMinter(account: Address): boolean {
    return this.minters.get(account);
  }

  setMinter(minter: Address, allowed: boolean): void {
    this.ownable.checkOwner();
    this.minters.set(minter, allowed);
    this.supplyEvents.MinterSet.emit({ minter, allowed });
  }

  setLockbox(lockbox: Address): void {
    this.ownable.checkOwner();
    this.lockboxAddress.set(lockbox);
    this.supplyEvents.LockboxSet.emit({ lockbox });
  }

  mint(to: Address, amount: bigint): void {
    this.requireMinter();
    this._mint(to, amount);
  }

  /**
   * Burn from `from`; a caller other than `from` spends its allowance
   */
  burn(from: Address, amount: bigint): void {
    const sender = this.requireMinter();
    if (sender !== from) {
      this._spendAllowance(from, sender, amount);
    }
    this._burn(from, amount);
  }

  private requireMinter(): Address {
    const sender = this.msg.sender;
    if (!this.minters.get(sender)) {
      throw new TokenError('NOT_MINTER', `${sender} is not an authorised bridge for ${this.symbol}`, {
        token: this.address,
        caller: sender,
      });
    }
    return sender;
  }
}
