/**
 * Lock/release controller for fiat-backed tokens whose issuer may take over
 * the remote supply: once migrated, the issuer burns what this pool locked.
 */

import type { Chain } from '../chain/chain.js';
import { DEFAULT_ADMIN_ROLE } from '../chain/access-control.js';
import { keccak256 } from '../core/hash.js';
import { FiatToken } from '../tokens/fiat-token.js';
import { invalidParams, type ControllerConfig } from './base-controller.js';
import { LockReleaseAssetController } from './lock-release-controller.js';
import { ControllerError } from './errors.js';

export const BURN_LOCKED_TOKENS_ROLE = keccak256('BURN_LOCKED_TOKENS_ROLE');

export class CircleLockReleaseAssetController extends LockReleaseAssetController {
  readonly fiatToken: FiatToken;

  readonly burnEvents = {
    AllowedTokensToBurnSet: this.event<{ amount: bigint }>('AllowedTokensToBurnSet'),
    LockedTokensBurned: this.event<{ amount: bigint }>('LockedTokensBurned'),
  };

  private readonly allowedToBurn = this.value(0n);

  constructor(chain: Chain, config: ControllerConfig) {
    super(chain, config, 'CircleLockReleaseAssetController');
    if (!(this.token instanceof FiatToken)) {
      throw invalidParams(`${config.token} is not a fiat token`, { token: config.token });
    }
    this.fiatToken = this.token;
  }

  get allowedTokensToBurn(): bigint {
    return this.allowedToBurn.get();
  }

  /**
   * Amount of locked tokens the next burnLockedUSDC destroys
   */
  setAllowedTokensToBurn(amount: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.allowedToBurn.set(amount);
    this.burnEvents.AllowedTokensToBurnSet.emit({ amount });
  }

  /**
   * Burn the allowed amount out of the pool; this controller must be a minter of the token
   */
  burnLockedUSDC(): void {
    this.access.checkRole(BURN_LOCKED_TOKENS_ROLE);
    const amount = this.allowedTokensToBurn;
    if (amount === 0n) {
      throw new ControllerError({
        code: 'CONTROLLER_NO_TOKENS_TO_BURN',
        message: 'No locked tokens are allowed to burn',
        suggestion: 'Set the amount with setAllowedTokensToBurn first',
      });
    }
    this.allowedToBurn.set(0n);
    const token = this.fiatToken;
    this.external(token, () => {
      token.burn(amount);
    });
    this.burnEvents.LockedTokensBurned.emit({ amount });
    this.log.info('Burned locked tokens', { amount });
  }
}
