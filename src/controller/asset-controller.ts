/**
 * Burn-and-mint asset controller for bridged tokens
 */

import type { Address } from '../core/types.js';
import { isZeroAddress } from '../core/address.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { BridgedToken } from '../tokens/bridged-token.js';
import { Lockbox } from '../tokens/lockbox.js';
import { BaseAssetController, type ControllerConfig } from './base-controller.js';
import { ControllerError } from './errors.js';

export class AssetController extends BaseAssetController<BridgedToken> {
  constructor(chain: Chain, config: ControllerConfig) {
    super(chain, 'AssetController', config, isBridgedToken);
  }

  /**
   * Burns through the sender's allowance; any token failure is reported as TOKEN_BURN_FAILED
   */
  protected override debit(sender: Address, amount: bigint): void {
    const token = this.token;
    try {
      this.external(token, () => {
        token.burn(sender, amount);
      });
    } catch (error) {
      throw new ControllerError({
        code: 'CONTROLLER_TOKEN_BURN_FAILED',
        message: `Burning ${String(amount)} ${token.symbol} from ${sender} failed`,
        details: { sender, amount, cause: error instanceof Error ? error.message : String(error) },
        suggestion: 'Approve the controller for the amount and make sure it is a minter of the token',
      });
    }
  }

  protected override credit(recipient: Address, amount: bigint, unwrap: boolean): void {
    const token = this.token;
    const lockbox = this.lockbox();
    if (!unwrap || !this.allowTokenUnwrapping || !lockbox) {
      this.external(token, () => {
        token.mint(recipient, amount);
      });
      return;
    }

    this.external(token, () => {
      token.mint(this.address, amount);
    });
    try {
      // a failed withdrawal rolls back only this frame
      this.chain.call({ from: this.address, to: this.address }, () => {
        this.external(token, () => token.approve(lockbox.address, amount));
        this.external(lockbox, () => {
          lockbox.withdrawTo(recipient, amount);
        });
      });
    } catch (error) {
      this.log.warn('Unwrap failed, delivering the bridged token', {
        recipient,
        amount,
        cause: error instanceof Error ? error.message : String(error),
      });
      this.external(token, () => token.transfer(recipient, amount));
    }
  }

  private lockbox(): Lockbox | undefined {
    const address = this.token.lockbox;
    if (isZeroAddress(address)) return undefined;
    const lockbox = this.chain.contractAt(address);
    return lockbox instanceof Lockbox ? lockbox : undefined;
  }
}

function isBridgedToken(contract: Deployed): contract is BridgedToken {
  return contract instanceof BridgedToken;
}
