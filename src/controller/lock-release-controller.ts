/**
 * Lock-and-release asset controller
 * For tokens that cannot be minted remotely: outbound transfers lock tokens in
 * the controller, inbound transfers release them from that pool.
 */

import type { Address } from '../core/types.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { ERC20 } from '../tokens/erc20.js';
import { BaseAssetController, type ControllerConfig } from './base-controller.js';
import { ControllerError } from './errors.js';

export interface LiquidityEvent {
  amount: bigint;
}

export class LockReleaseAssetController extends BaseAssetController<ERC20> {
  readonly liquidityEvents = {
    LiquidityAdded: this.event<LiquidityEvent>('LiquidityAdded'),
    LiquidityRemoved: this.event<LiquidityEvent>('LiquidityRemoved'),
  };

  constructor(chain: Chain, config: ControllerConfig, contractName = 'LockReleaseAssetController') {
    super(chain, contractName, config, isERC20);
  }

  override setTokenUnwrapping(allowed: boolean): void {
    throw new ControllerError({
      code: 'CONTROLLER_UNWRAPPING_NOT_SUPPORTED',
      message: 'Lock/release controllers never unwrap',
      details: { allowed },
    });
  }

  protected override debit(sender: Address, amount: bigint): void {
    const token = this.token;
    this.external(token, () => token.transferFrom(sender, this.address, amount));
    this.liquidityEvents.LiquidityAdded.emit({ amount });
  }

  /**
   * Unwrap is ignored; the pool must hold the full amount
   */
  protected override credit(recipient: Address, amount: bigint): void {
    const token = this.token;
    const available = token.balanceOf(this.address);
    if (available < amount) {
      throw new ControllerError({
        code: 'CONTROLLER_NOT_ENOUGH_TOKENS_IN_POOL',
        message: `Pool holds ${String(available)}, ${String(amount)} requested`,
        details: { available, amount },
        suggestion: 'Wait for outbound transfers to refill the pool',
        retryable: true,
      });
    }
    this.external(token, () => token.transfer(recipient, amount));
    this.liquidityEvents.LiquidityRemoved.emit({ amount });
  }
}

function isERC20(contract: Deployed): contract is ERC20 {
  return contract instanceof ERC20;
}
