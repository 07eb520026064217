/**
 * Token stand-ins
 */

import type { Address } from '../../src/core/types.js';
import { ERC20 } from '../../src/tokens/erc20.js';
import { PermitERC20 } from '../../src/tokens/permit-token.js';

/**
 * Freely mintable token
 */
export class TestToken extends ERC20 {
  mint(to: Address, amount: bigint): void {
    this._mint(to, amount);
  }
}

export class TestPermitToken extends PermitERC20 {
  mint(to: Address, amount: bigint): void {
    this._mint(to, amount);
  }
}

/**
 * Burns 1% of every transfer
 */
export class FeeOnTransferToken extends TestToken {
  protected override _transfer(from: Address, to: Address, value: bigint): void {
    const fee = value / 100n;
    super._transfer(from, to, value - fee);
    if (fee > 0n) this._burn(from, fee);
  }
}
