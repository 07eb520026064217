/**
 * Owner-run fee wrapper in front of a third-party deposit entry point
 */

import type { Address } from '../core/types.js';
import { isZeroAddress } from '../core/address.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { Ownable } from '../chain/access-control.js';
import { ERC20 } from '../tokens/erc20.js';
import { FeeWrapper, type WrapperConfig } from './base-wrapper.js';
import { WrapperError } from './errors.js';
import { quoteFlatFee, type FeeQuote } from './fee-tiers.js';

export interface DepositWrapperConfig extends WrapperConfig {
  owner: Address;
}

export abstract class DepositWrapper extends FeeWrapper {
  readonly ownable: Ownable;

  constructor(chain: Chain, contractName: string, config: DepositWrapperConfig) {
    super(chain, contractName, config);
    this.ownable = new Ownable(chain, this.address, config.owner);
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  quote(amount: bigint): FeeQuote {
    return quoteFlatFee(this.feeRate, amount);
  }

  transferOwnership(newOwner: Address): void {
    this.ownable.transferOwnership(newOwner);
  }

  protected override checkAdmin(): void {
    this.ownable.checkOwner();
  }

  protected override checkManager(): void {
    this.ownable.checkOwner();
  }

  /**
   * Pull `amount` of `token` from the caller and send the fee to the treasury
   */
  protected takeTokenFee(token: ERC20, amount: bigint): FeeQuote {
    this.pullExact(token, this.msg.sender, amount);
    const quote = this.quote(amount);
    if (quote.fee > 0n) {
      const treasury = this.treasury;
      this.external(token, () => token.transfer(treasury, quote.fee));
    }
    return quote;
  }

  /**
   * Send the fee share of msg.value to the treasury
   */
  protected takeNativeFee(amount: bigint): FeeQuote {
    const quote = this.quote(amount);
    this.payOut(this.treasury, quote.fee);
    return quote;
  }

  protected resolveToken(address: Address): ERC20 {
    const token = this.chain.contractAt(address);
    if (!(token instanceof ERC20)) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', `${address} is not a token`, { token: address });
    }
    return token;
  }
}

export function requireEntryPoint(
  entryPoint: Deployed,
  code: 'WRAPPER_RELAY_DEPOSITORY_ZERO_ADDRESS' | 'WRAPPER_SPOKE_POOL_ZERO_ADDRESS'
): void {
  if (isZeroAddress(entryPoint.address)) {
    throw new WrapperError(code, 'Deposit entry point cannot be the zero address');
  }
}
