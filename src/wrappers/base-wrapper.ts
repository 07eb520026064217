/**
 * Fee-taking wrapper base
 *
 * Holds the treasury and flat fee rate, pausing, reentrancy protection and
 * rescue of stuck funds. Subclasses decide who may change settings.
 */

import type { Address } from '../core/types.js';
import { isZeroAddress, ZERO_ADDRESS } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { Pausable, ReentrancyGuard } from '../chain/guards.js';
import type { ERC20 } from '../tokens/erc20.js';
import { FeeOnTransferTokenError, WrapperError } from './errors.js';
import { validateFeeRate } from './fee-tiers.js';

export interface WrapperConfig {
  treasury: Address;
  /** Flat fee in RATE_DENOMINATOR units */
  feeRate: bigint;
  logger?: Logger;
}

export interface TreasurySetEvent {
  oldTreasury: Address;
  newTreasury: Address;
}

export interface FeeRateSetEvent {
  oldRate: bigint;
  newRate: bigint;
}

export abstract class FeeWrapper extends Contract {
  readonly pausable: Pausable;

  readonly settingsEvents = {
    TreasurySet: this.event<TreasurySetEvent>('TreasurySet'),
    FeeRateSet: this.event<FeeRateSetEvent>('FeeRateSet'),
  };

  protected readonly guard = new ReentrancyGuard();
  private readonly treasuryValue = this.value<Address>(ZERO_ADDRESS);
  private readonly feeRateValue = this.value(0n);

  constructor(chain: Chain, contractName: string, config: WrapperConfig) {
    super(chain, contractName, config.logger);
    validateFeeRate(config.feeRate);
    requireTreasuryFor(config.feeRate, config.treasury);
    this.pausable = new Pausable(chain, this.address);
    this.writeTreasury(config.treasury);
    this.writeFeeRate(config.feeRate);
  }

  get treasury(): Address {
    return this.treasuryValue.get();
  }

  get feeRate(): bigint {
    return this.feeRateValue.get();
  }

  get paused(): boolean {
    return this.pausable.paused;
  }

  // ============ Settings ============

  setFeeRate(newRate: bigint): void {
    this.checkManager();
    validateFeeRate(newRate);
    requireTreasuryFor(newRate, this.treasury);
    this.writeFeeRate(newRate);
  }

  setTreasury(newTreasury: Address): void {
    this.checkAdmin();
    if (isZeroAddress(newTreasury)) {
      throw new WrapperError('WRAPPER_TREASURY_ZERO_ADDRESS', 'Treasury cannot be the zero address');
    }
    this.writeTreasury(newTreasury);
  }

  rescueTokens(token: ERC20, to: Address, amount: bigint): void {
    this.checkAdmin();
    requireRecipient(to);
    this.external(token, () => token.transfer(to, amount));
    this.log.info('Rescued tokens', { token: token.symbol, to, amount });
  }

  rescueETH(to: Address, amount: bigint): void {
    this.checkAdmin();
    requireRecipient(to);
    this.payOut(to, amount);
    this.log.info('Rescued native value', { to, amount });
  }

  pause(): void {
    this.checkAdmin();
    this.pausable.pause(this.msg.sender);
  }

  unpause(): void {
    this.checkAdmin();
    this.pausable.unpause(this.msg.sender);
  }

  // ============ Access hooks ============

  /**
   * Guards treasury, rescue and pause
   */
  protected abstract checkAdmin(): void;

  /**
   * Guards fee settings
   */
  protected abstract checkManager(): void;

  // ============ Token movement ============

  /**
   * Pull exactly `amount` from `from`; tokens that deliver less are rejected
   */
  protected pullExact(token: ERC20, from: Address, amount: bigint): void {
    const before = token.balanceOf(this.address);
    this.external(token, () => token.transferFrom(from, this.address, amount));
    const received = token.balanceOf(this.address) - before;
    if (received !== amount) {
      throw new FeeOnTransferTokenError(token.address, amount, received);
    }
  }

  protected payOut(to: Address, amount: bigint): void {
    if (amount === 0n) return;
    try {
      this.sendValue(to, amount);
    } catch (error) {
      throw new WrapperError('WRAPPER_TRANSFER_FAILED', `Native transfer of ${String(amount)} to ${to} failed`, {
        to,
        amount,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private writeTreasury(newTreasury: Address): void {
    const oldTreasury = this.treasury;
    this.treasuryValue.set(newTreasury);
    this.settingsEvents.TreasurySet.emit({ oldTreasury, newTreasury });
  }

  private writeFeeRate(newRate: bigint): void {
    const oldRate = this.feeRate;
    this.feeRateValue.set(newRate);
    this.settingsEvents.FeeRateSet.emit({ oldRate, newRate });
  }
}

function requireTreasuryFor(feeRate: bigint, treasury: Address): void {
  if (feeRate > 0n && isZeroAddress(treasury)) {
    throw new WrapperError(
      'WRAPPER_TREASURY_ZERO_ADDRESS',
      'A non-zero fee rate needs a treasury',
      { feeRate },
      'Set the treasury before the fee rate'
    );
  }
}

export function requireRecipient(to: Address): void {
  if (isZeroAddress(to)) {
    throw new WrapperError('WRAPPER_ZERO_ADDRESS', 'Recipient cannot be the zero address');
  }
}
