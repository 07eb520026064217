/**
 * FeeCollector
 * Charges multi-bridge transfers a proportional fee in the transferred token
 */

import type { Address } from '../core/types.js';
import { isZeroAddress, ZERO_ADDRESS } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { Ownable } from '../chain/access-control.js';
import type { ERC20 } from '../tokens/erc20.js';
import { FEE_DECIMALS, MAX_FEE_BPS } from '../bridge/constants.js';
import { FeeCollectorError } from './errors.js';

export interface FeeCollectorConfig {
  /** Fee in FEE_DECIMALS units, at most MAX_FEE_BPS */
  feeBps: bigint;
  treasury: Address;
  owner: Address;
  logger?: Logger;
}

export interface FeeCollectedEvent {
  token: Address;
  payer: Address;
  amount: bigint;
  fee: bigint;
}

export class FeeCollector extends Contract {
  readonly ownable: Ownable;

  readonly events = {
    FeeCollected: this.event<FeeCollectedEvent>('FeeCollected'),
    FeeBpsSet: this.event<{ feeBps: bigint }>('FeeBpsSet'),
    TreasurySet: this.event<{ treasury: Address }>('TreasurySet'),
  };

  private readonly feeBpsValue = this.value(0n);
  private readonly treasuryValue = this.value<Address>(ZERO_ADDRESS);

  constructor(chain: Chain, config: FeeCollectorConfig) {
    super(chain, 'FeeCollector', config.logger);
    validateFeeBps(config.feeBps);
    validateTreasury(config.treasury);
    this.ownable = new Ownable(chain, this.address, config.owner);
    this.feeBpsValue.set(config.feeBps);
    this.treasuryValue.set(config.treasury);
  }

  get feeBps(): bigint {
    return this.feeBpsValue.get();
  }

  get treasury(): Address {
    return this.treasuryValue.get();
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  quote(amount: bigint): bigint {
    return (amount * this.feeBps) / FEE_DECIMALS;
  }

  /**
   * Pull the fee for `amount` from the caller to the treasury; the caller must have approved it
   */
  collect(token: ERC20, amount: bigint): void {
    const fee = this.quote(amount);
    if (fee === 0n) return;
    const payer = this.msg.sender;
    const treasury = this.treasury;
    this.external(token, () => token.transferFrom(payer, treasury, fee));
    this.events.FeeCollected.emit({ token: token.address, payer, amount, fee });
    this.log.info('Collected fee', { token: token.symbol, payer, fee });
  }

  // ============ Owner ============

  setFeeBps(feeBps: bigint): void {
    this.ownable.checkOwner();
    validateFeeBps(feeBps);
    this.feeBpsValue.set(feeBps);
    this.events.FeeBpsSet.emit({ feeBps });
  }

  setTreasury(treasury: Address): void {
    this.ownable.checkOwner();
    validateTreasury(treasury);
    this.treasuryValue.set(treasury);
    this.events.TreasurySet.emit({ treasury });
  }
}

function validateFeeBps(feeBps: bigint): void {
  if (feeBps < 0n || feeBps > MAX_FEE_BPS) {
    throw new FeeCollectorError('FEE_COLLECTOR_FEE_EXCEEDS_MAX_BPS', `Fee ${String(feeBps)} exceeds ${String(MAX_FEE_BPS)}`, {
      feeBps,
    });
  }
}

function validateTreasury(treasury: Address): void {
  if (isZeroAddress(treasury)) {
    throw new FeeCollectorError('FEE_COLLECTOR_TREASURY_ZERO_ADDRESS', 'Treasury cannot be the zero address', {
      treasury,
    });
  }
}
