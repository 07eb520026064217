/**
 * RelayWrapper
 * Skims the wrapper fee and forwards the rest to a Relay depository
 */

import type { Address, Hash, Hex } from '../core/types.js';
import { ZERO_ADDRESS } from '../core/address.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { WrapperError } from './errors.js';
import { DepositWrapper, requireEntryPoint, type DepositWrapperConfig } from './deposit-wrapper.js';

export interface RelayDepository extends Deployed {
  /** Pulls `amount` of `token` from the caller */
  depositErc20(depositor: Address, token: Address, amount: bigint, id: Hash): void;
  /** Payable; the deposit is msg.value */
  depositNative(depositor: Address, id: Hash): void;
}

export interface RelayWrapperConfig extends DepositWrapperConfig {
  depository: RelayDepository;
}

export interface RelayTransferSentEvent {
  sender: Address;
  /** Zero for native deposits */
  token: Address;
  id: Hash;
  net: bigint;
  data: Hex;
}

export class RelayWrapper extends DepositWrapper {
  readonly depository: RelayDepository;

  readonly events = {
    TransferSent: this.event<RelayTransferSentEvent>('TransferSent'),
  };

  constructor(chain: Chain, config: RelayWrapperConfig) {
    super(chain, 'RelayWrapper', config);
    requireEntryPoint(config.depository, 'WRAPPER_RELAY_DEPOSITORY_ZERO_ADDRESS');
    this.depository = config.depository;
  }

  depositErc20(tokenAddress: Address, amount: bigint, id: Hash, data: Hex): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      if (this.msg.value !== 0n) {
        throw new WrapperError('WRAPPER_MSG_VALUE_NOT_ZERO', 'ERC20 deposits take no native value', {
          value: this.msg.value,
        });
      }
      requireAmount(amount);

      const sender = this.msg.sender;
      const token = this.resolveToken(tokenAddress);
      const { fee, net } = this.takeTokenFee(token, amount);

      const depository = this.depository;
      this.external(token, () => token.approve(depository.address, net));
      this.external(depository, () => {
        depository.depositErc20(sender, tokenAddress, net, id);
      });

      this.events.TransferSent.emit({ sender, token: tokenAddress, id, net, data });
      this.log.info('Deposited to Relay', { token: tokenAddress, id, fee, net });
    });
  }

  depositNative(id: Hash, data: Hex): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const amount = this.msg.value;
      requireAmount(amount);

      const sender = this.msg.sender;
      const { fee, net } = this.takeNativeFee(amount);

      const depository = this.depository;
      this.external(
        depository,
        () => {
          depository.depositNative(sender, id);
        },
        net
      );

      this.events.TransferSent.emit({ sender, token: ZERO_ADDRESS, id, net, data });
      this.log.info('Deposited native value to Relay', { id, fee, net });
    });
  }
}

function requireAmount(amount: bigint): void {
  if (amount === 0n) {
    throw new WrapperError('WRAPPER_AMOUNT_ZERO', 'Deposit amount must be positive');
  }
}
