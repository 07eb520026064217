/**
 * AcrossV4Wrapper
 *
 * Skims the wrapper fee from the input amount and forwards the deposit to an
 * Across SpokePool. Native deposits send msg.value equal to inputAmount.
 */

import type { Address, ChainId, Hex } from '../core/types.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { WrapperError } from './errors.js';
import { DepositWrapper, requireEntryPoint, type DepositWrapperConfig } from './deposit-wrapper.js';
import type { FeeQuote } from './fee-tiers.js';

export interface DepositParams {
  depositor: Address;
  recipient: Address;
  inputToken: Address;
  outputToken: Address;
  inputAmount: bigint;
  outputAmount: bigint;
  destinationChainId: ChainId;
  exclusiveRelayer: Address;
  quoteTimestamp: number;
  fillDeadline: number;
  exclusivityParameter: number;
  message: Hex;
}

export interface SpokePool extends Deployed {
  /** Payable; ERC20 deposits pull inputAmount of inputToken from the caller */
  deposit(params: DepositParams): void;
}

export interface AcrossWrapperConfig extends DepositWrapperConfig {
  spokePool: SpokePool;
}

export interface AcrossTransferSentEvent {
  sender: Address;
  inputToken: Address;
  destinationChainId: ChainId;
  net: bigint;
  message: Hex;
}

export class AcrossV4Wrapper extends DepositWrapper {
  readonly spokePool: SpokePool;

  readonly events = {
    TransferSent: this.event<AcrossTransferSentEvent>('TransferSent'),
  };

  constructor(chain: Chain, config: AcrossWrapperConfig) {
    super(chain, 'AcrossV4Wrapper', config);
    requireEntryPoint(config.spokePool, 'WRAPPER_SPOKE_POOL_ZERO_ADDRESS');
    this.spokePool = config.spokePool;
  }

  deposit(params: DepositParams): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      if (params.inputAmount === 0n) {
        throw new WrapperError('WRAPPER_AMOUNT_ZERO', 'Deposit amount must be positive');
      }

      const sender = this.msg.sender;
      const native = this.msg.value > 0n;
      const { fee, net } = native ? this.takeNative(params.inputAmount) : this.takeToken(params);
      if (params.outputAmount > net) {
        throw new WrapperError('WRAPPER_INVALID_PARAMS', 'Output amount exceeds the input after fees', {
          outputAmount: params.outputAmount,
          net,
        });
      }

      const spokePool = this.spokePool;
      const forwarded: DepositParams = { ...params, inputAmount: net };
      this.external(
        spokePool,
        () => {
          spokePool.deposit(forwarded);
        },
        native ? net : 0n
      );

      this.events.TransferSent.emit({
        sender,
        inputToken: params.inputToken,
        destinationChainId: params.destinationChainId,
        net,
        message: params.message,
      });
      this.log.info('Deposited to Across', { destinationChainId: params.destinationChainId, fee, net, native });
    });
  }

  private takeNative(inputAmount: bigint): FeeQuote {
    if (this.msg.value !== inputAmount) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', 'msg.value must equal the input amount', {
        value: this.msg.value,
        inputAmount,
      });
    }
    return this.takeNativeFee(inputAmount);
  }

  private takeToken(params: DepositParams): FeeQuote {
    const token = this.resolveToken(params.inputToken);
    const quote = this.takeTokenFee(token, params.inputAmount);
    const spokePool = this.spokePool;
    this.external(token, () => token.approve(spokePool.address, quote.net));
    return quote;
  }
}
