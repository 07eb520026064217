/**
 * Optimism superchain adapter over the L2-to-L2 cross-domain messenger
 */

import type { Address, ChainId, Hash, Hex } from '../../core/types.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import type { RefundOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint, ZERO_TRANSFER_ID } from './base-adapter.js';
import { FlatFeeAdapter, type FlatFeeAdapterConfig } from './flat-fee-adapter.js';

export interface CrossDomainMessenger extends Deployed {
  sendMessage(destination: ChainId, target: Address, message: Hex): Hash;
  /** Sender of the message being relayed; only meaningful during relay */
  crossDomainMessageSender(): Address;
  /** Origin chain of the message being relayed */
  crossDomainMessageSource(): ChainId;
}

export interface OptimismAdapterConfig extends FlatFeeAdapterConfig {
  messenger: CrossDomainMessenger;
}

export class OptimismAdapter extends FlatFeeAdapter {
  readonly messenger: CrossDomainMessenger;

  constructor(chain: Chain, config: OptimismAdapterConfig) {
    super(chain, config);
    this.messenger = config.messenger;
    requireEndpoint(config.messenger.address, 'messenger');
  }

  /**
   * Inbound entry point; the messenger attests origin chain and sender
   */
  receiveMessage(payload: Hex): void {
    this.inbound(() => {
      this.requireCaller(this.messenger.address, 'ADAPTER_UNAUTHORISED');
      const origin = this.messenger.crossDomainMessageSender();
      const originChainId = this.messenger.crossDomainMessageSource();
      this.deliver(originChainId, origin, payload);
    });
  }

  /**
   * The messenger produces no usable transfer id
   */
  protected override send({ route, envelope }: Dispatch<RefundOptions, bigint>): Hash {
    this.external(this.messenger, () => this.messenger.sendMessage(route.destChainId, route.trustedAdapter, envelope));
    return ZERO_TRANSFER_ID;
  }
}
