/**
 * Adapters that charge a flat minGas and address chains by chain id
 *
 * The whole minGas goes to the treasury (the transport itself is free to
 * call) and anything above it is refunded.
 */

import type { ChainId, Hash, Hex } from '../../core/types.js';
import type { Chain } from '../../chain/chain.js';
import { DEFAULT_ADMIN_ROLE } from '../../chain/access-control.js';
import { decodeRefundOptions, type RefundOptions } from '../options.js';
import type { AdapterRoute, Dispatch, RelayRoute } from '../types.js';
import { BaseAdapter, type BaseAdapterConfig, type OutboundRelay } from './base-adapter.js';

export interface FlatFeeAdapterConfig extends BaseAdapterConfig {
  chainIds: readonly ChainId[];
}

export interface ChainIdSetEvent {
  chainId: ChainId;
  enabled: boolean;
}

export abstract class FlatFeeAdapter extends BaseAdapter<RefundOptions, bigint> {
  readonly chainEvents = {
    ChainIdSet: this.event<ChainIdSetEvent>('ChainIdSet'),
  };

  private readonly supportedChains = this.map<ChainId, boolean>(() => false);

  constructor(chain: Chain, config: FlatFeeAdapterConfig) {
    super(chain, config);
    this.enableChains(config.chainIds, true);
  }

  supportedChainIds(chainId: ChainId): boolean {
    return this.supportedChains.get(chainId);
  }

  setChainIds(chainIds: readonly ChainId[], enabled: boolean): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.enableChains(chainIds, enabled);
  }

  // ============ Fee settlement ============

  protected override quoteRelay(): bigint {
    return this.minGas;
  }

  protected override settleAndSend(relay: OutboundRelay<RefundOptions, bigint>): Hash {
    const refund = this._deductFee(relay.value);
    const transferId = this.send({ route: relay.route, envelope: relay.envelope, options: relay.options });
    this.payOut(relay.options.refundAddress, refund);
    return transferId;
  }

  protected override decodeOptions(options: Hex): RefundOptions {
    return decodeRefundOptions(options);
  }

  protected abstract send(dispatch: Dispatch<RefundOptions, bigint>): Hash;

  // ============ Internal ============

  protected override applyRoute(route: AdapterRoute): void {
    this.enableChains([route.chainId], true);
    super.applyRoute(route);
  }

  protected override routeFor(chainId: ChainId): RelayRoute<bigint> | undefined {
    if (!this.supportedChains.get(chainId)) return undefined;
    return { destChainId: chainId, domainId: BigInt(chainId), trustedAdapter: this.trustedAdapter(chainId) };
  }

  private enableChains(chainIds: readonly ChainId[], enabled: boolean): void {
    for (const chainId of chainIds) {
      this.supportedChains.set(chainId, enabled);
      this.chainEvents.ChainIdSet.emit({ chainId, enabled });
    }
  }
}
