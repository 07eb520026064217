/**
 * Connext adapter
 * Sends zero-asset xcalls; the relayer fee is paid in native
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { ZERO_ADDRESS } from '../../core/address.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { decodeRefundOptions, type RefundOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { numericDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface ConnextBridge extends Deployed {
  /** Native relayer fee for a call to `destination` */
  estimateRelayerFee(destination: bigint): bigint;
  xcall(
    destination: bigint,
    to: Address,
    asset: Address,
    delegate: Address,
    amount: bigint,
    slippage: bigint,
    callData: Hex
  ): Hash;
}

export interface ConnextAdapterConfig extends QuotedAdapterConfig<bigint> {
  connext: ConnextBridge;
}

export class ConnextAdapter extends QuotedFeeAdapter<bigint, RefundOptions> {
  readonly connext: ConnextBridge;

  constructor(chain: Chain, config: ConnextAdapterConfig) {
    super(chain, config);
    this.connext = config.connext;
    requireEndpoint(config.connext.address, 'connext');
  }

  /**
   * Inbound entry point; only Connext may call it
   */
  xReceive(
    transferId: Hash,
    amount: bigint,
    asset: Address,
    originSender: Address,
    origin: bigint,
    callData: Hex
  ): Hex {
    return this.inbound(() => {
      this.requireCaller(this.connext.address, 'ADAPTER_UNAUTHORISED');
      this.log.debug('xReceive', { transferId, amount, asset });
      this.deliver(this.originChainOf(origin), originSender, callData);
      return '0x';
    });
  }

  protected override parseDomainId(domainId: DomainId): bigint {
    return numericDomainId(domainId);
  }

  protected override decodeOptions(options: Hex): RefundOptions {
    return decodeRefundOptions(options);
  }

  protected override quoteTransport({ route }: Dispatch<RefundOptions, bigint>): bigint {
    return this.connext.estimateRelayerFee(route.domainId);
  }

  /**
   * Returns the Connext transfer id
   */
  protected override send({ route, envelope, options }: Dispatch<RefundOptions, bigint>, fee: bigint): Hash {
    return this.external(
      this.connext,
      () =>
        this.connext.xcall(route.domainId, route.trustedAdapter, ZERO_ADDRESS, options.refundAddress, 0n, 0n, envelope),
      fee
    );
  }
}
