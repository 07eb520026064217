/**
 * Wormhole adapter using the standard relayer
 * Wormhole chain ids are uint16 domains; the relayer refunds unused gas on the refund chain.
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { toBytes32 } from '../../core/hash.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { AdapterError } from '../errors.js';
import { decodeWormholeOptions, type WormholeOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { numericDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface DeliveryQuote {
  nativePriceQuote: bigint;
  targetChainRefundPerGasUnused: bigint;
}

export interface WormholeRelayer extends Deployed {
  quoteEVMDeliveryPrice(targetChain: bigint, receiverValue: bigint, gasLimit: bigint): DeliveryQuote;
  /** Returns the sequence number of the delivery request */
  sendPayloadToEvm(
    targetChain: bigint,
    targetAddress: Address,
    payload: Hex,
    receiverValue: bigint,
    gasLimit: bigint,
    refundChain: bigint,
    refundAddress: Address
  ): bigint;
}

export interface WormholeAdapterConfig extends QuotedAdapterConfig<bigint> {
  relayer: WormholeRelayer;
}

export class WormholeAdapter extends QuotedFeeAdapter<bigint, WormholeOptions> {
  readonly relayer: WormholeRelayer;

  private readonly seenDeliveries = this.map<Hash, boolean>(() => false);

  constructor(chain: Chain, config: WormholeAdapterConfig) {
    super(chain, config);
    this.relayer = config.relayer;
    requireEndpoint(config.relayer.address, 'relayer');
  }

  isDeliveryProcessed(deliveryHash: Hash): boolean {
    return this.seenDeliveries.get(deliveryHash);
  }

  /**
   * Inbound entry point; only the relayer may call it
   */
  receiveWormholeMessages(
    payload: Hex,
    additionalMessages: readonly Hex[],
    sourceAddress: Hex,
    sourceChain: bigint,
    deliveryHash: Hash
  ): void {
    this.inbound(() => {
      this.requireCaller(this.relayer.address, 'ADAPTER_UNAUTHORISED');
      if (this.seenDeliveries.get(deliveryHash)) {
        throw new AdapterError({
          code: 'ADAPTER_ALREADY_PROCESSED',
          message: `Wormhole delivery ${deliveryHash} was already processed`,
          details: { deliveryHash },
        });
      }
      this.seenDeliveries.set(deliveryHash, true);

      this.log.debug('receiveWormholeMessages', { deliveryHash, additional: additionalMessages.length });
      this.deliver(this.originChainOf(sourceChain), this.originFromBytes32(sourceAddress), payload);
    });
  }

  protected override parseDomainId(domainId: DomainId): bigint {
    return numericDomainId(domainId);
  }

  /**
   * The refund chain must be a chain the relayer can reach
   */
  protected override decodeOptions(options: Hex): WormholeOptions {
    const decoded = decodeWormholeOptions(options);
    const refundDomain = this.chainIdToDomainId(decoded.refundChainId);
    if (refundDomain === undefined || refundDomain === 0n) {
      throw new AdapterError({
        code: 'ADAPTER_UNKNOWN_REFUND_CHAIN_ID',
        message: `No Wormhole chain id for refund chain ${String(decoded.refundChainId)}`,
        details: { refundChainId: decoded.refundChainId },
        suggestion: 'Refund to a chain configured with setDomainId',
      });
    }
    return decoded;
  }

  protected override quoteTransport({ route, options }: Dispatch<WormholeOptions, bigint>): bigint {
    return this.relayer.quoteEVMDeliveryPrice(route.domainId, 0n, options.gasLimit).nativePriceQuote;
  }

  /**
   * Returns the delivery sequence as a 32-byte word
   */
  protected override send({ route, envelope, options }: Dispatch<WormholeOptions, bigint>, fee: bigint): Hash {
    const refundChain = this.chainIdToDomainId(options.refundChainId) ?? 0n;
    const sequence = this.external(
      this.relayer,
      () =>
        this.relayer.sendPayloadToEvm(
          route.domainId,
          route.trustedAdapter,
          envelope,
          0n,
          options.gasLimit,
          refundChain,
          options.refundAddress
        ),
      fee
    );
    return toBytes32(sequence);
  }
}
