/**
 * Adapters whose transport quotes its own delivery fee
 *
 * The caller pays transportFee + calculateFee(transportFee). The protocol fee
 * goes to the treasury, the transport receives exactly its quote and the rest
 * is refunded.
 */

import type { ChainId, DomainId, Hash } from '../../core/types.js';
import type { Chain } from '../../chain/chain.js';
import { DEFAULT_ADMIN_ROLE } from '../../chain/access-control.js';
import { AdapterError, FeeTooLowError } from '../errors.js';
import type { RefundOptions } from '../options.js';
import type { AdapterRoute, Dispatch, RelayRoute } from '../types.js';
import { BaseAdapter, type BaseAdapterConfig, type OutboundRelay } from './base-adapter.js';

export interface QuotedAdapterConfig<D extends DomainId> extends BaseAdapterConfig {
  chainIds: readonly ChainId[];
  domainIds: readonly D[];
}

export interface DomainIdAssociatedEvent<D extends DomainId = DomainId> {
  chainId: ChainId;
  domainId: D;
}

export abstract class QuotedFeeAdapter<D extends DomainId, O extends RefundOptions> extends BaseAdapter<O, D> {
  readonly domainEvents = {
    DomainIdAssociated: this.event<DomainIdAssociatedEvent<D>>('DomainIdAssociated'),
  };

  private readonly chainIdDomains = this.map<ChainId, D | undefined>(() => undefined);
  private readonly domainIdChains = this.map<D, ChainId | undefined>(() => undefined);

  constructor(chain: Chain, config: QuotedAdapterConfig<D>) {
    super(chain, config);
    this.associateDomains(config.domainIds, config.chainIds);
  }

  /**
   * Bridge domain of a chain, if one is configured
   */
  chainIdToDomainId(chainId: ChainId): D | undefined {
    return this.chainIdDomains.get(chainId);
  }

  domainIdToChainId(domainId: D): ChainId | undefined {
    return this.domainIdChains.get(domainId);
  }

  setDomainId(domainIds: readonly D[], chainIds: readonly ChainId[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.associateDomains(domainIds, chainIds);
  }

  // ============ Fee settlement ============

  protected override quoteRelay(relay: Dispatch<O, D>, includeFee: boolean): bigint {
    const transportFee = this.quoteTransport(relay);
    return includeFee ? transportFee + this.calculateFee(transportFee) : transportFee;
  }

  protected override settleAndSend(relay: OutboundRelay<O, D>): Hash {
    const dispatch: Dispatch<O, D> = { route: relay.route, envelope: relay.envelope, options: relay.options };
    const transportFee = this.quoteTransport(dispatch);
    const protocolFee = this.calculateFee(transportFee);
    const required = transportFee + protocolFee;
    if (relay.value < required) {
      throw new FeeTooLowError(required, relay.value);
    }

    this.payOut(this.treasury, protocolFee);
    const transferId = this.send(dispatch, transportFee);
    this.payOut(relay.options.refundAddress, relay.value - required);

    this.log.debug('Settled relay fees', { transportFee, protocolFee, refund: relay.value - required });
    return transferId;
  }

  // ============ Transport hooks ============

  /**
   * Narrow a route table domain id to this bridge's domain type
   */
  protected abstract parseDomainId(domainId: DomainId): D;

  protected abstract quoteTransport(dispatch: Dispatch<O, D>): bigint;

  /**
   * Hand the envelope to the transport, paying it exactly `fee`
   */
  protected abstract send(dispatch: Dispatch<O, D>, fee: bigint): Hash;

  // ============ Internal ============

  protected override applyRoute(route: AdapterRoute): void {
    if (route.domainId !== undefined) {
      this.associateDomains([this.parseDomainId(route.domainId)], [route.chainId]);
    }
    super.applyRoute(route);
  }

  protected override routeFor(chainId: ChainId): RelayRoute<D> | undefined {
    const domainId = this.chainIdDomains.get(chainId);
    if (domainId === undefined || isEmptyDomain(domainId)) return undefined;
    return { destChainId: chainId, domainId, trustedAdapter: this.trustedAdapter(chainId) };
  }

  /**
   * Origin chain of an inbound message, from the bridge domain it came from
   */
  protected originChainOf(domainId: D): ChainId {
    const chainId = this.domainIdChains.get(domainId);
    if (chainId === undefined) {
      throw new AdapterError({
        code: 'ADAPTER_INVALID_PARAMS',
        message: `Unknown source domain ${String(domainId)}`,
        details: { domainId },
      });
    }
    return chainId;
  }

  private associateDomains(domainIds: readonly D[], chainIds: readonly ChainId[]): void {
    if (domainIds.length !== chainIds.length) {
      throw new AdapterError({
        code: 'ADAPTER_INVALID_PARAMS',
        message: `Got ${String(domainIds.length)} domain ids for ${String(chainIds.length)} chain ids`,
        details: { domainIds, chainIds },
      });
    }
    domainIds.forEach((domainId, i) => {
      const chainId = chainIds[i];
      if (chainId === undefined) return;
      // keep both directions one-to-one: drop the pairs either side was in before
      const previousDomain = this.chainIdDomains.get(chainId);
      if (previousDomain !== undefined && previousDomain !== domainId) {
        this.domainIdChains.delete(previousDomain);
      }
      const previousChain = this.domainIdChains.get(domainId);
      if (previousChain !== undefined && previousChain !== chainId) {
        this.chainIdDomains.delete(previousChain);
      }
      this.chainIdDomains.set(chainId, domainId);
      this.domainIdChains.set(domainId, chainId);
      this.domainEvents.DomainIdAssociated.emit({ chainId, domainId });
    });
  }
}

function isEmptyDomain(domainId: DomainId): boolean {
  return typeof domainId === 'string' ? domainId.length === 0 : domainId === 0n;
}

/**
 * Domain id parsers for route tables
 */
export function numericDomainId(domainId: DomainId): bigint {
  if (typeof domainId !== 'bigint') {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: `Expected a numeric domain id, got "${domainId}"`,
      details: { domainId },
    });
  }
  return domainId;
}

export function namedDomainId(domainId: DomainId): string {
  if (typeof domainId !== 'string') {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: `Expected a chain name, got ${String(domainId)}`,
      details: { domainId },
    });
  }
  return domainId;
}
