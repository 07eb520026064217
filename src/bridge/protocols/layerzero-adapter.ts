/**
 * LayerZero V2 adapter
 *
 * Chains are endpoint ids (eids). Besides the trusted adapter, LayerZero keeps
 * its own peer per eid; the endpoint only delivers from that peer.
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { addressToBytes32, isZeroAddress } from '../../core/address.js';
import { concatHex, hexEquals, numberToHex, padHex } from '../../core/hex.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { DEFAULT_ADMIN_ROLE } from '../../chain/access-control.js';
import { AdapterError } from '../errors.js';
import { decodeGasLimitOptions, type GasLimitOptions } from '../options.js';
import type { AdapterRoute, Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { numericDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface MessagingParams {
  dstEid: bigint;
  /** Peer on the destination, as a 32-byte word */
  receiver: Hex;
  message: Hex;
  options: Hex;
  payInLzToken: boolean;
}

export interface MessagingFee {
  nativeFee: bigint;
  lzTokenFee: bigint;
}

export interface MessagingReceipt {
  guid: Hash;
  nonce: bigint;
  fee: MessagingFee;
}

export interface Origin {
  srcEid: bigint;
  sender: Hex;
  nonce: bigint;
}

export interface LayerZeroEndpoint extends Deployed {
  quote(params: MessagingParams, sender: Address): MessagingFee;
  send(params: MessagingParams, refundAddress: Address): MessagingReceipt;
}

export interface LayerZeroAdapterConfig extends QuotedAdapterConfig<bigint> {
  endpoint: LayerZeroEndpoint;
}

export interface PeerSetEvent {
  eid: bigint;
  peer: Hex;
}

const ZERO_PEER: Hex = padHex('0x0', 32);

const TYPE_3_OPTIONS: Hex = '0x0003';
const EXECUTOR_WORKER_ID: Hex = '0x01';
const OPTION_TYPE_LZRECEIVE: Hex = '0x01';
// option type (1 byte) + uint128 gas (16 bytes)
const LZRECEIVE_OPTION_SIZE: Hex = '0x0011';

/**
 * Type 3 executor options carrying only the lzReceive gas limit
 */
export function encodeLzReceiveOption(gasLimit: bigint): Hex {
  return concatHex(
    TYPE_3_OPTIONS,
    EXECUTOR_WORKER_ID,
    LZRECEIVE_OPTION_SIZE,
    OPTION_TYPE_LZRECEIVE,
    padHex(numberToHex(gasLimit), 16)
  );
}

export class LayerZeroAdapter extends QuotedFeeAdapter<bigint, GasLimitOptions> {
  readonly endpoint: LayerZeroEndpoint;

  readonly peerEvents = {
    PeerSet: this.event<PeerSetEvent>('PeerSet'),
  };

  private readonly peerWords = this.map<bigint, Hex>(() => ZERO_PEER);

  constructor(chain: Chain, config: LayerZeroAdapterConfig) {
    super(chain, config);
    this.endpoint = config.endpoint;
    requireEndpoint(config.endpoint.address, 'endpoint');
  }

  peers(eid: bigint): Hex {
    return this.peerWords.get(eid);
  }

  setPeer(eid: bigint, peer: Hex): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.peerWords.set(eid, peer);
    this.peerEvents.PeerSet.emit({ eid, peer });
  }

  /**
   * Inbound entry point; only the endpoint may call it, and only for a message from the peer
   */
  lzReceive(origin: Origin, guid: Hash, message: Hex, executor: Address, extraData: Hex): void {
    this.inbound(() => {
      this.requireCaller(this.endpoint.address, 'ADAPTER_UNAUTHORISED');
      if (!hexEquals(this.peers(origin.srcEid), origin.sender)) {
        throw new AdapterError({
          code: 'ADAPTER_UNAUTHORISED',
          message: `Sender ${origin.sender} is not the peer for eid ${String(origin.srcEid)}`,
          details: { srcEid: origin.srcEid, sender: origin.sender },
        });
      }
      this.log.debug('lzReceive', { guid, nonce: origin.nonce, executor, extraData });
      this.deliver(this.originChainOf(origin.srcEid), this.originFromBytes32(origin.sender), message);
    });
  }

  protected override parseDomainId(domainId: DomainId): bigint {
    return numericDomainId(domainId);
  }

  protected override decodeOptions(options: Hex): GasLimitOptions {
    return decodeGasLimitOptions(options);
  }

  protected override quoteTransport(dispatch: Dispatch<GasLimitOptions, bigint>): bigint {
    return this.endpoint.quote(this.messagingParams(dispatch), this.address).nativeFee;
  }

  /**
   * Returns the LayerZero guid
   */
  protected override send(dispatch: Dispatch<GasLimitOptions, bigint>, fee: bigint): Hash {
    const params = this.messagingParams(dispatch);
    const receipt = this.external(this.endpoint, () => this.endpoint.send(params, dispatch.options.refundAddress), fee);
    return receipt.guid;
  }

  /**
   * Route tables set the peer too, defaulting to the trusted adapter
   */
  protected override applyRoute(route: AdapterRoute): void {
    super.applyRoute(route);
    const eid = this.chainIdToDomainId(route.chainId);
    if (eid === undefined) return;
    this.setPeer(eid, addressToBytes32(route.peer ?? route.trustedAdapter));
  }

  private messagingParams({ route, envelope, options }: Dispatch<GasLimitOptions, bigint>): MessagingParams {
    const peer = this.peers(route.domainId);
    if (hexEquals(peer, ZERO_PEER) || isZeroAddress(route.trustedAdapter)) {
      throw new AdapterError({
        code: 'ADAPTER_INVALID_PARAMS',
        message: `No peer for eid ${String(route.domainId)}`,
        details: { eid: route.domainId, destChainId: route.destChainId },
        suggestion: 'Call setPeer for the destination eid',
      });
    }
    return {
      dstEid: route.domainId,
      receiver: peer,
      message: envelope,
      options: encodeLzReceiveOption(options.gasLimit),
      payInLzToken: false,
    };
  }
}
