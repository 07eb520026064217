/**
 * Hyperlane adapter
 * Recipients and senders are 32-byte words; the gas limit rides in the hook metadata
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { addressToBytes32 } from '../../core/address.js';
import { concatHex, numberToHex, padHex } from '../../core/hex.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { decodeGasLimitOptions, type GasLimitOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { numericDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface HyperlaneMailbox extends Deployed {
  quoteDispatch(destinationDomain: bigint, recipientAddress: Hex, messageBody: Hex, metadata: Hex): bigint;
  dispatch(destinationDomain: bigint, recipientAddress: Hex, messageBody: Hex, metadata: Hex): Hash;
}

export interface HyperlaneAdapterConfig extends QuotedAdapterConfig<bigint> {
  mailbox: HyperlaneMailbox;
}

const STANDARD_HOOK_METADATA_VARIANT: Hex = '0x0001';

/**
 * StandardHookMetadata: variant, msg value, gas limit, refund address
 */
export function encodeHookMetadata(gasLimit: bigint, refundAddress: Address): Hex {
  return concatHex(
    STANDARD_HOOK_METADATA_VARIANT,
    padHex('0x0', 32),
    padHex(numberToHex(gasLimit), 32),
    refundAddress
  );
}

export class HyperlaneAdapter extends QuotedFeeAdapter<bigint, GasLimitOptions> {
  readonly mailbox: HyperlaneMailbox;

  constructor(chain: Chain, config: HyperlaneAdapterConfig) {
    super(chain, config);
    this.mailbox = config.mailbox;
    requireEndpoint(config.mailbox.address, 'mailbox');
  }

  /**
   * Inbound entry point; only the mailbox may call it
   */
  handle(origin: bigint, sender: Hex, body: Hex): void {
    this.inbound(() => {
      this.requireCaller(this.mailbox.address, 'ADAPTER_UNAUTHORISED');
      this.deliver(this.originChainOf(origin), this.originFromBytes32(sender), body);
    });
  }

  protected override parseDomainId(domainId: DomainId): bigint {
    return numericDomainId(domainId);
  }

  protected override decodeOptions(options: Hex): GasLimitOptions {
    return decodeGasLimitOptions(options);
  }

  protected override quoteTransport({ route, envelope, options }: Dispatch<GasLimitOptions, bigint>): bigint {
    return this.mailbox.quoteDispatch(
      route.domainId,
      addressToBytes32(route.trustedAdapter),
      envelope,
      encodeHookMetadata(options.gasLimit, options.refundAddress)
    );
  }

  /**
   * Returns the Hyperlane message id
   */
  protected override send({ route, envelope, options }: Dispatch<GasLimitOptions, bigint>, fee: bigint): Hash {
    const metadata = encodeHookMetadata(options.gasLimit, options.refundAddress);
    return this.external(
      this.mailbox,
      () => this.mailbox.dispatch(route.domainId, addressToBytes32(route.trustedAdapter), envelope, metadata),
      fee
    );
  }
}
