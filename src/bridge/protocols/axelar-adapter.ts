/**
 * Axelar adapter
 *
 * Gas is prepaid through the gas service; the gateway carries the payload.
 * Axelar names chains by string and the remote address travels as a string.
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { isAddress, toAddress } from '../../core/address.js';
import { keccak256 } from '../../core/hash.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { AdapterError } from '../errors.js';
import { decodeRefundOptions, type RefundOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint, ZERO_TRANSFER_ID } from './base-adapter.js';
import { namedDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface AxelarGateway extends Deployed {
  callContract(destinationChain: string, contractAddress: string, payload: Hex): void;
  /** True once per approved command; consumes the approval */
  validateContractCall(commandId: Hash, sourceChain: string, sourceAddress: string, payloadHash: Hash): boolean;
}

export interface AxelarGasService extends Deployed {
  estimateGasFee(destinationChain: string, destinationAddress: string, payload: Hex): bigint;
  payNativeGasForContractCall(
    sender: Address,
    destinationChain: string,
    destinationAddress: string,
    payload: Hex,
    refundAddress: Address
  ): void;
}

export interface AxelarAdapterConfig extends QuotedAdapterConfig<string> {
  gateway: AxelarGateway;
  gasService: AxelarGasService;
}

export class AxelarAdapter extends QuotedFeeAdapter<string, RefundOptions> {
  readonly gateway: AxelarGateway;
  readonly gasService: AxelarGasService;

  private readonly processedCommands = this.map<Hash, boolean>(() => false);

  constructor(chain: Chain, config: AxelarAdapterConfig) {
    super(chain, config);
    requireEndpoint(config.gateway.address, 'gateway');
    requireEndpoint(config.gasService.address, 'gasService');
    this.gateway = config.gateway;
    this.gasService = config.gasService;
  }

  isCommandProcessed(commandId: Hash): boolean {
    return this.processedCommands.get(commandId);
  }

  /**
   * Inbound entry point, callable by any relayer; the gateway approval authenticates it
   */
  execute(commandId: Hash, sourceChain: string, sourceAddress: string, payload: Hex): void {
    this.inbound(() => {
      if (this.processedCommands.get(commandId)) {
        throw new AdapterError({
          code: 'ADAPTER_ALREADY_PROCESSED',
          message: `Axelar command ${commandId} was already executed`,
          details: { commandId },
        });
      }

      const approved = this.external(this.gateway, () =>
        this.gateway.validateContractCall(commandId, sourceChain, sourceAddress, keccak256(payload))
      );
      if (!approved) {
        throw new AdapterError({
          code: 'ADAPTER_NOT_APPROVED_BY_GATEWAY',
          message: `Axelar gateway did not approve command ${commandId}`,
          details: { commandId, sourceChain, sourceAddress },
        });
      }
      this.processedCommands.set(commandId, true);

      if (!isAddress(sourceAddress)) {
        throw new AdapterError({
          code: 'ADAPTER_UNAUTHORISED',
          message: `Axelar source address ${sourceAddress} is not an EVM address`,
          details: { sourceAddress },
        });
      }
      this.deliver(this.originChainOf(sourceChain), toAddress(sourceAddress), payload);
    });
  }

  protected override parseDomainId(domainId: DomainId): string {
    return namedDomainId(domainId);
  }

  protected override decodeOptions(options: Hex): RefundOptions {
    return decodeRefundOptions(options);
  }

  protected override quoteTransport({ route, envelope }: Dispatch<RefundOptions, string>): bigint {
    return this.gasService.estimateGasFee(route.domainId, route.trustedAdapter, envelope);
  }

  /**
   * Axelar produces no transfer id
   */
  protected override send({ route, envelope, options }: Dispatch<RefundOptions, string>, fee: bigint): Hash {
    this.external(
      this.gasService,
      () => {
        this.gasService.payNativeGasForContractCall(
          this.address,
          route.domainId,
          route.trustedAdapter,
          envelope,
          options.refundAddress
        );
      },
      fee
    );
    this.external(this.gateway, () => {
      this.gateway.callContract(route.domainId, route.trustedAdapter, envelope);
    });
    return ZERO_TRANSFER_ID;
  }
}
