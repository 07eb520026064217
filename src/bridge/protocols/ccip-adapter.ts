/**
 * Chainlink CCIP adapter
 * Chains are addressed by 64-bit chain selectors
 */

import type { Address, DomainId, Hash, Hex } from '../../core/types.js';
import { asAddress, decodeParameters, encodeParameters } from '../../core/abi.js';
import { ZERO_ADDRESS } from '../../core/address.js';
import { concatHex } from '../../core/hex.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { AdapterError } from '../errors.js';
import { decodeGasLimitOptions, type GasLimitOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { numericDomainId, QuotedFeeAdapter, type QuotedAdapterConfig } from './quoted-adapter.js';

export interface EVMTokenAmount {
  token: Address;
  amount: bigint;
}

export interface EVM2AnyMessage {
  /** abi.encode(receiver) */
  receiver: Hex;
  data: Hex;
  tokenAmounts: readonly EVMTokenAmount[];
  /** Zero address pays in native */
  feeToken: Address;
  extraArgs: Hex;
}

export interface Any2EVMMessage {
  messageId: Hash;
  sourceChainSelector: bigint;
  /** abi.encode(sender) */
  sender: Hex;
  data: Hex;
  destTokenAmounts: readonly EVMTokenAmount[];
}

export interface CCIPRouter extends Deployed {
  getFee(destinationChainSelector: bigint, message: EVM2AnyMessage): bigint;
  ccipSend(destinationChainSelector: bigint, message: EVM2AnyMessage): Hash;
}

export interface CCIPAdapterConfig extends QuotedAdapterConfig<bigint> {
  router: CCIPRouter;
}

/** bytes4(keccak256("CCIP EVMExtraArgsV1")) */
export const EVM_EXTRA_ARGS_V1_TAG: Hex = '0x97a657c9';

export function encodeExtraArgsV1(gasLimit: bigint): Hex {
  return concatHex(EVM_EXTRA_ARGS_V1_TAG, encodeParameters(['uint256'], [gasLimit]));
}

export class CCIPAdapter extends QuotedFeeAdapter<bigint, GasLimitOptions> {
  readonly router: CCIPRouter;

  constructor(chain: Chain, config: CCIPAdapterConfig) {
    super(chain, config);
    this.router = config.router;
    requireEndpoint(config.router.address, 'router');
  }

  /**
   * Inbound entry point; only the router may call it
   */
  ccipReceive(message: Any2EVMMessage): void {
    this.inbound(() => {
      this.requireCaller(this.router.address, 'ADAPTER_INVALID_ROUTER');
      const originChainId = this.originChainOf(message.sourceChainSelector);
      this.deliver(originChainId, decodeSender(message.sender), message.data);
    });
  }

  protected override parseDomainId(domainId: DomainId): bigint {
    return numericDomainId(domainId);
  }

  protected override decodeOptions(options: Hex): GasLimitOptions {
    return decodeGasLimitOptions(options);
  }

  protected override quoteTransport(dispatch: Dispatch<GasLimitOptions, bigint>): bigint {
    return this.router.getFee(dispatch.route.domainId, buildMessage(dispatch));
  }

  /**
   * Returns the CCIP message id
   */
  protected override send(dispatch: Dispatch<GasLimitOptions, bigint>, fee: bigint): Hash {
    return this.external(this.router, () => this.router.ccipSend(dispatch.route.domainId, buildMessage(dispatch)), fee);
  }
}

function buildMessage({ route, envelope, options }: Dispatch<GasLimitOptions, bigint>): EVM2AnyMessage {
  return {
    receiver: encodeParameters(['address'], [route.trustedAdapter]),
    data: envelope,
    tokenAmounts: [],
    feeToken: ZERO_ADDRESS,
    extraArgs: encodeExtraArgsV1(options.gasLimit),
  };
}

function decodeSender(sender: Hex): Address {
  try {
    const [address] = decodeParameters(['address'], sender);
    return asAddress(address);
  } catch (error) {
    throw new AdapterError({
      code: 'ADAPTER_UNAUTHORISED',
      message: 'CCIP sender is not an ABI-encoded address',
      details: { sender, cause: error instanceof Error ? error.message : String(error) },
    });
  }
}
