/**
 * Per-bridge relay options
 *
 * Callers pass options as an ABI blob so that controllers can stay bridge
 * agnostic. Three layouts exist:
 * - (address refund): Axelar, Connext, Optimism, Polymer
 * - (address refund, uint256 gasLimit): CCIP, Hyperlane, LayerZero
 * - (address refund, uint256 refundChainId, uint256 gasLimit): Wormhole
 */

import type { Address, ChainId, Hex } from '../core/types.js';
import { asAddress, asBigInt, decodeParameters, encodeParameters } from '../core/abi.js';
import { AdapterError } from './errors.js';

export interface RefundOptions {
  refundAddress: Address;
}

export interface GasLimitOptions extends RefundOptions {
  gasLimit: bigint;
}

export interface WormholeOptions extends GasLimitOptions {
  refundChainId: ChainId;
}

export function encodeRefundOptions(options: RefundOptions): Hex {
  return encodeParameters(['address'], [options.refundAddress]);
}

export function decodeRefundOptions(data: Hex): RefundOptions {
  return decodeOptions(data, (raw) => {
    const [refundAddress] = decodeParameters(['address'], raw);
    return { refundAddress: asAddress(refundAddress) };
  });
}

export function encodeGasLimitOptions(options: GasLimitOptions): Hex {
  return encodeParameters(['address', 'uint256'], [options.refundAddress, options.gasLimit]);
}

export function decodeGasLimitOptions(data: Hex): GasLimitOptions {
  return decodeOptions(data, (raw) => {
    const [refundAddress, gasLimit] = decodeParameters(['address', 'uint256'], raw);
    return { refundAddress: asAddress(refundAddress), gasLimit: asBigInt(gasLimit) };
  });
}

export function encodeWormholeOptions(options: WormholeOptions): Hex {
  return encodeParameters(
    ['address', 'uint256', 'uint256'],
    [options.refundAddress, BigInt(options.refundChainId), options.gasLimit]
  );
}

export function decodeWormholeOptions(data: Hex): WormholeOptions {
  return decodeOptions(data, (raw) => {
    const [refundAddress, refundChainId, gasLimit] = decodeParameters(['address', 'uint256', 'uint256'], raw);
    const chainId = asBigInt(refundChainId);
    if (chainId > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Error(`refundChainId out of range: ${String(chainId)}`);
    }
    return {
      refundAddress: asAddress(refundAddress),
      refundChainId: Number(chainId),
      gasLimit: asBigInt(gasLimit),
    };
  });
}

function decodeOptions<T>(data: Hex, decode: (raw: Hex) => T): T {
  try {
    return decode(data);
  } catch (error) {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: 'Malformed relay options',
      details: { options: data, cause: error instanceof Error ? error.message : String(error) },
      suggestion: 'Encode options with the helper matching the adapter',
    });
  }
}
