/**
 * Adapter errors
 * Every adapter revert carries one of these codes
 */

import { RelayError } from '../core/errors.js';
import type { Address, ChainId } from '../core/types.js';

export type AdapterErrorCode =
  | 'ADAPTER_INVALID_PARAMS'
  | 'ADAPTER_INVALID_ADDRESS'
  | 'ADAPTER_VALUE_IS_LESS_THAN_LIMIT'
  | 'ADAPTER_FEE_TOO_LOW'
  | 'ADAPTER_FEE_TRANSFER_FAILED'
  | 'ADAPTER_UNAUTHORISED'
  | 'ADAPTER_NOT_APPROVED_BY_GATEWAY'
  | 'ADAPTER_ALREADY_PROCESSED'
  | 'ADAPTER_INVALID_ROUTER'
  | 'ADAPTER_INVALID_PROOF'
  | 'ADAPTER_UNKNOWN_REFUND_CHAIN_ID';

export class AdapterError extends RelayError {
  declare readonly code: AdapterErrorCode;

  constructor(config: {
    code: AdapterErrorCode;
    message: string;
    details?: Record<string, unknown>;
    suggestion?: string;
    retryable?: boolean;
  }) {
    super(config);
    this.name = 'AdapterError';
  }
}

/**
 * The value sent does not cover transport fee plus protocol fee
 */
export class FeeTooLowError extends AdapterError {
  readonly required: bigint;
  readonly supplied: bigint;

  constructor(required: bigint, supplied: bigint) {
    super({
      code: 'ADAPTER_FEE_TOO_LOW',
      message: `Fee too low: required ${String(required)}, supplied ${String(supplied)}`,
      details: { required, supplied },
      suggestion: 'Call quoteMessage with includeFee and send at least that value',
      retryable: true,
    });
    this.name = 'FeeTooLowError';
    this.required = required;
    this.supplied = supplied;
  }
}

export class UnsupportedRouteError extends AdapterError {
  constructor(adapter: string, destChainId: ChainId) {
    super({
      code: 'ADAPTER_INVALID_PARAMS',
      message: `${adapter} has no route to chain ${String(destChainId)}`,
      details: { adapter, destChainId },
      suggestion: 'Configure a domain id and a trusted adapter for the destination chain',
    });
    this.name = 'UnsupportedRouteError';
  }
}

export class UnauthorisedOriginError extends AdapterError {
  constructor(originChainId: ChainId, origin: Address) {
    super({
      code: 'ADAPTER_UNAUTHORISED',
      message: `Origin ${origin} is not the trusted adapter for chain ${String(originChainId)}`,
      details: { originChainId, origin },
      suggestion: 'Check setTrustedAdapter on the destination adapter',
    });
    this.name = 'UnauthorisedOriginError';
  }
}

export class FeeTransferFailedError extends AdapterError {
  constructor(recipient: Address, amount: bigint, cause: unknown) {
    super({
      code: 'ADAPTER_FEE_TRANSFER_FAILED',
      message: `Native transfer of ${String(amount)} to ${recipient} failed`,
      details: { recipient, amount, cause: cause instanceof Error ? cause.message : String(cause) },
      suggestion: 'Use a refund address and treasury that accept native value',
    });
    this.name = 'FeeTransferFailedError';
  }
}
