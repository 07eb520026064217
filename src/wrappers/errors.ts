/**
 * Wrapper errors
 */

import { RelayError } from '../core/errors.js';
import type { Address } from '../core/types.js';

export type WrapperErrorCode =
  | 'WRAPPER_TREASURY_ZERO_ADDRESS'
  | 'WRAPPER_INVALID_FEE_RATE'
  | 'WRAPPER_LENGTH_MISMATCH'
  | 'WRAPPER_INVALID_PARAMS'
  | 'WRAPPER_UNAUTHORIZED'
  | 'WRAPPER_ZERO_ADDRESS'
  | 'WRAPPER_CONTROLLER_NOT_WHITELISTED'
  | 'WRAPPER_FEE_ON_TRANSFER_TOKEN_NOT_SUPPORTED'
  | 'WRAPPER_AMOUNT_ZERO'
  | 'WRAPPER_MSG_VALUE_NOT_ZERO'
  | 'WRAPPER_TRANSFER_FAILED'
  | 'WRAPPER_RELAY_DEPOSITORY_ZERO_ADDRESS'
  | 'WRAPPER_SPOKE_POOL_ZERO_ADDRESS';

export class WrapperError extends RelayError {
  declare readonly code: WrapperErrorCode;

  constructor(code: WrapperErrorCode, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super({ code, message, details, suggestion });
    this.name = 'WrapperError';
  }
}

export class InvalidFeeRateError extends WrapperError {
  constructor(rate: bigint, max: bigint) {
    super('WRAPPER_INVALID_FEE_RATE', `Fee rate ${String(rate)} exceeds ${String(max)}`, { rate, max });
    this.name = 'InvalidFeeRateError';
  }
}

export class FeeOnTransferTokenError extends WrapperError {
  constructor(token: Address, expected: bigint, received: bigint) {
    super(
      'WRAPPER_FEE_ON_TRANSFER_TOKEN_NOT_SUPPORTED',
      `Token ${token} delivered ${String(received)} of ${String(expected)}`,
      { token, expected, received },
      'Fee-on-transfer tokens cannot be wrapped'
    );
    this.name = 'FeeOnTransferTokenError';
  }
}

export class LengthMismatchError extends WrapperError {
  constructor(details: Record<string, number>) {
    super('WRAPPER_LENGTH_MISMATCH', 'Array arguments must have matching lengths', details);
    this.name = 'LengthMismatchError';
  }
}
