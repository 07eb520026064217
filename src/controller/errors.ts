/**
 * Controller and fee collector errors
 */

import { RelayError } from '../core/errors.js';
import type { Address, ChainId, Hash } from '../core/types.js';

export type ControllerErrorCode =
  | 'CONTROLLER_INVALID_PARAMS'
  | 'CONTROLLER_ZERO_AMOUNT'
  | 'CONTROLLER_ZERO_ADDRESS'
  | 'CONTROLLER_TRANSFERS_PAUSED_TO_DESTINATION'
  | 'CONTROLLER_CHAIN_NOT_SUPPORTED'
  | 'CONTROLLER_NOT_HIGH_ENOUGH_LIMITS'
  | 'CONTROLLER_LIMITS_TOO_HIGH'
  | 'CONTROLLER_TOKEN_BURN_FAILED'
  | 'CONTROLLER_MULTI_BRIDGE_TRANSFERS_DISABLED'
  | 'CONTROLLER_LENGTH_MISMATCH'
  | 'CONTROLLER_FEES_SUM_MISMATCH'
  | 'CONTROLLER_DUPLICATE_ADAPTER'
  | 'CONTROLLER_ADAPTER_NOT_SUPPORTED'
  | 'CONTROLLER_UNKNOWN_TRANSFER'
  | 'CONTROLLER_TRANSFER_RESENT_BY_ADAPTER'
  | 'CONTROLLER_TRANSFER_NOT_EXECUTABLE'
  | 'CONTROLLER_THRESHOLD_NOT_MET'
  | 'CONTROLLER_NOT_ENOUGH_TOKENS_IN_POOL'
  | 'CONTROLLER_UNWRAPPING_NOT_SUPPORTED'
  | 'CONTROLLER_NO_TOKENS_TO_BURN'
  | 'CONTROLLER_UNAUTHORISED'
  | 'CONTROLLER_MESSAGE_RESENT_BY_ADAPTER'
  | 'CONTROLLER_MESSAGE_NOT_EXECUTABLE'
  | 'CONTROLLER_MESSAGE_NOT_EXECUTABLE_YET'
  | 'CONTROLLER_MESSAGE_EXPIRED'
  | 'CONTROLLER_MESSAGE_NOT_CANCELLABLE'
  | 'CONTROLLER_MESSAGE_CALL_FAILED';

export class ControllerError extends RelayError {
  declare readonly code: ControllerErrorCode;

  constructor(config: {
    code: ControllerErrorCode;
    message: string;
    details?: Record<string, unknown>;
    suggestion?: string;
    retryable?: boolean;
  }) {
    super(config);
    this.name = 'ControllerError';
  }
}

export class NotHighEnoughLimitsError extends ControllerError {
  constructor(bridge: Address, requested: bigint, available: bigint) {
    super({
      code: 'CONTROLLER_NOT_HIGH_ENOUGH_LIMITS',
      message: `Bridge ${bridge} has ${String(available)} left, ${String(requested)} requested`,
      details: { bridge, requested, available },
      suggestion: 'Wait for the limit to replenish or raise it with setLimits',
      retryable: available > 0n,
    });
    this.name = 'NotHighEnoughLimitsError';
  }
}

export class UnknownTransferError extends ControllerError {
  constructor(transferId: Hash) {
    super({
      code: 'CONTROLLER_UNKNOWN_TRANSFER',
      message: `Unknown transfer ${transferId}`,
      details: { transferId },
    });
    this.name = 'UnknownTransferError';
  }
}

export class ChainNotSupportedError extends ControllerError {
  constructor(chainId: ChainId) {
    super({
      code: 'CONTROLLER_CHAIN_NOT_SUPPORTED',
      message: `No controller registered for chain ${String(chainId)}`,
      details: { chainId },
      suggestion: 'Register the remote controller with setControllerForChain',
    });
    this.name = 'ChainNotSupportedError';
  }
}

export type FeeCollectorErrorCode = 'FEE_COLLECTOR_FEE_EXCEEDS_MAX_BPS' | 'FEE_COLLECTOR_TREASURY_ZERO_ADDRESS';

export class FeeCollectorError extends RelayError {
  declare readonly code: FeeCollectorErrorCode;

  constructor(code: FeeCollectorErrorCode, message: string, details?: Record<string, unknown>) {
    super({ code, message, details });
    this.name = 'FeeCollectorError';
  }
}

export type RegistryErrorCode = 'REGISTRY_INVALID_PARAMS' | 'REGISTRY_NOT_ADAPTER';

export class RegistryError extends RelayError {
  declare readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string, details?: Record<string, unknown>) {
    super({ code, message, details });
    this.name = 'RegistryError';
  }
}
