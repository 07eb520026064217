/**
 * Runtime errors raised by the chain itself and by the shared contract mixins
 */

import { RelayError } from '../core/errors.js';
import type { Address } from '../core/types.js';

export type ChainErrorCode =
  | 'INSUFFICIENT_BALANCE'
  | 'NATIVE_TRANSFER_REJECTED'
  | 'NO_CALL_CONTEXT'
  | 'UNKNOWN_CONTRACT'
  | 'ACCESS_CONTROL_UNAUTHORIZED'
  | 'OWNABLE_UNAUTHORIZED_ACCOUNT'
  | 'OWNABLE_INVALID_OWNER'
  | 'PAUSED'
  | 'NOT_PAUSED'
  | 'REENTRANT_CALL';

export class ChainError extends RelayError {
  declare readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super({ code, message, details, suggestion });
    this.name = 'ChainError';
  }
}

export class InsufficientBalanceError extends ChainError {
  constructor(account: Address, required: bigint, available: bigint) {
    super(
      'INSUFFICIENT_BALANCE',
      `Insufficient native balance for ${account}: need ${String(required)}, have ${String(available)}`,
      { account, required, available },
      'Fund the account before sending value'
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class AccessControlUnauthorizedError extends ChainError {
  constructor(account: Address, role: string) {
    super(
      'ACCESS_CONTROL_UNAUTHORIZED',
      `AccessControl: account ${account} is missing role ${role}`,
      { account, role },
      'Call from an account holding the required role'
    );
    this.name = 'AccessControlUnauthorizedError';
  }
}

export class OwnableUnauthorizedAccountError extends ChainError {
  constructor(account: Address) {
    super('OWNABLE_UNAUTHORIZED_ACCOUNT', `Ownable: caller ${account} is not the owner`, { account }, 'Call from the owner account');
    this.name = 'OwnableUnauthorizedAccountError';
  }
}

export class EnforcedPauseError extends ChainError {
  constructor(contract: Address) {
    super('PAUSED', 'Pausable: paused', { contract }, 'Wait for the contract to be unpaused');
    this.name = 'EnforcedPauseError';
  }
}
