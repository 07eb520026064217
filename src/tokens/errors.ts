/**
 * Token errors
 */

import { RelayError } from '../core/errors.js';
import type { Address } from '../core/types.js';

export type TokenErrorCode =
  | 'ERC20_INSUFFICIENT_BALANCE'
  | 'ERC20_INSUFFICIENT_ALLOWANCE'
  | 'ERC20_INVALID_RECEIVER'
  | 'ERC20_INVALID_SENDER'
  | 'ERC20_INVALID_SPENDER'
  | 'PERMIT_EXPIRED'
  | 'PERMIT_INVALID_SIGNER'
  | 'NOT_MINTER'
  | 'MINT_ALLOWANCE_EXCEEDED'
  | 'LOCKBOX_AMOUNT_ZERO';

export class TokenError extends RelayError {
  declare readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super({ code, message, details, suggestion });
    this.name = 'TokenError';
  }
}

export class InsufficientTokenBalanceError extends TokenError {
  constructor(token: Address, account: Address, required: bigint, available: bigint) {
    super(
      'ERC20_INSUFFICIENT_BALANCE',
      `ERC20: transfer amount ${String(required)} exceeds balance ${String(available)} of ${account}`,
      { token, account, required, available },
      'Top up the account or reduce the amount'
    );
    this.name = 'InsufficientTokenBalanceError';
  }
}

export class InsufficientAllowanceError extends TokenError {
  constructor(token: Address, owner: Address, spender: Address, required: bigint, allowance: bigint) {
    super(
      'ERC20_INSUFFICIENT_ALLOWANCE',
      `ERC20: insufficient allowance for ${spender}: need ${String(required)}, have ${String(allowance)}`,
      { token, owner, spender, required, allowance },
      `Approve ${spender} to spend at least ${String(required)}`
    );
    this.name = 'InsufficientAllowanceError';
  }
}
