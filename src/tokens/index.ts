/**
 * Token contracts
 */

export { ERC20, MAX_UINT256 } from './erc20.js';
export type { ERC20Config, TransferEvent, ApprovalEvent } from './erc20.js';
export { PermitERC20, PERMIT_TYPEHASH } from './permit-token.js';
export type { PermitSignature } from './permit-token.js';
export { BridgedToken } from './bridged-token.js';
export type { BridgedTokenConfig, MinterSetEvent, LockboxSetEvent } from './bridged-token.js';
export { FiatToken } from './fiat-token.js';
export type { FiatTokenConfig, MinterConfiguredEvent, SupplyChangeEvent } from './fiat-token.js';
export { Lockbox } from './lockbox.js';
export type { LockboxConfig, LockboxMovement } from './lockbox.js';
export { TokenError, InsufficientTokenBalanceError, InsufficientAllowanceError } from './errors.js';
export type { TokenErrorCode } from './errors.js';
