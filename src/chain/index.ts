/**
 * In-memory chain runtime
 */

export { Chain } from './chain.js';
export type { ChainConfig, CallFrame, ChainLog, Deployed, MessageContext, Receipt } from './chain.js';
export { Contract, EventChannel } from './contract.js';
export { Journal, StateMap, StateValue } from './journal.js';
export { AccessControl, Ownable, DEFAULT_ADMIN_ROLE, PAUSE_ROLE } from './access-control.js';
export type { RoleGranted, RoleRevoked, OwnershipTransferred } from './access-control.js';
export { Pausable, ReentrancyGuard } from './guards.js';
export type { PauseToggled } from './guards.js';
export {
  ChainError,
  InsufficientBalanceError,
  AccessControlUnauthorizedError,
  OwnableUnauthorizedAccountError,
  EnforcedPauseError,
} from './errors.js';
export type { ChainErrorCode } from './errors.js';
