/**
 * Fee wrappers
 */

export { FeeWrapper, requireRecipient } from './base-wrapper.js';
export type { WrapperConfig, TreasurySetEvent, FeeRateSetEvent } from './base-wrapper.js';
export { ControllerWrapper, CONTROLLER_MANAGER_ROLE } from './controller-wrapper.js';
export type {
  ControllerWrapperConfig,
  TransferParams,
  FeeTierTable,
  TransferSentEvent,
  FeesCollectedEvent,
  ControllerSetEvent,
  DestChainPremiumSetEvent,
  ControllerFeeTiersSetEvent,
} from './controller-wrapper.js';
export { DepositWrapper, requireEntryPoint } from './deposit-wrapper.js';
export type { DepositWrapperConfig } from './deposit-wrapper.js';
export { RelayWrapper } from './relay-wrapper.js';
export type { RelayDepository, RelayWrapperConfig, RelayTransferSentEvent } from './relay-wrapper.js';
export { AcrossV4Wrapper } from './across-wrapper.js';
export type { DepositParams, SpokePool, AcrossWrapperConfig, AcrossTransferSentEvent } from './across-wrapper.js';
export { buildFeeTiers, quoteFee, quoteFlatFee, tieredFee, validateFeeRate } from './fee-tiers.js';
export type { FeeTier, FeeQuote, FeeSchedule } from './fee-tiers.js';
export { WrapperError, InvalidFeeRateError, FeeOnTransferTokenError, LengthMismatchError } from './errors.js';
export type { WrapperErrorCode } from './errors.js';
