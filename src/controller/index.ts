/**
 * Asset and message controllers, the adapter registry and the multi-bridge fee collector
 */

export { BaseAssetController, MULTI_BRIDGE_LIMIT_KEY, invalidParams } from './base-controller.js';
export type {
  ControllerConfig,
  SentTransfer,
  ReceivedTransfer,
  TransferCreatedEvent,
  TransferRelayedEvent,
  TransferReceivedEvent,
  TransferIdEvent,
  ControllerForChainSetEvent,
  MultiBridgeAdapterSetEvent,
  BridgeLimitsSetEvent,
  TransfersPausedToChainEvent,
} from './base-controller.js';
export { AssetController } from './asset-controller.js';
export { LockReleaseAssetController } from './lock-release-controller.js';
export type { LiquidityEvent } from './lock-release-controller.js';
export { CircleLockReleaseAssetController, BURN_LOCKED_TOKENS_ROLE } from './circle-lock-release-controller.js';
export {
  MessageController,
  MESSAGE_ORIGINATOR_ROLE,
  MESSAGE_RESENDER_ROLE,
  MESSAGE_EXPIRY,
  isCallTarget,
} from './message-controller.js';
export type {
  MessageControllerConfig,
  CallTarget,
  SentMessage,
  ReceivedMessage,
  MessageCreatedEvent,
  MessageAdapterEvent,
  MessageIdEvent,
  MessageExecutableAtEvent,
  LocalAdapterSetEvent,
  AccountStatusEvent,
} from './message-controller.js';
export { encodeCallMessage, decodeCallMessage, computeMessageId } from './call-message.js';
export type { CallBundle, CallMessage } from './call-message.js';
export { Registry } from './registry.js';
export type { RegistryConfig, AdapterSetEvent } from './registry.js';
export { FeeCollector } from './fee-collector.js';
export type { FeeCollectorConfig, FeeCollectedEvent } from './fee-collector.js';
export { RateLimits, currentLimitAt, limitAfterChange, emptyBridgeParameters } from './rate-limits.js';
export type { LimitParameters, BridgeParameters, LimitKind } from './rate-limits.js';
export { encodeTransferMessage, decodeTransferMessage, computeTransferId } from './transfer-message.js';
export type { TransferMessage } from './transfer-message.js';
export {
  ControllerError,
  NotHighEnoughLimitsError,
  UnknownTransferError,
  ChainNotSupportedError,
  FeeCollectorError,
  RegistryError,
} from './errors.js';
export type { ControllerErrorCode, FeeCollectorErrorCode, RegistryErrorCode } from './errors.js';
