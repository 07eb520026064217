/**
 * Bridge module - cross-chain message relay over heterogeneous transports
 * Axelar, CCIP, Connext, Hyperlane, LayerZero, Optimism, Polymer and Wormhole
 */

// Types
export {
  isMessageReceiver,
  type MessageReceiver,
  type RelayRoute,
  type Dispatch,
  type AdapterRoute,
} from './types.js';

// Constants
export {
  FEE_DECIMALS,
  RATE_DENOMINATOR,
  MAX_FEE_RATE,
  MAX_FEE_BPS,
  MAX_FEE_TIERS,
  MAX_LIMIT,
  RELAY_EVENT_SIGNATURE,
  RELAY_EVENT_HASH,
  DEFAULT_GAS_LIMIT,
} from './constants.js';

// Errors
export {
  AdapterError,
  FeeTooLowError,
  UnsupportedRouteError,
  UnauthorisedOriginError,
  FeeTransferFailedError,
  type AdapterErrorCode,
} from './errors.js';

// Wire formats
export { encodeBridgedMessage, decodeBridgedMessage, type BridgedMessage } from './message.js';
export {
  encodeRefundOptions,
  decodeRefundOptions,
  encodeGasLimitOptions,
  decodeGasLimitOptions,
  encodeWormholeOptions,
  decodeWormholeOptions,
  type RefundOptions,
  type GasLimitOptions,
  type WormholeOptions,
} from './options.js';

// Configuration
export { configureAdapterRoutes } from './config.js';

// Adapters
export * from './protocols/index.js';
