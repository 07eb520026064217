/**
 * Bridge protocol adapters
 * Every adapter exposes the same relayMessage / quoteMessage surface over its own transport
 */

export {
  BaseAdapter,
  requireEndpoint,
  ZERO_TRANSFER_ID,
  type BaseAdapterConfig,
  type OutboundRelay,
  type MinGasSetEvent,
  type ProtocolFeeSetEvent,
  type TrustedAdapterSetEvent,
} from './base-adapter.js';
export {
  QuotedFeeAdapter,
  numericDomainId,
  namedDomainId,
  type QuotedAdapterConfig,
  type DomainIdAssociatedEvent,
} from './quoted-adapter.js';
export { FlatFeeAdapter, type FlatFeeAdapterConfig, type ChainIdSetEvent } from './flat-fee-adapter.js';

export {
  AxelarAdapter,
  type AxelarAdapterConfig,
  type AxelarGateway,
  type AxelarGasService,
} from './axelar-adapter.js';
export {
  CCIPAdapter,
  encodeExtraArgsV1,
  EVM_EXTRA_ARGS_V1_TAG,
  type CCIPAdapterConfig,
  type CCIPRouter,
  type EVM2AnyMessage,
  type Any2EVMMessage,
  type EVMTokenAmount,
} from './ccip-adapter.js';
export { ConnextAdapter, type ConnextAdapterConfig, type ConnextBridge } from './connext-adapter.js';
export {
  HyperlaneAdapter,
  encodeHookMetadata,
  type HyperlaneAdapterConfig,
  type HyperlaneMailbox,
} from './hyperlane-adapter.js';
export {
  LayerZeroAdapter,
  encodeLzReceiveOption,
  type LayerZeroAdapterConfig,
  type LayerZeroEndpoint,
  type MessagingParams,
  type MessagingFee,
  type MessagingReceipt,
  type Origin,
  type PeerSetEvent,
} from './layerzero-adapter.js';
export { OptimismAdapter, type OptimismAdapterConfig, type CrossDomainMessenger } from './optimism-adapter.js';
export {
  PolymerAdapter,
  encodeRelayTopics,
  type PolymerAdapterConfig,
  type PolymerProver,
  type ProvenEvent,
  type RelayViaPolymerEvent,
} from './polymer-adapter.js';
export {
  WormholeAdapter,
  type WormholeAdapterConfig,
  type WormholeRelayer,
  type DeliveryQuote,
} from './wormhole-adapter.js';
