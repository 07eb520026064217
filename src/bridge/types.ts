/**
 * Shared adapter types
 */

import type { Address, ChainId, DomainId, Hex } from '../core/types.js';
import type { Deployed } from '../chain/chain.js';

/**
 * Contract an adapter hands decoded payloads to (the destination controller)
 */
export interface MessageReceiver {
  receiveMessage(message: Hex, originChainId: ChainId, originSender: Address): void;
}

export function isMessageReceiver(contract: Deployed): contract is Deployed & MessageReceiver {
  return 'receiveMessage' in contract && typeof contract.receiveMessage === 'function';
}

/**
 * Resolved outbound route: the destination chain, its bridge domain and the adapter there
 */
export interface RelayRoute<D extends DomainId = DomainId> {
  destChainId: ChainId;
  domainId: D;
  trustedAdapter: Address;
}

/**
 * Everything a transport needs to dispatch one envelope
 */
export interface Dispatch<O, D extends DomainId = DomainId> {
  route: RelayRoute<D>;
  envelope: Hex;
  options: O;
}

/**
 * Declarative route table entry for configureAdapterRoutes
 */
export interface AdapterRoute {
  chainId: ChainId;
  /** Bridge domain; ignored by adapters that address chains by chain id */
  domainId?: DomainId;
  trustedAdapter: Address;
  /** LayerZero peer, defaults to the trusted adapter */
  peer?: Address;
}
