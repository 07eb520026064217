/**
 * Declarative adapter configuration
 */

import type { Address } from '../core/types.js';
import type { Receipt } from '../chain/chain.js';
import type { BaseAdapter } from './protocols/base-adapter.js';
import type { AdapterRoute } from './types.js';

/**
 * Apply a route table as `admin`: domain ids, trusted adapters and, for
 * LayerZero, peers. All entries land or none do.
 *
 * @example
 * configureAdapterRoutes(hyperlane, owner, [
 *   { chainId: 10, domainId: 10n, trustedAdapter: remoteAdapter },
 * ]);
 */
export function configureAdapterRoutes(
  adapter: BaseAdapter,
  admin: Address,
  routes: readonly AdapterRoute[]
): Receipt<void> {
  return adapter.chain.transact({ from: admin, to: adapter.address }, () => {
    adapter.configureRoutes(routes);
  });
}
