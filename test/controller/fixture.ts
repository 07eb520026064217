/**
 * Controller fixture: one source chain with a Hyperlane and a LayerZero adapter
 * routed to chain 10, where the counterpart controller lives
 */

import type { Address, Hex } from '../../src/core/types.js';
import { ZERO_ADDRESS } from '../../src/core/address.js';
import type { Chain } from '../../src/chain/chain.js';
import { configureAdapterRoutes } from '../../src/bridge/config.js';
import { encodeGasLimitOptions } from '../../src/bridge/options.js';
import { HyperlaneAdapter } from '../../src/bridge/protocols/hyperlane-adapter.js';
import { LayerZeroAdapter } from '../../src/bridge/protocols/layerzero-adapter.js';
import type { ControllerConfig } from '../../src/controller/base-controller.js';
import { FeeCollector } from '../../src/controller/fee-collector.js';
import type { ERC20 } from '../../src/tokens/erc20.js';
import { MockLayerZeroEndpoint, MockMailbox } from '../mocks/transports.js';
import { accounts, newChain, send, type Accounts } from '../helpers.js';

export const REMOTE_CHAIN = 10;
export const LIMIT = 1_000_000n;
export const DAY = 86_400n;

export interface ControllerFixture {
  chain: Chain;
  acct: Accounts;
  feeCollector: FeeCollector;
  mailbox: MockMailbox;
  endpoint: MockLayerZeroEndpoint;
  hyperlane: HyperlaneAdapter;
  layerzero: LayerZeroAdapter;
  remoteController: Address;
  options: Hex;
  /** Controller config for `token`, with both adapters whitelisted and limited to LIMIT */
  config(token: Address): ControllerConfig;
}

export function controllerFixture(): ControllerFixture {
  const chain = newChain(1);
  const acct = accounts(chain);
  const feeCollector = new FeeCollector(chain, { feeBps: 1_000n, treasury: acct.treasury, owner: acct.owner });
  const mailbox = new MockMailbox(chain);
  const endpoint = new MockLayerZeroEndpoint(chain);
  const hyperlane = new HyperlaneAdapter(chain, {
    name: 'Hyperlane',
    owner: acct.owner,
    treasury: acct.treasury,
    chainIds: [],
    domainIds: [],
    mailbox,
  });
  const layerzero = new LayerZeroAdapter(chain, {
    name: 'LayerZero',
    owner: acct.owner,
    treasury: acct.treasury,
    chainIds: [],
    domainIds: [],
    endpoint,
  });
  configureAdapterRoutes(hyperlane, acct.owner, [
    { chainId: REMOTE_CHAIN, domainId: 10n, trustedAdapter: chain.createAccount('remote-hyperlane') },
  ]);
  configureAdapterRoutes(layerzero, acct.owner, [
    { chainId: REMOTE_CHAIN, domainId: 30111n, trustedAdapter: chain.createAccount('remote-layerzero') },
  ]);
  const remoteController = chain.createAccount('remote-controller');

  return {
    chain,
    acct,
    feeCollector,
    mailbox,
    endpoint,
    hyperlane,
    layerzero,
    remoteController,
    options: encodeGasLimitOptions({ refundAddress: acct.refund, gasLimit: 200_000n }),
    config: (token) => ({
      token,
      admin: acct.owner,
      pauser: acct.owner,
      feeCollector: feeCollector.address,
      duration: DAY,
      minBridges: 2n,
      multiBridgeAdapters: [hyperlane.address, layerzero.address],
      chainIds: [REMOTE_CHAIN],
      controllers: [remoteController],
      bridges: [hyperlane.address, layerzero.address, ZERO_ADDRESS],
      mintingLimits: [LIMIT, LIMIT, LIMIT],
      burningLimits: [LIMIT, LIMIT, LIMIT],
    }),
  };
}

/**
 * Approve `spender` for `amount` of `token` as `owner`
 */
export function approve(token: ERC20, owner: Address, spender: Address, amount: bigint): void {
  send(owner, token, () => token.approve(spender, amount));
}
