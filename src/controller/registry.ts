/**
 * Registry
 * Owner-kept list of the adapters deployed on this chain, shared by message
 * controllers that delegate sender approval to it.
 */

import type { Address, ChainId } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { Chain } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { Ownable } from '../chain/access-control.js';
import { BaseAdapter } from '../bridge/protocols/base-adapter.js';
import { RegistryError } from './errors.js';

export interface RegistryConfig {
  adapters: readonly Address[];
  owner: Address;
  logger?: Logger;
}

export interface AdapterSetEvent {
  adapter: Address;
  enabled: boolean;
}

export class Registry extends Contract {
  readonly ownable: Ownable;

  readonly events = {
    AdapterSet: this.event<AdapterSetEvent>('AdapterSet'),
    ChainIdsAdded: this.event<{ chainIds: ChainId[] }>('ChainIdsAdded'),
  };

  private readonly enabled = this.map<Address, boolean>(() => false);
  // every adapter ever set, in insertion order; `enabled` says which still count
  private readonly adapterList = this.value<readonly Address[]>([]);
  private readonly chainIdList = this.value<readonly ChainId[]>([]);

  constructor(chain: Chain, config: RegistryConfig) {
    super(chain, 'Registry', config.logger);
    this.ownable = new Ownable(chain, this.address, config.owner);
    for (const adapter of config.adapters) {
      this.writeAdapter(adapter, true);
    }
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  get chainIds(): readonly ChainId[] {
    return this.chainIdList.get();
  }

  isLocalAdapter(adapter: Address): boolean {
    return this.enabled.get(adapter);
  }

  /**
   * Enabled adapters with a route to `chainId`
   */
  getSupportedBridgesForChain(chainId: ChainId): Address[] {
    return this.adapterList.get().filter((address) => {
      if (!this.isLocalAdapter(address)) return false;
      const adapter = this.chain.contractAt(address);
      return adapter instanceof BaseAdapter && adapter.isChainIdSupported(chainId);
    });
  }

  /**
   * Registered chain ids `adapter` has a route to
   */
  getSupportedChainsForAdapter(address: Address): ChainId[] {
    const adapter = this.chain.contractAt(address);
    if (!this.isLocalAdapter(address) || !(adapter instanceof BaseAdapter)) {
      throw new RegistryError('REGISTRY_NOT_ADAPTER', `${address} is not a registered adapter`, { adapter: address });
    }
    return this.chainIds.filter((chainId) => adapter.isChainIdSupported(chainId));
  }

  setAdapters(adapters: readonly Address[], enabled: readonly boolean[]): void {
    this.ownable.checkOwner();
    if (adapters.length !== enabled.length) {
      throw new RegistryError('REGISTRY_INVALID_PARAMS', 'adapters and enabled must have the same length', {
        adapters: adapters.length,
        enabled: enabled.length,
      });
    }
    adapters.forEach((adapter, i) => {
      this.writeAdapter(adapter, enabled[i] ?? false);
    });
  }

  addChainIds(chainIds: readonly ChainId[]): void {
    this.ownable.checkOwner();
    const known = this.chainIds;
    const added = chainIds.filter((chainId, i) => !known.includes(chainId) && chainIds.indexOf(chainId) === i);
    this.chainIdList.set([...known, ...added]);
    this.events.ChainIdsAdded.emit({ chainIds: added });
  }

  transferOwnership(newOwner: Address): void {
    this.ownable.transferOwnership(newOwner);
  }

  private writeAdapter(adapter: Address, enabled: boolean): void {
    this.enabled.set(adapter, enabled);
    const list = this.adapterList.get();
    if (!list.includes(adapter)) {
      this.adapterList.set([...list, adapter]);
    }
    this.events.AdapterSet.emit({ adapter, enabled });
    this.log.debug('Adapter set', { adapter, enabled });
  }
}
