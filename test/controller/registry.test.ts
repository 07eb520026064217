import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from '../../src/controller/registry.js';
import { errorCode, send } from '../helpers.js';
import { controllerFixture, REMOTE_CHAIN, type ControllerFixture } from './fixture.js';

describe('Registry', () => {
  let fx: ControllerFixture;
  let registry: Registry;

  beforeEach(() => {
    fx = controllerFixture();
    registry = new Registry(fx.chain, { adapters: [fx.hyperlane.address, fx.layerzero.address], owner: fx.acct.owner });
    send(fx.acct.owner, registry, () => {
      registry.addChainIds([REMOTE_CHAIN, 8453]);
    });
  });

  it('lists the enabled adapters routed to a chain', () => {
    expect(registry.getSupportedBridgesForChain(REMOTE_CHAIN)).toEqual([fx.hyperlane.address, fx.layerzero.address]);
    expect(registry.getSupportedBridgesForChain(8453)).toEqual([]);
  });

  it('drops disabled adapters from every lookup', () => {
    send(fx.acct.owner, registry, () => {
      registry.setAdapters([fx.layerzero.address], [false]);
    });

    expect(registry.isLocalAdapter(fx.layerzero.address)).toBe(false);
    expect(registry.getSupportedBridgesForChain(REMOTE_CHAIN)).toEqual([fx.hyperlane.address]);
    expect(errorCode(() => registry.getSupportedChainsForAdapter(fx.layerzero.address))).toBe('REGISTRY_NOT_ADAPTER');
    expect(registry.events.AdapterSet.last()).toEqual({ adapter: fx.layerzero.address, enabled: false });
  });

  it('lists the registered chains an adapter reaches', () => {
    expect(registry.getSupportedChainsForAdapter(fx.hyperlane.address)).toEqual([REMOTE_CHAIN]);
    expect(errorCode(() => registry.getSupportedChainsForAdapter(fx.acct.alice))).toBe('REGISTRY_NOT_ADAPTER');
  });

  it('adds each chain id once', () => {
    send(fx.acct.owner, registry, () => {
      registry.addChainIds([REMOTE_CHAIN, 42161, 42161]);
    });
    expect(registry.chainIds).toEqual([REMOTE_CHAIN, 8453, 42161]);
    expect(registry.events.ChainIdsAdded.last()).toEqual({ chainIds: [42161] });
  });

  it('keeps writes to the owner', () => {
    expect(errorCode(() => send(fx.acct.alice, registry, () => registry.setAdapters([fx.acct.alice], [true])))).toBe(
      'OWNABLE_UNAUTHORIZED_ACCOUNT'
    );
    expect(errorCode(() => send(fx.acct.alice, registry, () => registry.addChainIds([1])))).toBe('OWNABLE_UNAUTHORIZED_ACCOUNT');
    expect(
      errorCode(() => send(fx.acct.owner, registry, () => registry.setAdapters([fx.acct.alice], [true, false])))
    ).toBe('REGISTRY_INVALID_PARAMS');
    expect(registry.isLocalAdapter(fx.acct.alice)).toBe(false);
  });

  it('hands writes to a new owner', () => {
    send(fx.acct.owner, registry, () => {
      registry.transferOwnership(fx.acct.bob);
    });
    send(fx.acct.bob, registry, () => {
      registry.setAdapters([fx.acct.alice], [true]);
    });
    expect(registry.owner).toBe(fx.acct.bob);
    expect(registry.isLocalAdapter(fx.acct.alice)).toBe(true);
  });
});
