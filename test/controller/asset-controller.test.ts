import { describe, it, expect, beforeEach } from 'vitest';
import type { Address, Hash } from '../../src/core/types.js';
import { ZERO_ADDRESS } from '../../src/core/address.js';
import { toBytes32 } from '../../src/core/hash.js';
import { encodeBridgedMessage } from '../../src/bridge/message.js';
import { MAX_LIMIT } from '../../src/bridge/constants.js';
import { AssetController } from '../../src/controller/asset-controller.js';
import { MULTI_BRIDGE_LIMIT_KEY } from '../../src/controller/base-controller.js';
import {
  computeTransferId,
  encodeTransferMessage,
  type TransferMessage,
} from '../../src/controller/transfer-message.js';
import { BridgedToken } from '../../src/tokens/bridged-token.js';
import { Lockbox } from '../../src/tokens/lockbox.js';
import { TestToken } from '../mocks/tokens.js';
import { errorCode, send } from '../helpers.js';
import { approve, controllerFixture, LIMIT, REMOTE_CHAIN, type ControllerFixture } from './fixture.js';

describe('AssetController', () => {
  let fx: ControllerFixture;
  let token: BridgedToken;
  let controller: AssetController;
  let alice: Address;
  let bob: Address;
  let owner: Address;

  const transferTo = (amount: bigint, adapter: Address = fx.hyperlane.address, destChainId = REMOTE_CHAIN): Hash =>
    send(alice, controller, () => controller.transferTo(bob, amount, false, destChainId, adapter, fx.options)).result;

  const transferToMulti = (amount: bigint, adapters: readonly Address[], fees: readonly bigint[] = adapters.map(() => 0n)): Hash =>
    send(alice, controller, () =>
      controller.transferToMulti(bob, amount, false, REMOTE_CHAIN, adapters, fees, adapters.map(() => fx.options))
    ).result;

  const inbound = (overrides: Partial<TransferMessage> = {}): TransferMessage => ({
    transferId: toBytes32(1n),
    recipient: bob,
    amount: 500n,
    unwrap: false,
    threshold: 1n,
    ...overrides,
  });

  const deliver = (adapter: Address, message: TransferMessage, origin: Address = fx.remoteController): void => {
    send(adapter, controller, () => {
      controller.receiveMessage(encodeTransferMessage(message), REMOTE_CHAIN, origin);
    });
  };

  beforeEach(() => {
    fx = controllerFixture();
    ({ alice, bob, owner } = fx.acct);
    token = new BridgedToken(fx.chain, { name: 'Bridged USD', symbol: 'xUSD', owner });
    controller = new AssetController(fx.chain, fx.config(token.address));
    send(owner, token, () => token.setMinter(controller.address, true));
    send(owner, token, () => token.setMinter(owner, true));
    send(owner, token, () => token.mint(alice, 10_000n));
  });

  // ============ Construction ============

  describe('constructor', () => {
    it('rejects tokens it cannot mint', () => {
      const plain = new TestToken(fx.chain, { name: 'Plain', symbol: 'PLN' });
      expect(errorCode(() => new AssetController(fx.chain, fx.config(plain.address)))).toBe('CONTROLLER_INVALID_PARAMS');
      expect(errorCode(() => new AssetController(fx.chain, fx.config(ZERO_ADDRESS)))).toBe('CONTROLLER_INVALID_PARAMS');
    });

    it('validates the configuration', () => {
      expect(errorCode(() => new AssetController(fx.chain, { ...fx.config(token.address), duration: 0n }))).toBe(
        'CONTROLLER_INVALID_PARAMS'
      );
      expect(errorCode(() => new AssetController(fx.chain, { ...fx.config(token.address), controllers: [] }))).toBe(
        'CONTROLLER_INVALID_PARAMS'
      );
      expect(errorCode(() => new AssetController(fx.chain, { ...fx.config(token.address), burningLimits: [1n] }))).toBe(
        'CONTROLLER_INVALID_PARAMS'
      );
    });

    it('applies routes and limits', () => {
      expect(controller.controllerForChain(REMOTE_CHAIN)).toBe(fx.remoteController);
      expect(controller.isMultiBridgeAdapter(fx.layerzero.address)).toBe(true);
      expect(controller.mintingMaxLimitOf(fx.hyperlane.address)).toBe(LIMIT);
      expect(controller.burningCurrentLimitOf(MULTI_BRIDGE_LIMIT_KEY)).toBe(LIMIT);
      expect(controller.minBridges).toBe(2n);
    });
  });

  // ============ Single bridge ============

  describe('transferTo', () => {
    beforeEach(() => {
      approve(token, alice, controller.address, 10_000n);
    });

    it('burns the amount and relays the transfer', () => {
      const expectedId = controller.calculateTransferId(REMOTE_CHAIN);
      const transferId = transferTo(1_000n);

      expect(transferId).toBe(expectedId);
      expect(transferId).toBe(computeTransferId(controller.address, 1, REMOTE_CHAIN, 0n));
      expect(controller.nonce).toBe(1n);
      expect(token.balanceOf(alice)).toBe(9_000n);
      expect(token.totalSupply()).toBe(9_000n);
      expect(controller.events.TransferCreated.last()).toEqual({
        transferId,
        destChainId: REMOTE_CHAIN,
        threshold: 1n,
        sender: alice,
        recipient: bob,
        amount: 1_000n,
        unwrap: false,
      });
      expect(controller.events.TransferRelayed.last()).toEqual({ transferId, adapter: fx.hyperlane.address });
      expect(fx.mailbox.events.Dispatch.last()?.messageBody).toBe(
        encodeBridgedMessage({
          message: encodeTransferMessage({ transferId, recipient: bob, amount: 1_000n, unwrap: false, threshold: 1n }),
          originController: controller.address,
          destController: fx.remoteController,
        })
      );
    });

    it('spends and refills the adapter burning limit', () => {
      transferTo(1_000n);
      expect(controller.burningCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT - 1_000n);
      fx.chain.advanceTime(10);
      // 1_000_000 / 86_400 per second, truncated to 11
      expect(controller.burningCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT - 1_000n + 110n);
      fx.chain.advanceTime(86_400);
      expect(controller.burningCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT);
    });

    it('rejects transfers above the burning limit', () => {
      send(owner, controller, () => controller.setLimits(fx.hyperlane.address, LIMIT, 500n));
      expect(controller.burningCurrentLimitOf(fx.hyperlane.address)).toBe(500n);
      expect(errorCode(() => transferTo(1_000n))).toBe('CONTROLLER_NOT_HIGH_ENOUGH_LIMITS');
      expect(errorCode(() => transferTo(1_000n, fx.acct.relayer))).toBe('CONTROLLER_NOT_HIGH_ENOUGH_LIMITS');
      expect(token.balanceOf(alice)).toBe(10_000n);
    });

    it('validates amount and destination', () => {
      expect(errorCode(() => transferTo(0n))).toBe('CONTROLLER_ZERO_AMOUNT');
      expect(errorCode(() => transferTo(1n, fx.hyperlane.address, 99))).toBe('CONTROLLER_CHAIN_NOT_SUPPORTED');
      send(owner, controller, () => controller.pauseTransfersToChain(REMOTE_CHAIN, true));
      expect(controller.isTransfersPausedToChain(REMOTE_CHAIN)).toBe(true);
      expect(errorCode(() => transferTo(1n))).toBe('CONTROLLER_TRANSFERS_PAUSED_TO_DESTINATION');
    });

    it('reports a failed burn', () => {
      approve(token, alice, controller.address, 0n);
      expect(errorCode(() => transferTo(1_000n))).toBe('CONTROLLER_TOKEN_BURN_FAILED');
    });

    it('refuses transfers while paused', () => {
      send(owner, controller, () => controller.pause());
      expect(errorCode(() => transferTo(1_000n))).toBe('PAUSED');
    });
  });

  describe('resendTransfer', () => {
    let transferId: Hash;

    beforeEach(() => {
      approve(token, alice, controller.address, 10_000n);
      transferId = transferTo(1_000n);
    });

    it('relays the same transfer through another adapter without debiting again', () => {
      send(alice, controller, () => {
        controller.resendTransfer(transferId, fx.layerzero.address, fx.options);
      });

      expect(token.balanceOf(alice)).toBe(9_000n);
      expect(controller.events.TransferResent.last()).toEqual({ transferId });
      expect(controller.events.TransferRelayed.last()).toEqual({ transferId, adapter: fx.layerzero.address });
      expect(fx.endpoint.events.PacketSent.count).toBe(1);
    });

    it('rejects unknown transfers and unlimited adapters', () => {
      expect(
        errorCode(() =>
          send(alice, controller, () => {
            controller.resendTransfer(toBytes32(5n), fx.layerzero.address, fx.options);
          })
        )
      ).toBe('CONTROLLER_UNKNOWN_TRANSFER');
      expect(
        errorCode(() =>
          send(alice, controller, () => {
            controller.resendTransfer(transferId, fx.acct.relayer, fx.options);
          })
        )
      ).toBe('CONTROLLER_NOT_HIGH_ENOUGH_LIMITS');
    });

    it('rejects resending a single-bridge transfer as multi', () => {
      expect(
        errorCode(() =>
          send(alice, controller, () => {
            controller.resendTransferMulti(transferId, [fx.hyperlane.address, fx.layerzero.address], [0n, 0n], [
              fx.options,
              fx.options,
            ]);
          })
        )
      ).toBe('CONTROLLER_INVALID_PARAMS');
    });
  });

  // ============ Multi bridge ============

  describe('transferToMulti', () => {
    const adapters = (): Address[] => [fx.hyperlane.address, fx.layerzero.address];

    beforeEach(() => {
      // amount plus the 1% collector fee
      approve(token, alice, controller.address, 1_010n);
    });

    it('collects the fee, burns and relays through every adapter', () => {
      const transferId = transferToMulti(1_000n, adapters());

      expect(token.balanceOf(alice)).toBe(8_990n);
      expect(token.balanceOf(fx.acct.treasury)).toBe(10n);
      expect(token.allowance(alice, controller.address)).toBe(0n);
      expect(fx.feeCollector.events.FeeCollected.last()).toEqual({
        token: token.address,
        payer: controller.address,
        amount: 1_000n,
        fee: 10n,
      });
      expect(controller.sentTransfer(transferId)).toEqual({
        destChainId: REMOTE_CHAIN,
        recipient: bob,
        amount: 1_000n,
        unwrap: false,
        threshold: 2n,
        multiBridge: true,
      });
      expect(controller.events.TransferRelayed.all()).toEqual([
        { transferId, adapter: fx.hyperlane.address },
        { transferId, adapter: fx.layerzero.address },
      ]);
      expect(controller.burningCurrentLimitOf(MULTI_BRIDGE_LIMIT_KEY)).toBe(LIMIT - 1_000n);
      expect(controller.burningCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT);
    });

    it('splits msg.value into the per-adapter fees', () => {
      send(fx.acct.relayer, fx.mailbox, () => {
        fx.mailbox.setFee(100n);
      });
      send(fx.acct.relayer, fx.endpoint, () => {
        fx.endpoint.setFee(200n);
      });
      fx.chain.fund(alice, 1_000n);
      const fees = [100n, 200n];
      send(
        alice,
        controller,
        () => controller.transferToMulti(bob, 1_000n, false, REMOTE_CHAIN, adapters(), fees, [fx.options, fx.options]),
        300n
      );

      expect(fx.mailbox.nativeBalance).toBe(100n);
      expect(fx.endpoint.nativeBalance).toBe(200n);
      expect(fx.chain.balanceOf(alice)).toBe(700n);
    });

    it('validates the adapter list', () => {
      expect(errorCode(() => transferToMulti(1_000n, [fx.hyperlane.address]))).toBe('CONTROLLER_INVALID_PARAMS');
      expect(errorCode(() => transferToMulti(1_000n, adapters(), [0n]))).toBe('CONTROLLER_LENGTH_MISMATCH');
      expect(errorCode(() => transferToMulti(1_000n, adapters(), [1n, 0n]))).toBe('CONTROLLER_FEES_SUM_MISMATCH');
      expect(errorCode(() => transferToMulti(1_000n, [fx.hyperlane.address, fx.hyperlane.address]))).toBe(
        'CONTROLLER_DUPLICATE_ADAPTER'
      );
      send(owner, controller, () => controller.setMultiBridgeAdapters([fx.layerzero.address], [false]));
      expect(errorCode(() => transferToMulti(1_000n, adapters()))).toBe('CONTROLLER_ADAPTER_NOT_SUPPORTED');
      expect(token.balanceOf(alice)).toBe(10_000n);
    });

    it('is disabled when minBridges is zero', () => {
      send(owner, controller, () => controller.setMinBridges(0n));
      expect(errorCode(() => transferToMulti(1_000n, adapters()))).toBe('CONTROLLER_MULTI_BRIDGE_TRANSFERS_DISABLED');
    });

    it('resends through a subset of adapters', () => {
      const transferId = transferToMulti(1_000n, adapters());
      send(alice, controller, () => {
        controller.resendTransferMulti(transferId, [fx.layerzero.address], [0n], [fx.options]);
      });
      expect(fx.endpoint.events.PacketSent.count).toBe(2);
      expect(
        errorCode(() =>
          send(alice, controller, () => {
            controller.resendTransfer(transferId, fx.layerzero.address, fx.options);
          })
        )
      ).toBe('CONTROLLER_INVALID_PARAMS');
    });
  });

  // ============ Inbound ============

  describe('receiveMessage', () => {
    it('mints a single-bridge transfer on arrival', () => {
      deliver(fx.hyperlane.address, inbound());

      expect(token.balanceOf(bob)).toBe(500n);
      expect(controller.receivedTransfer(toBytes32(1n))).toEqual({
        originChainId: REMOTE_CHAIN,
        recipient: bob,
        amount: 500n,
        unwrap: false,
        threshold: 1n,
        receivedSoFar: 1n,
        executed: true,
      });
      expect(controller.events.TransferExecuted.last()).toEqual({ transferId: toBytes32(1n) });
      expect(controller.mintingCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT - 500n);
    });

    it('executes a transfer once', () => {
      deliver(fx.hyperlane.address, inbound());
      expect(errorCode(() => deliver(fx.hyperlane.address, inbound()))).toBe('CONTROLLER_TRANSFER_RESENT_BY_ADAPTER');
      expect(errorCode(() => deliver(fx.layerzero.address, inbound()))).toBe('CONTROLLER_TRANSFER_NOT_EXECUTABLE');
      expect(token.balanceOf(bob)).toBe(500n);
    });

    it('only accepts the controller registered for the origin chain', () => {
      expect(errorCode(() => deliver(fx.hyperlane.address, inbound(), alice))).toBe('CONTROLLER_INVALID_PARAMS');
    });

    it('rejects malformed payloads', () => {
      expect(
        errorCode(() =>
          send(fx.hyperlane.address, controller, () => {
            controller.receiveMessage('0x1234', REMOTE_CHAIN, fx.remoteController);
          })
        )
      ).toBe('CONTROLLER_INVALID_PARAMS');
    });

    it('enforces the adapter minting limit', () => {
      expect(errorCode(() => deliver(fx.hyperlane.address, inbound({ amount: LIMIT + 1n })))).toBe(
        'CONTROLLER_NOT_HIGH_ENOUGH_LIMITS'
      );
    });

    it('waits for every adapter before a multi-bridge transfer executes', () => {
      const message = inbound({ threshold: 2n });
      const execute = (): void => {
        send(fx.acct.relayer, controller, () => {
          controller.execute(message.transferId);
        });
      };

      deliver(fx.hyperlane.address, message);
      expect(controller.receivedTransfer(message.transferId)?.receivedSoFar).toBe(1n);
      expect(errorCode(execute)).toBe('CONTROLLER_THRESHOLD_NOT_MET');

      deliver(fx.layerzero.address, message);
      expect(controller.events.TransferExecutable.last()).toEqual({ transferId: message.transferId });
      expect(token.balanceOf(bob)).toBe(0n);

      execute();
      expect(token.balanceOf(bob)).toBe(500n);
      expect(controller.mintingCurrentLimitOf(MULTI_BRIDGE_LIMIT_KEY)).toBe(LIMIT - 500n);
      expect(controller.mintingCurrentLimitOf(fx.hyperlane.address)).toBe(LIMIT);
      expect(errorCode(execute)).toBe('CONTROLLER_TRANSFER_NOT_EXECUTABLE');
    });

    it('only counts whitelisted adapters towards a multi-bridge threshold', () => {
      expect(errorCode(() => deliver(fx.acct.relayer, inbound({ threshold: 2n })))).toBe('CONTROLLER_ADAPTER_NOT_SUPPORTED');
    });

    it('rejects executing unknown transfers', () => {
      expect(
        errorCode(() =>
          send(alice, controller, () => {
            controller.execute(toBytes32(9n));
          })
        )
      ).toBe('CONTROLLER_UNKNOWN_TRANSFER');
    });

    it('refuses deliveries while paused', () => {
      send(owner, controller, () => controller.pause());
      expect(errorCode(() => deliver(fx.hyperlane.address, inbound()))).toBe('PAUSED');
    });
  });

  // ============ Unwrapping ============

  describe('unwrapping', () => {
    let native: TestToken;
    let lockbox: Lockbox;

    beforeEach(() => {
      native = new TestToken(fx.chain, { name: 'USD', symbol: 'USD' });
      lockbox = new Lockbox(fx.chain, { erc20: native, bridgedToken: token });
      send(owner, token, () => token.setMinter(lockbox.address, true));
      send(owner, token, () => token.setLockbox(lockbox.address));
      send(owner, controller, () => controller.setTokenUnwrapping(true));
    });

    it('delivers the native token through the lockbox', () => {
      send(owner, native, () => native.mint(lockbox.address, 5_000n));
      deliver(fx.hyperlane.address, inbound({ unwrap: true }));

      expect(native.balanceOf(bob)).toBe(500n);
      expect(token.balanceOf(bob)).toBe(0n);
      expect(native.balanceOf(lockbox.address)).toBe(4_500n);
      expect(lockbox.events.Withdraw.last()).toEqual({ sender: controller.address, amount: 500n });
    });

    it('falls back to the bridged token when the lockbox is short', () => {
      send(owner, native, () => native.mint(lockbox.address, 100n));
      deliver(fx.hyperlane.address, inbound({ unwrap: true }));

      expect(token.balanceOf(bob)).toBe(500n);
      expect(native.balanceOf(bob)).toBe(0n);
      expect(token.balanceOf(controller.address)).toBe(0n);
      expect(token.allowance(controller.address, lockbox.address)).toBe(0n);
    });

    it('ignores the unwrap flag while unwrapping is disabled', () => {
      send(owner, native, () => native.mint(lockbox.address, 5_000n));
      send(owner, controller, () => controller.setTokenUnwrapping(false));
      deliver(fx.hyperlane.address, inbound({ unwrap: true }));
      expect(token.balanceOf(bob)).toBe(500n);
      expect(native.balanceOf(bob)).toBe(0n);
    });
  });

  // ============ Admin ============

  describe('admin', () => {
    it('restricts configuration to the admin', () => {
      expect(errorCode(() => send(alice, controller, () => controller.setLimits(fx.hyperlane.address, 1n, 1n)))).toBe(
        'ACCESS_CONTROL_UNAUTHORIZED'
      );
      expect(errorCode(() => send(alice, controller, () => controller.setControllerForChain([5], [alice])))).toBe(
        'ACCESS_CONTROL_UNAUTHORIZED'
      );
      expect(errorCode(() => send(alice, controller, () => controller.pause()))).toBe('ACCESS_CONTROL_UNAUTHORIZED');
    });

    it('caps limits', () => {
      expect(errorCode(() => send(owner, controller, () => controller.setLimits(fx.hyperlane.address, MAX_LIMIT + 1n, 0n)))).toBe(
        'CONTROLLER_LIMITS_TOO_HIGH'
      );
    });

    it('rejects mismatched controller tables', () => {
      expect(errorCode(() => send(owner, controller, () => controller.setControllerForChain([5, 6], [alice])))).toBe(
        'CONTROLLER_INVALID_PARAMS'
      );
    });

    it('rescues stuck funds', () => {
      send(owner, token, () => token.mint(controller.address, 40n));
      fx.chain.fund(controller.address, 70n);

      send(owner, controller, () => {
        controller.rescueTokens(token, bob, 40n);
      });
      send(owner, controller, () => {
        controller.rescueETH(bob, 70n);
      });

      expect(token.balanceOf(bob)).toBe(40n);
      expect(fx.chain.balanceOf(bob)).toBe(70n);
      expect(
        errorCode(() =>
          send(owner, controller, () => {
            controller.rescueETH(ZERO_ADDRESS, 1n);
          })
        )
      ).toBe('CONTROLLER_ZERO_ADDRESS');
    });
  });
});
