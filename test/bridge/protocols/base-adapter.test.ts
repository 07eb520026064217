import { describe, it, expect, beforeEach } from 'vitest';
import type { Chain } from '../../../src/chain/chain.js';
import type { Address, Hash, Hex } from '../../../src/core/types.js';
import { addressToBytes32, toAddress, ZERO_ADDRESS } from '../../../src/core/address.js';
import { toBytes32 } from '../../../src/core/hash.js';
import { DEFAULT_ADMIN_ROLE } from '../../../src/chain/access-control.js';
import { configureAdapterRoutes } from '../../../src/bridge/config.js';
import { encodeBridgedMessage } from '../../../src/bridge/message.js';
import { encodeGasLimitOptions } from '../../../src/bridge/options.js';
import { encodeHookMetadata, HyperlaneAdapter } from '../../../src/bridge/protocols/hyperlane-adapter.js';
import { MockMailbox } from '../../mocks/transports.js';
import { MockReceiver, RejectingReceiver } from '../../mocks/contracts.js';
import { accounts, errorCode, newChain, send, type Accounts } from '../../helpers.js';

describe('BaseAdapter', () => {
  let chain: Chain;
  let acct: Accounts;
  let mailbox: MockMailbox;
  let receiver: MockReceiver;
  let adapter: HyperlaneAdapter;
  let remote: Address;
  let options: Hex;

  const relay = (value: bigint, relayOptions: Hex = options, destChainId = 10): Hash =>
    send(acct.alice, adapter, () => adapter.relayMessage(destChainId, receiver.address, relayOptions, '0x1234'), value)
      .result;

  beforeEach(() => {
    chain = newChain(1);
    acct = accounts(chain);
    mailbox = new MockMailbox(chain, 10_000n);
    receiver = new MockReceiver(chain);
    remote = chain.createAccount('remote-adapter');
    adapter = new HyperlaneAdapter(chain, {
      name: 'Hyperlane',
      owner: acct.owner,
      treasury: acct.treasury,
      protocolFee: 1_000n,
      chainIds: [10],
      domainIds: [10n],
      mailbox,
    });
    send(acct.owner, adapter, () => adapter.setTrustedAdapter(10, remote));
    chain.fund(acct.alice, 1_000_000n);
    options = encodeGasLimitOptions({ refundAddress: acct.refund, gasLimit: 300_000n });
  });

  // ============ Fees ============

  describe('fees', () => {
    it('charges the protocol fee on the transport fee', () => {
      expect(adapter.calculateFee(10_000n)).toBe(100n);
      expect(adapter.calculateFee(99n)).toBe(0n);
    });

    it('quotes with and without the protocol fee', () => {
      expect(adapter.quoteMessage(10, receiver.address, options, '0x1234', true)).toBe(10_100n);
      expect(adapter.quoteMessage(10, receiver.address, options, '0x1234', false)).toBe(10_000n);
    });

    it('splits the value between treasury, transport and refund', () => {
      const transferId = relay(15_000n);

      expect(transferId).toBe(toBytes32(1n));
      expect(chain.balanceOf(acct.treasury)).toBe(100n);
      expect(mailbox.nativeBalance).toBe(10_000n);
      expect(chain.balanceOf(acct.refund)).toBe(4_900n);
      expect(chain.balanceOf(acct.alice)).toBe(985_000n);
      expect(adapter.nativeBalance).toBe(0n);
    });

    it('refunds nothing when the value is exact', () => {
      relay(10_100n);
      expect(chain.balanceOf(acct.refund)).toBe(0n);
      expect(adapter.nativeBalance).toBe(0n);
    });

    it('rejects a value below transport fee plus protocol fee', () => {
      expect(errorCode(() => relay(10_099n))).toBe('ADAPTER_FEE_TOO_LOW');
      expect(chain.balanceOf(acct.alice)).toBe(1_000_000n);
      expect(chain.balanceOf(acct.treasury)).toBe(0n);
    });

    it('rejects a value below minGas', () => {
      send(acct.owner, adapter, () => adapter.setMinGas(20_000n));
      expect(errorCode(() => relay(15_000n))).toBe('ADAPTER_VALUE_IS_LESS_THAN_LIMIT');
    });

    it('fails the relay when the refund cannot be delivered', () => {
      const rejecting = new RejectingReceiver(chain);
      const rejectingOptions = encodeGasLimitOptions({ refundAddress: rejecting.address, gasLimit: 300_000n });
      expect(errorCode(() => relay(15_000n, rejectingOptions))).toBe('ADAPTER_FEE_TRANSFER_FAILED');
      expect(mailbox.events.Dispatch.count).toBe(0);
      expect(() => relay(10_100n, rejectingOptions)).not.toThrow();
    });

    it('validates protocol fee settings', () => {
      expect(errorCode(() => send(acct.owner, adapter, () => adapter.setProtocolFee(100_001n, acct.treasury)))).toBe(
        'ADAPTER_INVALID_PARAMS'
      );
      expect(errorCode(() => send(acct.owner, adapter, () => adapter.setProtocolFee(1n, ZERO_ADDRESS)))).toBe(
        'ADAPTER_INVALID_PARAMS'
      );
      send(acct.owner, adapter, () => adapter.setProtocolFee(5_000n, acct.bob));
      expect(adapter.protocolFee).toBe(5_000n);
      expect(adapter.treasury).toBe(acct.bob);
      expect(adapter.events.ProtocolFeeSet.last()).toEqual({ protocolFee: 5_000n });
    });
  });

  // ============ Outbound ============

  describe('relayMessage', () => {
    it('hands the envelope to the transport', () => {
      relay(10_100n);

      expect(mailbox.events.Dispatch.last()).toEqual({
        sender: adapter.address,
        destinationDomain: 10n,
        recipientAddress: addressToBytes32(remote),
        messageBody: encodeBridgedMessage({
          message: '0x1234',
          originController: acct.alice,
          destController: receiver.address,
        }),
        metadata: encodeHookMetadata(300_000n, acct.refund),
        value: 10_000n,
      });
    });

    it('rejects chains without a route', () => {
      expect(errorCode(() => relay(10_100n, options, 99))).toBe('ADAPTER_INVALID_PARAMS');
      send(acct.owner, adapter, () => adapter.setTrustedAdapter(10, ZERO_ADDRESS));
      expect(adapter.isChainIdSupported(10)).toBe(false);
      expect(errorCode(() => relay(10_100n))).toBe('ADAPTER_INVALID_PARAMS');
    });

    it('rejects malformed options', () => {
      expect(errorCode(() => relay(10_100n, '0x12'))).toBe('ADAPTER_INVALID_PARAMS');
    });

    it('refuses to relay while paused', () => {
      send(acct.owner, adapter, () => adapter.pause());
      expect(errorCode(() => relay(10_100n))).toBe('PAUSED');
      send(acct.owner, adapter, () => adapter.unpause());
      expect(() => relay(10_100n)).not.toThrow();
    });
  });

  // ============ Admin ============

  describe('admin', () => {
    it('restricts settings to the admin role', () => {
      expect(errorCode(() => send(acct.alice, adapter, () => adapter.setMinGas(1n)))).toBe('ACCESS_CONTROL_UNAUTHORIZED');
      expect(errorCode(() => send(acct.alice, adapter, () => adapter.setTrustedAdapter(10, acct.alice)))).toBe(
        'ACCESS_CONTROL_UNAUTHORIZED'
      );
      expect(errorCode(() => send(acct.alice, adapter, () => adapter.pause()))).toBe('ACCESS_CONTROL_UNAUTHORIZED');
      expect(adapter.access.hasRole(DEFAULT_ADMIN_ROLE, acct.owner)).toBe(true);
    });

    it('applies a route table', () => {
      const other = chain.createAccount('other-adapter');
      configureAdapterRoutes(adapter, acct.owner, [{ chainId: 42, domainId: 4_200n, trustedAdapter: other }]);

      expect(adapter.chainIdToDomainId(42)).toBe(4_200n);
      expect(adapter.domainIdToChainId(4_200n)).toBe(42);
      expect(adapter.trustedAdapter(42)).toBe(other);
      expect(adapter.isChainIdSupported(42)).toBe(true);
    });

    it('applies all routes or none', () => {
      const other = chain.createAccount('other-adapter');
      expect(
        errorCode(() =>
          configureAdapterRoutes(adapter, acct.owner, [
            { chainId: 42, domainId: 4_200n, trustedAdapter: other },
            { chainId: 43, domainId: 'named', trustedAdapter: other },
          ])
        )
      ).toBe('ADAPTER_INVALID_PARAMS');
      expect(adapter.chainIdToDomainId(42)).toBeUndefined();
      expect(adapter.trustedAdapter(42)).toBe(ZERO_ADDRESS);
    });

    it('rejects mismatched domain tables', () => {
      expect(errorCode(() => send(acct.owner, adapter, () => adapter.setDomainId([1n, 2n], [1])))).toBe(
        'ADAPTER_INVALID_PARAMS'
      );
    });

    it('requires a transport endpoint', () => {
      expect(
        errorCode(
          () =>
            new HyperlaneAdapter(chain, {
              name: 'Hyperlane',
              owner: acct.owner,
              treasury: acct.treasury,
              chainIds: [],
              domainIds: [],
              mailbox: {
                address: ZERO_ADDRESS,
                contractName: 'Mailbox',
                onNativeReceived: () => undefined,
                quoteDispatch: () => 0n,
                dispatch: () => toBytes32(0n),
              },
            })
        )
      ).toBe('ADAPTER_INVALID_ADDRESS');
    });
  });

  // ============ Inbound ============

  describe('inbound', () => {
    const originController = toAddress('0x00000000000000000000000000000000000000c1');

    const envelopeTo = (destController: Address): Hex =>
      encodeBridgedMessage({ message: '0xfeed', originController, destController });

    const handle = (from: Address, origin: bigint, sender: Address, body: Hex): void => {
      send(from, adapter, () => adapter.handle(origin, addressToBytes32(sender), body));
    };

    it('delivers to the destination controller', () => {
      handle(mailbox.address, 10n, remote, envelopeTo(receiver.address));
      expect(receiver.events.Received.last()).toEqual({
        message: '0xfeed',
        originChainId: 10,
        originSender: originController,
        adapter: adapter.address,
      });
    });

    it('only accepts calls from the mailbox', () => {
      expect(errorCode(() => handle(acct.alice, 10n, remote, envelopeTo(receiver.address)))).toBe('ADAPTER_UNAUTHORISED');
    });

    it('only accepts the trusted adapter as origin', () => {
      expect(errorCode(() => handle(mailbox.address, 10n, acct.alice, envelopeTo(receiver.address)))).toBe(
        'ADAPTER_UNAUTHORISED'
      );
    });

    it('rejects unknown source domains', () => {
      expect(errorCode(() => handle(mailbox.address, 77n, remote, envelopeTo(receiver.address)))).toBe(
        'ADAPTER_INVALID_PARAMS'
      );
    });

    it('rejects destinations that cannot receive messages', () => {
      expect(errorCode(() => handle(mailbox.address, 10n, remote, envelopeTo(acct.bob)))).toBe('ADAPTER_INVALID_PARAMS');
      expect(errorCode(() => handle(mailbox.address, 10n, remote, envelopeTo(adapter.address)))).toBe(
        'ADAPTER_INVALID_PARAMS'
      );
    });

    it('refuses deliveries while paused', () => {
      send(acct.owner, adapter, () => adapter.pause());
      expect(errorCode(() => handle(mailbox.address, 10n, remote, envelopeTo(receiver.address)))).toBe('PAUSED');
    });
  });
});
