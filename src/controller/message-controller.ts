/**
 * Message controller
 *
 * Sends arbitrary call bundles to the controller registered for another chain
 * through one or more adapters. On the receiving side a bundle becomes
 * executable once `threshold` distinct adapters delivered it, after a
 * timelock, and until it expires. A vetoer may cancel it before execution.
 */

import type { Address, ChainId, Hash, Hex } from '../core/types.js';
import { isZeroAddress, ZERO_ADDRESS } from '../core/address.js';
import { keccak256 } from '../core/hash.js';
import type { Logger } from '../core/logger.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { AccessControl, DEFAULT_ADMIN_ROLE, PAUSE_ROLE } from '../chain/access-control.js';
import { Pausable, ReentrancyGuard } from '../chain/guards.js';
import { BaseAdapter } from '../bridge/protocols/base-adapter.js';
import { invalidParams } from './base-controller.js';
import { computeMessageId, decodeCallMessage, encodeCallMessage, type CallBundle } from './call-message.js';
import { ChainNotSupportedError, ControllerError } from './errors.js';
import { Registry } from './registry.js';

export const MESSAGE_ORIGINATOR_ROLE = keccak256('MESSAGE_ORIGINATOR_ROLE');
export const MESSAGE_RESENDER_ROLE = keccak256('MESSAGE_RESENDER_ROLE');

/** Seconds a received message stays executable after its first delivery */
export const MESSAGE_EXPIRY = 7n * 86_400n;

export interface MessageControllerConfig {
  /** Receive MESSAGE_ORIGINATOR_ROLE and MESSAGE_RESENDER_ROLE */
  originators: readonly Address[];
  /** Receives DEFAULT_ADMIN_ROLE and PAUSE_ROLE */
  admin: Address;
  /** Receives PAUSE_ROLE */
  pauser: Address;
  vetoer: Address;
  /** Seconds between reaching the threshold and becoming executable */
  timelockDelay: bigint;
  /** When set, sender approval is read from this registry instead of the local list */
  registry?: Address;
  localAdapters?: readonly Address[];
  chainIds?: readonly ChainId[];
  controllers?: readonly Address[];
  logger?: Logger;
}

/**
 * Contract a message may call; `data` is the ABI-encoded call
 */
export interface CallTarget {
  onCall(data: Hex): void;
}

export function isCallTarget(contract: Deployed): contract is Deployed & CallTarget {
  return 'onCall' in contract && typeof contract.onCall === 'function';
}

/**
 * Message sent by this controller, kept so resends replay the same payload
 */
export interface SentMessage {
  destChainId: ChainId;
  targets: Address[];
  calldatas: Hex[];
  threshold: bigint;
}

/**
 * Message delivered to this controller
 */
export interface ReceivedMessage {
  originChainId: ChainId;
  targets: Address[];
  calldatas: Hex[];
  threshold: bigint;
  receivedSoFar: bigint;
  /** Zero until the threshold is reached */
  executableAt: bigint;
  expiresAt: bigint;
  executed: boolean;
  cancelled: boolean;
}

// ============ Events ============

export interface MessageCreatedEvent {
  messageId: Hash;
  chainId: ChainId;
  threshold: bigint;
  sender: Address;
}

export interface MessageAdapterEvent {
  messageId: Hash;
  adapter: Address;
}

export interface MessageIdEvent {
  messageId: Hash;
}

export interface MessageExecutableAtEvent {
  messageId: Hash;
  executableAt: bigint;
}

export interface LocalAdapterSetEvent {
  adapter: Address;
  enabled: boolean;
}

export interface AccountStatusEvent {
  account: Address;
  enabled: boolean;
}

export class MessageController extends Contract {
  readonly access: AccessControl;
  readonly pausable: Pausable;

  readonly events = {
    MessageCreated: this.event<MessageCreatedEvent>('MessageCreated'),
    MessageRelayed: this.event<MessageAdapterEvent>('MessageRelayed'),
    MessageResent: this.event<MessageIdEvent>('MessageResent'),
    MessageReceived: this.event<MessageAdapterEvent>('MessageReceived'),
    MessageExecutableAt: this.event<MessageExecutableAtEvent>('MessageExecutableAt'),
    MessageExecuted: this.event<MessageIdEvent>('MessageExecuted'),
    MessageCancelled: this.event<MessageIdEvent>('MessageCancelled'),
    LocalAdapterSet: this.event<LocalAdapterSetEvent>('LocalAdapterSet'),
    LocalRegistrySet: this.event<{ registry: Address }>('LocalRegistrySet'),
    MessageOriginatorSet: this.event<AccountStatusEvent>('MessageOriginatorSet'),
    MessageResenderSet: this.event<AccountStatusEvent>('MessageResenderSet'),
    ControllerForChainSet: this.event<{ controller: Address; chainId: ChainId }>('ControllerForChainSet'),
    VetoerSet: this.event<{ vetoer: Address }>('VetoerSet'),
    TimelockDelaySet: this.event<{ delay: bigint }>('TimelockDelaySet'),
  };

  private readonly guard = new ReentrancyGuard();
  private readonly nonceValue = this.value(0n);
  private readonly registryValue = this.value<Address>(ZERO_ADDRESS);
  private readonly vetoerValue = this.value<Address>(ZERO_ADDRESS);
  private readonly delayValue = this.value(0n);
  private readonly localAdapters = this.map<Address, boolean>(() => false);
  private readonly controllers = this.map<ChainId, Address>(() => ZERO_ADDRESS);
  private readonly sent = this.map<Hash, SentMessage | undefined>(() => undefined);
  private readonly received = this.map<Hash, ReceivedMessage | undefined>(() => undefined);
  private readonly deliveries = this.map<string, boolean>(() => false);

  constructor(chain: Chain, config: MessageControllerConfig) {
    super(chain, 'MessageController', config.logger);
    const chainIds = config.chainIds ?? [];
    if (chainIds.length !== (config.controllers?.length ?? 0)) {
      throw invalidParams('chainIds and controllers must have the same length', {
        chainIds: chainIds.length,
        controllers: config.controllers?.length ?? 0,
      });
    }

    this.access = new AccessControl(chain, this.address);
    this.pausable = new Pausable(chain, this.address);
    this.access.grant(DEFAULT_ADMIN_ROLE, config.admin);
    this.access.grant(PAUSE_ROLE, config.admin);
    this.access.grant(PAUSE_ROLE, config.pauser);
    for (const originator of config.originators) {
      this.access.grant(MESSAGE_ORIGINATOR_ROLE, originator);
      this.access.grant(MESSAGE_RESENDER_ROLE, originator);
    }

    this.registryValue.set(config.registry ?? ZERO_ADDRESS);
    this.vetoerValue.set(config.vetoer);
    this.delayValue.set(config.timelockDelay);
    for (const adapter of config.localAdapters ?? []) {
      this.localAdapters.set(adapter, true);
    }
    chainIds.forEach((chainId, i) => {
      this.controllers.set(chainId, config.controllers?.[i] ?? ZERO_ADDRESS);
    });
  }

  // ============ Views ============

  get nonce(): bigint {
    return this.nonceValue.get();
  }

  get localRegistry(): Address {
    return this.registryValue.get();
  }

  get vetoer(): Address {
    return this.vetoerValue.get();
  }

  get timelockDelay(): bigint {
    return this.delayValue.get();
  }

  get paused(): boolean {
    return this.pausable.paused;
  }

  controllerForChain(chainId: ChainId): Address {
    return this.controllers.get(chainId);
  }

  isLocalAdapter(adapter: Address): boolean {
    return this.localAdapters.get(adapter);
  }

  /**
   * Whether `sender` may deliver messages; the registry, once set, replaces the local list
   */
  isSenderApproved(sender: Address): boolean {
    const registryAddress = this.localRegistry;
    if (isZeroAddress(registryAddress)) return this.isLocalAdapter(sender);
    const registry = this.chain.contractAt(registryAddress);
    return registry instanceof Registry && registry.isLocalAdapter(sender);
  }

  sentMessage(messageId: Hash): SentMessage | undefined {
    return this.sent.get(messageId);
  }

  receivedMessage(messageId: Hash): ReceivedMessage | undefined {
    return this.received.get(messageId);
  }

  isDeliveredBy(messageId: Hash, adapter: Address): boolean {
    return this.deliveries.get(deliveryKey(messageId, adapter));
  }

  isReceivedMessageExecutable(messageId: Hash): boolean {
    const record = this.received.get(messageId);
    if (!record || record.executed || record.cancelled) return false;
    const now = BigInt(this.chain.now());
    return record.receivedSoFar >= record.threshold && now >= record.executableAt && now < record.expiresAt;
  }

  calculateMessageId(destChainId: ChainId, salt: Hash): Hash {
    return computeMessageId(this.address, this.chain.chainId, destChainId, this.nonce, salt);
  }

  // ============ Outbound ============

  /**
   * Send `bundle` to the controller on `destChainId` through every adapter in
   * `adapters`; the threshold must equal the number of adapters
   */
  sendMessage(
    bundle: CallBundle,
    destChainId: ChainId,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[]
  ): Hash {
    return this.guard.run(() => {
      this.access.checkRole(MESSAGE_ORIGINATOR_ROLE);
      this.pausable.requireNotPaused();
      if (bundle.targets.length !== bundle.calldatas.length) {
        throw invalidParams('targets and calldatas must have the same length', {
          targets: bundle.targets.length,
          calldatas: bundle.calldatas.length,
        });
      }
      if (adapters.length === 0 || bundle.threshold !== BigInt(adapters.length)) {
        throw invalidParams(`Threshold ${String(bundle.threshold)} does not match ${String(adapters.length)} adapters`, {
          threshold: bundle.threshold,
          adapters: adapters.length,
        });
      }
      this.requireRelays(adapters, fees, options);
      const destController = this.requireDestController(destChainId);

      const messageId = this.calculateMessageId(destChainId, bundle.salt);
      this.nonceValue.set(this.nonce + 1n);
      const message: SentMessage = {
        destChainId,
        targets: [...bundle.targets],
        calldatas: [...bundle.calldatas],
        threshold: bundle.threshold,
      };
      this.sent.set(messageId, message);
      this.events.MessageCreated.emit({ messageId, chainId: destChainId, threshold: bundle.threshold, sender: this.msg.sender });
      this.log.info('Created message', { messageId, destChainId, threshold: bundle.threshold });

      adapters.forEach((adapter, i) => {
        this.relay(messageId, message, adapter, destController, options[i] ?? '0x', fees[i] ?? 0n);
      });
      return messageId;
    });
  }

  /**
   * Relay a sent message again, typically through adapters that have not delivered it
   */
  resendMessage(messageId: Hash, adapters: readonly Address[], fees: readonly bigint[], options: readonly Hex[]): void {
    this.guard.run(() => {
      this.access.checkRole(MESSAGE_RESENDER_ROLE);
      this.pausable.requireNotPaused();
      const message = this.sent.get(messageId);
      if (!message) {
        throw invalidParams(`Unknown message ${messageId}`, { messageId });
      }
      this.requireRelays(adapters, fees, options);
      const destController = this.requireDestController(message.destChainId);

      this.events.MessageResent.emit({ messageId });
      adapters.forEach((adapter, i) => {
        this.relay(messageId, message, adapter, destController, options[i] ?? '0x', fees[i] ?? 0n);
      });
    });
  }

  // ============ Inbound ============

  /**
   * Adapter callback; records one delivery and starts the timelock once the threshold is reached
   */
  receiveMessage(payload: Hex, originChainId: ChainId, originSender: Address): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const adapter = this.msg.sender;
      if (!this.isSenderApproved(adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_UNAUTHORISED',
          message: `${adapter} is not an approved adapter`,
          details: { adapter },
        });
      }
      const expected = this.controllerForChain(originChainId);
      if (isZeroAddress(expected) || expected !== originSender) {
        throw invalidParams(`${originSender} is not the controller for chain ${String(originChainId)}`, {
          originChainId,
          originSender,
        });
      }

      const message = decodeCallMessage(payload);
      const { messageId } = message;
      if (this.isDeliveredBy(messageId, adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_MESSAGE_RESENT_BY_ADAPTER',
          message: `Adapter ${adapter} already delivered ${messageId}`,
          details: { messageId, adapter },
        });
      }
      const existing = this.received.get(messageId);
      if (existing && (existing.executed || existing.cancelled)) {
        throw notExecutable(messageId);
      }
      this.deliveries.set(deliveryKey(messageId, adapter), true);

      const now = BigInt(this.chain.now());
      const record: ReceivedMessage = existing ?? {
        originChainId,
        targets: message.targets,
        calldatas: message.calldatas,
        threshold: message.threshold,
        receivedSoFar: 0n,
        executableAt: 0n,
        expiresAt: now + MESSAGE_EXPIRY,
        executed: false,
        cancelled: false,
      };
      const receivedSoFar = record.receivedSoFar + 1n;
      const reached = receivedSoFar === record.threshold;
      const executableAt = reached ? now + this.timelockDelay : record.executableAt;
      this.received.set(messageId, { ...record, receivedSoFar, executableAt });
      this.events.MessageReceived.emit({ messageId, adapter });

      if (reached) {
        this.events.MessageExecutableAt.emit({ messageId, executableAt });
        this.log.info('Message executable', { messageId, executableAt, deliveries: receivedSoFar });
      }
    });
  }

  /**
   * Run every call of an executable message; anyone may call
   */
  execute(messageId: Hash): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const record = this.received.get(messageId);
      if (!record || record.executed || record.cancelled) throw notExecutable(messageId);
      if (record.receivedSoFar < record.threshold) {
        throw new ControllerError({
          code: 'CONTROLLER_THRESHOLD_NOT_MET',
          message: `Message ${messageId} has ${String(record.receivedSoFar)} of ${String(record.threshold)} deliveries`,
          details: { messageId, receivedSoFar: record.receivedSoFar, threshold: record.threshold },
          retryable: true,
        });
      }
      const now = BigInt(this.chain.now());
      if (now < record.executableAt) {
        throw new ControllerError({
          code: 'CONTROLLER_MESSAGE_NOT_EXECUTABLE_YET',
          message: `Message ${messageId} is timelocked until ${String(record.executableAt)}`,
          details: { messageId, executableAt: record.executableAt },
          retryable: true,
        });
      }
      if (now >= record.expiresAt) {
        throw new ControllerError({
          code: 'CONTROLLER_MESSAGE_EXPIRED',
          message: `Message ${messageId} expired at ${String(record.expiresAt)}`,
          details: { messageId, expiresAt: record.expiresAt },
        });
      }

      this.received.set(messageId, { ...record, executed: true });
      record.targets.forEach((target, i) => {
        this.invoke(messageId, target, record.calldatas[i] ?? '0x');
      });
      this.events.MessageExecuted.emit({ messageId });
      this.log.info('Executed message', { messageId, originChainId: record.originChainId, calls: record.targets.length });
    });
  }

  /**
   * Veto a received message that has not run yet
   */
  cancel(messageId: Hash): void {
    const sender = this.msg.sender;
    if (sender !== this.vetoer) {
      throw new ControllerError({
        code: 'CONTROLLER_UNAUTHORISED',
        message: `${sender} is not the vetoer`,
        details: { sender },
      });
    }
    const record = this.received.get(messageId);
    if (!record || record.executed || record.cancelled) {
      throw new ControllerError({
        code: 'CONTROLLER_MESSAGE_NOT_CANCELLABLE',
        message: `Message ${messageId} cannot be cancelled`,
        details: { messageId, executed: record?.executed, cancelled: record?.cancelled },
      });
    }
    this.received.set(messageId, { ...record, cancelled: true });
    this.events.MessageCancelled.emit({ messageId });
    this.log.warn('Cancelled message', { messageId });
  }

  // ============ Admin ============

  setLocalAdapter(adapters: readonly Address[], enabled: readonly boolean[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireSameLength(adapters.length, enabled.length, 'adapters', 'enabled');
    adapters.forEach((adapter, i) => {
      const status = enabled[i] ?? false;
      this.localAdapters.set(adapter, status);
      this.events.LocalAdapterSet.emit({ adapter, enabled: status });
    });
  }

  /**
   * Delegate sender approval to a registry; the zero address returns to the local list
   */
  setLocalRegistry(registry: Address): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.registryValue.set(registry);
    this.events.LocalRegistrySet.emit({ registry });
  }

  /**
   * Grant or revoke both the originator and the resender role
   */
  setMessageOriginators(originators: readonly Address[], enabled: readonly boolean[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireSameLength(originators.length, enabled.length, 'originators', 'enabled');
    originators.forEach((account, i) => {
      const status = enabled[i] ?? false;
      if (status) {
        this.access.grant(MESSAGE_ORIGINATOR_ROLE, account);
        this.access.grant(MESSAGE_RESENDER_ROLE, account);
      } else {
        this.access.revoke(MESSAGE_ORIGINATOR_ROLE, account);
        this.access.revoke(MESSAGE_RESENDER_ROLE, account);
      }
      this.events.MessageOriginatorSet.emit({ account, enabled: status });
      this.events.MessageResenderSet.emit({ account, enabled: status });
    });
  }

  setControllerForChain(chainIds: readonly ChainId[], controllers: readonly Address[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireSameLength(chainIds.length, controllers.length, 'chainIds', 'controllers');
    chainIds.forEach((chainId, i) => {
      const controller = controllers[i] ?? ZERO_ADDRESS;
      this.controllers.set(chainId, controller);
      this.events.ControllerForChainSet.emit({ controller, chainId });
    });
  }

  setVetoer(vetoer: Address): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.vetoerValue.set(vetoer);
    this.events.VetoerSet.emit({ vetoer });
  }

  setTimelockDelay(delay: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.delayValue.set(delay);
    this.events.TimelockDelaySet.emit({ delay });
  }

  /**
   * Send the whole native balance to `recipient`
   */
  withdraw(recipient: Address): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    if (isZeroAddress(recipient)) {
      throw new ControllerError({ code: 'CONTROLLER_ZERO_ADDRESS', message: 'Recipient cannot be the zero address' });
    }
    this.sendValue(recipient, this.nativeBalance);
  }

  pause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.pause(this.msg.sender);
  }

  unpause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.unpause(this.msg.sender);
  }

  // ============ Internal ============

  private requireRelays(adapters: readonly Address[], fees: readonly bigint[], options: readonly Hex[]): void {
    if (adapters.length !== fees.length || adapters.length !== options.length) {
      throw invalidParams('Adapters, fees and options must have the same length', {
        adapters: adapters.length,
        fees: fees.length,
        options: options.length,
      });
    }
    if (new Set(adapters).size !== adapters.length) {
      throw new ControllerError({
        code: 'CONTROLLER_DUPLICATE_ADAPTER',
        message: 'An adapter appears twice',
        details: { adapters },
      });
    }
    for (const adapter of adapters) {
      if (!this.isSenderApproved(adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_ADAPTER_NOT_SUPPORTED',
          message: `Adapter ${adapter} is not approved on this chain`,
          details: { adapter },
        });
      }
    }
    const total = fees.reduce((sum, fee) => sum + fee, 0n);
    if (total !== this.msg.value) {
      throw new ControllerError({
        code: 'CONTROLLER_FEES_SUM_MISMATCH',
        message: `Fees add up to ${String(total)} but ${String(this.msg.value)} was sent`,
        details: { total, value: this.msg.value },
      });
    }
  }

  private requireDestController(destChainId: ChainId): Address {
    const controller = this.controllerForChain(destChainId);
    if (isZeroAddress(controller)) throw new ChainNotSupportedError(destChainId);
    return controller;
  }

  private relay(
    messageId: Hash,
    message: SentMessage,
    adapterAddress: Address,
    destController: Address,
    options: Hex,
    fee: bigint
  ): void {
    const adapter = this.chain.contractAt(adapterAddress);
    if (!(adapter instanceof BaseAdapter)) {
      throw invalidParams(`${adapterAddress} is not a bridge adapter`, { adapter: adapterAddress });
    }
    const payload = encodeCallMessage({
      messageId,
      targets: message.targets,
      calldatas: message.calldatas,
      threshold: message.threshold,
    });
    this.external(adapter, () => adapter.relayMessage(message.destChainId, destController, options, payload), fee);
    this.events.MessageRelayed.emit({ messageId, adapter: adapterAddress });
  }

  /**
   * Calls to addresses without a contract succeed, as they would on chain
   */
  private invoke(messageId: Hash, address: Address, data: Hex): void {
    const target = this.chain.contractAt(address);
    if (!target) return;
    if (!isCallTarget(target)) {
      throw callFailed(messageId, address, `${address} does not accept calls`);
    }
    try {
      this.external(target, () => {
        target.onCall(data);
      });
    } catch (error) {
      throw callFailed(messageId, address, error instanceof Error ? error.message : String(error));
    }
  }
}

function notExecutable(messageId: Hash): ControllerError {
  return new ControllerError({
    code: 'CONTROLLER_MESSAGE_NOT_EXECUTABLE',
    message: `Message ${messageId} was executed, cancelled or never received`,
    details: { messageId },
  });
}

function callFailed(messageId: Hash, target: Address, cause: string): ControllerError {
  return new ControllerError({
    code: 'CONTROLLER_MESSAGE_CALL_FAILED',
    message: `Call to ${target} in message ${messageId} failed`,
    details: { messageId, target, cause },
  });
}

function requireSameLength(left: number, right: number, leftName: string, rightName: string): void {
  if (left !== right) {
    throw invalidParams(`${leftName} and ${rightName} must have the same length`, { [leftName]: left, [rightName]: right });
  }
}

function deliveryKey(messageId: Hash, adapter: Address): string {
  return `${messageId}:${adapter}`;
}
