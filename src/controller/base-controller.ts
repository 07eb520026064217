/**
 * Asset controller base
 *
 * Owns one token's cross-chain movement: debits the sender once, announces
 * the transfer through one or more adapters, and credits the recipient when
 * the transfer arrives from the controller registered for the origin chain.
 * Subclasses decide what debit and credit mean (burn and mint, or lock and
 * release).
 */

import type { Address, ChainId, Hash, Hex } from '../core/types.js';
import { isZeroAddress, ZERO_ADDRESS } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import type { Chain, Deployed } from '../chain/chain.js';
import { Contract } from '../chain/contract.js';
import { AccessControl, DEFAULT_ADMIN_ROLE, PAUSE_ROLE } from '../chain/access-control.js';
import { Pausable, ReentrancyGuard } from '../chain/guards.js';
import type { ERC20 } from '../tokens/erc20.js';
import { BaseAdapter } from '../bridge/protocols/base-adapter.js';
import { ChainNotSupportedError, ControllerError, UnknownTransferError } from './errors.js';
import { FeeCollector } from './fee-collector.js';
import { emptyBridgeParameters, RateLimits, type BridgeParameters } from './rate-limits.js';
import { computeTransferId, decodeTransferMessage, encodeTransferMessage } from './transfer-message.js';

export interface ControllerConfig {
  token: Address;
  /** Receives DEFAULT_ADMIN_ROLE and PAUSE_ROLE */
  admin: Address;
  /** Receives PAUSE_ROLE */
  pauser: Address;
  feeCollector: Address;
  /** Seconds a drained limit takes to refill */
  duration: bigint;
  /** Adapters needed for a multi-bridge transfer; 0 disables them */
  minBridges?: bigint;
  multiBridgeAdapters?: readonly Address[];
  chainIds?: readonly ChainId[];
  controllers?: readonly Address[];
  bridges?: readonly Address[];
  mintingLimits?: readonly bigint[];
  burningLimits?: readonly bigint[];
  logger?: Logger;
}

/**
 * Transfer announced by this controller, kept so resends replay the same values
 */
export interface SentTransfer {
  destChainId: ChainId;
  recipient: Address;
  amount: bigint;
  unwrap: boolean;
  threshold: bigint;
  multiBridge: boolean;
}

/**
 * Transfer announced to this controller
 */
export interface ReceivedTransfer {
  originChainId: ChainId;
  recipient: Address;
  amount: bigint;
  unwrap: boolean;
  threshold: bigint;
  receivedSoFar: bigint;
  executed: boolean;
}

// ============ Events ============

export interface TransferCreatedEvent {
  transferId: Hash;
  destChainId: ChainId;
  threshold: bigint;
  sender: Address;
  recipient: Address;
  amount: bigint;
  unwrap: boolean;
}

export interface TransferRelayedEvent {
  transferId: Hash;
  adapter: Address;
}

export interface TransferReceivedEvent {
  transferId: Hash;
  originChainId: ChainId;
  adapter: Address;
}

export interface TransferIdEvent {
  transferId: Hash;
}

export interface ControllerForChainSetEvent {
  controller: Address;
  chainId: ChainId;
}

export interface MultiBridgeAdapterSetEvent {
  adapter: Address;
  allowed: boolean;
}

export interface BridgeLimitsSetEvent {
  bridge: Address;
  mintingLimit: bigint;
  burningLimit: bigint;
}

export interface TransfersPausedToChainEvent {
  chainId: ChainId;
  paused: boolean;
}

/**
 * Key of the multi-bridge limit
 */
export const MULTI_BRIDGE_LIMIT_KEY = ZERO_ADDRESS;

export abstract class BaseAssetController<T extends ERC20 = ERC20> extends Contract {
  readonly token: T;
  readonly feeCollector: FeeCollector;
  readonly access: AccessControl;
  readonly pausable: Pausable;
  readonly limits: RateLimits;

  readonly events = {
    TransferCreated: this.event<TransferCreatedEvent>('TransferCreated'),
    TransferRelayed: this.event<TransferRelayedEvent>('TransferRelayed'),
    TransferResent: this.event<TransferIdEvent>('TransferResent'),
    TransferReceived: this.event<TransferReceivedEvent>('TransferReceived'),
    TransferExecutable: this.event<TransferIdEvent>('TransferExecutable'),
    TransferExecuted: this.event<TransferIdEvent>('TransferExecuted'),
    ControllerForChainSet: this.event<ControllerForChainSetEvent>('ControllerForChainSet'),
    MinBridgesSet: this.event<{ minBridges: bigint }>('MinBridgesSet'),
    MultiBridgeAdapterSet: this.event<MultiBridgeAdapterSetEvent>('MultiBridgeAdapterSet'),
    BridgeLimitsSet: this.event<BridgeLimitsSetEvent>('BridgeLimitsSet'),
    AllowTokenUnwrappingSet: this.event<{ allowed: boolean }>('AllowTokenUnwrappingSet'),
    TransfersPausedToChain: this.event<TransfersPausedToChainEvent>('TransfersPausedToChain'),
  };

  protected readonly guard = new ReentrancyGuard();
  private readonly nonceValue = this.value(0n);
  private readonly minBridgesValue = this.value(0n);
  private readonly unwrappingValue = this.value(false);
  private readonly controllers = this.map<ChainId, Address>(() => ZERO_ADDRESS);
  private readonly multiBridgeAdapters = this.map<Address, boolean>(() => false);
  private readonly pausedChains = this.map<ChainId, boolean>(() => false);
  private readonly sent = this.map<Hash, SentTransfer | undefined>(() => undefined);
  private readonly received = this.map<Hash, ReceivedTransfer | undefined>(() => undefined);
  private readonly deliveries = this.map<string, boolean>(() => false);

  constructor(
    chain: Chain,
    contractName: string,
    config: ControllerConfig,
    isToken: (contract: Deployed) => contract is T
  ) {
    super(chain, contractName, config.logger);
    validateConfig(config);

    const token = chain.contractAt(config.token);
    if (!token || !isToken(token)) {
      throw invalidParams(`${config.token} is not a supported token`, { token: config.token });
    }

    const feeCollector = chain.contractAt(config.feeCollector);
    if (!(feeCollector instanceof FeeCollector)) {
      throw invalidParams(`${config.feeCollector} is not a fee collector`, { feeCollector: config.feeCollector });
    }

    this.token = token;
    this.feeCollector = feeCollector;
    this.access = new AccessControl(chain, this.address);
    this.pausable = new Pausable(chain, this.address);
    this.limits = new RateLimits(chain, this.map<Address, BridgeParameters>(emptyBridgeParameters), config.duration);

    this.access.grant(DEFAULT_ADMIN_ROLE, config.admin);
    this.access.grant(PAUSE_ROLE, config.admin);
    this.access.grant(PAUSE_ROLE, config.pauser);

    this.minBridgesValue.set(config.minBridges ?? 0n);
    for (const adapter of config.multiBridgeAdapters ?? []) {
      this.multiBridgeAdapters.set(adapter, true);
    }
    const chainIds = config.chainIds ?? [];
    chainIds.forEach((chainId, i) => {
      this.controllers.set(chainId, config.controllers?.[i] ?? ZERO_ADDRESS);
    });
    const bridges = config.bridges ?? [];
    bridges.forEach((bridge, i) => {
      this.limits.set(bridge, config.mintingLimits?.[i] ?? 0n, config.burningLimits?.[i] ?? 0n);
    });
  }

  // ============ Views ============

  get nonce(): bigint {
    return this.nonceValue.get();
  }

  get minBridges(): bigint {
    return this.minBridgesValue.get();
  }

  get allowTokenUnwrapping(): boolean {
    return this.unwrappingValue.get();
  }

  get paused(): boolean {
    return this.pausable.paused;
  }

  controllerForChain(chainId: ChainId): Address {
    return this.controllers.get(chainId);
  }

  isMultiBridgeAdapter(adapter: Address): boolean {
    return this.multiBridgeAdapters.get(adapter);
  }

  isTransfersPausedToChain(chainId: ChainId): boolean {
    return this.pausedChains.get(chainId);
  }

  sentTransfer(transferId: Hash): SentTransfer | undefined {
    return this.sent.get(transferId);
  }

  receivedTransfer(transferId: Hash): ReceivedTransfer | undefined {
    return this.received.get(transferId);
  }

  isDeliveredBy(transferId: Hash, adapter: Address): boolean {
    return this.deliveries.get(deliveryKey(transferId, adapter));
  }

  mintingMaxLimitOf(bridge: Address): bigint {
    return this.limits.maxLimitOf('minter', bridge);
  }

  burningMaxLimitOf(bridge: Address): bigint {
    return this.limits.maxLimitOf('burner', bridge);
  }

  mintingCurrentLimitOf(bridge: Address): bigint {
    return this.limits.currentLimitOf('minter', bridge);
  }

  burningCurrentLimitOf(bridge: Address): bigint {
    return this.limits.currentLimitOf('burner', bridge);
  }

  /**
   * Id the next transfer to `destChainId` will get
   */
  calculateTransferId(destChainId: ChainId): Hash {
    return computeTransferId(this.address, this.chain.chainId, destChainId, this.nonce);
  }

  // ============ Outbound ============

  /**
   * Send `amount` to `recipient` on `destChainId` through one adapter; msg.value pays the adapter
   */
  transferTo(recipient: Address, amount: bigint, unwrap: boolean, destChainId: ChainId, adapter: Address, options: Hex): Hash {
    return this.guard.run(() => {
      this.requireTransferable(amount, destChainId);
      const destController = this.requireDestController(destChainId);
      this.limits.use('burner', adapter, amount);

      const sender = this.msg.sender;
      this.debit(sender, amount);

      const transfer: SentTransfer = { destChainId, recipient, amount, unwrap, threshold: 1n, multiBridge: false };
      const transferId = this.record(transfer);
      this.relay(transferId, transfer, adapter, destController, options, this.msg.value);
      return transferId;
    });
  }

  /**
   * Announce one transfer through several adapters; it executes once every one of them delivered it.
   * The fee collector's fee is taken from the sender on top of `amount`.
   */
  transferToMulti(
    recipient: Address,
    amount: bigint,
    unwrap: boolean,
    destChainId: ChainId,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[]
  ): Hash {
    return this.guard.run(() => {
      this.requireTransferable(amount, destChainId);
      this.requireMultiBridgeEnabled();
      if (BigInt(adapters.length) < this.minBridges) {
        throw invalidParams(`At least ${String(this.minBridges)} adapters are required`, {
          adapters: adapters.length,
          minBridges: this.minBridges,
        });
      }
      this.requireMultiRelay(adapters, fees, options);
      const destController = this.requireDestController(destChainId);
      this.requireFeesSum(fees);
      this.requireWhitelisted(adapters);
      this.limits.use('burner', MULTI_BRIDGE_LIMIT_KEY, amount);

      const sender = this.msg.sender;
      this.collectFee(sender, amount);
      this.debit(sender, amount);

      const threshold = BigInt(adapters.length);
      const transfer: SentTransfer = { destChainId, recipient, amount, unwrap, threshold, multiBridge: true };
      const transferId = this.record(transfer);
      adapters.forEach((adapter, i) => {
        this.relay(transferId, transfer, adapter, destController, options[i] ?? '0x', fees[i] ?? 0n);
      });
      return transferId;
    });
  }

  /**
   * Announce a single-bridge transfer again through another adapter; nothing is debited
   */
  resendTransfer(transferId: Hash, adapter: Address, options: Hex): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const transfer = this.requireSent(transferId);
      if (transfer.multiBridge) {
        throw invalidParams('Multi-bridge transfers are resent with resendTransferMulti', { transferId });
      }
      if (this.burningMaxLimitOf(adapter) === 0n) {
        throw new ControllerError({
          code: 'CONTROLLER_NOT_HIGH_ENOUGH_LIMITS',
          message: `Adapter ${adapter} has no burning limit`,
          details: { adapter },
          suggestion: 'Resend through an adapter with a configured limit',
        });
      }
      const destController = this.requireDestController(transfer.destChainId);

      this.events.TransferResent.emit({ transferId });
      this.relay(transferId, transfer, adapter, destController, options, this.msg.value);
    });
  }

  /**
   * Announce a multi-bridge transfer again, typically through adapters that have not delivered it yet
   */
  resendTransferMulti(
    transferId: Hash,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[]
  ): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const transfer = this.requireSent(transferId);
      if (!transfer.multiBridge) {
        throw invalidParams('Single-bridge transfers are resent with resendTransfer', { transferId });
      }
      this.requireMultiBridgeEnabled();
      this.requireMultiRelay(adapters, fees, options);
      this.requireFeesSum(fees);
      this.requireWhitelisted(adapters);
      const destController = this.requireDestController(transfer.destChainId);

      this.events.TransferResent.emit({ transferId });
      adapters.forEach((adapter, i) => {
        this.relay(transferId, transfer, adapter, destController, options[i] ?? '0x', fees[i] ?? 0n);
      });
    });
  }

  // ============ Inbound ============

  /**
   * Adapter callback. Single-bridge transfers execute on arrival; multi-bridge
   * transfers wait until every announcing adapter delivered them.
   */
  receiveMessage(message: Hex, originChainId: ChainId, originSender: Address): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const expected = this.controllerForChain(originChainId);
      if (isZeroAddress(expected) || expected !== originSender) {
        throw invalidParams(`${originSender} is not the controller for chain ${String(originChainId)}`, {
          originChainId,
          originSender,
        });
      }

      const adapter = this.msg.sender;
      const transfer = decodeTransferMessage(message);
      const { transferId } = transfer;

      if (this.isDeliveredBy(transferId, adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_TRANSFER_RESENT_BY_ADAPTER',
          message: `Adapter ${adapter} already delivered ${transferId}`,
          details: { transferId, adapter },
        });
      }
      const existing = this.received.get(transferId);
      if (existing?.executed) {
        throw notExecutable(transferId);
      }
      this.deliveries.set(deliveryKey(transferId, adapter), true);

      const record: ReceivedTransfer = existing ?? {
        originChainId,
        recipient: transfer.recipient,
        amount: transfer.amount,
        unwrap: transfer.unwrap,
        threshold: transfer.threshold,
        receivedSoFar: 0n,
        executed: false,
      };

      if (record.threshold <= 1n) {
        this.limits.use('minter', adapter, record.amount);
        this.received.set(transferId, { ...record, receivedSoFar: record.receivedSoFar + 1n, executed: true });
        this.events.TransferReceived.emit({ transferId, originChainId, adapter });
        this.credit(record.recipient, record.amount, record.unwrap);
        this.events.TransferExecuted.emit({ transferId });
        this.log.info('Executed transfer', { transferId, originChainId, amount: record.amount });
        return;
      }

      if (!this.isMultiBridgeAdapter(adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_ADAPTER_NOT_SUPPORTED',
          message: `Adapter ${adapter} is not a multi-bridge adapter`,
          details: { adapter, transferId },
        });
      }
      const receivedSoFar = record.receivedSoFar + 1n;
      this.received.set(transferId, { ...record, receivedSoFar });
      this.events.TransferReceived.emit({ transferId, originChainId, adapter });
      if (receivedSoFar === record.threshold) {
        this.events.TransferExecutable.emit({ transferId });
        this.log.info('Transfer executable', { transferId, deliveries: receivedSoFar });
      }
    });
  }

  /**
   * Credit a multi-bridge transfer that reached its threshold; anyone may call
   */
  execute(transferId: Hash): void {
    this.guard.run(() => {
      this.pausable.requireNotPaused();
      const record = this.received.get(transferId);
      if (!record) throw new UnknownTransferError(transferId);
      if (record.executed) throw notExecutable(transferId);
      if (record.receivedSoFar < record.threshold) {
        throw new ControllerError({
          code: 'CONTROLLER_THRESHOLD_NOT_MET',
          message: `Transfer ${transferId} has ${String(record.receivedSoFar)} of ${String(record.threshold)} deliveries`,
          details: { transferId, receivedSoFar: record.receivedSoFar, threshold: record.threshold },
          retryable: true,
        });
      }

      this.limits.use('minter', MULTI_BRIDGE_LIMIT_KEY, record.amount);
      this.received.set(transferId, { ...record, executed: true });
      this.credit(record.recipient, record.amount, record.unwrap);
      this.events.TransferExecuted.emit({ transferId });
      this.log.info('Executed transfer', { transferId, originChainId: record.originChainId, amount: record.amount });
    });
  }

  // ============ Admin ============

  setControllerForChain(chainIds: readonly ChainId[], controllers: readonly Address[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireSameLength(chainIds.length, controllers.length, 'chainIds', 'controllers');
    chainIds.forEach((chainId, i) => {
      const controller = controllers[i] ?? ZERO_ADDRESS;
      this.controllers.set(chainId, controller);
      this.events.ControllerForChainSet.emit({ controller, chainId });
    });
  }

  setMinBridges(minBridges: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.minBridgesValue.set(minBridges);
    this.events.MinBridgesSet.emit({ minBridges });
  }

  setMultiBridgeAdapters(adapters: readonly Address[], enabled: readonly boolean[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireSameLength(adapters.length, enabled.length, 'adapters', 'enabled');
    adapters.forEach((adapter, i) => {
      const allowed = enabled[i] ?? false;
      this.multiBridgeAdapters.set(adapter, allowed);
      this.events.MultiBridgeAdapterSet.emit({ adapter, allowed });
    });
  }

  /**
   * Set a bridge's minting and burning maxima; the zero address sets the multi-bridge limits
   */
  setLimits(bridge: Address, mintingLimit: bigint, burningLimit: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.limits.set(bridge, mintingLimit, burningLimit);
    this.events.BridgeLimitsSet.emit({ bridge, mintingLimit, burningLimit });
  }

  setTokenUnwrapping(allowed: boolean): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.unwrappingValue.set(allowed);
    this.events.AllowTokenUnwrappingSet.emit({ allowed });
  }

  pauseTransfersToChain(chainId: ChainId, paused: boolean): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.pausedChains.set(chainId, paused);
    this.events.TransfersPausedToChain.emit({ chainId, paused });
  }

  rescueTokens(token: ERC20, to: Address, amount: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireRecipient(to);
    this.external(token, () => token.transfer(to, amount));
  }

  rescueETH(to: Address, amount: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    requireRecipient(to);
    this.sendValue(to, amount);
  }

  pause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.pause(this.msg.sender);
  }

  unpause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.unpause(this.msg.sender);
  }

  // ============ Token movement ============

  /**
   * Take `amount` from `sender`; runs once per transfer
   */
  protected abstract debit(sender: Address, amount: bigint): void;

  /**
   * Give `amount` to `recipient`, unwrapping when asked and possible
   */
  protected abstract credit(recipient: Address, amount: bigint, unwrap: boolean): void;

  // ============ Internal ============

  private requireTransferable(amount: bigint, destChainId: ChainId): void {
    this.pausable.requireNotPaused();
    if (amount <= 0n) {
      throw new ControllerError({ code: 'CONTROLLER_ZERO_AMOUNT', message: 'Amount must be positive', details: { amount } });
    }
    if (this.isTransfersPausedToChain(destChainId)) {
      throw new ControllerError({
        code: 'CONTROLLER_TRANSFERS_PAUSED_TO_DESTINATION',
        message: `Transfers to chain ${String(destChainId)} are paused`,
        details: { destChainId },
        retryable: true,
      });
    }
  }

  private requireMultiBridgeEnabled(): void {
    if (this.minBridges === 0n) {
      throw new ControllerError({
        code: 'CONTROLLER_MULTI_BRIDGE_TRANSFERS_DISABLED',
        message: 'Multi-bridge transfers are disabled',
        suggestion: 'Set minBridges above zero',
      });
    }
  }

  private requireMultiRelay(adapters: readonly Address[], fees: readonly bigint[], options: readonly Hex[]): void {
    if (adapters.length !== fees.length || adapters.length !== options.length) {
      throw new ControllerError({
        code: 'CONTROLLER_LENGTH_MISMATCH',
        message: 'Adapters, fees and options must have the same length',
        details: { adapters: adapters.length, fees: fees.length, options: options.length },
      });
    }
  }

  private requireFeesSum(fees: readonly bigint[]): void {
    const total = fees.reduce((sum, fee) => sum + fee, 0n);
    if (total !== this.msg.value) {
      throw new ControllerError({
        code: 'CONTROLLER_FEES_SUM_MISMATCH',
        message: `Fees add up to ${String(total)} but ${String(this.msg.value)} was sent`,
        details: { total, value: this.msg.value },
      });
    }
  }

  private requireWhitelisted(adapters: readonly Address[]): void {
    const seen = new Set<Address>();
    for (const adapter of adapters) {
      if (seen.has(adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_DUPLICATE_ADAPTER',
          message: `Adapter ${adapter} appears twice`,
          details: { adapter },
        });
      }
      seen.add(adapter);
    }
    for (const adapter of adapters) {
      if (!this.isMultiBridgeAdapter(adapter)) {
        throw new ControllerError({
          code: 'CONTROLLER_ADAPTER_NOT_SUPPORTED',
          message: `Adapter ${adapter} is not a multi-bridge adapter`,
          details: { adapter },
        });
      }
    }
  }

  private requireDestController(destChainId: ChainId): Address {
    const controller = this.controllerForChain(destChainId);
    if (isZeroAddress(controller)) throw new ChainNotSupportedError(destChainId);
    return controller;
  }

  private requireSent(transferId: Hash): SentTransfer {
    const transfer = this.sent.get(transferId);
    if (!transfer) throw new UnknownTransferError(transferId);
    return transfer;
  }

  private collectFee(sender: Address, amount: bigint): void {
    const feeCollector = this.feeCollector;
    const fee = feeCollector.quote(amount);
    if (fee === 0n) return;
    const token = this.token;
    this.external(token, () => token.transferFrom(sender, this.address, fee));
    this.external(token, () => token.approve(feeCollector.address, fee));
    this.external(feeCollector, () => {
      feeCollector.collect(token, amount);
    });
  }

  private record(transfer: SentTransfer): Hash {
    const { destChainId } = transfer;
    const transferId = this.calculateTransferId(destChainId);
    this.nonceValue.set(this.nonce + 1n);
    this.sent.set(transferId, transfer);
    this.events.TransferCreated.emit({
      transferId,
      destChainId,
      threshold: transfer.threshold,
      sender: this.msg.sender,
      recipient: transfer.recipient,
      amount: transfer.amount,
      unwrap: transfer.unwrap,
    });
    this.log.info('Created transfer', { transferId, destChainId, amount: transfer.amount, threshold: transfer.threshold });
    return transferId;
  }

  private relay(
    transferId: Hash,
    transfer: SentTransfer,
    adapterAddress: Address,
    destController: Address,
    options: Hex,
    fee: bigint
  ): void {
    const adapter = this.chain.contractAt(adapterAddress);
    if (!(adapter instanceof BaseAdapter)) {
      throw invalidParams(`${adapterAddress} is not a bridge adapter`, { adapter: adapterAddress });
    }
    const message = encodeTransferMessage({
      transferId,
      recipient: transfer.recipient,
      amount: transfer.amount,
      unwrap: transfer.unwrap,
      threshold: transfer.threshold,
    });
    this.external(adapter, () => adapter.relayMessage(transfer.destChainId, destController, options, message), fee);
    this.events.TransferRelayed.emit({ transferId, adapter: adapterAddress });
  }
}

// ============ Helpers ============

export function invalidParams(message: string, details: Record<string, unknown>): ControllerError {
  return new ControllerError({ code: 'CONTROLLER_INVALID_PARAMS', message, details });
}

function notExecutable(transferId: Hash): ControllerError {
  return new ControllerError({
    code: 'CONTROLLER_TRANSFER_NOT_EXECUTABLE',
    message: `Transfer ${transferId} was already executed`,
    details: { transferId },
  });
}

function requireSameLength(left: number, right: number, leftName: string, rightName: string): void {
  if (left !== right) {
    throw invalidParams(`${leftName} and ${rightName} must have the same length`, { [leftName]: left, [rightName]: right });
  }
}

function requireRecipient(to: Address): void {
  if (isZeroAddress(to)) {
    throw new ControllerError({ code: 'CONTROLLER_ZERO_ADDRESS', message: 'Recipient cannot be the zero address' });
  }
}

function deliveryKey(transferId: Hash, adapter: Address): string {
  return `${transferId}:${adapter}`;
}

function validateConfig(config: ControllerConfig): void {
  if (isZeroAddress(config.token)) {
    throw invalidParams('Token cannot be the zero address', {});
  }
  if (isZeroAddress(config.feeCollector)) {
    throw invalidParams('Fee collector cannot be the zero address', {});
  }
  if (config.duration <= 0n) {
    throw invalidParams('Limit duration must be positive', { duration: config.duration });
  }
  requireSameLength(config.chainIds?.length ?? 0, config.controllers?.length ?? 0, 'chainIds', 'controllers');
  const bridges = config.bridges?.length ?? 0;
  requireSameLength(bridges, config.mintingLimits?.length ?? 0, 'bridges', 'mintingLimits');
  requireSameLength(bridges, config.burningLimits?.length ?? 0, 'bridges', 'burningLimits');
}
