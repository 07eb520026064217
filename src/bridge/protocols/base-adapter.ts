/**
 * Base adapter class for bridge protocols
 *
 * Owns everything the bridges share: fee settings, trusted adapters, pausing,
 * role checks, the outbound relay pipeline and the final inbound dispatch to
 * the destination controller. Subclasses provide chain addressing, fee
 * settlement and the transport itself.
 */

import type { Address, ChainId, DomainId, Hash, Hex } from '../../core/types.js';
import { bytes32ToAddress, isZeroAddress, ZERO_ADDRESS } from '../../core/address.js';
import type { Logger } from '../../core/logger.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { Contract } from '../../chain/contract.js';
import { AccessControl, DEFAULT_ADMIN_ROLE, PAUSE_ROLE } from '../../chain/access-control.js';
import { Pausable, ReentrancyGuard } from '../../chain/guards.js';
import { FEE_DECIMALS } from '../constants.js';
import {
  AdapterError,
  FeeTransferFailedError,
  UnauthorisedOriginError,
  UnsupportedRouteError,
} from '../errors.js';
import { decodeBridgedMessage, encodeBridgedMessage } from '../message.js';
import type { RefundOptions } from '../options.js';
import {
  isMessageReceiver,
  type AdapterRoute,
  type Dispatch,
  type MessageReceiver,
  type RelayRoute,
} from '../types.js';

/**
 * Configuration shared by every adapter
 */
export interface BaseAdapterConfig {
  /** Human readable adapter name */
  name: string;
  /** Smallest value relayMessage accepts; flat-fee adapters charge exactly this */
  minGas?: bigint;
  /** Receives protocol fees */
  treasury: Address;
  /** Protocol fee in FEE_DECIMALS units, charged on the transport fee */
  protocolFee?: bigint;
  /** Holds DEFAULT_ADMIN_ROLE and PAUSE_ROLE */
  owner: Address;
  logger?: Logger;
}

export interface MinGasSetEvent {
  minGas: bigint;
}

export interface ProtocolFeeSetEvent {
  protocolFee: bigint;
}

export interface TrustedAdapterSetEvent {
  adapter: Address;
  chainId: ChainId;
}

/**
 * Everything relayMessage resolved before settling fees
 */
export interface OutboundRelay<O, D extends DomainId = DomainId> extends Dispatch<O, D> {
  value: bigint;
}

export const ZERO_TRANSFER_ID = `0x${'00'.repeat(32)}` as Hash;

/**
 * Abstract base class for bridge adapters
 */
export abstract class BaseAdapter<O extends RefundOptions = RefundOptions, D extends DomainId = DomainId> extends Contract {
  readonly adapterName: string;
  readonly access: AccessControl;
  readonly pausable: Pausable;

  readonly events = {
    MinGasSet: this.event<MinGasSetEvent>('MinGasSet'),
    ProtocolFeeSet: this.event<ProtocolFeeSetEvent>('ProtocolFeeSet'),
    TrustedAdapterSet: this.event<TrustedAdapterSetEvent>('TrustedAdapterSet'),
  };

  protected readonly guard = new ReentrancyGuard();
  private readonly minGasValue = this.value(0n);
  private readonly protocolFeeValue = this.value(0n);
  private readonly treasuryValue = this.value<Address>(ZERO_ADDRESS);
  private readonly trusted = this.map<ChainId, Address>(() => ZERO_ADDRESS);

  constructor(chain: Chain, config: BaseAdapterConfig) {
    super(chain, config.name, config.logger);
    this.adapterName = config.name;

    const protocolFee = config.protocolFee ?? 0n;
    validateFeeSettings(protocolFee, config.treasury);

    this.access = new AccessControl(chain, this.address);
    this.pausable = new Pausable(chain, this.address);
    this.access.grant(DEFAULT_ADMIN_ROLE, config.owner);
    this.access.grant(PAUSE_ROLE, config.owner);

    this.minGasValue.set(config.minGas ?? 0n);
    this.protocolFeeValue.set(protocolFee);
    this.treasuryValue.set(config.treasury);
  }

  // ============ Views ============

  get minGas(): bigint {
    return this.minGasValue.get();
  }

  get protocolFee(): bigint {
    return this.protocolFeeValue.get();
  }

  get treasury(): Address {
    return this.treasuryValue.get();
  }

  get paused(): boolean {
    return this.pausable.paused;
  }

  trustedAdapter(chainId: ChainId): Address {
    return this.trusted.get(chainId);
  }

  /**
   * A chain is supported when it has a bridge address and a trusted adapter
   */
  isChainIdSupported(chainId: ChainId): boolean {
    return this.resolveRoute(chainId) !== undefined;
  }

  /**
   * Proportional protocol fee, truncated in the payer's favour
   */
  calculateFee(amount: bigint): bigint {
    return (amount * this.protocolFee) / FEE_DECIMALS;
  }

  /**
   * Value relayMessage needs for this message; read-only
   */
  quoteMessage(destChainId: ChainId, destination: Address, options: Hex, message: Hex, includeFee: boolean): bigint {
    const route = this.requireRoute(destChainId);
    const envelope = encodeBridgedMessage({ message, originController: destination, destController: destination });
    const quote = this.quoteRelay({ route, envelope, options: this.decodeOptions(options) }, includeFee);
    this.log.debug('Quoted relay', { destChainId, includeFee, quote });
    return quote;
  }

  // ============ Outbound ============

  /**
   * Send `message` to the controller `destination` on `destChainId`.
   * msg.value pays for the transport; the excess goes to the refund address in `options`.
   */
  relayMessage(destChainId: ChainId, destination: Address, options: Hex, message: Hex): Hash {
    return this.guard.run(() => {
      this.pausable.requireNotPaused();
      const route = this.requireRoute(destChainId);
      const { sender, value } = this.msg;

      if (value < this.minGas) {
        throw new AdapterError({
          code: 'ADAPTER_VALUE_IS_LESS_THAN_LIMIT',
          message: `Value ${String(value)} is below the minimum ${String(this.minGas)}`,
          details: { value, minGas: this.minGas },
          suggestion: 'Send at least minGas',
        });
      }

      const decoded = this.decodeOptions(options);
      const envelope = encodeBridgedMessage({ message, originController: sender, destController: destination });
      const transferId = this.settleAndSend({ route, envelope, options: decoded, value });

      this.log.info('Relayed message', { destChainId, destination, sender, transferId });
      return transferId;
    });
  }

  // ============ Admin ============

  setMinGas(minGas: bigint): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.minGasValue.set(minGas);
    this.events.MinGasSet.emit({ minGas });
  }

  setProtocolFee(protocolFee: bigint, treasury: Address): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    validateFeeSettings(protocolFee, treasury);
    this.protocolFeeValue.set(protocolFee);
    this.treasuryValue.set(treasury);
    this.events.ProtocolFeeSet.emit({ protocolFee });
  }

  /**
   * Trust `adapter` as the counterpart on `chainId`; the zero address disables the chain
   */
  setTrustedAdapter(chainId: ChainId, adapter: Address): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    this.trusted.set(chainId, adapter);
    this.events.TrustedAdapterSet.emit({ adapter, chainId });
  }

  /**
   * Apply a route table in one admin call
   */
  configureRoutes(routes: readonly AdapterRoute[]): void {
    this.access.checkRole(DEFAULT_ADMIN_ROLE);
    for (const route of routes) {
      this.applyRoute(route);
    }
    this.log.info('Configured routes', { chainIds: routes.map((route) => route.chainId) });
  }

  pause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.pause(this.msg.sender);
  }

  unpause(): void {
    this.access.checkRole(PAUSE_ROLE);
    this.pausable.unpause(this.msg.sender);
  }

  // ============ Subclass hooks ============

  /**
   * Bridge route for a chain, or undefined when the chain has no bridge address
   */
  protected abstract routeFor(chainId: ChainId): RelayRoute<D> | undefined;

  protected abstract decodeOptions(options: Hex): O;

  /**
   * Read-only value the relay needs
   */
  protected abstract quoteRelay(relay: Dispatch<O, D>, includeFee: boolean): bigint;

  /**
   * Settle fees, hand the envelope to the transport and refund the excess; returns the transfer id
   */
  protected abstract settleAndSend(relay: OutboundRelay<O, D>): Hash;

  /**
   * One route table entry; subclasses add their chain addressing
   */
  protected applyRoute(route: AdapterRoute): void {
    this.setTrustedAdapter(route.chainId, route.trustedAdapter);
  }

  // ============ Shared helpers ============

  protected resolveRoute(chainId: ChainId): RelayRoute<D> | undefined {
    const route = this.routeFor(chainId);
    if (!route || isZeroAddress(route.trustedAdapter)) return undefined;
    return route;
  }

  protected requireRoute(chainId: ChainId): RelayRoute<D> {
    const route = this.resolveRoute(chainId);
    if (!route) throw new UnsupportedRouteError(this.adapterName, chainId);
    return route;
  }

  /**
   * Pay minGas to the treasury and return what is left of `value`
   */
  protected _deductFee(value: bigint): bigint {
    const minGas = this.minGas;
    if (minGas === 0n) return value;
    if (value < minGas) {
      throw new AdapterError({
        code: 'ADAPTER_VALUE_IS_LESS_THAN_LIMIT',
        message: `Value ${String(value)} is below the minimum ${String(minGas)}`,
        details: { value, minGas },
      });
    }
    this.payOut(this.treasury, minGas);
    return value - minGas;
  }

  /**
   * Native transfer out of the adapter; any failure fails the relay
   */
  protected payOut(to: Address, amount: bigint): void {
    if (amount === 0n) return;
    try {
      this.sendValue(to, amount);
    } catch (error) {
      throw new FeeTransferFailedError(to, amount, error);
    }
  }

  /**
   * Run an inbound entry point: not reentrant, rejected while paused
   */
  protected inbound<T>(fn: () => T): T {
    return this.guard.run(() => {
      this.pausable.requireNotPaused();
      return fn();
    });
  }

  /**
   * Final inbound step shared by every bridge: check the verified origin
   * against the trusted adapter, then hand the payload to the destination controller
   */
  protected deliver(originChainId: ChainId, origin: Address, payload: Hex): void {
    const trusted = this.trustedAdapter(originChainId);
    if (isZeroAddress(trusted) || trusted !== origin) {
      throw new UnauthorisedOriginError(originChainId, origin);
    }

    const envelope = decodeBridgedMessage(payload);
    const receiver = this.resolveReceiver(envelope.destController);
    this.external(receiver, () => {
      receiver.receiveMessage(envelope.message, originChainId, envelope.originController);
    });

    this.log.info('Delivered message', {
      originChainId,
      originController: envelope.originController,
      destController: envelope.destController,
    });
  }

  /**
   * Require the current caller to be a transport endpoint
   */
  protected requireCaller(expected: Address, code: 'ADAPTER_UNAUTHORISED' | 'ADAPTER_INVALID_ROUTER'): void {
    const caller = this.msg.sender;
    if (caller !== expected) {
      throw new AdapterError({
        code,
        message: `Caller ${caller} is not the ${this.adapterName} endpoint`,
        details: { caller, expected },
      });
    }
  }

  /**
   * Origin address carried as a 32-byte word (Hyperlane, LayerZero, Wormhole)
   */
  protected originFromBytes32(word: Hex): Address {
    try {
      return bytes32ToAddress(word);
    } catch (error) {
      throw new AdapterError({
        code: 'ADAPTER_UNAUTHORISED',
        message: `Origin ${word} is not an EVM address`,
        details: { origin: word, cause: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  private resolveReceiver(address: Address): Deployed & MessageReceiver {
    const target = this.chain.contractAt(address);
    if (!target || target instanceof BaseAdapter || !isMessageReceiver(target)) {
      throw new AdapterError({
        code: 'ADAPTER_INVALID_PARAMS',
        message: `Destination ${address} cannot receive bridged messages`,
        details: { destination: address },
      });
    }
    return target;
  }
}

function validateFeeSettings(protocolFee: bigint, treasury: Address): void {
  if (protocolFee < 0n || protocolFee > FEE_DECIMALS) {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: `Protocol fee ${String(protocolFee)} exceeds ${String(FEE_DECIMALS)}`,
      details: { protocolFee },
    });
  }
  if (isZeroAddress(treasury)) {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: 'Treasury cannot be the zero address',
      details: { treasury },
    });
  }
}

/**
 * Reject a zero endpoint address in an adapter constructor
 */
export function requireEndpoint(address: Address, name: string): Address {
  if (isZeroAddress(address)) {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_ADDRESS',
      message: `${name} cannot be the zero address`,
      details: { [name]: address },
    });
  }
  return address;
}
