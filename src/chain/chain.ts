/**
 * In-memory chain runtime
 *
 * Gives contracts on-chain call semantics: a msg.sender / msg.value frame stack,
 * native balances, a clock, an event log, and all-or-nothing calls backed by
 * the undo journal.
 */

import type { Address, ChainId, Hex } from '../core/types.js';
import { keccak256 } from '../core/hash.js';
import { addressEquals, isZeroAddress } from '../core/address.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger, noopLogger } from '../core/logger.js';
import { Journal, StateMap } from './journal.js';
import { ChainError, InsufficientBalanceError } from './errors.js';

/**
 * Minimal shape the runtime needs from a deployed contract
 */
export interface Deployed {
  readonly address: Address;
  readonly contractName: string;
  /** Runs when native value is sent to the contract; throwing rejects the transfer */
  onNativeReceived(): void;
}

export interface CallFrame {
  from: Address;
  to: Address;
  value?: bigint;
}

export interface MessageContext {
  readonly sender: Address;
  readonly value: bigint;
  readonly self: Address;
}

export interface ChainLog {
  readonly seq: number;
  readonly address: Address;
  readonly event: string;
  readonly args: object;
}

export interface Receipt<T> {
  readonly result: T;
  readonly fromSeq: number;
  readonly toSeq: number;
  readonly logs: readonly ChainLog[];
}

export interface ChainConfig {
  chainId: ChainId;
  /** Initial block timestamp in seconds */
  timestamp?: number;
  logger?: Logger;
}

export class Chain {
  readonly chainId: ChainId;
  readonly journal = new Journal();
  readonly logger: Logger;

  private readonly nativeBalances: StateMap<Address, bigint>;
  private readonly contracts = new Map<Address, Deployed>();
  private readonly frames: MessageContext[] = [];
  private readonly logs: ChainLog[] = [];
  private seq = 0;
  private deployNonce = 0;
  private timestamp: number;

  constructor(config: ChainConfig) {
    this.chainId = config.chainId;
    this.timestamp = config.timestamp ?? 1_700_000_000;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, `chain ${String(config.chainId)}`);
    this.nativeBalances = new StateMap(this.journal, () => 0n);
  }

  // ============ Clock ============

  now(): number {
    return this.timestamp;
  }

  setTime(timestamp: number): void {
    if (timestamp < this.timestamp) {
      throw new Error(`Cannot move the clock backwards (${String(this.timestamp)} -> ${String(timestamp)})`);
    }
    this.timestamp = timestamp;
  }

  advanceTime(seconds: number): void {
    this.setTime(this.timestamp + seconds);
  }

  // ============ Accounts and contracts ============

  /**
   * Deterministic externally owned account; the same label gives the same address on every chain
   */
  createAccount(label: string): Address {
    return this.addressFrom(`account:${label}`);
  }

  /**
   * Next deployment address; unique per chain
   */
  allocateAddress(): Address {
    return this.addressFrom(`contract:${String(this.chainId)}:${String(this.deployNonce++)}`);
  }

  /**
   * Make a contract reachable through contractAt
   */
  attach(contract: Deployed): void {
    this.contracts.set(contract.address, contract);
  }

  contractAt(address: Address): Deployed | undefined {
    return this.contracts.get(address);
  }

  isContract(address: Address): boolean {
    return this.contracts.has(address);
  }

  // ============ Native balances ============

  balanceOf(account: Address): bigint {
    return this.nativeBalances.get(account);
  }

  /**
   * Credit native balance out of thin air (test funding, faucet)
   */
  fund(account: Address, amount: bigint): void {
    this.nativeBalances.update(account, (balance) => balance + amount);
  }

  /**
   * Send native value; contract recipients run their onNativeReceived hook
   */
  sendValue(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;
    const target = this.contracts.get(to);
    if (target) {
      this.call({ from, to, value: amount }, () => {
        target.onNativeReceived();
      });
      return;
    }
    this.moveNative(from, to, amount);
  }

  // ============ Calls ============

  get msg(): MessageContext {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new ChainError('NO_CALL_CONTEXT', 'State-changing contract methods must run inside chain.transact or chain.call');
    }
    return frame;
  }

  get inCall(): boolean {
    return this.frames.length > 0;
  }

  /**
   * Run fn as a call from `from` to `to`, moving `value` first.
   * Any throw rolls back every state change the call made; the outermost
   * call commits the journal when it returns.
   */
  call<T>(frame: CallFrame, fn: () => T): T {
    const value = frame.value ?? 0n;
    const checkpoint = this.journal.checkpoint();
    const logMark = this.logs.length;
    this.frames.push({ sender: frame.from, value, self: frame.to });
    try {
      if (value > 0n) this.moveNative(frame.from, frame.to, value);
      const result = fn();
      if (this.frames.length === 1) this.journal.commit();
      return result;
    } catch (error) {
      this.journal.revertTo(checkpoint);
      this.logs.length = logMark;
      throw error;
    } finally {
      this.frames.pop();
    }
  }

  /**
   * Top-level call that also returns the events it emitted
   */
  transact<T>(frame: CallFrame, fn: () => T): Receipt<T> {
    const fromSeq = this.seq;
    const logMark = this.logs.length;
    const result = this.call(frame, fn);
    return {
      result,
      fromSeq,
      toSeq: this.seq,
      logs: this.logs.slice(logMark),
    };
  }

  // ============ Events ============

  /**
   * Append to the chain log; returns the sequence number of the entry
   */
  recordLog(address: Address, event: string, args: object): number {
    const seq = this.seq++;
    this.logs.push({ seq, address, event, args });
    return seq;
  }

  logsOf(address: Address): ChainLog[] {
    return this.logs.filter((log) => addressEquals(log.address, address));
  }

  // ============ Internal ============

  private moveNative(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Negative native transfer: ${String(amount)}`);
    }
    const available = this.nativeBalances.get(from);
    if (available < amount) {
      throw new InsufficientBalanceError(from, amount, available);
    }
    this.nativeBalances.set(from, available - amount);
    if (!isZeroAddress(to)) {
      this.nativeBalances.update(to, (balance) => balance + amount);
    }
  }

  private addressFrom(seed: string): Address {
    const hash: Hex = keccak256(seed);
    return `0x${hash.slice(-40)}` as Address;
  }
}
