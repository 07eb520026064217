/**
 * Contract base and typed event channels
 */

import type { Address } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger } from '../core/logger.js';
import type { Chain, Deployed, MessageContext, Receipt } from './chain.js';
import { StateMap, StateValue } from './journal.js';

interface EmittedEvent<T> {
  seq: number;
  args: T;
}

/**
 * One event type of one contract. Emissions are journaled, so a reverted
 * call leaves no trace in the channel.
 */
export class EventChannel<T extends object> {
  private readonly emitted: Array<EmittedEvent<T>> = [];

  constructor(
    private readonly chain: Chain,
    readonly address: Address,
    readonly name: string
  ) {}

  emit(args: T): void {
    const seq = this.chain.recordLog(this.address, this.name, args);
    this.emitted.push({ seq, args });
    this.chain.journal.record(() => {
      this.emitted.pop();
    });
  }

  all(): T[] {
    return this.emitted.map((event) => event.args);
  }

  /**
   * Events emitted during the given transaction
   */
  in(receipt: Receipt<unknown>): T[] {
    return this.emitted
      .filter((event) => event.seq >= receipt.fromSeq && event.seq < receipt.toSeq)
      .map((event) => event.args);
  }

  last(): T | undefined {
    return this.emitted[this.emitted.length - 1]?.args;
  }

  get count(): number {
    return this.emitted.length;
  }
}

/**
 * Base for every simulated contract: owns an address on one chain and keeps its
 * storage in journaled containers.
 */
export abstract class Contract implements Deployed {
  readonly address: Address;
  readonly chain: Chain;
  readonly contractName: string;
  protected readonly log: Logger;

  constructor(chain: Chain, contractName: string, logger?: Logger) {
    this.chain = chain;
    this.contractName = contractName;
    this.address = chain.allocateAddress();
    this.log = createPrefixedLogger(logger ?? chain.logger, contractName);
    chain.attach(this);
  }

  /**
   * Contracts accept native value unless they override this
   */
  onNativeReceived(): void {
    // payable
  }

  get nativeBalance(): bigint {
    return this.chain.balanceOf(this.address);
  }

  protected get msg(): MessageContext {
    return this.chain.msg;
  }

  protected map<K, V>(defaultValue: () => V): StateMap<K, V> {
    return new StateMap<K, V>(this.chain.journal, defaultValue);
  }

  protected value<T>(initial: T): StateValue<T> {
    return new StateValue<T>(this.chain.journal, initial);
  }

  protected event<T extends object>(name: string): EventChannel<T> {
    return new EventChannel<T>(this.chain, this.address, name);
  }

  /**
   * Call another contract with this contract as msg.sender
   */
  protected external<T>(target: Deployed, fn: () => T, value = 0n): T {
    return this.chain.call({ from: this.address, to: target.address, value }, fn);
  }

  protected sendValue(to: Address, amount: bigint): void {
    this.chain.sendValue(this.address, to, amount);
  }
}
