/**
 * Pause switch and reentrancy lock
 */

import type { Address } from '../core/types.js';
import type { Chain } from './chain.js';
import { EventChannel } from './contract.js';
import { StateValue } from './journal.js';
import { ChainError, EnforcedPauseError } from './errors.js';

export interface PauseToggled {
  account: Address;
}

export class Pausable {
  readonly events: {
    Paused: EventChannel<PauseToggled>;
    Unpaused: EventChannel<PauseToggled>;
  };
  private readonly state: StateValue<boolean>;

  constructor(
    chain: Chain,
    private readonly address: Address
  ) {
    this.state = new StateValue(chain.journal, false);
    this.events = {
      Paused: new EventChannel(chain, address, 'Paused'),
      Unpaused: new EventChannel(chain, address, 'Unpaused'),
    };
  }

  get paused(): boolean {
    return this.state.get();
  }

  requireNotPaused(): void {
    if (this.paused) throw new EnforcedPauseError(this.address);
  }

  pause(account: Address): void {
    this.requireNotPaused();
    this.state.set(true);
    this.events.Paused.emit({ account });
  }

  unpause(account: Address): void {
    if (!this.paused) {
      throw new ChainError('NOT_PAUSED', 'Pausable: not paused', { contract: this.address });
    }
    this.state.set(false);
    this.events.Unpaused.emit({ account });
  }
}

/**
 * Scoped non-reentrant lock; released on every exit path
 */
export class ReentrancyGuard {
  private entered = false;

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new ChainError('REENTRANT_CALL', 'ReentrancyGuard: reentrant call');
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
