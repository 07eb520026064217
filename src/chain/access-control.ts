/**
 * Role-based and single-owner access control for simulated contracts
 */

import type { Address, Hash } from '../core/types.js';
import { keccak256 } from '../core/hash.js';
import { isZeroAddress } from '../core/address.js';
import type { Chain } from './chain.js';
import { EventChannel } from './contract.js';
import { StateMap, StateValue } from './journal.js';
import { AccessControlUnauthorizedError, ChainError, OwnableUnauthorizedAccountError } from './errors.js';

export const DEFAULT_ADMIN_ROLE = `0x${'00'.repeat(32)}` as Hash;
export const PAUSE_ROLE = keccak256('PAUSE_ROLE');

export interface RoleGranted {
  role: Hash;
  account: Address;
  sender: Address;
}

export type RoleRevoked = RoleGranted;

/**
 * Role membership; every role is administered by DEFAULT_ADMIN_ROLE
 */
export class AccessControl {
  readonly events: {
    RoleGranted: EventChannel<RoleGranted>;
    RoleRevoked: EventChannel<RoleRevoked>;
  };

  private readonly members: StateMap<string, boolean>;

  constructor(
    private readonly chain: Chain,
    address: Address
  ) {
    this.members = new StateMap(chain.journal, () => false);
    this.events = {
      RoleGranted: new EventChannel(chain, address, 'RoleGranted'),
      RoleRevoked: new EventChannel(chain, address, 'RoleRevoked'),
    };
  }

  hasRole(role: Hash, account: Address): boolean {
    return this.members.get(memberKey(role, account));
  }

  /**
   * Throw unless the current caller holds the role
   */
  checkRole(role: Hash, account: Address = this.chain.msg.sender): void {
    if (!this.hasRole(role, account)) {
      throw new AccessControlUnauthorizedError(account, role);
    }
  }

  grantRole(role: Hash, account: Address): void {
    this.checkRole(DEFAULT_ADMIN_ROLE);
    this.grant(role, account);
  }

  revokeRole(role: Hash, account: Address): void {
    this.checkRole(DEFAULT_ADMIN_ROLE);
    this.revoke(role, account);
  }

  /**
   * Give up a role held by the caller
   */
  renounceRole(role: Hash, callerConfirmation: Address): void {
    if (callerConfirmation !== this.chain.msg.sender) {
      throw new ChainError('ACCESS_CONTROL_UNAUTHORIZED', 'AccessControl: can only renounce roles for self', {
        role,
        account: callerConfirmation,
      });
    }
    this.revoke(role, callerConfirmation);
  }

  /**
   * Unchecked grant, for constructors
   */
  grant(role: Hash, account: Address): boolean {
    if (this.hasRole(role, account)) return false;
    this.members.set(memberKey(role, account), true);
    this.events.RoleGranted.emit({ role, account, sender: this.senderOrSelf(account) });
    return true;
  }

  revoke(role: Hash, account: Address): boolean {
    if (!this.hasRole(role, account)) return false;
    this.members.set(memberKey(role, account), false);
    this.events.RoleRevoked.emit({ role, account, sender: this.senderOrSelf(account) });
    return true;
  }

  private senderOrSelf(fallback: Address): Address {
    return this.chain.inCall ? this.chain.msg.sender : fallback;
  }
}

export interface OwnershipTransferred {
  previousOwner: Address | null;
  newOwner: Address;
}

/**
 * Single owner
 */
export class Ownable {
  readonly events: { OwnershipTransferred: EventChannel<OwnershipTransferred> };
  private readonly ownerValue: StateValue<Address>;

  constructor(
    private readonly chain: Chain,
    address: Address,
    initialOwner: Address
  ) {
    if (isZeroAddress(initialOwner)) {
      throw new ChainError('OWNABLE_INVALID_OWNER', 'Ownable: invalid owner', { owner: initialOwner });
    }
    this.ownerValue = new StateValue(chain.journal, initialOwner);
    this.events = { OwnershipTransferred: new EventChannel(chain, address, 'OwnershipTransferred') };
    this.events.OwnershipTransferred.emit({ previousOwner: null, newOwner: initialOwner });
  }

  get owner(): Address {
    return this.ownerValue.get();
  }

  checkOwner(): void {
    const sender = this.chain.msg.sender;
    if (sender !== this.owner) {
      throw new OwnableUnauthorizedAccountError(sender);
    }
  }

  transferOwnership(newOwner: Address): void {
    this.checkOwner();
    if (isZeroAddress(newOwner)) {
      throw new ChainError('OWNABLE_INVALID_OWNER', 'Ownable: invalid owner', { owner: newOwner });
    }
    const previousOwner = this.owner;
    this.ownerValue.set(newOwner);
    this.events.OwnershipTransferred.emit({ previousOwner, newOwner });
  }
}

function memberKey(role: Hash, account: Address): string {
  return `${role}:${account}`;
}
