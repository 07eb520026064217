/**
 * Polymer adapter
 *
 * Outbound messages are only emitted as RelayViaPolymer events. A relayer
 * proves the event on the destination, where the prover returns the emitting
 * chain, contract, packed topics and unindexed data.
 */

import type { Address, ChainId, Hash, Hex } from '../../core/types.js';
import { encodeParameters } from '../../core/abi.js';
import { addressToBytes32, bytes32ToAddress, isZeroAddress } from '../../core/address.js';
import { keccak256, toBytes32 } from '../../core/hash.js';
import { concatHex, hexEquals, hexLength, hexToBigInt, sliceHex } from '../../core/hex.js';
import type { Chain, Deployed } from '../../chain/chain.js';
import { RELAY_EVENT_HASH } from '../constants.js';
import { AdapterError } from '../errors.js';
import type { RefundOptions } from '../options.js';
import type { Dispatch } from '../types.js';
import { requireEndpoint } from './base-adapter.js';
import { FlatFeeAdapter, type FlatFeeAdapterConfig } from './flat-fee-adapter.js';

export interface ProvenEvent {
  chainId: ChainId;
  emittingContract: Address;
  /** Topics packed as consecutive 32-byte words */
  topics: Hex;
  unindexedData: Hex;
}

export interface PolymerProver extends Deployed {
  /** Throws when the proof does not verify */
  validateEvent(proof: Hex): ProvenEvent;
}

export interface PolymerAdapterConfig extends FlatFeeAdapterConfig {
  prover: PolymerProver;
}

export interface RelayViaPolymerEvent {
  destChainId: ChainId;
  destAdapter: Address;
  transferId: Hash;
  message: Hex;
}

const TOPICS_LENGTH = 128;

/**
 * Packed topics of a RelayViaPolymer log
 */
export function encodeRelayTopics(destChainId: ChainId, destAdapter: Address, transferId: Hash): Hex {
  return concatHex(RELAY_EVENT_HASH, toBytes32(BigInt(destChainId)), addressToBytes32(destAdapter), transferId);
}

export class PolymerAdapter extends FlatFeeAdapter {
  readonly prover: PolymerProver;

  readonly polymerEvents = {
    RelayViaPolymer: this.event<RelayViaPolymerEvent>('RelayViaPolymer'),
  };

  private readonly nonceValue = this.value(0n);
  private readonly processedTransfers = this.map<Hash, boolean>(() => false);

  constructor(chain: Chain, config: PolymerAdapterConfig) {
    super(chain, config);
    this.prover = config.prover;
    requireEndpoint(config.prover.address, 'prover');
  }

  get nonce(): bigint {
    return this.nonceValue.get();
  }

  isProcessed(transferId: Hash): boolean {
    return this.processedTransfers.get(transferId);
  }

  /**
   * Id the next relay to `destChainId` will carry
   */
  calculateTransferId(destChainId: ChainId): Hash {
    return keccak256(
      encodeParameters(
        ['address', 'uint256', 'uint256', 'uint256'],
        [this.address, BigInt(this.chain.chainId), BigInt(destChainId), this.nonce]
      )
    );
  }

  /**
   * Inbound entry point, callable by anyone holding a valid proof
   */
  receiveMessage(proof: Hex): void {
    this.inbound(() => {
      const event = this.validateProof(proof);
      const { topics } = event;

      if (hexLength(topics) !== TOPICS_LENGTH) {
        throw invalidProof('Topics must be exactly four words', { length: hexLength(topics) });
      }
      if (!hexEquals(sliceHex(topics, 0, 32), RELAY_EVENT_HASH)) {
        throw invalidProof('Not a RelayViaPolymer event', { eventHash: sliceHex(topics, 0, 32) });
      }
      const destChainId = hexToBigInt(sliceHex(topics, 32, 64));
      if (destChainId !== BigInt(this.chain.chainId)) {
        throw invalidProof('Event targets another chain', { destChainId });
      }
      if (!this.isDestination(sliceHex(topics, 64, 96))) {
        throw invalidProof('Event targets another adapter', { destAdapter: sliceHex(topics, 64, 96) });
      }
      if (isZeroAddress(this.trustedAdapter(event.chainId))) {
        throw invalidProof('No trusted adapter on the source chain', { chainId: event.chainId });
      }

      const transferId = toBytes32(hexToBigInt(sliceHex(topics, 96, 128)));
      if (this.processedTransfers.get(transferId)) {
        throw new AdapterError({
          code: 'ADAPTER_ALREADY_PROCESSED',
          message: `Polymer transfer ${transferId} was already delivered`,
          details: { transferId },
        });
      }
      this.processedTransfers.set(transferId, true);

      this.deliver(event.chainId, event.emittingContract, event.unindexedData);
    });
  }

  /**
   * Emits the event relayers prove; returns its transfer id
   */
  protected override send({ route, envelope }: Dispatch<RefundOptions, bigint>): Hash {
    const transferId = this.calculateTransferId(route.destChainId);
    this.nonceValue.set(this.nonce + 1n);
    this.polymerEvents.RelayViaPolymer.emit({
      destChainId: route.destChainId,
      destAdapter: route.trustedAdapter,
      transferId,
      message: envelope,
    });
    return transferId;
  }

  private validateProof(proof: Hex): ProvenEvent {
    try {
      return this.prover.validateEvent(proof);
    } catch (error) {
      throw invalidProof('Prover rejected the proof', { cause: error instanceof Error ? error.message : String(error) });
    }
  }

  private isDestination(word: Hex): boolean {
    try {
      return bytes32ToAddress(word) === this.address;
    } catch {
      return false;
    }
  }
}

function invalidProof(message: string, details: Record<string, unknown>): AdapterError {
  return new AdapterError({ code: 'ADAPTER_INVALID_PROOF', message, details });
}
