/**
 * Controller-to-controller transfer payload, carried inside the BridgedMessage envelope
 */

import type { Address, ChainId, Hash, Hex } from '../core/types.js';
import { asAddress, asBigInt, asBool, asHash, decodeParameters, encodeParameters } from '../core/abi.js';
import { keccak256 } from '../core/hash.js';
import { ControllerError } from './errors.js';

export interface TransferMessage {
  transferId: Hash;
  recipient: Address;
  amount: bigint;
  unwrap: boolean;
  /** Number of distinct adapters that must deliver before the transfer executes */
  threshold: bigint;
}

const MESSAGE_TYPES = ['bytes32', 'address', 'uint256', 'bool', 'uint256'] as const;

export function encodeTransferMessage(message: TransferMessage): Hex {
  return encodeParameters(MESSAGE_TYPES, [
    message.transferId,
    message.recipient,
    message.amount,
    message.unwrap,
    message.threshold,
  ]);
}

export function decodeTransferMessage(data: Hex): TransferMessage {
  try {
    const [transferId, recipient, amount, unwrap, threshold] = decodeParameters(MESSAGE_TYPES, data);
    return {
      transferId: asHash(transferId),
      recipient: asAddress(recipient),
      amount: asBigInt(amount),
      unwrap: asBool(unwrap),
      threshold: asBigInt(threshold),
    };
  } catch (error) {
    throw new ControllerError({
      code: 'CONTROLLER_INVALID_PARAMS',
      message: 'Malformed transfer message',
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}

/**
 * Unique per controller, source chain, destination chain and nonce
 */
export function computeTransferId(controller: Address, chainId: ChainId, destChainId: ChainId, nonce: bigint): Hash {
  return keccak256(
    encodeParameters(['address', 'uint256', 'uint256', 'uint256'], [controller, BigInt(chainId), BigInt(destChainId), nonce])
  );
}

