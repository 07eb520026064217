/**
 * Controller-to-controller call bundle, carried inside the BridgedMessage envelope
 */

import type { Address, ChainId, Hash, Hex } from '../core/types.js';
import { asAddress, asBigInt, asHash, asHex, decodeParameters, encodeParameters } from '../core/abi.js';
import { keccak256 } from '../core/hash.js';
import { ControllerError } from './errors.js';

/**
 * What an originator asks the remote controller to run
 */
export interface CallBundle {
  targets: Address[];
  calldatas: Hex[];
  salt: Hash;
  /** Distinct adapters that must deliver before the bundle can execute */
  threshold: bigint;
}

export interface CallMessage {
  messageId: Hash;
  targets: Address[];
  calldatas: Hex[];
  threshold: bigint;
}

const MESSAGE_TYPES = ['bytes32', 'address[]', 'bytes[]', 'uint256'] as const;

export function encodeCallMessage(message: CallMessage): Hex {
  return encodeParameters(MESSAGE_TYPES, [message.messageId, message.targets, message.calldatas, message.threshold]);
}

export function decodeCallMessage(data: Hex): CallMessage {
  try {
    const [messageId, targets, calldatas, threshold] = decodeParameters(MESSAGE_TYPES, data);
    return {
      messageId: asHash(messageId),
      targets: asList(targets).map(asAddress),
      calldatas: asList(calldatas).map(asHex),
      threshold: asBigInt(threshold),
    };
  } catch (error) {
    throw new ControllerError({
      code: 'CONTROLLER_INVALID_PARAMS',
      message: 'Malformed call message',
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}

/**
 * Unique per controller, source chain, destination chain, nonce and salt
 */
export function computeMessageId(controller: Address, chainId: ChainId, destChainId: ChainId, nonce: bigint, salt: Hash): Hash {
  return keccak256(
    encodeParameters(
      ['address', 'uint256', 'uint256', 'uint256', 'bytes32'],
      [controller, BigInt(chainId), BigInt(destChainId), nonce, salt]
    )
  );
}

function asList(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected decoded array, got ${String(value)}`);
  }
  return value;
}
