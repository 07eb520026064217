/**
 * BridgedMessage envelope
 * Every adapter wraps the controller payload in this before handing it to its transport
 */

import type { Address, Hex } from '../core/types.js';
import { asAddress, asHex, decodeParameters, encodeParameters } from '../core/abi.js';
import { AdapterError } from './errors.js';

export interface BridgedMessage {
  /** Controller payload, opaque to adapters */
  message: Hex;
  /** Controller that called relayMessage on the source chain */
  originController: Address;
  /** Controller the destination adapter hands the payload to */
  destController: Address;
}

const ENVELOPE_TYPES = ['bytes', 'address', 'address'] as const;

export function encodeBridgedMessage(envelope: BridgedMessage): Hex {
  return encodeParameters(ENVELOPE_TYPES, [envelope.message, envelope.originController, envelope.destController]);
}

export function decodeBridgedMessage(data: Hex): BridgedMessage {
  try {
    const [message, originController, destController] = decodeParameters(ENVELOPE_TYPES, data);
    return {
      message: asHex(message),
      originController: asAddress(originController),
      destController: asAddress(destController),
    };
  } catch (error) {
    throw new AdapterError({
      code: 'ADAPTER_INVALID_PARAMS',
      message: 'Malformed BridgedMessage envelope',
      details: { cause: error instanceof Error ? error.message : String(error) },
    });
  }
}
