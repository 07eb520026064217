/**
 * Core primitives layer
 * Hex, hashing, ABI words, addresses, signatures, errors and logging
 */

// Types
export type { Hex, Address, Hash, Signature, ChainId, DomainId } from './types.js';

// Hex utilities
export {
  isHex,
  assertHex,
  bytesToHex,
  hexToBytes,
  numberToHex,
  hexToBigInt,
  padHex,
  concatHex,
  hexLength,
  sliceHex,
  hexEquals,
  stringToHex,
  hexToString,
} from './hex.js';

// Hash functions
export { keccak256, eventTopic, toBytes32 } from './hash.js';

// ABI encoding
export { encodeParameters, decodeParameters, asAddress, asBigInt, asHex, asHash, asBool, asString } from './abi.js';

// Address utilities
export {
  ZERO_ADDRESS,
  isAddress,
  toAddress,
  addressEquals,
  isZeroAddress,
  addressToBytes32,
  bytes32ToAddress,
} from './address.js';

// Signatures and EIP-712
export { publicKeyToAddress, privateKeyToAddress, sign, recoverAddress, signatureFromVrs } from './signature.js';
export { EIP712_DOMAIN_TYPEHASH, domainSeparator, hashStruct, typedDataDigest } from './typed-data.js';
export type { TypedDataDomain } from './typed-data.js';

// Errors
export { RelayError, isRelayError } from './errors.js';
export type { ErrorDetails } from './errors.js';

// Logging
export { noopLogger, consoleLogger, createPrefixedLogger, createRecordingLogger } from './logger.js';
export type { LogLevel, LogContext, Logger, LogEntry } from './logger.js';
