/**
 * Core type definitions for xchain-relay
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string, always lowercase
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// Signature components
export interface Signature {
  readonly r: Hex;
  readonly s: Hex;
  readonly v: number;
  readonly yParity: 0 | 1;
}

// Chain identifiers are plain integers; bridge domains are their own namespace
export type ChainId = number;

/**
 * Identifier a bridge uses for a chain.
 * Axelar names chains by string, every other bridge by an integer.
 */
export type DomainId = bigint | string;
