/**
 * ERC20 with EIP-2612 signed approvals
 */

import type { Address, Hash, Hex } from '../core/types.js';
import { encodeParameters } from '../core/abi.js';
import { keccak256 } from '../core/hash.js';
import { recoverAddress, signatureFromVrs } from '../core/signature.js';
import { domainSeparator, hashStruct, typedDataDigest } from '../core/typed-data.js';
import { ERC20 } from './erc20.js';
import { TokenError } from './errors.js';

export const PERMIT_TYPEHASH = keccak256(
  'Permit(address owner,address spender,uint256 value,uint256 nonce,uint256 deadline)'
);

/**
 * Signed approval as passed on-chain
 */
export interface PermitSignature {
  deadline: bigint;
  v: number;
  r: Hex;
  s: Hex;
}

export class PermitERC20 extends ERC20 {
  readonly version = '1';
  private readonly permitNonces = this.map<Address, bigint>(() => 0n);

  nonces(owner: Address): bigint {
    return this.permitNonces.get(owner);
  }

  DOMAIN_SEPARATOR(): Hash {
    return domainSeparator({
      name: this.name,
      version: this.version,
      chainId: this.chain.chainId,
      verifyingContract: this.address,
    });
  }

  /**
   * Digest an owner signs to approve `spender` for `value`
   */
  permitDigest(owner: Address, spender: Address, value: bigint, nonce: bigint, deadline: bigint): Hash {
    const structHash = hashStruct(
      encodeParameters(
        ['bytes32', 'address', 'address', 'uint256', 'uint256', 'uint256'],
        [PERMIT_TYPEHASH, owner, spender, value, nonce, deadline]
      )
    );
    return typedDataDigest(this.DOMAIN_SEPARATOR(), structHash);
  }

  permit(owner: Address, spender: Address, value: bigint, signature: PermitSignature): void {
    if (BigInt(this.chain.now()) > signature.deadline) {
      throw new TokenError('PERMIT_EXPIRED', `ERC2612: expired deadline ${String(signature.deadline)}`, {
        token: this.address,
        deadline: signature.deadline,
      });
    }

    const nonce = this.nonces(owner);
    const digest = this.permitDigest(owner, spender, value, nonce, signature.deadline);

    let signer: Address;
    try {
      signer = recoverAddress(digest, signatureFromVrs(signature.v, signature.r, signature.s));
    } catch (error) {
      throw new TokenError('PERMIT_INVALID_SIGNER', 'ERC2612: invalid signature', {
        token: this.address,
        owner,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (signer !== owner) {
      throw new TokenError('PERMIT_INVALID_SIGNER', `ERC2612: invalid signer ${signer}`, {
        token: this.address,
        owner,
        signer,
      });
    }

    this.permitNonces.set(owner, nonce + 1n);
    this._approve(owner, spender, value);
  }
}
