/**
 * ControllerWrapper
 *
 * Permissioned gateway in front of asset controllers. Takes a tiered or flat
 * fee plus a per-destination premium, sends it to the treasury and hands the
 * net amount to the controller.
 */

import type { Address, ChainId, Hash, Hex } from '../core/types.js';
import { keccak256 } from '../core/hash.js';
import type { Chain } from '../chain/chain.js';
import { AccessControl, DEFAULT_ADMIN_ROLE } from '../chain/access-control.js';
import { BaseAssetController } from '../controller/base-controller.js';
import type { ERC20 } from '../tokens/erc20.js';
import { PermitERC20, type PermitSignature } from '../tokens/permit-token.js';
import { FeeWrapper, type WrapperConfig } from './base-wrapper.js';
import { LengthMismatchError, WrapperError } from './errors.js';
import { buildFeeTiers, quoteFee, validateFeeRate, type FeeQuote, type FeeTier } from './fee-tiers.js';

export const CONTROLLER_MANAGER_ROLE = keccak256('CONTROLLER_MANAGER_ROLE');

export interface ControllerWrapperConfig extends WrapperConfig {
  admin: Address;
  manager: Address;
  controllers?: readonly Address[];
  premiumChainIds?: readonly ChainId[];
  premiumRates?: readonly bigint[];
}

/**
 * What the caller wants moved; `amount` is gross, before the wrapper fee
 */
export interface TransferParams {
  controller: Address;
  recipient: Address;
  amount: bigint;
  unwrap: boolean;
  destChainId: ChainId;
}

export interface FeeTierTable {
  thresholds: bigint[];
  rates: bigint[];
}

export interface TransferSentEvent {
  sender: Address;
  controller: Address;
  isResend: boolean;
  isMulti: boolean;
  amount: bigint;
  net: bigint;
  referralData: Hex;
}

export interface FeesCollectedEvent {
  sender: Address;
  token: Address;
  controller: Address;
  fee: bigint;
  treasury: Address;
}

export interface ControllerSetEvent {
  controller: Address;
  allowed: boolean;
}

export interface DestChainPremiumSetEvent {
  chainId: ChainId;
  rate: bigint;
}

export interface ControllerFeeTiersSetEvent {
  controller: Address;
  destChainId: ChainId;
  thresholds: bigint[];
  rates: bigint[];
}

type Dispatch = (controller: BaseAssetController, net: bigint) => Hash;

export class ControllerWrapper extends FeeWrapper {
  readonly access: AccessControl;

  readonly events = {
    TransferSent: this.event<TransferSentEvent>('TransferSent'),
    FeesCollected: this.event<FeesCollectedEvent>('FeesCollected'),
    ControllerSet: this.event<ControllerSetEvent>('ControllerSet'),
    DestChainPremiumSet: this.event<DestChainPremiumSetEvent>('DestChainPremiumSet'),
    ControllerFeeTiersSet: this.event<ControllerFeeTiersSetEvent>('ControllerFeeTiersSet'),
  };

  private readonly allowedControllers = this.map<Address, boolean>(() => false);
  private readonly premiumRates = this.map<ChainId, bigint>(() => 0n);
  private readonly feeTiers = this.map<string, readonly FeeTier[]>(() => []);

  constructor(chain: Chain, config: ControllerWrapperConfig) {
    super(chain, 'ControllerWrapper', config);
    this.access = new AccessControl(chain, this.address);
    this.access.grant(DEFAULT_ADMIN_ROLE, config.admin);
    this.access.grant(CONTROLLER_MANAGER_ROLE, config.manager);

    for (const controller of config.controllers ?? []) {
      this.writeController(controller, true);
    }
    this.writePremiumRates(config.premiumChainIds ?? [], config.premiumRates ?? []);
  }

  // ============ Views ============

  controllers(controller: Address): boolean {
    return this.allowedControllers.get(controller);
  }

  destChainPremiumRate(chainId: ChainId): bigint {
    return this.premiumRates.get(chainId);
  }

  getControllerFeeTiers(controller: Address, destChainId: ChainId): FeeTierTable {
    const tiers = this.feeTiers.get(tierKey(controller, destChainId));
    return {
      thresholds: tiers.map((tier) => tier.threshold),
      rates: tiers.map((tier) => tier.rate),
    };
  }

  /**
   * Fee the wrapper keeps and the net amount the controller receives
   */
  quote(controller: Address, destChainId: ChainId, amount: bigint): FeeQuote {
    return quoteFee(
      {
        tiers: this.feeTiers.get(tierKey(controller, destChainId)),
        feeRate: this.feeRate,
        premiumRate: this.destChainPremiumRate(destChainId),
      },
      amount
    );
  }

  // ============ Transfers ============

  transferTo(params: TransferParams, adapter: Address, options: Hex, referralData: Hex): Hash {
    return this.guard.run(() =>
      this.handleTransfers(params, false, referralData, (controller, net) =>
        this.external(
          controller,
          () => controller.transferTo(params.recipient, net, params.unwrap, params.destChainId, adapter, options),
          this.msg.value
        )
      )
    );
  }

  transferToMulti(
    params: TransferParams,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[],
    referralData: Hex
  ): Hash {
    return this.guard.run(() => this.multi(params, adapters, fees, options, referralData));
  }

  /**
   * Same as transferTo, approving the wrapper with an EIP-2612 permit first
   */
  transferToWithPermit(
    params: TransferParams,
    adapter: Address,
    options: Hex,
    referralData: Hex,
    permit: PermitSignature
  ): Hash {
    this.applyPermit(params.controller, params.amount, permit);
    return this.transferTo(params, adapter, options, referralData);
  }

  transferToMultiWithPermit(
    params: TransferParams,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[],
    referralData: Hex,
    permit: PermitSignature
  ): Hash {
    // multi transfers also pull the controller's collector fee on the net amount
    const { net } = this.quote(params.controller, params.destChainId, params.amount);
    const collectorFee = this.requireController(params.controller).feeCollector.quote(net);
    this.applyPermit(params.controller, params.amount + collectorFee, permit);
    return this.transferToMulti(params, adapters, fees, options, referralData);
  }

  /**
   * Pass a resend through to the controller; no fee is taken
   */
  resendTransfer(controllerAddress: Address, transferId: Hash, adapter: Address, options: Hex, referralData: Hex): void {
    this.guard.run(() => {
      const controller = this.requireController(controllerAddress);
      this.external(controller, () => controller.resendTransfer(transferId, adapter, options), this.msg.value);
      this.emitResent(controllerAddress, false, referralData);
    });
  }

  resendTransferMulti(
    controllerAddress: Address,
    transferId: Hash,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[],
    referralData: Hex
  ): void {
    this.guard.run(() => {
      const controller = this.requireController(controllerAddress);
      this.external(controller, () => controller.resendTransferMulti(transferId, adapters, fees, options), this.msg.value);
      this.emitResent(controllerAddress, true, referralData);
    });
  }

  // ============ Settings ============

  setControllers(controllers: readonly Address[], allowed: readonly boolean[]): void {
    this.checkManager();
    if (controllers.length !== allowed.length) {
      throw new LengthMismatchError({ controllers: controllers.length, allowed: allowed.length });
    }
    controllers.forEach((controller, i) => {
      this.writeController(controller, allowed[i] ?? false);
    });
  }

  setDestChainPremiumRate(chainIds: readonly ChainId[], rates: readonly bigint[]): void {
    this.checkManager();
    this.writePremiumRates(chainIds, rates);
  }

  /**
   * Replace the tier table of one (controller, destination) pair; empty arrays clear it
   */
  setControllerFeeTiers(
    controller: Address,
    destChainIds: readonly ChainId[],
    thresholds: readonly bigint[],
    rates: readonly bigint[]
  ): void {
    this.checkManager();
    const tiers = buildFeeTiers(thresholds, rates);
    for (const destChainId of destChainIds) {
      this.feeTiers.set(tierKey(controller, destChainId), tiers);
      this.events.ControllerFeeTiersSet.emit({
        controller,
        destChainId,
        thresholds: tiers.map((tier) => tier.threshold),
        rates: tiers.map((tier) => tier.rate),
      });
    }
  }

  protected override checkAdmin(): void {
    const sender = this.msg.sender;
    if (!this.access.hasRole(DEFAULT_ADMIN_ROLE, sender)) {
      throw unauthorized(sender);
    }
  }

  protected override checkManager(): void {
    const sender = this.msg.sender;
    if (!this.access.hasRole(DEFAULT_ADMIN_ROLE, sender) && !this.access.hasRole(CONTROLLER_MANAGER_ROLE, sender)) {
      throw unauthorized(sender);
    }
  }

  // ============ Internal ============

  private multi(
    params: TransferParams,
    adapters: readonly Address[],
    fees: readonly bigint[],
    options: readonly Hex[],
    referralData: Hex
  ): Hash {
    return this.handleTransfers(params, true, referralData, (controller, net) => {
      // the controller's fee collector charges the caller of transferToMulti on top of `net`
      const collectorFee = controller.feeCollector.quote(net);
      if (collectorFee > 0n) {
        this.pullExact(controller.token, this.msg.sender, collectorFee);
        this.external(controller.token, () => controller.token.approve(controller.address, net + collectorFee));
      }
      return this.external(
        controller,
        () => controller.transferToMulti(params.recipient, net, params.unwrap, params.destChainId, adapters, fees, options),
        this.msg.value
      );
    });
  }

  /**
   * Pull the gross amount, pay the fee out, let the controller consume an exact
   * approval for the net amount, then clear the approval
   */
  private handleTransfers(params: TransferParams, isMulti: boolean, referralData: Hex, dispatch: Dispatch): Hash {
    const controller = this.requireController(params.controller);
    const token = controller.token;
    const sender = this.msg.sender;

    this.pullExact(token, sender, params.amount);
    const { fee, net } = this.quote(params.controller, params.destChainId, params.amount);
    if (fee > 0n) {
      const treasury = this.treasury;
      this.external(token, () => token.transfer(treasury, fee));
      this.events.FeesCollected.emit({ sender, token: token.address, controller: params.controller, fee, treasury });
    }

    this.external(token, () => token.approve(controller.address, net));
    const transferId = dispatch(controller, net);
    this.resetApproval(token, controller.address);

    this.events.TransferSent.emit({
      sender,
      controller: params.controller,
      isResend: false,
      isMulti,
      amount: params.amount,
      net,
      referralData,
    });
    this.log.info('Forwarded transfer', { controller: params.controller, transferId, fee, net, isMulti });
    return transferId;
  }

  private applyPermit(controllerAddress: Address, value: bigint, permit: PermitSignature): void {
    const controller = this.requireController(controllerAddress);
    const token = controller.token;
    if (!(token instanceof PermitERC20)) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', `Token ${token.address} does not support permit`, {
        token: token.address,
      });
    }
    const owner = this.msg.sender;
    this.external(token, () => {
      token.permit(owner, this.address, value, permit);
    });
  }

  private requireController(address: Address): BaseAssetController {
    this.pausable.requireNotPaused();
    if (!this.controllers(address)) {
      throw new WrapperError('WRAPPER_CONTROLLER_NOT_WHITELISTED', `Controller ${address} is not whitelisted`, {
        controller: address,
      });
    }
    const controller = this.chain.contractAt(address);
    if (!(controller instanceof BaseAssetController)) {
      throw new WrapperError('WRAPPER_INVALID_PARAMS', `${address} is not an asset controller`, { controller: address });
    }
    return controller;
  }

  private resetApproval(token: ERC20, spender: Address): void {
    if (token.allowance(this.address, spender) === 0n) return;
    this.external(token, () => token.approve(spender, 0n));
  }

  private emitResent(controller: Address, isMulti: boolean, referralData: Hex): void {
    this.events.TransferSent.emit({
      sender: this.msg.sender,
      controller,
      isResend: true,
      isMulti,
      amount: 0n,
      net: 0n,
      referralData,
    });
  }

  private writeController(controller: Address, allowed: boolean): void {
    this.allowedControllers.set(controller, allowed);
    this.events.ControllerSet.emit({ controller, allowed });
  }

  private writePremiumRates(chainIds: readonly ChainId[], rates: readonly bigint[]): void {
    if (chainIds.length !== rates.length) {
      throw new LengthMismatchError({ chainIds: chainIds.length, rates: rates.length });
    }
    chainIds.forEach((chainId, i) => {
      const rate = rates[i] ?? 0n;
      validateFeeRate(rate);
      this.premiumRates.set(chainId, rate);
      this.events.DestChainPremiumSet.emit({ chainId, rate });
    });
  }
}

function tierKey(controller: Address, destChainId: ChainId): string {
  return `${controller}:${String(destChainId)}`;
}

function unauthorized(account: Address): WrapperError {
  return new WrapperError('WRAPPER_UNAUTHORIZED', `${account} may not change wrapper settings`, { account });
}
