/**
 * Treasury
 *
 * Coordinator of the epoch-driven monetary policy:
 * - Bond purchases below peg (supply contraction)
 * - Bond redemptions above the ceiling
 * - Seigniorage allocation once per epoch (supply expansion)
 * - Operator governance over every policy parameter
 *
 * Every mutating call runs in one chain transaction and either fully
 * commits or leaves no trace. Events are published after commit.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import {
  treasuryLogger as logger,
  AuthorizationError,
  InMemoryChain,
  PreconditionViolationError,
  WAD,
  add,
  audit,
  ensure,
  formatWad,
  isSameAddress,
  isZeroAddress,
  logTransaction,
  mulDiv,
  normalizeAddress,
  percentOf,
  toError,
  type BasisAsset,
  type CallContext,
  type Checkpointable,
  type Erc20,
} from "@seigniorage/shared";
import type {
  BondTreasury,
  PriceOracle,
  SeigniorageSink,
  TreasuryConfig,
  TreasuryEvent,
  TreasuryEvents,
  TreasuryLinks,
  TreasuryParameters,
  TreasuryState,
} from "./types.js";
import { DEFAULT_TREASURY_CONFIG } from "./types.js";
import { treasuryConfigSchema } from "./config.js";
import { EpochController, createEpochController } from "./epoch/epoch-controller.js";
import { BlockGuard, createBlockGuard, createBlockGuardState } from "./epoch/block-guard.js";
import { OracleGateway, createOracleGateway } from "./oracle/oracle-gateway.js";
import { BondPricingEngine, createBondPricingEngine } from "./bonds/bond-pricing.js";
import {
  SupplyExpansionPlanner,
  createSupplyExpansionPlanner,
  type AllocationPlan,
} from "./expansion/supply-expansion-planner.js";
import { TreasuryLedger, createTreasuryLedger } from "./ledger/treasury-ledger.js";
import {
  PARAMETER_RULES,
  checkParameter,
  checkSupplyTierEntry,
  pegPriceCeilingRule,
  premiumThresholdRule,
  tierIndexRule,
} from "./governance/parameter-rules.js";

const coordinatorLogger = logger.child({ component: "treasury" });

// ============================================
// TYPES
// ============================================

export interface TreasuryOptions {
  address: Address;
  chain: InMemoryChain;
  config?: Partial<TreasuryConfig>;
}

export interface InitializeParams {
  pegToken: BasisAsset;
  bondToken: BasisAsset;
  shareToken: BasisAsset;
  oracle: PriceOracle;
  masonry: SeigniorageSink;
  bondTreasury?: BondTreasury;
  startTime: bigint;
  excludedFromTotalSupply?: Address[];
}

type GuardedMethod = "buyBonds" | "redeemBonds" | "allocateSeigniorage";

function cloneParameters(parameters: TreasuryParameters): TreasuryParameters {
  return {
    ...parameters,
    supplyTiers: [...parameters.supplyTiers],
    maxExpansionTiers: [...parameters.maxExpansionTiers],
  };
}

// ============================================
// TREASURY
// ============================================

export class Treasury extends EventEmitter<TreasuryEvents> implements Checkpointable {
  readonly address: Address;

  private readonly chain: InMemoryChain;
  private readonly config: TreasuryConfig;

  // Components
  private readonly epochController: EpochController;
  private readonly blockGuard: BlockGuard;
  private readonly oracleGateway: OracleGateway;
  private readonly pricing: BondPricingEngine;
  private readonly planner: SupplyExpansionPlanner;
  private readonly ledger: TreasuryLedger;

  // State
  private readonly state: TreasuryState;
  private links?: TreasuryLinks;
  private readonly history: TreasuryEvent[] = [];

  constructor(options: TreasuryOptions) {
    super();
    this.address = normalizeAddress(options.address);
    this.chain = options.chain;
    this.config = treasuryConfigSchema.parse({ ...DEFAULT_TREASURY_CONFIG, ...options.config });

    const parameters = cloneParameters(this.config.parameters);

    this.state = {
      initialized: false,
      operator: undefined,
      startTime: 0n,
      periodSeconds: this.config.periodSeconds,
      epoch: 0n,
      epochSupplyContractionLeft: 0n,
      seigniorageSaved: 0n,
      previousEpochPegPrice: 0n,
      excludedFromTotalSupply: [],
      parameters,
      guard: createBlockGuardState(),
    };

    this.epochController = createEpochController();
    this.blockGuard = createBlockGuard();
    this.oracleGateway = createOracleGateway(this.chain);
    this.pricing = createBondPricingEngine();
    this.planner = createSupplyExpansionPlanner();
    this.ledger = createTreasuryLedger(this.address, (event) => this.record(event));

    this.chain.register(this);

    coordinatorLogger.info({
      address: this.address,
      periodSeconds: this.config.periodSeconds.toString(),
      pegPriceCeiling: formatWad(parameters.pegPriceCeiling),
    }, "Treasury created");
  }

  checkpoint(): () => void {
    const savedState = structuredClone(this.state);
    const savedLinks = this.links ? { ...this.links } : undefined;
    // Restore in place: callers up the stack may hold these objects
    return () => {
      Object.assign(this.state, savedState);
      if (savedLinks && this.links) {
        Object.assign(this.links, savedLinks);
      } else {
        this.links = savedLinks;
      }
    };
  }

  /**
   * One-time setup; the caller becomes operator
   */
  initialize(caller: Address, params: InitializeParams): void {
    this.chain.transact(() => {
      ensure(!this.state.initialized, "Treasury: already initialized");

      this.links = {
        pegToken: params.pegToken,
        bondToken: params.bondToken,
        shareToken: params.shareToken,
        oracle: params.oracle,
        masonry: params.masonry,
        bondTreasury: params.bondTreasury,
      };

      this.state.initialized = true;
      this.state.operator = normalizeAddress(caller);
      this.state.startTime = params.startTime;
      this.state.epoch = 0n;
      this.state.epochSupplyContractionLeft = 0n;
      this.state.excludedFromTotalSupply = (params.excludedFromTotalSupply ?? []).map(normalizeAddress);
      this.state.seigniorageSaved = params.pegToken.balanceOf(this.address);

      this.record({ type: "Initialized", executor: this.state.operator, blockNumber: this.chain.blockNumber });
    });

    coordinatorLogger.info({
      operator: this.state.operator,
      startTime: this.state.startTime.toString(),
      seigniorageSaved: this.state.seigniorageSaved.toString(),
    }, "Treasury initialized");
  }

  // ============================================
  // GUARDED ENTRY POINTS
  // ============================================

  /**
   * Burns `amount` pegged token for bonds at the discount rate.
   * The caller must have approved the treasury for `amount`.
   */
  buyBonds(ctx: CallContext, amount: bigint, expectedPrice: bigint): void {
    this.guarded(ctx, "buyBonds", false, (links) => {
      ensure(amount > 0n, "Treasury: cannot purchase bonds with zero amount");

      const price = this.oracleGateway.getPrice(links.oracle, links.pegToken.address);
      ensure(price === expectedPrice, "Treasury: peg price moved");
      ensure(price < this.state.parameters.pegPriceOne, "Treasury: pegPrice not eligible for bond purchase");
      ensure(amount <= this.state.epochSupplyContractionLeft, "Treasury: not enough bond left to purchase");

      const rate = this.pricing.discountRate(price, this.state.parameters);
      ensure(rate > 0n, "Treasury: invalid bond rate");

      const bondAmount = mulDiv(amount, rate, WAD);
      const circulating = this.ledger.circulatingSupply(links, this.state);
      const newBondSupply = add(links.bondToken.totalSupply(), bondAmount);
      ensure(
        newBondSupply <= percentOf(circulating, this.state.parameters.maxDebtRatioPercent),
        "over max debt ratio"
      );

      this.ledger.purchaseBonds(links, this.state, normalizeAddress(ctx.sender), amount, bondAmount);
      this.oracleGateway.refreshPrice(links.oracle);
    });
  }

  /**
   * Burns bonds for pegged token at the premium rate
   */
  redeemBonds(ctx: CallContext, bondAmount: bigint, expectedPrice: bigint): void {
    this.guarded(ctx, "redeemBonds", false, (links) => {
      ensure(bondAmount > 0n, "Treasury: cannot redeem bonds with zero amount");

      const price = this.oracleGateway.getPrice(links.oracle, links.pegToken.address);
      ensure(price === expectedPrice, "Treasury: peg price moved");
      ensure(price > this.state.parameters.pegPriceCeiling, "Treasury: pegPrice not eligible for bond redemption");

      const rate = this.pricing.premiumRate(price, this.state.parameters);
      ensure(rate > 0n, "Treasury: invalid bond rate");

      const pegAmount = mulDiv(bondAmount, rate, WAD);
      ensure(this.ledger.reserve(links) >= pegAmount, "Treasury: treasury has no more budget");

      this.ledger.redeemBonds(links, this.state, normalizeAddress(ctx.sender), bondAmount, pegAmount);
      this.oracleGateway.refreshPrice(links.oracle);
    });
  }

  /**
   * Closes the current epoch: tops up the bond treasury, then expands supply
   * according to the previous epoch's price
   */
  allocateSeigniorage(ctx: CallContext): AllocationPlan {
    return this.guarded(ctx, "allocateSeigniorage", true, (links) => {
      this.oracleGateway.refreshPrice(links.oracle);
      this.state.previousEpochPegPrice = this.oracleGateway.getPrice(links.oracle, links.pegToken.address);

      const supply = this.ledger.circulatingSupply(links, this.state);
      const plan = this.planner.plan({
        epoch: this.state.epoch,
        previousEpochPegPrice: this.state.previousEpochPegPrice,
        supply,
        seigniorageSaved: this.state.seigniorageSaved,
        bondSupply: links.bondToken.totalSupply(),
      }, this.state.parameters);

      this.ledger.execute(links, this.state, plan, this.chain.timestamp);
      return plan;
    });
  }

  // ============================================
  // VIEWS
  // ============================================

  isInitialized(): boolean {
    return this.state.initialized;
  }

  operator(): Address | undefined {
    return this.state.operator;
  }

  epoch(): bigint {
    return this.state.epoch;
  }

  nextEpochPoint(): bigint {
    return this.epochController.nextEpochPoint(this.state);
  }

  getPegPrice(): bigint {
    const links = this.requireLinks();
    return this.oracleGateway.getPrice(links.oracle, links.pegToken.address);
  }

  getPegUpdatedPrice(): bigint {
    const links = this.requireLinks();
    return this.oracleGateway.getUpdatedPrice(links.oracle, links.pegToken.address);
  }

  /**
   * Pegged token set aside for bond redemptions
   */
  getReserve(): bigint {
    return this.state.seigniorageSaved;
  }

  getCirculatingSupply(): bigint {
    return this.ledger.circulatingSupply(this.requireLinks(), this.state);
  }

  getBurnablePegLeft(): bigint {
    const links = this.requireLinks();
    return this.pricing.burnablePegLeft({
      price: this.getPegPrice(),
      contractionLeft: this.state.epochSupplyContractionLeft,
      circulatingSupply: this.ledger.circulatingSupply(links, this.state),
      bondSupply: links.bondToken.totalSupply(),
    }, this.state.parameters);
  }

  getRedeemableBonds(): bigint {
    const links = this.requireLinks();
    return this.pricing.redeemableBonds(this.getPegPrice(), this.ledger.reserve(links), this.state.parameters);
  }

  getBondDiscountRate(): bigint {
    return this.pricing.discountRate(this.getPegPrice(), this.state.parameters);
  }

  getBondPremiumRate(): bigint {
    return this.pricing.premiumRate(this.getPegPrice(), this.state.parameters);
  }

  /**
   * Deep copy of the persisted state
   */
  getState(): TreasuryState {
    return structuredClone(this.state);
  }

  /**
   * Committed events, oldest first
   */
  getEventHistory(): readonly TreasuryEvent[] {
    return [...this.history];
  }

  // ============================================
  // GOVERNANCE
  // ============================================

  setOperator(caller: Address, newOperator: Address): void {
    this.governed(caller, "setOperator", { operator: newOperator }, () => {
      ensure(!isZeroAddress(newOperator), "Treasury: zero address");
      this.state.operator = normalizeAddress(newOperator);
    });
  }

  setMasonry(caller: Address, masonry: SeigniorageSink): void {
    this.governed(caller, "setMasonry", { masonry: masonry.address }, () => {
      ensure(!isZeroAddress(masonry.address), "Treasury: zero address");
      this.requireLinks().masonry = masonry;
    });
  }

  setOracle(caller: Address, oracle: PriceOracle): void {
    this.governed(caller, "setOracle", { oracle: oracle.address }, () => {
      ensure(!isZeroAddress(oracle.address), "Treasury: zero address");
      this.requireLinks().oracle = oracle;
    });
  }

  /**
   * Sets or clears the bond treasury sink
   */
  setBondTreasury(caller: Address, bondTreasury: BondTreasury | undefined): void {
    this.governed(caller, "setBondTreasury", { bondTreasury: bondTreasury?.address ?? null }, () => {
      if (bondTreasury) {
        ensure(!isZeroAddress(bondTreasury.address), "Treasury: zero address");
      }
      this.requireLinks().bondTreasury = bondTreasury;
    });
  }

  setPegPriceCeiling(caller: Address, pegPriceCeiling: bigint): void {
    this.governed(caller, "setPegPriceCeiling", { pegPriceCeiling: pegPriceCeiling.toString() }, () => {
      const params = this.state.parameters;
      params.pegPriceCeiling = checkParameter("pegPriceCeiling", pegPriceCeilingRule(params), pegPriceCeiling);
    });
  }

  setMaxSupplyExpansionPercents(caller: Address, percent: bigint): void {
    this.governed(caller, "setMaxSupplyExpansionPercents", { percent: percent.toString() }, () => {
      this.state.parameters.maxSupplyExpansionPercent = checkParameter(
        "maxSupplyExpansionPercent",
        PARAMETER_RULES.maxSupplyExpansionPercent,
        percent
      );
    });
  }

  setSupplyTiersEntry(caller: Address, index: number, value: bigint): boolean {
    this.governed(caller, "setSupplyTiersEntry", { index, value: value.toString() }, () => {
      checkSupplyTierEntry(this.state.parameters.supplyTiers, index, value);
      this.state.parameters.supplyTiers[index] = value;
    });
    return true;
  }

  setMaxExpansionTiersEntry(caller: Address, index: number, value: bigint): boolean {
    this.governed(caller, "setMaxExpansionTiersEntry", { index, value: value.toString() }, () => {
      checkParameter("maxExpansionTiers.index", tierIndexRule(), index);
      this.state.parameters.maxExpansionTiers[index] = checkParameter(
        `maxExpansionTiers[${index}]`,
        PARAMETER_RULES.maxExpansionTier,
        value
      );
    });
    return true;
  }

  setBondDepletionFloorPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "bondDepletionFloorPercent", percent);
  }

  setMaxSupplyContractionPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "maxSupplyContractionPercent", percent);
  }

  setMaxDebtRatioPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "maxDebtRatioPercent", percent);
  }

  setBootstrap(caller: Address, bootstrapEpochs: bigint, bootstrapSupplyExpansionPercent: bigint): void {
    this.governed(caller, "setBootstrap", {
      bootstrapEpochs: bootstrapEpochs.toString(),
      bootstrapSupplyExpansionPercent: bootstrapSupplyExpansionPercent.toString(),
    }, () => {
      const params = this.state.parameters;
      params.bootstrapEpochs = checkParameter("bootstrapEpochs", PARAMETER_RULES.bootstrapEpochs, bootstrapEpochs);
      params.bootstrapSupplyExpansionPercent = checkParameter(
        "bootstrapSupplyExpansionPercent",
        PARAMETER_RULES.bootstrapSupplyExpansionPercent,
        bootstrapSupplyExpansionPercent
      );
    });
  }

  setExtraFunds(
    caller: Address,
    daoFund: Address,
    daoFundSharedPercent: bigint,
    devFund: Address,
    devFundSharedPercent: bigint
  ): void {
    this.governed(caller, "setExtraFunds", {
      daoFund,
      daoFundSharedPercent: daoFundSharedPercent.toString(),
      devFund,
      devFundSharedPercent: devFundSharedPercent.toString(),
    }, () => {
      ensure(!isZeroAddress(daoFund), "Treasury: zero dao fund");
      ensure(!isZeroAddress(devFund), "Treasury: zero dev fund");

      const params = this.state.parameters;
      params.daoFundSharedPercent = checkParameter(
        "daoFundSharedPercent",
        PARAMETER_RULES.daoFundSharedPercent,
        daoFundSharedPercent
      );
      params.devFundSharedPercent = checkParameter(
        "devFundSharedPercent",
        PARAMETER_RULES.devFundSharedPercent,
        devFundSharedPercent
      );
      params.daoFund = normalizeAddress(daoFund);
      params.devFund = normalizeAddress(devFund);
    });
  }

  setMaxDiscountRate(caller: Address, rate: bigint): void {
    this.setRuled(caller, "maxDiscountRate", rate);
  }

  setMaxPremiumRate(caller: Address, rate: bigint): void {
    this.setRuled(caller, "maxPremiumRate", rate);
  }

  setDiscountPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "discountPercent", percent);
  }

  setPremiumThreshold(caller: Address, threshold: bigint): void {
    this.governed(caller, "setPremiumThreshold", { threshold: threshold.toString() }, () => {
      const params = this.state.parameters;
      params.premiumThreshold = checkParameter("premiumThreshold", premiumThresholdRule(params), threshold);
    });
  }

  setPremiumPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "premiumPercent", percent);
  }

  setMintingFactorForPayingDebt(caller: Address, factor: bigint): void {
    this.setRuled(caller, "mintingFactorForPayingDebt", factor);
  }

  setBondSupplyExpansionPercent(caller: Address, percent: bigint): void {
    this.setRuled(caller, "bondSupplyExpansionPercent", percent);
  }

  /**
   * Appends to the exclusion list; duplicates are kept
   */
  addExcludedAddress(caller: Address, account: Address): void {
    this.governed(caller, "addExcludedAddress", { account }, () => {
      this.state.excludedFromTotalSupply.push(normalizeAddress(account));
    });
  }

  /**
   * Sends out tokens sent here by mistake; core tokens cannot be recovered
   */
  governanceRecoverUnsupported(caller: Address, token: Erc20, amount: bigint, to: Address): void {
    this.governed(caller, "governanceRecoverUnsupported", {
      token: token.address,
      amount: amount.toString(),
      to,
    }, () => {
      const links = this.requireLinks();
      ensure(!isSameAddress(token.address, links.pegToken.address), "Treasury: cannot recover peg token");
      ensure(!isSameAddress(token.address, links.bondToken.address), "Treasury: cannot recover bond token");
      ensure(!isSameAddress(token.address, links.shareToken.address), "Treasury: cannot recover share token");
      token.transfer(this.address, to, amount);
    });
  }

  // ============================================
  // MASONRY PASS-THROUGHS
  // ============================================

  masonrySetOperator(caller: Address, newOperator: Address): void {
    this.governed(caller, "masonrySetOperator", { operator: newOperator }, () => {
      this.requireLinks().masonry.setOperator(this.address, newOperator);
    });
  }

  masonrySetLockUp(caller: Address, withdrawLockupEpochs: bigint, rewardLockupEpochs: bigint): void {
    this.governed(caller, "masonrySetLockUp", {
      withdrawLockupEpochs: withdrawLockupEpochs.toString(),
      rewardLockupEpochs: rewardLockupEpochs.toString(),
    }, () => {
      this.requireLinks().masonry.setLockUp(this.address, withdrawLockupEpochs, rewardLockupEpochs);
    });
  }

  masonryAllocateSeigniorage(caller: Address, amount: bigint): void {
    this.governed(caller, "masonryAllocateSeigniorage", { amount: amount.toString() }, () => {
      this.requireLinks().masonry.allocateSeigniorage(this.address, amount);
    });
  }

  masonryGovernanceRecoverUnsupported(caller: Address, token: Erc20, amount: bigint, to: Address): void {
    this.governed(caller, "masonryGovernanceRecoverUnsupported", {
      token: token.address,
      amount: amount.toString(),
      to,
    }, () => {
      this.requireLinks().masonry.governanceRecoverUnsupported(this.address, token, amount, to);
    });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  /**
   * Runs a guarded entry point: onlyOneBlock, checkCondition,
   * checkEpoch (when epoch-gated), checkOperator, then the body
   */
  private guarded<T>(
    ctx: CallContext,
    method: GuardedMethod,
    epochGated: boolean,
    body: (links: TreasuryLinks) => T
  ): T {
    const txContext = {
      contract: "Treasury",
      method,
      sender: ctx.sender,
      blockNumber: this.chain.blockNumber.toString(),
      timestamp: this.chain.timestamp.toString(),
    };

    try {
      const result = this.chain.transact(() => {
        const links = this.requireLinks();
        const now = this.chain.timestamp;

        this.blockGuard.enter(this.state.guard, this.chain.blockNumber, ctx);
        this.epochController.assertStarted(this.state, now);

        const run = (): T => {
          this.checkOperator(links);
          return body(links);
        };

        if (!epochGated) {
          return run();
        }
        return this.epochController.runEpoch(this.state, now, run, () => this.nextContractionBudget(links));
      });

      logTransaction("info", `${method}:committed`, txContext);
      return result;
    } catch (error) {
      logTransaction("warn", `${method}:reverted`, txContext, toError(error).message);
      throw error;
    }
  }

  /**
   * Operator-only governance call with an audit entry on commit
   */
  private governed(
    caller: Address,
    action: string,
    details: Record<string, unknown>,
    body: () => void
  ): void {
    this.chain.transact(() => {
      this.onlyOperator(caller);
      body();
      this.chain.afterCommit(() => {
        audit({
          action,
          entityType: "treasury",
          entityId: this.address,
          actor: caller,
          details,
        });
      });
    });
  }

  private setRuled(
    caller: Address,
    parameter:
      | "bondDepletionFloorPercent"
      | "maxSupplyContractionPercent"
      | "maxDebtRatioPercent"
      | "maxDiscountRate"
      | "maxPremiumRate"
      | "discountPercent"
      | "premiumPercent"
      | "mintingFactorForPayingDebt"
      | "bondSupplyExpansionPercent",
    value: bigint
  ): void {
    const setter = `set${parameter.charAt(0).toUpperCase()}${parameter.slice(1)}`;
    this.governed(caller, setter, { [parameter]: value.toString() }, () => {
      this.state.parameters[parameter] = checkParameter(parameter, PARAMETER_RULES[parameter], value);
    });
  }

  /**
   * Budget for the next epoch: nothing above the ceiling, otherwise a
   * share of circulating supply
   */
  private nextContractionBudget(links: TreasuryLinks): bigint {
    const price = this.oracleGateway.getPrice(links.oracle, links.pegToken.address);
    if (price > this.state.parameters.pegPriceCeiling) {
      return 0n;
    }
    return percentOf(
      this.ledger.circulatingSupply(links, this.state),
      this.state.parameters.maxSupplyContractionPercent
    );
  }

  private checkOperator(links: TreasuryLinks): void {
    const controlled =
      isSameAddress(links.pegToken.operator(), this.address) &&
      isSameAddress(links.bondToken.operator(), this.address) &&
      isSameAddress(links.shareToken.operator(), this.address) &&
      isSameAddress(links.masonry.operator(), this.address);
    ensure(controlled, "Treasury: need more permission");
  }

  private onlyOperator(caller: Address): void {
    const { operator } = this.state;
    if (!operator || !isSameAddress(operator, caller)) {
      throw new AuthorizationError("Treasury: caller is not the operator", caller);
    }
  }

  private requireLinks(): TreasuryLinks {
    if (!this.links) {
      throw new PreconditionViolationError("Treasury: not initialized");
    }
    return this.links;
  }

  private record(event: TreasuryEvent): void {
    this.chain.afterCommit(() => {
      this.history.push(event);
      this.emit("event", event);
    });
  }
}

/**
 * Factory function
 */
export function createTreasury(options: TreasuryOptions): Treasury {
  return new Treasury(options);
}
