/**
 * Treasury Ledger
 *
 * Token movements and reserve accounting for the treasury:
 * - Circulating supply (total supply minus excluded balances)
 * - Bond purchase and redemption effects
 * - Seigniorage distribution (DAO / dev / reward sink / bond treasury)
 * - Bond reserve funding
 *
 * Callers check preconditions; the ledger applies effects and records events.
 */

import type { Address } from "viem";
import {
  treasuryLogger as logger,
  ensure,
  percentOf,
  sub,
} from "@seigniorage/shared";
import type { TreasuryEvent, TreasuryLinks, TreasuryState } from "../types.js";
import type { AllocationPlan } from "../expansion/supply-expansion-planner.js";

const ledgerLogger = logger.child({ component: "treasury-ledger" });

export type EventRecorder = (event: TreasuryEvent) => void;

// ============================================
// TREASURY LEDGER
// ============================================

export class TreasuryLedger {
  constructor(
    private readonly treasury: Address,
    private readonly record: EventRecorder
  ) {}

  /**
   * totalSupply - sum of excluded balances. A duplicated exclusion is
   * subtracted once per entry.
   */
  circulatingSupply(links: TreasuryLinks, state: TreasuryState): bigint {
    let balanceExcluded = 0n;
    for (const account of state.excludedFromTotalSupply) {
      balanceExcluded += links.pegToken.balanceOf(account);
    }
    return sub(links.pegToken.totalSupply(), balanceExcluded);
  }

  /**
   * Pegged token held by the treasury
   */
  reserve(links: TreasuryLinks): bigint {
    return links.pegToken.balanceOf(this.treasury);
  }

  // ============================================
  // BONDS
  // ============================================

  /**
   * Burns the buyer's pegged token and mints bonds in return
   */
  purchaseBonds(
    links: TreasuryLinks,
    state: TreasuryState,
    buyer: Address,
    pegAmount: bigint,
    bondAmount: bigint
  ): void {
    links.pegToken.burnFrom(this.treasury, buyer, pegAmount);
    links.bondToken.mint(this.treasury, buyer, bondAmount);

    state.epochSupplyContractionLeft = sub(state.epochSupplyContractionLeft, pegAmount);

    this.record({ type: "BoughtBonds", from: buyer, pegAmount, bondAmount });
  }

  /**
   * Burns the redeemer's bonds and pays out pegged token from the reserve
   */
  redeemBonds(
    links: TreasuryLinks,
    state: TreasuryState,
    redeemer: Address,
    bondAmount: bigint,
    pegAmount: bigint
  ): void {
    state.seigniorageSaved -= state.seigniorageSaved < pegAmount
      ? state.seigniorageSaved
      : pegAmount;

    links.bondToken.burnFrom(this.treasury, redeemer, bondAmount);
    links.pegToken.transfer(this.treasury, redeemer, pegAmount);

    this.record({ type: "RedeemedBonds", from: redeemer, pegAmount, bondAmount });
  }

  // ============================================
  // SEIGNIORAGE DISTRIBUTION
  // ============================================

  /**
   * Carries out an allocation plan in order: bond treasury, reward sink,
   * bond reserve
   */
  execute(links: TreasuryLinks, state: TreasuryState, plan: AllocationPlan, now: bigint): void {
    this.fundBondTreasury(links, plan.toBondTreasury, now);

    if (plan.phase === "bootstrap" || plan.toRewardSink > 0n) {
      this.fundRewardSink(links, state, plan.toRewardSink, now);
    }
    if (plan.savedForBond > 0n) {
      this.fundReserve(links, state, plan.savedForBond, now);
    }
  }

  /**
   * Mints `amount`, pays the DAO and dev shares, and hands the rest to the
   * reward sink
   */
  fundRewardSink(links: TreasuryLinks, state: TreasuryState, amount: bigint, now: bigint): void {
    const { parameters } = state;
    links.pegToken.mint(this.treasury, this.treasury, amount);

    let daoFundSharedAmount = 0n;
    if (parameters.daoFundSharedPercent > 0n) {
      ensure(parameters.daoFund !== undefined, "Treasury: dao fund not set");
      daoFundSharedAmount = percentOf(amount, parameters.daoFundSharedPercent);
      links.pegToken.transfer(this.treasury, parameters.daoFund, daoFundSharedAmount);
      this.record({ type: "DaoFundFunded", timestamp: now, seigniorage: daoFundSharedAmount });
    }

    let devFundSharedAmount = 0n;
    if (parameters.devFundSharedPercent > 0n) {
      ensure(parameters.devFund !== undefined, "Treasury: dev fund not set");
      devFundSharedAmount = percentOf(amount, parameters.devFundSharedPercent);
      links.pegToken.transfer(this.treasury, parameters.devFund, devFundSharedAmount);
      this.record({ type: "DevFundFunded", timestamp: now, seigniorage: devFundSharedAmount });
    }

    const remaining = sub(sub(amount, daoFundSharedAmount), devFundSharedAmount);

    links.pegToken.approve(this.treasury, links.masonry.address, 0n);
    links.pegToken.approve(this.treasury, links.masonry.address, remaining);
    links.masonry.allocateSeigniorage(this.treasury, remaining);

    this.record({ type: "MasonryFunded", timestamp: now, seigniorage: remaining });

    ledgerLogger.info({
      amount: amount.toString(),
      dao: daoFundSharedAmount.toString(),
      dev: devFundSharedAmount.toString(),
      masonry: remaining.toString(),
    }, "Reward sink funded");
  }

  /**
   * Tops the bond treasury up to `amount` of unvested pegged token.
   * No-op without a bond treasury or for a zero amount.
   */
  fundBondTreasury(links: TreasuryLinks, amount: bigint, now: bigint): void {
    const { bondTreasury } = links;
    if (!bondTreasury || amount === 0n) return;

    const balance = links.pegToken.balanceOf(bondTreasury.address);
    const vested = bondTreasury.totalVested();
    if (vested >= balance) return;

    const unspent = balance - vested;
    if (amount <= unspent) return;

    const minted = amount - unspent;
    links.pegToken.mint(this.treasury, bondTreasury.address, minted);

    this.record({ type: "BondTreasuryFunded", timestamp: now, seigniorage: minted });
  }

  /**
   * Mints to the treasury and books it against future redemptions
   */
  fundReserve(links: TreasuryLinks, state: TreasuryState, amount: bigint, now: bigint): void {
    state.seigniorageSaved += amount;
    links.pegToken.mint(this.treasury, this.treasury, amount);

    this.record({ type: "TreasuryFunded", timestamp: now, seigniorage: amount });
  }
}

/**
 * Factory function
 */
export function createTreasuryLedger(treasury: Address, record: EventRecorder): TreasuryLedger {
  return new TreasuryLedger(treasury, record);
}
