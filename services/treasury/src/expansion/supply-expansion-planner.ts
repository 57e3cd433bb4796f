/**
 * Supply Expansion Planner
 *
 * Turns one epoch's price and supply into an explicit allocation plan:
 * - Bond treasury top-up (every epoch)
 * - Bootstrap: fixed expansion to the reward sink
 * - Steady state above the ceiling: expansion split between the reward sink
 *   and the bond reserve, depending on outstanding debt
 *
 * The planner never moves tokens; TreasuryLedger executes the plan.
 */

import {
  treasuryLogger as logger,
  BPS_TO_WAD,
  WAD,
  formatWad,
  mul,
  mulDiv,
  percentOf,
  sub,
} from "@seigniorage/shared";
import type { TreasuryParameters } from "../types.js";
import { findSupplyTier } from "./supply-tiers.js";

const plannerLogger = logger.child({ component: "supply-expansion-planner" });

// ============================================
// TYPES
// ============================================

export type AllocationPhase = "bootstrap" | "expansion" | "debt-repayment" | "none";

export interface AllocationInput {
  epoch: bigint;
  previousEpochPegPrice: bigint;
  /** Circulating supply, excluded addresses already removed */
  supply: bigint;
  seigniorageSaved: bigint;
  bondSupply: bigint;
}

export interface AllocationPlan {
  phase: AllocationPhase;
  toBondTreasury: bigint;
  toRewardSink: bigint;
  savedForBond: bigint;
}

// ============================================
// SUPPLY EXPANSION PLANNER
// ============================================

export class SupplyExpansionPlanner {
  /**
   * Resolves the tier for `supply` and stores it as the current
   * maxSupplyExpansionPercent. Keeps the stored value if no tier matches.
   */
  maxExpansionPercent(params: TreasuryParameters, supply: bigint): bigint {
    const tier = findSupplyTier(params.supplyTiers, params.maxExpansionTiers, supply);
    if (tier) {
      params.maxSupplyExpansionPercent = tier.maxExpansionPercent;
    }
    return params.maxSupplyExpansionPercent;
  }

  /**
   * Plans one epoch's seigniorage
   */
  plan(input: AllocationInput, params: TreasuryParameters): AllocationPlan {
    const toBondTreasury = percentOf(input.supply, params.bondSupplyExpansionPercent);

    if (input.epoch < params.bootstrapEpochs) {
      return this.finish(input, {
        phase: "bootstrap",
        toBondTreasury,
        toRewardSink: percentOf(input.supply, params.bootstrapSupplyExpansionPercent),
        savedForBond: 0n,
      });
    }

    if (input.previousEpochPegPrice <= params.pegPriceCeiling) {
      return this.finish(input, { phase: "none", toBondTreasury, toRewardSink: 0n, savedForBond: 0n });
    }

    let percentage = sub(input.previousEpochPegPrice, params.pegPriceOne);
    const mse = mul(this.maxExpansionPercent(params, input.supply), BPS_TO_WAD);
    if (percentage > mse) {
      percentage = mse;
    }

    const seigniorage = mulDiv(input.supply, percentage, WAD);
    const depletionFloor = percentOf(input.bondSupply, params.bondDepletionFloorPercent);

    if (input.seigniorageSaved >= depletionFloor) {
      // debt covered; everything to stakers
      return this.finish(input, {
        phase: "expansion",
        toBondTreasury,
        toRewardSink: seigniorage,
        savedForBond: 0n,
      });
    }

    const toRewardSink = percentOf(seigniorage, params.seigniorageExpansionFloorPercent);
    let savedForBond = sub(seigniorage, toRewardSink);
    if (params.mintingFactorForPayingDebt > 0n) {
      savedForBond = percentOf(savedForBond, params.mintingFactorForPayingDebt);
    }

    return this.finish(input, {
      phase: "debt-repayment",
      toBondTreasury,
      toRewardSink,
      savedForBond,
    });
  }

  private finish(input: AllocationInput, plan: AllocationPlan): AllocationPlan {
    plannerLogger.debug({
      epoch: input.epoch.toString(),
      phase: plan.phase,
      previousPrice: formatWad(input.previousEpochPegPrice),
      supply: formatWad(input.supply),
      toBondTreasury: plan.toBondTreasury.toString(),
      toRewardSink: plan.toRewardSink.toString(),
      savedForBond: plan.savedForBond.toString(),
    }, "Allocation planned");
    return plan;
  }
}

/**
 * Factory function
 */
export function createSupplyExpansionPlanner(): SupplyExpansionPlanner {
  return new SupplyExpansionPlanner();
}
