/**
 * Governance Parameter Rules
 *
 * Bounds for every operator-tunable treasury parameter, as zod rules.
 * A rejected value raises RangeViolationError before anything is written.
 */

import { z } from "zod";
import {
  RangeViolationError,
  boundedUintSchema,
  mulDiv,
  uint256Schema,
} from "@seigniorage/shared";
import { SUPPLY_TIER_COUNT, type TreasuryParameters } from "../types.js";
import { isValidSupplyTierEntry } from "../expansion/supply-tiers.js";

// ============================================
// STATIC RULES
// ============================================

export const PARAMETER_RULES = {
  maxSupplyExpansionPercent: boundedUintSchema(10n, 1000n, "_maxSupplyExpansionPercent: out of range"),
  maxExpansionTier: boundedUintSchema(10n, 1000n, "_value: out of range"),
  bondDepletionFloorPercent: boundedUintSchema(500n, 10_000n, "out of range"),
  maxSupplyContractionPercent: boundedUintSchema(100n, 1500n, "out of range"),
  maxDebtRatioPercent: boundedUintSchema(1000n, 10_000n, "out of range"),
  bootstrapEpochs: boundedUintSchema(0n, 120n, "_bootstrapEpochs: out of range"),
  bootstrapSupplyExpansionPercent: boundedUintSchema(100n, 1000n, "_bootstrapSupplyExpansionPercent: out of range"),
  daoFundSharedPercent: boundedUintSchema(0n, 3000n, "out of range"),
  devFundSharedPercent: boundedUintSchema(0n, 1000n, "out of range"),
  maxDiscountRate: uint256Schema,
  maxPremiumRate: uint256Schema,
  discountPercent: boundedUintSchema(0n, 20_000n, "_discountPercent is over 200%"),
  premiumPercent: boundedUintSchema(0n, 20_000n, "_premiumPercent is over 200%"),
  mintingFactorForPayingDebt: boundedUintSchema(10_000n, 20_000n, "_mintingFactorForPayingDebt: out of range"),
  bondSupplyExpansionPercent: boundedUintSchema(0n, 1000n, "_bondSupplyExpansionPercent: out of range"),
} as const;

export type RuledParameter = keyof typeof PARAMETER_RULES;

// ============================================
// STATE-DEPENDENT RULES
// ============================================

/** Ceiling between peg and 120% of peg */
export function pegPriceCeilingRule(params: Pick<TreasuryParameters, "pegPriceOne">) {
  return boundedUintSchema(
    params.pegPriceOne,
    mulDiv(params.pegPriceOne, 120n, 100n),
    "out of range"
  );
}

/**
 * Premium threshold in percent of peg; must sit at or above the ceiling
 * and at most 150
 */
export function premiumThresholdRule(
  params: Pick<TreasuryParameters, "pegPriceOne" | "pegPriceCeiling">
) {
  return z
    .bigint()
    .lte(150n, "_premiumThreshold is higher than 1.5")
    .refine(
      (threshold) => mulDiv(params.pegPriceOne, threshold, 100n) >= params.pegPriceCeiling,
      "_premiumThreshold exceeds pegPriceCeiling"
    );
}

export function tierIndexRule() {
  return z
    .number()
    .int()
    .gte(0, "Index has to be higher than 0")
    .lt(SUPPLY_TIER_COUNT, "Index has to be lower than count of tiers");
}

// ============================================
// CHECKS
// ============================================

/**
 * Parses `value` with `rule`, or throws RangeViolationError naming the parameter
 */
export function checkParameter<T extends bigint | number>(
  parameter: string,
  rule: z.ZodType<T>,
  value: T
): T {
  const result = rule.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "out of range";
    throw new RangeViolationError(`Treasury: ${parameter} ${reason}`, parameter, value.toString());
  }
  return result.data;
}

/**
 * Validates a new supply tier threshold against its neighbours
 */
export function checkSupplyTierEntry(supplyTiers: readonly bigint[], index: number, value: bigint): void {
  checkParameter("supplyTiers.index", tierIndexRule(), index);
  if (!isValidSupplyTierEntry(supplyTiers, index, value)) {
    throw new RangeViolationError(
      `Treasury: supplyTiers[${index}] must lie strictly between its neighbours`,
      `supplyTiers[${index}]`,
      value.toString()
    );
  }
}
