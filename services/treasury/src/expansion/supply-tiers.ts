/**
 * Supply tier table: circulating supply -> max expansion percent.
 * Thresholds ascend; the highest tier at or below the supply wins.
 */

import { SUPPLY_TIER_COUNT } from "../types.js";

export type SupplyTierLookup = { index: number; maxExpansionPercent: bigint } | undefined;

/**
 * Highest tier whose threshold is <= supply, scanning downward
 */
export function findSupplyTier(
  supplyTiers: readonly bigint[],
  maxExpansionTiers: readonly bigint[],
  supply: bigint
): SupplyTierLookup {
  for (let index = supplyTiers.length - 1; index >= 0; index--) {
    const threshold = supplyTiers[index];
    const percent = maxExpansionTiers[index];
    if (threshold !== undefined && percent !== undefined && supply >= threshold) {
      return { index, maxExpansionPercent: percent };
    }
  }
  return undefined;
}

/**
 * Whether `value` may replace supplyTiers[index] without breaking the
 * strictly ascending order
 */
export function isValidSupplyTierEntry(
  supplyTiers: readonly bigint[],
  index: number,
  value: bigint
): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= SUPPLY_TIER_COUNT) {
    return false;
  }

  const lower = index > 0 ? supplyTiers[index - 1] : undefined;
  const upper = index < SUPPLY_TIER_COUNT - 1 ? supplyTiers[index + 1] : undefined;

  if (lower !== undefined && value <= lower) return false;
  if (upper !== undefined && value >= upper) return false;
  return true;
}

/**
 * Whether thresholds are strictly ascending and both tables have 9 entries
 */
export function isValidTierTable(
  supplyTiers: readonly bigint[],
  maxExpansionTiers: readonly bigint[]
): boolean {
  if (supplyTiers.length !== SUPPLY_TIER_COUNT) return false;
  if (maxExpansionTiers.length !== SUPPLY_TIER_COUNT) return false;

  return supplyTiers.every((threshold, index) => {
    const previous = supplyTiers[index - 1];
    return previous === undefined || threshold > previous;
  });
}
