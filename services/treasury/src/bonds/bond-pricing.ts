/**
 * Bond Pricing Engine
 *
 * Pure pricing over the current peg price:
 * - Discount rate: pegged token -> bonds, below peg
 * - Premium rate: bonds -> pegged token, above the ceiling
 * A rate of 0 means "not available at this price".
 */

import { WAD, min, mulDiv, percentOf, sub } from "@seigniorage/shared";
import type { TreasuryParameters } from "../types.js";

export type BondPricingParameters = Pick<
  TreasuryParameters,
  | "pegPriceOne"
  | "pegPriceCeiling"
  | "maxDiscountRate"
  | "maxPremiumRate"
  | "discountPercent"
  | "premiumThreshold"
  | "premiumPercent"
  | "maxDebtRatioPercent"
>;

export interface BurnableInput {
  price: bigint;
  contractionLeft: bigint;
  circulatingSupply: bigint;
  bondSupply: bigint;
}

// ============================================
// BOND PRICING ENGINE
// ============================================

export class BondPricingEngine {
  /**
   * Bonds minted per 1e18 pegged token burned
   */
  discountRate(price: bigint, params: BondPricingParameters): bigint {
    if (price > params.pegPriceOne) return 0n;

    if (params.discountPercent === 0n) {
      // no discount
      return params.pegPriceOne;
    }

    const bondAmount = mulDiv(params.pegPriceOne, WAD, price);
    const discountAmount = percentOf(sub(bondAmount, params.pegPriceOne), params.discountPercent);
    const rate = params.pegPriceOne + discountAmount;

    return clamp(rate, params.maxDiscountRate);
  }

  /**
   * Pegged token paid per 1e18 bonds redeemed
   */
  premiumRate(price: bigint, params: BondPricingParameters): bigint {
    if (price <= params.pegPriceCeiling) return 0n;

    const premiumThresholdPrice = mulDiv(params.pegPriceOne, params.premiumThreshold, 100n);
    if (price < premiumThresholdPrice) {
      // no premium bonus
      return params.pegPriceOne;
    }

    const premiumAmount = percentOf(sub(price, params.pegPriceOne), params.premiumPercent);
    const rate = params.pegPriceOne + premiumAmount;

    return clamp(rate, params.maxPremiumRate);
  }

  /**
   * Pegged token that can still be burned for bonds this epoch
   */
  burnablePegLeft(input: BurnableInput, params: BondPricingParameters): bigint {
    if (input.price > params.pegPriceOne) return 0n;

    const bondMaxSupply = percentOf(input.circulatingSupply, params.maxDebtRatioPercent);
    if (bondMaxSupply <= input.bondSupply) return 0n;

    const maxMintableBond = bondMaxSupply - input.bondSupply;
    const maxBurnablePeg = mulDiv(maxMintableBond, input.price, WAD);
    return min(input.contractionLeft, maxBurnablePeg);
  }

  /**
   * Bonds the treasury's pegged balance can currently pay out
   */
  redeemableBonds(price: bigint, treasuryPegBalance: bigint, params: BondPricingParameters): bigint {
    if (price <= params.pegPriceCeiling) return 0n;

    const rate = this.premiumRate(price, params);
    if (rate === 0n) return 0n;

    return mulDiv(treasuryPegBalance, WAD, rate);
  }
}

function clamp(rate: bigint, cap: bigint): bigint {
  return cap > 0n && rate > cap ? cap : rate;
}

/**
 * Factory function
 */
export function createBondPricingEngine(): BondPricingEngine {
  return new BondPricingEngine();
}
