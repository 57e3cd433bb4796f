/**
 * Bond Pricing Tests
 *
 * Tests for discount and premium rates:
 * - Price windows
 * - Discount and premium formulas
 * - Rate caps
 * - Burnable and redeemable amounts
 */

import { describe, it, expect, beforeEach } from "vitest";
import { WAD } from "@seigniorage/shared";
import { BondPricingEngine, createBondPricingEngine } from "../bonds/bond-pricing.js";
import { DEFAULT_TREASURY_PARAMETERS, type TreasuryParameters } from "../types.js";

const price = (cents: bigint) => (WAD * cents) / 100n;

describe("BondPricingEngine", () => {
  let engine: BondPricingEngine;
  let params: TreasuryParameters;

  beforeEach(() => {
    engine = createBondPricingEngine();
    params = { ...DEFAULT_TREASURY_PARAMETERS };
  });

  describe("discountRate", () => {
    it("should be unavailable above peg", () => {
      expect(engine.discountRate(price(101n), params)).toBe(0n);
    });

    it("should return exactly peg when the discount percent is zero", () => {
      expect(engine.discountRate(price(80n), params)).toBe(WAD);
      expect(engine.discountRate(WAD, params)).toBe(WAD);
    });

    it("should add the scaled discount below peg", () => {
      params.discountPercent = 5_000n;
      // 1 / 0.8 = 1.25 bonds; half of the 0.25 bonus
      expect(engine.discountRate(price(80n), params)).toBe(1_125_000_000_000_000_000n);
    });

    it("should clamp to maxDiscountRate", () => {
      params.discountPercent = 5_000n;
      params.maxDiscountRate = price(110n);
      expect(engine.discountRate(price(80n), params)).toBe(price(110n));
    });
  });

  describe("premiumRate", () => {
    it("should be unavailable at or below the ceiling", () => {
      expect(engine.premiumRate(WAD, params)).toBe(0n);
      expect(engine.premiumRate(params.pegPriceCeiling, params)).toBe(0n);
    });

    it("should return peg between the ceiling and the premium threshold", () => {
      expect(engine.premiumRate(price(105n), params)).toBe(WAD);
    });

    it("should add the scaled premium above the threshold", () => {
      // 1 + 0.2 * 70%
      expect(engine.premiumRate(price(120n), params)).toBe(1_140_000_000_000_000_000n);
      expect(engine.premiumRate(price(110n), params)).toBe(1_070_000_000_000_000_000n);
    });

    it("should clamp to maxPremiumRate", () => {
      params.maxPremiumRate = price(110n);
      expect(engine.premiumRate(price(120n), params)).toBe(price(110n));
    });
  });

  describe("burnablePegLeft", () => {
    const input = {
      price: price(90n),
      contractionLeft: 30_000n * WAD,
      circulatingSupply: 1_000_000n * WAD,
      bondSupply: 0n,
    };

    it("should be bounded by the contraction budget", () => {
      expect(engine.burnablePegLeft(input, params)).toBe(30_000n * WAD);
    });

    it("should be bounded by the remaining debt capacity at the current price", () => {
      const nearCap = { ...input, bondSupply: 340_000n * WAD };
      expect(engine.burnablePegLeft(nearCap, params)).toBe(9_000n * WAD);
    });

    it("should be zero at the debt cap or above peg", () => {
      expect(engine.burnablePegLeft({ ...input, bondSupply: 350_000n * WAD }, params)).toBe(0n);
      expect(engine.burnablePegLeft({ ...input, price: price(105n) }, params)).toBe(0n);
    });
  });

  describe("redeemableBonds", () => {
    it("should convert the treasury balance at the premium rate", () => {
      expect(engine.redeemableBonds(price(120n), 1_140n * WAD, params)).toBe(1_000n * WAD);
    });

    it("should be zero at or below the ceiling", () => {
      expect(engine.redeemableBonds(WAD, 1_000n * WAD, params)).toBe(0n);
    });
  });
});
