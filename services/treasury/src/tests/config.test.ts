/**
 * Treasury Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { WAD } from "@seigniorage/shared";
import { DEFAULT_TREASURY_PARAMETERS } from "../types.js";
import { loadTreasuryConfig, treasuryConfigSchema } from "../config.js";

describe("loadTreasuryConfig", () => {
  it("should fall back to the defaults", () => {
    const config = loadTreasuryConfig({});

    expect(config.periodSeconds).toBe(21_600n);
    expect(config.parameters).toEqual(DEFAULT_TREASURY_PARAMETERS);
  });

  it("should read overrides from the environment", () => {
    const config = loadTreasuryConfig({
      TREASURY_PERIOD_SECONDS: "3600",
      TREASURY_PRICE_CEILING: "1050000000000000000",
      TREASURY_BOOTSTRAP_EPOCHS: "0",
      TREASURY_BOOTSTRAP_EXPANSION_PERCENT: "300",
    });

    expect(config.periodSeconds).toBe(3600n);
    expect(config.parameters.pegPriceCeiling).toBe((WAD * 105n) / 100n);
    expect(config.parameters.bootstrapEpochs).toBe(0n);
    expect(config.parameters.bootstrapSupplyExpansionPercent).toBe(300n);
  });

  it("should let explicit overrides win over the environment", () => {
    const config = loadTreasuryConfig({ TREASURY_PERIOD_SECONDS: "3600" }, { periodSeconds: 60n });
    expect(config.periodSeconds).toBe(60n);
  });

  it("should merge parameter overrides field by field over the environment", () => {
    const config = loadTreasuryConfig(
      { TREASURY_PRICE_CEILING: "1050000000000000000", TREASURY_BOOTSTRAP_EPOCHS: "7" },
      { parameters: { discountPercent: 100n, bootstrapEpochs: 3n } }
    );

    expect(config.parameters.pegPriceCeiling).toBe((WAD * 105n) / 100n);
    expect(config.parameters.discountPercent).toBe(100n);
    expect(config.parameters.bootstrapEpochs).toBe(3n);
    expect(config.parameters.supplyTiers).toEqual(DEFAULT_TREASURY_PARAMETERS.supplyTiers);
  });

  it("should reject malformed or out-of-range values", () => {
    expect(() => loadTreasuryConfig({ TREASURY_PERIOD_SECONDS: "six hours" })).toThrow(ZodError);
    expect(() => loadTreasuryConfig({ TREASURY_PRICE_CEILING: "1300000000000000000" })).toThrow(ZodError);
    expect(() => loadTreasuryConfig({ TREASURY_BOOTSTRAP_EPOCHS: "121" })).toThrow(ZodError);
    expect(() => loadTreasuryConfig({}, { periodSeconds: 0n })).toThrow("periodSeconds must be positive");
  });
});

describe("treasuryConfigSchema", () => {
  it("should reject a tier table that is not strictly ascending", () => {
    const supplyTiers = [...DEFAULT_TREASURY_PARAMETERS.supplyTiers];
    supplyTiers[3] = supplyTiers[2] ?? 0n;

    const result = treasuryConfigSchema.safeParse({
      periodSeconds: 21_600n,
      parameters: { ...DEFAULT_TREASURY_PARAMETERS, supplyTiers },
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("supplyTiers must be strictly ascending");
  });
});
