/**
 * Treasury Service Configuration
 */

import { z } from "zod";
import {
  addressSchema,
  boundedUintSchema,
  envSchema,
  uint256Schema,
  uintInputSchema,
} from "@seigniorage/shared";
import {
  DEFAULT_TREASURY_CONFIG,
  SUPPLY_TIER_COUNT,
  type TreasuryConfig,
  type TreasuryParameters,
} from "./types.js";
import { isValidTierTable } from "./expansion/supply-tiers.js";
import { PARAMETER_RULES } from "./governance/parameter-rules.js";

// ============================================
// TREASURY CONFIG SCHEMA
// ============================================

const parametersSchema = z
  .object({
    // Price
    pegPriceOne: uint256Schema.gt(0n),
    pegPriceCeiling: uint256Schema,

    // Expansion tiers
    supplyTiers: z.array(uint256Schema).length(SUPPLY_TIER_COUNT),
    maxExpansionTiers: z.array(PARAMETER_RULES.maxExpansionTier).length(SUPPLY_TIER_COUNT),
    maxSupplyExpansionPercent: PARAMETER_RULES.maxSupplyExpansionPercent,

    // Expansion split
    bondDepletionFloorPercent: PARAMETER_RULES.bondDepletionFloorPercent,
    seigniorageExpansionFloorPercent: boundedUintSchema(0n, 10_000n),
    mintingFactorForPayingDebt: boundedUintSchema(0n, 20_000n),
    bondSupplyExpansionPercent: PARAMETER_RULES.bondSupplyExpansionPercent,

    // Contraction
    maxSupplyContractionPercent: PARAMETER_RULES.maxSupplyContractionPercent,
    maxDebtRatioPercent: PARAMETER_RULES.maxDebtRatioPercent,

    // Bootstrap
    bootstrapEpochs: PARAMETER_RULES.bootstrapEpochs,
    bootstrapSupplyExpansionPercent: PARAMETER_RULES.bootstrapSupplyExpansionPercent,

    // Bond pricing
    maxDiscountRate: PARAMETER_RULES.maxDiscountRate,
    maxPremiumRate: PARAMETER_RULES.maxPremiumRate,
    discountPercent: PARAMETER_RULES.discountPercent,
    premiumThreshold: boundedUintSchema(0n, 150n),
    premiumPercent: PARAMETER_RULES.premiumPercent,

    // Extra funds
    daoFund: addressSchema.optional(),
    daoFundSharedPercent: PARAMETER_RULES.daoFundSharedPercent,
    devFund: addressSchema.optional(),
    devFundSharedPercent: PARAMETER_RULES.devFundSharedPercent,
  })
  .refine(
    (params) => isValidTierTable(params.supplyTiers, params.maxExpansionTiers),
    { message: "supplyTiers must be strictly ascending", path: ["supplyTiers"] }
  )
  .refine(
    (params) =>
      params.pegPriceCeiling >= params.pegPriceOne &&
      params.pegPriceCeiling <= (params.pegPriceOne * 120n) / 100n,
    { message: "pegPriceCeiling out of range", path: ["pegPriceCeiling"] }
  );

export const treasuryConfigSchema = z.object({
  periodSeconds: uint256Schema.gt(0n, "periodSeconds must be positive"),
  parameters: parametersSchema,
});

// ============================================
// ENVIRONMENT
// ============================================

export const treasuryEnvSchema = envSchema.extend({
  TREASURY_PERIOD_SECONDS: uintInputSchema.optional(),
  TREASURY_PRICE_CEILING: uintInputSchema.optional(),
  TREASURY_BOOTSTRAP_EPOCHS: uintInputSchema.optional(),
  TREASURY_BOOTSTRAP_EXPANSION_PERCENT: uintInputSchema.optional(),
});

export type TreasuryEnv = z.infer<typeof treasuryEnvSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

export type TreasuryConfigOverrides = Partial<Omit<TreasuryConfig, "parameters">> & {
  parameters?: Partial<TreasuryParameters>;
};

/**
 * Builds a validated treasury config from defaults, env overrides and
 * explicit overrides (highest precedence). Parameters merge field by field.
 */
export function loadTreasuryConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: TreasuryConfigOverrides = {}
): TreasuryConfig {
  const parsedEnv = treasuryEnvSchema.parse(env);
  const defaults = DEFAULT_TREASURY_CONFIG.parameters;

  const config: TreasuryConfig = {
    periodSeconds:
      overrides.periodSeconds ?? parsedEnv.TREASURY_PERIOD_SECONDS ?? DEFAULT_TREASURY_CONFIG.periodSeconds,
    parameters: {
      ...defaults,
      supplyTiers: [...defaults.supplyTiers],
      maxExpansionTiers: [...defaults.maxExpansionTiers],
      pegPriceCeiling: parsedEnv.TREASURY_PRICE_CEILING ?? defaults.pegPriceCeiling,
      bootstrapEpochs: parsedEnv.TREASURY_BOOTSTRAP_EPOCHS ?? defaults.bootstrapEpochs,
      bootstrapSupplyExpansionPercent:
        parsedEnv.TREASURY_BOOTSTRAP_EXPANSION_PERCENT ?? defaults.bootstrapSupplyExpansionPercent,
      ...overrides.parameters,
    },
  };

  return treasuryConfigSchema.parse(config);
}
