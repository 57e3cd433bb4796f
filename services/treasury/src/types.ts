/**
 * Treasury Types
 *
 * Types for the epoch-driven monetary policy:
 * - Collaborator capabilities (oracle, masonry, bond treasury)
 * - Policy parameters and their defaults
 * - The single TreasuryState aggregate
 * - Treasury events
 */

import type { Address } from "viem";
import type { BasisAsset, Erc20 } from "@seigniorage/shared";
import { TIME, WAD } from "@seigniorage/shared";

// ============================================
// COLLABORATOR CAPABILITIES
// ============================================

/**
 * Price oracle. consult and twap return an 18-decimal price or throw.
 */
export interface PriceOracle {
  readonly address: Address;
  consult(token: Address, amountIn: bigint): bigint;
  twap(token: Address, amountIn: bigint): bigint;
  update(): void;
}

/**
 * Staking reward sink ("Masonry") that receives seigniorage
 */
export interface SeigniorageSink {
  readonly address: Address;
  operator(): Address;
  allocateSeigniorage(caller: Address, amount: bigint): void;
  setOperator(caller: Address, newOperator: Address): void;
  setLockUp(caller: Address, withdrawLockupEpochs: bigint, rewardLockupEpochs: bigint): void;
  governanceRecoverUnsupported(caller: Address, token: Erc20, amount: bigint, to: Address): void;
}

/**
 * Bond treasury sink; vested amounts are already promised to bonders
 */
export interface BondTreasury {
  readonly address: Address;
  totalVested(): bigint;
}

/**
 * Live collaborator handles. Kept apart from TreasuryState because they are
 * objects, not data.
 */
export interface TreasuryLinks {
  pegToken: BasisAsset;
  bondToken: BasisAsset;
  shareToken: BasisAsset;
  oracle: PriceOracle;
  masonry: SeigniorageSink;
  bondTreasury?: BondTreasury;
}

// ============================================
// POLICY PARAMETERS
// ============================================

export interface TreasuryParameters {
  // Price
  pegPriceOne: bigint;
  pegPriceCeiling: bigint;

  // Expansion tiers (ascending thresholds, basis-point percents)
  supplyTiers: bigint[];
  maxExpansionTiers: bigint[];
  maxSupplyExpansionPercent: bigint;

  // Expansion split
  bondDepletionFloorPercent: bigint;
  seigniorageExpansionFloorPercent: bigint;
  mintingFactorForPayingDebt: bigint;
  bondSupplyExpansionPercent: bigint;

  // Contraction
  maxSupplyContractionPercent: bigint;
  maxDebtRatioPercent: bigint;

  // Bootstrap
  bootstrapEpochs: bigint;
  bootstrapSupplyExpansionPercent: bigint;

  // Bond pricing
  maxDiscountRate: bigint;
  maxPremiumRate: bigint;
  discountPercent: bigint;
  premiumThreshold: bigint;
  premiumPercent: bigint;

  // Extra funds
  daoFund?: Address;
  daoFundSharedPercent: bigint;
  devFund?: Address;
  devFundSharedPercent: bigint;
}

export const SUPPLY_TIER_COUNT = 9;

export const DEFAULT_SUPPLY_TIERS: readonly bigint[] = [
  0n,
  500_000n * WAD,
  1_000_000n * WAD,
  1_500_000n * WAD,
  2_000_000n * WAD,
  5_000_000n * WAD,
  10_000_000n * WAD,
  20_000_000n * WAD,
  50_000_000n * WAD,
];

export const DEFAULT_MAX_EXPANSION_TIERS: readonly bigint[] = [
  450n, 400n, 350n, 300n, 250n, 200n, 150n, 125n, 100n,
];

export const DEFAULT_TREASURY_PARAMETERS: TreasuryParameters = {
  pegPriceOne: WAD,
  pegPriceCeiling: (WAD * 101n) / 100n,           // $1.01

  supplyTiers: [...DEFAULT_SUPPLY_TIERS],
  maxExpansionTiers: [...DEFAULT_MAX_EXPANSION_TIERS],
  maxSupplyExpansionPercent: 400n,                 // up to 4% of supply per epoch

  bondDepletionFloorPercent: 10_000n,              // 100% of bond supply covered
  seigniorageExpansionFloorPercent: 3_500n,        // at least 35% to the masonry
  mintingFactorForPayingDebt: 0n,
  bondSupplyExpansionPercent: 0n,

  maxSupplyContractionPercent: 300n,               // up to 3% of supply per epoch
  maxDebtRatioPercent: 3_500n,                     // bonds up to 35% of supply

  bootstrapEpochs: 28n,
  bootstrapSupplyExpansionPercent: 450n,

  maxDiscountRate: 0n,
  maxPremiumRate: 0n,
  discountPercent: 0n,
  premiumThreshold: 110n,                          // premium above $1.10
  premiumPercent: 7_000n,

  daoFundSharedPercent: 0n,
  devFundSharedPercent: 0n,
};

// ============================================
// CONFIGURATION
// ============================================

export interface TreasuryConfig {
  periodSeconds: bigint;
  parameters: TreasuryParameters;
}

export const DEFAULT_TREASURY_CONFIG: TreasuryConfig = {
  periodSeconds: 6n * TIME.HOUR,
  parameters: DEFAULT_TREASURY_PARAMETERS,
};

// ============================================
// TREASURY STATE
// ============================================

/**
 * Addresses that already made a guarded call in the current block
 */
export interface BlockGuardState {
  blockNumber: bigint;
  origins: Set<Address>;
  senders: Set<Address>;
}

/**
 * Complete persisted treasury state
 */
export interface TreasuryState {
  initialized: boolean;
  operator?: Address;

  // Epochs
  startTime: bigint;
  periodSeconds: bigint;
  epoch: bigint;
  epochSupplyContractionLeft: bigint;

  // Reserve
  seigniorageSaved: bigint;
  previousEpochPegPrice: bigint;

  // Supply accounting
  excludedFromTotalSupply: Address[];

  // Policy
  parameters: TreasuryParameters;

  // One call per block
  guard: BlockGuardState;
}

// ============================================
// EVENTS
// ============================================

export type TreasuryEvent =
  | { type: "Initialized"; executor: Address; blockNumber: bigint }
  | { type: "BoughtBonds"; from: Address; pegAmount: bigint; bondAmount: bigint }
  | { type: "RedeemedBonds"; from: Address; pegAmount: bigint; bondAmount: bigint }
  | { type: "TreasuryFunded"; timestamp: bigint; seigniorage: bigint }
  | { type: "MasonryFunded"; timestamp: bigint; seigniorage: bigint }
  | { type: "DaoFundFunded"; timestamp: bigint; seigniorage: bigint }
  | { type: "DevFundFunded"; timestamp: bigint; seigniorage: bigint }
  | { type: "BondTreasuryFunded"; timestamp: bigint; seigniorage: bigint };

export type TreasuryEventType = TreasuryEvent["type"];

export interface TreasuryEvents {
  event: (event: TreasuryEvent) => void;
}
