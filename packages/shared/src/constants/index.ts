/**
 * Seigniorage Constants
 * Fixed-point scales and protocol-wide defaults
 */

// ============================================
// FIXED-POINT SCALES
// ============================================
export const DECIMALS = 18;

/** 1.0 in 18-decimal fixed point */
export const WAD = 10n ** 18n;

/** Denominator for basis-point percentages (10000 = 100%) */
export const BPS_DENOMINATOR = 10_000n;

/** One basis point of a WAD, used to lift tier percentages into price space */
export const BPS_TO_WAD = 10n ** 14n;

/** Largest value an unsigned 256-bit word can hold */
export const MAX_UINT256 = 2n ** 256n - 1n;

/** Largest price an oracle may report */
export const MAX_UINT144 = 2n ** 144n - 1n;

// ============================================
// TIME
// ============================================
export const TIME = {
  MINUTE: 60n,
  HOUR: 60n * 60n,
  DAY: 24n * 60n * 60n,
} as const;

// ============================================
// CHAIN SIMULATION DEFAULTS
// ============================================
export const CHAIN_DEFAULTS = {
  genesisTimestamp: 1_700_000_000n,
  genesisBlockNumber: 1n,
  blockTimeSeconds: 2n,
} as const;

// ============================================
// GUARD MESSAGES
// ============================================
export const GUARD_MESSAGES = {
  ONE_BLOCK_ONE_FUNCTION: "ContractGuard: one block, one function",
} as const;
