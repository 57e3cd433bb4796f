/**
 * @seigniorage/shared
 * Shared math, schemas, logging and the in-memory chain
 */

// Export schemas
export * from "./schemas/index.js";

// Export constants (WAD, BPS_DENOMINATOR, TIME, etc.)
export * from "./constants/index.js";

// Export error taxonomy
export * from "./errors/index.js";

// Export fixed-point math
export * from "./math/fixed-point.js";

// Export in-memory chain, tokens and address helpers
export * from "./chain/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  chainLogger,
  treasuryLogger,
  rewardPoolLogger,
  logTransaction,
  audit,
  logError,
  toError,
} from "./logger/index.js";

// Export capability types
export type {
  CallContext,
  Erc20,
  BasisAsset,
  Checkpointable,
  Result,
} from "./types/index.js";
