/**
 * @seigniorage/reward-pool
 *
 * Time-weighted staking rewards over a fixed emission schedule
 */

// Types
export * from "./types.js";

// Configuration
export * from "./config.js";

// Emission schedule
export * from "./emission-schedule.js";

// Reward pool
export * from "./reward-pool.js";
