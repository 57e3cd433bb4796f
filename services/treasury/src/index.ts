/**
 * @seigniorage/treasury
 *
 * Epoch-driven monetary policy for a pegged token:
 * - Bond purchases and redemptions around the peg
 * - Seigniorage expansion by supply tier
 * - Operator governance with bounded parameters
 */

// Types
export * from "./types.js";

// Configuration
export * from "./config.js";

// Epochs and the one-call-per-block guard
export * from "./epoch/epoch-controller.js";
export * from "./epoch/block-guard.js";

// Oracle access
export * from "./oracle/oracle-gateway.js";
export * from "./oracle/mock-price-oracle.js";

// Bond pricing
export * from "./bonds/bond-pricing.js";

// Supply expansion
export * from "./expansion/supply-tiers.js";
export * from "./expansion/supply-expansion-planner.js";

// Ledger
export * from "./ledger/treasury-ledger.js";

// Governance rules
export * from "./governance/parameter-rules.js";

// In-memory sinks
export * from "./sinks/memory-masonry.js";
export * from "./sinks/memory-bond-treasury.js";

// Coordinator
export * from "./treasury.js";
