/**
 * Chain Module Exports
 *
 * In-process stand-in for the execution environment:
 * - Block clock and atomic transactions
 * - Operator-managed in-memory tokens
 * - Address helpers
 */

export * from "./addresses.js";
export * from "./in-memory-chain.js";
export * from "./memory-token.js";
