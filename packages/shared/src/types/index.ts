/**
 * Seigniorage Capability Types
 *
 * Contracts outside the protocol core are reached only through these
 * capabilities. Mutating calls name the calling account explicitly.
 */

import type { Address } from "viem";

// ============================================
// CALL CONTEXT
// ============================================
export interface CallContext {
  /** Immediate caller */
  sender: Address;

  /** Externally owned account that started the call chain; defaults to sender */
  origin?: Address;
}

// ============================================
// TOKEN CAPABILITIES
// ============================================
export interface Erc20 {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;

  totalSupply(): bigint;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;

  transfer(caller: Address, to: Address, amount: bigint): boolean;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean;
  approve(caller: Address, spender: Address, amount: bigint): boolean;
}

/**
 * Operator-managed token: the pegged token, bonds and shares
 */
export interface BasisAsset extends Erc20 {
  operator(): Address;
  mint(caller: Address, recipient: Address, amount: bigint): boolean;
  burnFrom(caller: Address, account: Address, amount: bigint): void;
  transferOperator(caller: Address, newOperator: Address): void;
}

// ============================================
// ROLLBACK
// ============================================

/**
 * State that can be captured before a transaction and restored if it aborts.
 * checkpoint() returns the function that restores the captured state.
 */
export interface Checkpointable {
  checkpoint(): () => void;
}

// ============================================
// RESULTS
// ============================================
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
