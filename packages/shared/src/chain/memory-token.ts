/**
 * In-memory basis asset
 *
 * Operator-managed ERC-20 used as the pegged token, bond token and share
 * token in simulations and tests. Balances roll back with the chain.
 */

import type { Address } from "viem";
import { chainLogger as logger } from "../logger/index.js";
import {
  AuthorizationError,
  PreconditionViolationError,
} from "../errors/index.js";
import { add, sub } from "../math/fixed-point.js";
import type { BasisAsset, Checkpointable } from "../types/index.js";
import { isZeroAddress, normalizeAddress } from "./addresses.js";

const tokenLogger = logger.child({ component: "memory-token" });

// ============================================
// TYPES
// ============================================

export interface MemoryTokenOptions {
  address: Address;
  symbol: string;
  operator: Address;
  decimals?: number;
}

interface TokenState {
  totalSupply: bigint;
  operator: Address;
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
}

// ============================================
// MEMORY BASIS ASSET
// ============================================

export class MemoryBasisAsset implements BasisAsset, Checkpointable {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;

  private state: TokenState;

  constructor(options: MemoryTokenOptions) {
    this.address = normalizeAddress(options.address);
    this.symbol = options.symbol;
    this.decimals = options.decimals ?? 18;
    this.state = {
      totalSupply: 0n,
      operator: normalizeAddress(options.operator),
      balances: new Map(),
      allowances: new Map(),
    };
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  // ============================================
  // VIEWS
  // ============================================

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.state.balances.get(normalizeAddress(account)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.state.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  operator(): Address {
    return this.state.operator;
  }

  // ============================================
  // ERC-20
  // ============================================

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    this.move(caller, to, amount);
    return true;
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    this.spendAllowance(from, caller, amount, "ERC20: transfer amount exceeds allowance");
    this.move(from, to, amount);
    return true;
  }

  approve(caller: Address, spender: Address, amount: bigint): boolean {
    this.state.allowances.set(this.allowanceKey(caller, spender), amount);
    return true;
  }

  // ============================================
  // OPERATOR
  // ============================================

  mint(caller: Address, recipient: Address, amount: bigint): boolean {
    this.onlyOperator(caller);
    if (isZeroAddress(recipient)) {
      throw new PreconditionViolationError("ERC20: mint to the zero address");
    }

    const balanceBefore = this.balanceOf(recipient);
    this.state.totalSupply = add(this.state.totalSupply, amount);
    this.state.balances.set(normalizeAddress(recipient), add(balanceBefore, amount));

    tokenLogger.debug({
      token: this.symbol,
      recipient,
      amount: amount.toString(),
    }, "Minted");

    return this.balanceOf(recipient) > balanceBefore;
  }

  /**
   * Burns from an account that has approved the caller
   */
  burnFrom(caller: Address, account: Address, amount: bigint): void {
    this.onlyOperator(caller);
    this.spendAllowance(account, caller, amount, "ERC20: burn amount exceeds allowance");

    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new PreconditionViolationError("ERC20: burn amount exceeds balance");
    }
    this.state.balances.set(normalizeAddress(account), balance - amount);
    this.state.totalSupply = sub(this.state.totalSupply, amount);

    tokenLogger.debug({
      token: this.symbol,
      account,
      amount: amount.toString(),
    }, "Burned");
  }

  transferOperator(caller: Address, newOperator: Address): void {
    this.onlyOperator(caller);
    if (isZeroAddress(newOperator)) {
      throw new PreconditionViolationError("operator: zero address given for new operator");
    }
    this.state.operator = normalizeAddress(newOperator);

    tokenLogger.info({
      token: this.symbol,
      operator: this.state.operator,
    }, "Operator transferred");
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private move(from: Address, to: Address, amount: bigint): void {
    if (isZeroAddress(to)) {
      throw new PreconditionViolationError("ERC20: transfer to the zero address");
    }

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new PreconditionViolationError("ERC20: transfer amount exceeds balance");
    }

    this.state.balances.set(normalizeAddress(from), fromBalance - amount);
    this.state.balances.set(normalizeAddress(to), add(this.balanceOf(to), amount));
  }

  private spendAllowance(owner: Address, spender: Address, amount: bigint, message: string): void {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw new PreconditionViolationError(message);
    }
    this.state.allowances.set(this.allowanceKey(owner, spender), current - amount);
  }

  private onlyOperator(caller: Address): void {
    if (normalizeAddress(caller) !== this.state.operator) {
      throw new AuthorizationError("operator: caller is not the operator", caller);
    }
  }

  private allowanceKey(owner: Address, spender: Address): string {
    return `${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
  }
}

/**
 * Factory function
 */
export function createMemoryToken(options: MemoryTokenOptions): MemoryBasisAsset {
  return new MemoryBasisAsset(options);
}
