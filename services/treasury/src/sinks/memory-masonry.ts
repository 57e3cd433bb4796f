/**
 * In-memory Masonry
 *
 * Staking reward sink stand-in. Pulls allocated seigniorage from the
 * operator and keeps one snapshot per allocation.
 */

import type { Address } from "viem";
import {
  treasuryLogger as logger,
  AuthorizationError,
  ensure,
  isSameAddress,
  isZeroAddress,
  normalizeAddress,
  type Checkpointable,
  type Erc20,
} from "@seigniorage/shared";
import type { SeigniorageSink } from "../types.js";

const masonryLogger = logger.child({ component: "memory-masonry" });

export interface MasonrySnapshot {
  amount: bigint;
  operator: Address;
}

interface MasonryState {
  operator: Address;
  withdrawLockupEpochs: bigint;
  rewardLockupEpochs: bigint;
  snapshots: MasonrySnapshot[];
}

export interface MemoryMasonryOptions {
  address: Address;
  operator: Address;
  pegToken: Erc20;
  shareToken: Erc20;
}

export class MemoryMasonry implements SeigniorageSink, Checkpointable {
  readonly address: Address;
  private readonly pegToken: Erc20;
  private readonly shareToken: Erc20;
  private state: MasonryState;

  constructor(options: MemoryMasonryOptions) {
    this.address = normalizeAddress(options.address);
    this.pegToken = options.pegToken;
    this.shareToken = options.shareToken;
    this.state = {
      operator: normalizeAddress(options.operator),
      withdrawLockupEpochs: 6n,
      rewardLockupEpochs: 3n,
      snapshots: [],
    };
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  operator(): Address {
    return this.state.operator;
  }

  allocateSeigniorage(caller: Address, amount: bigint): void {
    this.onlyOperator(caller);
    ensure(amount > 0n, "Masonry: Cannot allocate 0");

    this.pegToken.transferFrom(this.address, caller, this.address, amount);
    this.state.snapshots.push({ amount, operator: normalizeAddress(caller) });

    masonryLogger.debug({ amount: amount.toString() }, "Seigniorage allocated");
  }

  setOperator(caller: Address, newOperator: Address): void {
    this.onlyOperator(caller);
    ensure(!isZeroAddress(newOperator), "Masonry: zero address");
    this.state.operator = normalizeAddress(newOperator);
  }

  setLockUp(caller: Address, withdrawLockupEpochs: bigint, rewardLockupEpochs: bigint): void {
    this.onlyOperator(caller);
    ensure(
      withdrawLockupEpochs >= rewardLockupEpochs && withdrawLockupEpochs <= 56n,
      "_withdrawLockupEpochs: out of range"
    );
    this.state.withdrawLockupEpochs = withdrawLockupEpochs;
    this.state.rewardLockupEpochs = rewardLockupEpochs;
  }

  governanceRecoverUnsupported(caller: Address, token: Erc20, amount: bigint, to: Address): void {
    this.onlyOperator(caller);
    ensure(!isSameAddress(token.address, this.pegToken.address), "Masonry: cannot drain core tokens");
    ensure(!isSameAddress(token.address, this.shareToken.address), "Masonry: cannot drain core tokens");
    token.transfer(this.address, to, amount);
  }

  // ============================================
  // VIEWS
  // ============================================

  getSnapshots(): readonly MasonrySnapshot[] {
    return this.state.snapshots;
  }

  getLockUp(): { withdrawLockupEpochs: bigint; rewardLockupEpochs: bigint } {
    return {
      withdrawLockupEpochs: this.state.withdrawLockupEpochs,
      rewardLockupEpochs: this.state.rewardLockupEpochs,
    };
  }

  private onlyOperator(caller: Address): void {
    if (!isSameAddress(caller, this.state.operator)) {
      throw new AuthorizationError("Masonry: caller is not the operator", caller);
    }
  }
}

/**
 * Factory function
 */
export function createMemoryMasonry(options: MemoryMasonryOptions): MemoryMasonry {
  return new MemoryMasonry(options);
}
