/**
 * Reward Pool Types
 *
 * Types for the time-weighted staking reward pool:
 * - Emission schedule configuration
 * - Per-pool and per-user accrual records
 * - Reward pool events
 */

import type { Address } from "viem";
import { TIME, WAD } from "@seigniorage/shared";

// ============================================
// EMISSION SCHEDULE
// ============================================

/**
 * Consecutive emission epochs starting at poolStartTime. Each epoch emits
 * its total evenly over its duration; after the last one emission stops.
 */
export interface EmissionScheduleConfig {
  poolStartTime: bigint;
  epochTotalRewards: bigint[];
  epochDurations: bigint[];
}

export const DEFAULT_EPOCH_TOTAL_REWARDS: readonly bigint[] = [80_000n * WAD, 60_000n * WAD];

export const DEFAULT_EPOCH_DURATIONS: readonly bigint[] = [4n * TIME.DAY, 5n * TIME.DAY];

/** Guard window after the last epoch ends before pool tokens can be recovered */
export const RECOVERY_GRACE_PERIOD = 30n * TIME.DAY;

// ============================================
// ACCRUAL RECORDS
// ============================================

export interface PoolInfo {
  token: Address;
  allocPoint: bigint;
  lastRewardTime: bigint;
  /** Reward per staked unit, scaled by 1e18 */
  accRewardPerShare: bigint;
  isStarted: boolean;
}

export interface UserInfo {
  amount: bigint;
  rewardDebt: bigint;
}

export interface RewardPoolState {
  operator: Address;
  totalAllocPoint: bigint;
  pools: PoolInfo[];
  /** Keyed by `${pid}:${user}` */
  users: Map<string, UserInfo>;
}

// ============================================
// EVENTS
// ============================================

export type RewardPoolEvent =
  | { type: "Deposit"; user: Address; pid: number; amount: bigint }
  | { type: "Withdraw"; user: Address; pid: number; amount: bigint }
  | { type: "EmergencyWithdraw"; user: Address; pid: number; amount: bigint }
  | { type: "RewardPaid"; user: Address; amount: bigint };

export type RewardPoolEventType = RewardPoolEvent["type"];

export interface RewardPoolEvents {
  event: (event: RewardPoolEvent) => void;
}
