/**
 * Reward Pool
 *
 * Accumulator-based staking rewards across weighted pools:
 * - Each pool accrues rewardPerShare lazily on every touch
 * - Users settle pending rewards on deposit and withdraw
 * - Payouts are bounded by the pool's reward balance
 *
 * Every mutating call runs in one chain transaction.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "viem";
import {
  rewardPoolLogger as logger,
  AuthorizationError,
  InMemoryChain,
  PreconditionViolationError,
  WAD,
  add,
  audit,
  ensure,
  isSameAddress,
  isZeroAddress,
  mulDiv,
  normalizeAddress,
  sub,
  type Checkpointable,
  type Erc20,
} from "@seigniorage/shared";
import type {
  EmissionScheduleConfig,
  PoolInfo,
  RewardPoolEvent,
  RewardPoolEvents,
  RewardPoolState,
  UserInfo,
} from "./types.js";
import { RECOVERY_GRACE_PERIOD } from "./types.js";
import { EmissionSchedule, createEmissionSchedule } from "./emission-schedule.js";
import { loadEmissionScheduleConfig } from "./config.js";

const poolLogger = logger.child({ component: "reward-pool" });

// ============================================
// TYPES
// ============================================

export interface RewardPoolOptions {
  address: Address;
  chain: InMemoryChain;
  rewardToken: Erc20;
  operator: Address;
  poolStartTime: bigint;
  schedule?: Partial<Omit<EmissionScheduleConfig, "poolStartTime">>;
}

// ============================================
// REWARD POOL
// ============================================

export class RewardPool extends EventEmitter<RewardPoolEvents> implements Checkpointable {
  readonly address: Address;
  readonly rewardToken: Erc20;
  readonly schedule: EmissionSchedule;

  private readonly chain: InMemoryChain;
  private readonly state: RewardPoolState;
  // Token handles by pid, kept beside the cloneable state
  private readonly poolTokens: Erc20[] = [];
  private readonly history: RewardPoolEvent[] = [];

  constructor(options: RewardPoolOptions) {
    super();
    ensure(options.chain.timestamp < options.poolStartTime, "late");

    this.address = normalizeAddress(options.address);
    this.chain = options.chain;
    this.rewardToken = options.rewardToken;
    this.schedule = createEmissionSchedule(
      loadEmissionScheduleConfig({ poolStartTime: options.poolStartTime, ...options.schedule })
    );
    this.state = {
      operator: normalizeAddress(options.operator),
      totalAllocPoint: 0n,
      pools: [],
      users: new Map(),
    };

    this.chain.register(this);

    poolLogger.info({
      address: this.address,
      poolStartTime: this.schedule.poolStartTime.toString(),
      lastEpochEnd: this.schedule.lastEpochEnd.toString(),
    }, "RewardPool created");
  }

  checkpoint(): () => void {
    const savedState = structuredClone(this.state);
    const savedTokens = [...this.poolTokens];
    return () => {
      Object.assign(this.state, savedState);
      this.poolTokens.splice(0, this.poolTokens.length, ...savedTokens);
    };
  }

  // ============================================
  // VIEWS
  // ============================================

  get poolStartTime(): bigint {
    return this.schedule.poolStartTime;
  }

  operator(): Address {
    return this.state.operator;
  }

  totalAllocPoint(): bigint {
    return this.state.totalAllocPoint;
  }

  poolLength(): number {
    return this.state.pools.length;
  }

  getPoolInfo(pid: number): PoolInfo {
    return { ...this.pool(pid) };
  }

  getUserInfo(pid: number, user: Address): UserInfo {
    this.pool(pid);
    return { ...this.user(pid, user) };
  }

  getGeneratedReward(fromTime: bigint, toTime: bigint): bigint {
    return this.schedule.generatedReward(fromTime, toTime);
  }

  /**
   * Reward the user could claim now, including accrual since the last touch
   */
  pendingReward(pid: number, user: Address): bigint {
    const pool = this.pool(pid);
    const info = this.user(pid, user);
    const now = this.chain.timestamp;

    let accRewardPerShare = pool.accRewardPerShare;
    const tokenSupply = this.stakedSupply(pid);
    if (now > pool.lastRewardTime && tokenSupply !== 0n && this.state.totalAllocPoint > 0n) {
      const generated = this.schedule.generatedReward(pool.lastRewardTime, now);
      const reward = mulDiv(generated, pool.allocPoint, this.state.totalAllocPoint);
      accRewardPerShare = add(accRewardPerShare, mulDiv(reward, WAD, tokenSupply));
    }

    return sub(mulDiv(info.amount, accRewardPerShare, WAD), info.rewardDebt);
  }

  getEventHistory(): readonly RewardPoolEvent[] {
    return [...this.history];
  }

  // ============================================
  // OPERATOR
  // ============================================

  /**
   * Adds a pool. Before pool start the first reward time is clamped up to
   * poolStartTime; afterwards up to now.
   */
  add(caller: Address, allocPoint: bigint, token: Erc20, withUpdate: boolean, lastRewardTime: bigint): number {
    return this.chain.transact(() => {
      this.onlyOperator(caller);
      this.checkPoolDuplicate(token);
      if (withUpdate) {
        this.updateAllPools();
      }

      const now = this.chain.timestamp;
      const poolStartTime = this.schedule.poolStartTime;
      let rewardTime = lastRewardTime;

      if (now < poolStartTime) {
        if (rewardTime === 0n || rewardTime < poolStartTime) {
          rewardTime = poolStartTime;
        }
      } else if (rewardTime === 0n || rewardTime < now) {
        rewardTime = now;
      }

      const isStarted = rewardTime <= poolStartTime || rewardTime <= now;
      this.state.pools.push({
        token: normalizeAddress(token.address),
        allocPoint,
        lastRewardTime: rewardTime,
        accRewardPerShare: 0n,
        isStarted,
      });
      this.poolTokens.push(token);

      if (isStarted) {
        this.state.totalAllocPoint = add(this.state.totalAllocPoint, allocPoint);
      }

      const pid = this.state.pools.length - 1;
      this.auditOnCommit(caller, "add", { pid, token: token.address, allocPoint: allocPoint.toString() });
      return pid;
    });
  }

  /**
   * Changes a pool's weight after bringing every pool up to date
   */
  set(caller: Address, pid: number, allocPoint: bigint): void {
    this.chain.transact(() => {
      this.onlyOperator(caller);
      this.updateAllPools();

      const pool = this.pool(pid);
      if (pool.isStarted) {
        this.state.totalAllocPoint = add(sub(this.state.totalAllocPoint, pool.allocPoint), allocPoint);
      }
      pool.allocPoint = allocPoint;

      this.auditOnCommit(caller, "set", { pid, allocPoint: allocPoint.toString() });
    });
  }

  setOperator(caller: Address, newOperator: Address): void {
    this.chain.transact(() => {
      this.onlyOperator(caller);
      ensure(!isZeroAddress(newOperator), "RewardPool: zero address");
      this.state.operator = normalizeAddress(newOperator);
      this.auditOnCommit(caller, "setOperator", { operator: this.state.operator });
    });
  }

  /**
   * Recovers stray tokens. Until 30 days after emission ends the reward
   * token and staked tokens stay locked.
   */
  governanceRecoverUnsupported(caller: Address, token: Erc20, amount: bigint, to: Address): void {
    this.chain.transact(() => {
      this.onlyOperator(caller);

      if (this.chain.timestamp < this.schedule.lastEpochEnd + RECOVERY_GRACE_PERIOD) {
        ensure(!isSameAddress(token.address, this.rewardToken.address), "reward token");
        for (const pool of this.state.pools) {
          ensure(!isSameAddress(token.address, pool.token), "pool.token");
        }
      }

      token.transfer(this.address, to, amount);
      this.auditOnCommit(caller, "governanceRecoverUnsupported", {
        token: token.address,
        amount: amount.toString(),
        to,
      });
    });
  }

  // ============================================
  // ACCRUAL
  // ============================================

  massUpdatePools(): void {
    this.chain.transact(() => this.updateAllPools());
  }

  updatePool(pid: number): void {
    this.chain.transact(() => this.accrue(pid));
  }

  // ============================================
  // STAKING
  // ============================================

  /**
   * Settles pending rewards, then stakes `amount`. The sender must have
   * approved the pool for `amount`.
   */
  deposit(sender: Address, pid: number, amount: bigint): void {
    this.chain.transact(() => {
      const account = normalizeAddress(sender);
      const pool = this.accrue(pid);
      const info = this.user(pid, account);

      if (info.amount > 0n) {
        this.settle(account, info, pool);
      }
      if (amount > 0n) {
        this.poolToken(pid).transferFrom(this.address, account, this.address, amount);
        info.amount = add(info.amount, amount);
      }
      info.rewardDebt = mulDiv(info.amount, pool.accRewardPerShare, WAD);
      this.state.users.set(this.userKey(pid, account), info);

      this.record({ type: "Deposit", user: account, pid, amount });
    });
  }

  /**
   * Settles pending rewards, then unstakes `amount`
   */
  withdraw(sender: Address, pid: number, amount: bigint): void {
    this.chain.transact(() => {
      const account = normalizeAddress(sender);
      this.pool(pid);
      const info = this.user(pid, account);
      ensure(info.amount >= amount, "withdraw: not good");

      const pool = this.accrue(pid);
      this.settle(account, info, pool);

      if (amount > 0n) {
        info.amount -= amount;
        this.poolToken(pid).transfer(this.address, account, amount);
      }
      info.rewardDebt = mulDiv(info.amount, pool.accRewardPerShare, WAD);
      this.state.users.set(this.userKey(pid, account), info);

      this.record({ type: "Withdraw", user: account, pid, amount });
    });
  }

  /**
   * Returns the principal and forfeits pending rewards
   */
  emergencyWithdraw(sender: Address, pid: number): void {
    this.chain.transact(() => {
      const account = normalizeAddress(sender);
      this.pool(pid);
      const amount = this.user(pid, account).amount;

      this.state.users.set(this.userKey(pid, account), { amount: 0n, rewardDebt: 0n });
      this.poolToken(pid).transfer(this.address, account, amount);

      this.record({ type: "EmergencyWithdraw", user: account, pid, amount });
    });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private updateAllPools(): void {
    for (let pid = 0; pid < this.state.pools.length; pid++) {
      this.accrue(pid);
    }
  }

  /**
   * Brings one pool's accumulator up to now
   */
  private accrue(pid: number): PoolInfo {
    const pool = this.pool(pid);
    const now = this.chain.timestamp;
    if (now <= pool.lastRewardTime) return pool;

    const tokenSupply = this.stakedSupply(pid);
    if (tokenSupply === 0n) {
      pool.lastRewardTime = now;
      return pool;
    }

    if (!pool.isStarted) {
      pool.isStarted = true;
      this.state.totalAllocPoint = add(this.state.totalAllocPoint, pool.allocPoint);
    }

    if (this.state.totalAllocPoint > 0n) {
      const generated = this.schedule.generatedReward(pool.lastRewardTime, now);
      const reward = mulDiv(generated, pool.allocPoint, this.state.totalAllocPoint);
      pool.accRewardPerShare = add(pool.accRewardPerShare, mulDiv(reward, WAD, tokenSupply));
    }

    pool.lastRewardTime = now;
    return pool;
  }

  private settle(account: Address, info: UserInfo, pool: PoolInfo): void {
    const pending = sub(mulDiv(info.amount, pool.accRewardPerShare, WAD), info.rewardDebt);
    if (pending > 0n) {
      this.safeRewardTransfer(account, pending);
      this.record({ type: "RewardPaid", user: account, amount: pending });
    }
  }

  /**
   * Pays min(amount, reward balance); a shortfall truncates the payout
   */
  private safeRewardTransfer(to: Address, amount: bigint): void {
    const balance = this.rewardToken.balanceOf(this.address);
    if (balance === 0n) {
      poolLogger.warn({ to, owed: amount.toString() }, "Reward balance empty, payout skipped");
      return;
    }

    const paid = amount > balance ? balance : amount;
    if (paid < amount) {
      poolLogger.warn({ to, owed: amount.toString(), paid: paid.toString() }, "Reward payout truncated");
    }
    this.rewardToken.transfer(this.address, to, paid);
  }

  private stakedSupply(pid: number): bigint {
    return this.poolToken(pid).balanceOf(this.address);
  }

  private checkPoolDuplicate(token: Erc20): void {
    for (const pool of this.state.pools) {
      ensure(!isSameAddress(pool.token, token.address), "RewardPool: existing pool?");
    }
  }

  private pool(pid: number): PoolInfo {
    const pool = this.state.pools[pid];
    if (!pool) {
      throw new PreconditionViolationError(`RewardPool: unknown pool ${pid}`);
    }
    return pool;
  }

  private poolToken(pid: number): Erc20 {
    const token = this.poolTokens[pid];
    if (!token) {
      throw new PreconditionViolationError(`RewardPool: unknown pool ${pid}`);
    }
    return token;
  }

  private user(pid: number, account: Address): UserInfo {
    return this.state.users.get(this.userKey(pid, account)) ?? { amount: 0n, rewardDebt: 0n };
  }

  private userKey(pid: number, account: Address): string {
    return `${pid}:${normalizeAddress(account)}`;
  }

  private onlyOperator(caller: Address): void {
    if (!isSameAddress(caller, this.state.operator)) {
      throw new AuthorizationError("RewardPool: caller is not the operator", caller);
    }
  }

  private auditOnCommit(caller: Address, action: string, details: Record<string, unknown>): void {
    this.chain.afterCommit(() => {
      audit({ action, entityType: "reward-pool", entityId: this.address, actor: caller, details });
    });
  }

  private record(event: RewardPoolEvent): void {
    this.chain.afterCommit(() => {
      this.history.push(event);
      this.emit("event", event);
    });
  }
}

/**
 * Factory function
 */
export function createRewardPool(options: RewardPoolOptions): RewardPool {
  return new RewardPool(options);
}
