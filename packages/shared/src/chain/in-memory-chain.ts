/**
 * In-Memory Chain
 *
 * A single serialized ledger:
 * - Block clock (timestamp, block number)
 * - Atomic transactions with nested savepoints
 * - Commit hooks for publishing events only after success
 */

import { chainLogger as logger } from "../logger/index.js";
import { CHAIN_DEFAULTS } from "../constants/index.js";
import { PreconditionViolationError } from "../errors/index.js";
import type { Checkpointable } from "../types/index.js";

const log = logger.child({ component: "in-memory-chain" });

// ============================================
// CONFIGURATION
// ============================================

export interface ChainConfig {
  genesisTimestamp: bigint;
  genesisBlockNumber: bigint;
  blockTimeSeconds: bigint;
}

export const DEFAULT_CHAIN_CONFIG: ChainConfig = {
  genesisTimestamp: CHAIN_DEFAULTS.genesisTimestamp,
  genesisBlockNumber: CHAIN_DEFAULTS.genesisBlockNumber,
  blockTimeSeconds: CHAIN_DEFAULTS.blockTimeSeconds,
};

// ============================================
// IN-MEMORY CHAIN
// ============================================

export class InMemoryChain {
  private readonly config: ChainConfig;
  private readonly participants: Checkpointable[] = [];

  // One frame of pending commit hooks per open transaction
  private readonly hookFrames: Array<Array<() => void>> = [];

  private currentTimestamp: bigint;
  private currentBlockNumber: bigint;

  constructor(config?: Partial<ChainConfig>) {
    this.config = { ...DEFAULT_CHAIN_CONFIG, ...config };
    this.currentTimestamp = this.config.genesisTimestamp;
    this.currentBlockNumber = this.config.genesisBlockNumber;

    log.debug({
      genesisTimestamp: this.currentTimestamp.toString(),
      genesisBlock: this.currentBlockNumber.toString(),
    }, "InMemoryChain initialized");
  }

  get timestamp(): bigint {
    return this.currentTimestamp;
  }

  get blockNumber(): bigint {
    return this.currentBlockNumber;
  }

  get inTransaction(): boolean {
    return this.hookFrames.length > 0;
  }

  /**
   * Registers state that must roll back when a transaction aborts
   */
  register<T extends Checkpointable>(participant: T): T {
    this.participants.push(participant);
    return participant;
  }

  // ============================================
  // BLOCK CLOCK
  // ============================================

  /**
   * Produces the next block, `seconds` after the current one
   */
  mine(seconds: bigint = this.config.blockTimeSeconds): void {
    if (seconds < 0n) {
      throw new PreconditionViolationError("Chain: time cannot go backwards");
    }
    this.currentTimestamp += seconds;
    this.currentBlockNumber += 1n;
  }

  /**
   * Moves time forward and mines a block at the new timestamp
   */
  advanceTime(seconds: bigint): void {
    this.mine(seconds);
  }

  /**
   * Mines the next block at an exact timestamp
   */
  setNextBlockTimestamp(timestamp: bigint): void {
    if (timestamp < this.currentTimestamp) {
      throw new PreconditionViolationError(
        `Chain: timestamp ${timestamp} is before current ${this.currentTimestamp}`
      );
    }
    this.mine(timestamp - this.currentTimestamp);
  }

  // ============================================
  // TRANSACTIONS
  // ============================================

  /**
   * Runs fn atomically. On any thrown error every registered participant
   * is restored and the error is rethrown. Nested calls act as savepoints.
   */
  transact<T>(fn: () => T): T {
    const restores = this.participants.map((participant) => participant.checkpoint());
    this.hookFrames.push([]);

    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.hookFrames.pop();
      for (let i = restores.length - 1; i >= 0; i--) {
        restores[i]();
      }

      log.debug({
        blockNumber: this.currentBlockNumber.toString(),
        depth: this.hookFrames.length,
        reason: error instanceof Error ? error.message : String(error),
      }, "Transaction reverted");

      throw error;
    }

    const hooks = this.hookFrames.pop() ?? [];
    const parent = this.hookFrames[this.hookFrames.length - 1];
    if (parent) {
      parent.push(...hooks);
    } else {
      for (const hook of hooks) {
        hook();
      }
    }

    return result;
  }

  /**
   * Defers a callback until the outermost transaction commits.
   * Outside a transaction it runs immediately.
   */
  afterCommit(hook: () => void): void {
    const frame = this.hookFrames[this.hookFrames.length - 1];
    if (frame) {
      frame.push(hook);
    } else {
      hook();
    }
  }
}

/**
 * Factory function
 */
export function createInMemoryChain(config?: Partial<ChainConfig>): InMemoryChain {
  return new InMemoryChain(config);
}
