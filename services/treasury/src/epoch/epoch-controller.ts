/**
 * Epoch Controller
 *
 * Gates epoch-bound entry points:
 * - checkCondition: the treasury has started
 * - checkEpoch: the next epoch point has been reached
 * - Epoch transition: epoch += 1, then the contraction budget is recomputed
 */

import { treasuryLogger as logger, ensure } from "@seigniorage/shared";
import type { TreasuryState } from "../types.js";

const epochLogger = logger.child({ component: "epoch-controller" });

export type EpochState = Pick<
  TreasuryState,
  "startTime" | "periodSeconds" | "epoch" | "epochSupplyContractionLeft"
>;

// ============================================
// EPOCH CONTROLLER
// ============================================

export class EpochController {
  /**
   * startTime + epoch * PERIOD
   */
  nextEpochPoint(state: EpochState): bigint {
    return state.startTime + state.epoch * state.periodSeconds;
  }

  /**
   * checkCondition
   */
  assertStarted(state: EpochState, now: bigint): void {
    ensure(now >= state.startTime, "Treasury: not started yet");
  }

  /**
   * checkEpoch precondition
   */
  assertEpochOpen(state: EpochState, now: bigint): void {
    ensure(now >= this.nextEpochPoint(state), "Treasury: not opened yet");
  }

  /**
   * Runs the body of an epoch-gated call, then closes the epoch.
   * closeBudget is evaluated after the increment and may throw, which
   * aborts the whole call.
   */
  runEpoch<T>(state: EpochState, now: bigint, body: () => T, closeBudget: () => bigint): T {
    this.assertEpochOpen(state, now);

    const result = body();

    state.epoch += 1n;
    state.epochSupplyContractionLeft = closeBudget();

    epochLogger.info({
      epoch: state.epoch.toString(),
      nextEpochPoint: this.nextEpochPoint(state).toString(),
      contractionLeft: state.epochSupplyContractionLeft.toString(),
    }, "Epoch advanced");

    return result;
  }
}

/**
 * Factory function
 */
export function createEpochController(): EpochController {
  return new EpochController();
}
