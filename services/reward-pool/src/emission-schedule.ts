/**
 * Emission Schedule
 *
 * Piecewise-constant reward rate over consecutive epochs:
 * - Epoch i ends at epochEndTimes[i] and emits ratesPerSecond[i]
 * - The first rate also covers any time before the first epoch end
 * - After the last epoch end the rate is 0
 */

import { rewardPoolLogger as logger, div, ensure, formatWad, max, min } from "@seigniorage/shared";
import type { EmissionScheduleConfig } from "./types.js";

const scheduleLogger = logger.child({ component: "emission-schedule" });

export class EmissionSchedule {
  readonly poolStartTime: bigint;
  readonly epochEndTimes: readonly bigint[];
  /** One rate per epoch plus the terminal rate 0 */
  readonly ratesPerSecond: readonly bigint[];

  constructor(config: EmissionScheduleConfig) {
    ensure(
      config.epochTotalRewards.length === config.epochDurations.length && config.epochDurations.length > 0,
      "EmissionSchedule: one duration per epoch total"
    );

    const endTimes: bigint[] = [];
    const rates: bigint[] = [];
    let end = config.poolStartTime;

    config.epochDurations.forEach((duration, index) => {
      ensure(duration > 0n, "EmissionSchedule: epoch duration must be positive");
      end += duration;
      endTimes.push(end);
      rates.push(div(config.epochTotalRewards[index] ?? 0n, duration));
    });
    rates.push(0n);

    this.poolStartTime = config.poolStartTime;
    this.epochEndTimes = endTimes;
    this.ratesPerSecond = rates;

    scheduleLogger.debug({
      poolStartTime: config.poolStartTime.toString(),
      epochEndTimes: endTimes.map(String),
      ratesPerSecond: rates.map((rate) => formatWad(rate)),
    }, "Emission schedule built");
  }

  /**
   * End of the last emitting epoch
   */
  get lastEpochEnd(): bigint {
    return this.epochEndTimes[this.epochEndTimes.length - 1] ?? this.poolStartTime;
  }

  /**
   * Reward emitted over [from, to); 0 when to <= from
   */
  generatedReward(from: bigint, to: bigint): bigint {
    if (to <= from) return 0n;

    let total = 0n;
    let segmentStart = from;

    for (let index = 0; index < this.ratesPerSecond.length; index++) {
      const segmentEnd = this.epochEndTimes[index];
      const rate = this.ratesPerSecond[index] ?? 0n;

      // Last segment is open-ended
      const overlapEnd = segmentEnd === undefined ? to : min(to, segmentEnd);
      const overlapStart = max(from, segmentStart);

      if (overlapEnd > overlapStart) {
        total += (overlapEnd - overlapStart) * rate;
      }
      if (segmentEnd === undefined || to <= segmentEnd) break;
      segmentStart = segmentEnd;
    }

    return total;
  }

  /**
   * Rate in effect at `timestamp`
   */
  rateAt(timestamp: bigint): bigint {
    const index = this.epochEndTimes.findIndex((end) => timestamp < end);
    return index === -1 ? 0n : (this.ratesPerSecond[index] ?? 0n);
  }
}

/**
 * Factory function
 */
export function createEmissionSchedule(config: EmissionScheduleConfig): EmissionSchedule {
  return new EmissionSchedule(config);
}
