/**
 * Emission Schedule Tests
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { TIME, WAD } from "@seigniorage/shared";
import { createEmissionSchedule } from "../emission-schedule.js";
import { loadEmissionScheduleConfig } from "../config.js";

const START = 1_000_000n;
const DAY = TIME.DAY;

// 80,000 over 4 days, then 60,000 over 5 days
const R0 = 231_481_481_481_481_481n;
const R1 = 138_888_888_888_888_888n;

function defaultSchedule() {
  return createEmissionSchedule(loadEmissionScheduleConfig({ poolStartTime: START }));
}

// ============================================
// SCHEDULE LAYOUT TESTS
// ============================================

describe("EmissionSchedule layout", () => {
  it("should derive epoch ends and per-second rates", () => {
    const schedule = defaultSchedule();

    expect(schedule.epochEndTimes).toEqual([START + 4n * DAY, START + 9n * DAY]);
    expect(schedule.ratesPerSecond).toEqual([R0, R1, 0n]);
    expect(schedule.lastEpochEnd).toBe(START + 9n * DAY);
  });

  it("should report the rate in effect at a timestamp", () => {
    const schedule = defaultSchedule();

    expect(schedule.rateAt(START - 1n)).toBe(R0);
    expect(schedule.rateAt(START + 4n * DAY - 1n)).toBe(R0);
    expect(schedule.rateAt(START + 4n * DAY)).toBe(R1);
    expect(schedule.rateAt(START + 9n * DAY)).toBe(0n);
  });
});

// ============================================
// GENERATED REWARD TESTS
// ============================================

describe("EmissionSchedule.generatedReward", () => {
  it("should integrate within a single epoch", () => {
    expect(defaultSchedule().generatedReward(START, START + DAY)).toBe(DAY * R0);
  });

  it("should split an interval at the epoch boundary", () => {
    const schedule = defaultSchedule();

    expect(schedule.generatedReward(START + 3n * DAY, START + 6n * DAY)).toBe(DAY * R0 + 2n * DAY * R1);
    expect(schedule.generatedReward(START + 3n * DAY, START + 6n * DAY)).toBe(43_999_999_999_999_999_804_800n);
  });

  it("should emit just under the configured totals over the whole schedule", () => {
    const total = defaultSchedule().generatedReward(START, START + 9n * DAY);

    expect(total).toBe(139_999_999_999_999_999_449_600n);
    expect(total).toBeLessThanOrEqual(140_000n * WAD);
  });

  it("should charge time before the pool start at the first rate", () => {
    expect(defaultSchedule().generatedReward(START - 100n, START + DAY)).toBe((DAY + 100n) * R0);
  });

  it("should stop emitting after the last epoch", () => {
    const schedule = defaultSchedule();

    expect(schedule.generatedReward(START + 9n * DAY, START + 10n * DAY)).toBe(0n);
    expect(schedule.generatedReward(START + 8n * DAY, START + 30n * DAY)).toBe(DAY * R1);
  });

  it("should be zero for empty or reversed intervals", () => {
    const schedule = defaultSchedule();

    expect(schedule.generatedReward(START + DAY, START + DAY)).toBe(0n);
    expect(schedule.generatedReward(START + 2n * DAY, START + DAY)).toBe(0n);
  });

  it("should be additive over adjacent intervals", () => {
    const schedule = defaultSchedule();
    const points = [START - 50n, START + 1234n, START + 4n * DAY, START + 5n * DAY + 7n, START + 12n * DAY];

    for (let i = 1; i < points.length - 1; i++) {
      const [a, b, c] = [points[0] ?? 0n, points[i] ?? 0n, points[points.length - 1] ?? 0n];
      expect(schedule.generatedReward(a, b) + schedule.generatedReward(b, c)).toBe(schedule.generatedReward(a, c));
    }
  });

  it("should follow a custom three-epoch schedule", () => {
    const schedule = createEmissionSchedule(
      loadEmissionScheduleConfig({
        poolStartTime: START,
        epochTotalRewards: ["100", "200", "300"],
        epochDurations: [10, 20, 30],
      })
    );

    expect(schedule.ratesPerSecond).toEqual([10n, 10n, 10n, 0n]);
    expect(schedule.generatedReward(START, START + 100n)).toBe(600n);
  });
});

// ============================================
// CONFIGURATION TESTS
// ============================================

describe("loadEmissionScheduleConfig", () => {
  it("should apply the default totals and durations", () => {
    expect(loadEmissionScheduleConfig({ poolStartTime: "42" })).toEqual({
      poolStartTime: 42n,
      epochTotalRewards: [80_000n * WAD, 60_000n * WAD],
      epochDurations: [4n * DAY, 5n * DAY],
    });
  });

  it("should require one duration per epoch total", () => {
    expect(() =>
      loadEmissionScheduleConfig({ poolStartTime: START, epochTotalRewards: [1n, 2n], epochDurations: [1n] })
    ).toThrow("one duration per epoch total");
  });

  it("should reject zero durations", () => {
    expect(() =>
      loadEmissionScheduleConfig({ poolStartTime: START, epochTotalRewards: [1n], epochDurations: [0n] })
    ).toThrow(ZodError);
  });
});
