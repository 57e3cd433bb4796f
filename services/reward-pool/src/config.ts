/**
 * Reward Pool Configuration
 */

import { z } from "zod";
import { uint256Schema, uintInputSchema } from "@seigniorage/shared";
import {
  DEFAULT_EPOCH_DURATIONS,
  DEFAULT_EPOCH_TOTAL_REWARDS,
  type EmissionScheduleConfig,
} from "./types.js";

// ============================================
// REWARD POOL CONFIG SCHEMA
// ============================================

export const rewardPoolConfigSchema = z
  .object({
    poolStartTime: uintInputSchema,
    epochTotalRewards: z.array(uintInputSchema).min(1),
    epochDurations: z.array(uintInputSchema.pipe(uint256Schema.gt(0n, "epoch duration must be positive"))).min(1),
  })
  .refine(
    (config) => config.epochTotalRewards.length === config.epochDurations.length,
    { message: "one duration per epoch total", path: ["epochDurations"] }
  );

export type RewardPoolConfigInput = z.input<typeof rewardPoolConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

/**
 * Validated emission schedule; totals and durations default to
 * 80,000 over 4 days then 60,000 over 5 days
 */
export function loadEmissionScheduleConfig(
  input: Pick<RewardPoolConfigInput, "poolStartTime"> & Partial<RewardPoolConfigInput>
): EmissionScheduleConfig {
  return rewardPoolConfigSchema.parse({
    poolStartTime: input.poolStartTime,
    epochTotalRewards: input.epochTotalRewards ?? [...DEFAULT_EPOCH_TOTAL_REWARDS],
    epochDurations: input.epochDurations ?? [...DEFAULT_EPOCH_DURATIONS],
  });
}
