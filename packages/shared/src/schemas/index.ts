/**
 * Seigniorage Zod Schemas
 * Validation schemas for configuration and inputs
 */

import { z } from "zod";
import { logFormatSchema, logLevelSchema } from "./common.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

export const envSchema = z.object({
  // Logging
  LOG_LEVEL: logLevelSchema.default("info"),
  LOG_FORMAT: logFormatSchema.default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
