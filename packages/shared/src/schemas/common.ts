/**
 * Common Schema Primitives
 * Shared validators used by every configuration schema
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import { MAX_UINT256 } from "../constants/index.js";

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/** EVM address, normalized to its checksum form */
export const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

/** Unsigned 256-bit integer */
export const uint256Schema = z
  .bigint()
  .gte(0n, "Value must be non-negative")
  .lte(MAX_UINT256, "Value exceeds uint256");

/**
 * Unsigned integer from a bigint, a decimal string or a safe integer.
 * Strings keep precision for 18-decimal amounts read from env or JSON.
 */
export const uintInputSchema = z
  .union([
    z.bigint(),
    z.string().regex(/^\d+$/, "Amount must be a numeric string").transform((value) => BigInt(value)),
    z.number().int().nonnegative().transform((value) => BigInt(value)),
  ])
  .pipe(uint256Schema);

/**
 * Bounded integer rule, e.g. basisPointsSchema(10n, 1000n) for [0.1%, 10%]
 */
export function boundedUintSchema(minimum: bigint, maximum: bigint, message = "out of range") {
  return z.bigint().gte(minimum, message).lte(maximum, message);
}

// ============================================
// COMMON ENUMS
// ============================================

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logFormatSchema = z.enum(["json", "pretty"]);
export type LogFormat = z.infer<typeof logFormatSchema>;
