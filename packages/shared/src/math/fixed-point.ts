/**
 * Fixed-Point Math
 *
 * Unsigned 256-bit arithmetic over 18-decimal fixed-point values.
 * Every operation rejects results outside [0, 2^256 - 1], so a value that
 * passes through these helpers is always a valid on-chain word.
 */

import { formatUnits, parseUnits } from "viem";
import { ArithmeticError } from "../errors/index.js";
import {
  BPS_DENOMINATOR,
  DECIMALS,
  MAX_UINT256,
  WAD,
} from "../constants/index.js";

// ============================================
// CHECKED PRIMITIVES
// ============================================

/**
 * Asserts that a value fits an unsigned 256-bit word
 */
export function assertUint256(value: bigint, label = "value"): bigint {
  if (value < 0n) {
    throw new ArithmeticError(`${label} is negative: ${value}`, "sub");
  }
  if (value > MAX_UINT256) {
    throw new ArithmeticError(`${label} exceeds uint256: ${value}`, "mul");
  }
  return value;
}

export function add(a: bigint, b: bigint): bigint {
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new ArithmeticError("SafeMath: addition overflow", "add");
  }
  return result;
}

export function sub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new ArithmeticError("SafeMath: subtraction overflow", "sub");
  }
  return a - b;
}

export function mul(a: bigint, b: bigint): bigint {
  const result = a * b;
  if (result > MAX_UINT256) {
    throw new ArithmeticError("SafeMath: multiplication overflow", "mul");
  }
  return result;
}

/**
 * Integer division rounding toward zero
 */
export function div(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new ArithmeticError("SafeMath: division by zero", "div");
  }
  return a / b;
}

/**
 * a * b / denominator, with the intermediate product overflow-checked
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return div(mul(a, b), denominator);
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ============================================
// SCALED HELPERS
// ============================================

/**
 * Applies a basis-point percentage (10000 = 100%) to an amount
 */
export function percentOf(amount: bigint, basisPoints: bigint): bigint {
  return mulDiv(amount, basisPoints, BPS_DENOMINATOR);
}

export function wadMul(a: bigint, b: bigint): bigint {
  return mulDiv(a, b, WAD);
}

export function wadDiv(a: bigint, b: bigint): bigint {
  return mulDiv(a, WAD, b);
}

// ============================================
// FORMATTING
// ============================================

/**
 * Renders an 18-decimal value for logs, e.g. 1010000000000000000n -> "1.01"
 */
export function formatWad(value: bigint): string {
  return formatUnits(value, DECIMALS);
}

/**
 * Parses a decimal string into an 18-decimal value
 */
export function parseWad(value: string): bigint {
  return parseUnits(value, DECIMALS);
}
