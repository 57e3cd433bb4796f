/**
 * Fixed-Point Math Tests
 */

import { describe, it, expect } from "vitest";
import {
  ArithmeticError,
  MAX_UINT256,
  WAD,
  add,
  assertUint256,
  div,
  formatWad,
  max,
  min,
  mul,
  mulDiv,
  parseWad,
  percentOf,
  sub,
  wadDiv,
  wadMul,
} from "../index.js";

describe("checked primitives", () => {
  it("should add and reject uint256 overflow", () => {
    expect(add(2n, 3n)).toBe(5n);
    expect(() => add(MAX_UINT256, 1n)).toThrow("SafeMath: addition overflow");
  });

  it("should reject subtraction below zero", () => {
    expect(sub(5n, 5n)).toBe(0n);
    expect(() => sub(1n, 2n)).toThrow(ArithmeticError);
    expect(() => sub(1n, 2n)).toThrow("SafeMath: subtraction overflow");
  });

  it("should reject multiplication overflow", () => {
    expect(mul(WAD, 3n)).toBe(3n * WAD);
    expect(() => mul(MAX_UINT256, 2n)).toThrow("SafeMath: multiplication overflow");
  });

  it("should round division toward zero and reject division by zero", () => {
    expect(div(7n, 2n)).toBe(3n);
    expect(() => div(1n, 0n)).toThrow("SafeMath: division by zero");
  });

  it("should tag the failing operation", () => {
    try {
      div(1n, 0n);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArithmeticError);
      if (error instanceof ArithmeticError) {
        expect(error.operation).toBe("div");
        expect(error.code).toBe("ARITHMETIC_FAILURE");
      }
    }
  });

  it("should validate uint256 range", () => {
    expect(assertUint256(MAX_UINT256)).toBe(MAX_UINT256);
    expect(() => assertUint256(-1n)).toThrow(ArithmeticError);
    expect(() => assertUint256(MAX_UINT256 + 1n)).toThrow(ArithmeticError);
  });

  it("should pick min and max", () => {
    expect(min(3n, 9n)).toBe(3n);
    expect(max(3n, 9n)).toBe(9n);
  });
});

describe("scaled helpers", () => {
  it("should compute mulDiv with integer truncation", () => {
    expect(mulDiv(3n * WAD, 2n * WAD, WAD)).toBe(6n * WAD);
    expect(mulDiv(10n, 1n, 3n)).toBe(3n);
  });

  it("should apply basis points", () => {
    expect(percentOf(1000n, 250n)).toBe(25n);
    expect(percentOf(6_000_000n * WAD, 300n)).toBe(180_000n * WAD);
  });

  it("should multiply and divide 18-decimal values", () => {
    expect(wadMul(WAD / 2n, 3n * WAD)).toBe(1_500_000_000_000_000_000n);
    expect(wadDiv(WAD, 3n * WAD)).toBe(333_333_333_333_333_333n);
  });

  it("should format and parse 18-decimal values", () => {
    expect(formatWad(1_010_000_000_000_000_000n)).toBe("1.01");
    expect(parseWad("1.01")).toBe(1_010_000_000_000_000_000n);
    expect(formatWad(0n)).toBe("0");
  });
});
