/**
 * In-Memory Chain Tests
 *
 * Tests for the ledger substrate:
 * - Block clock
 * - Atomic transactions and savepoints
 * - Commit hooks
 * - Basis asset token
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  AuthorizationError,
  CHAIN_DEFAULTS,
  InMemoryChain,
  MemoryBasisAsset,
  PreconditionViolationError,
  createInMemoryChain,
  createMemoryToken,
  deriveAddress,
  isSameAddress,
  zeroAddress,
} from "../index.js";

const operator = deriveAddress("operator");
const alice = deriveAddress("alice");
const bob = deriveAddress("bob");

// ============================================
// BLOCK CLOCK TESTS
// ============================================

describe("InMemoryChain clock", () => {
  let chain: InMemoryChain;

  beforeEach(() => {
    chain = createInMemoryChain();
  });

  it("should start at genesis", () => {
    expect(chain.timestamp).toBe(CHAIN_DEFAULTS.genesisTimestamp);
    expect(chain.blockNumber).toBe(CHAIN_DEFAULTS.genesisBlockNumber);
  });

  it("should mine blocks with the default block time", () => {
    chain.mine();
    expect(chain.timestamp).toBe(CHAIN_DEFAULTS.genesisTimestamp + 2n);
    expect(chain.blockNumber).toBe(2n);
  });

  it("should advance time by one block", () => {
    chain.advanceTime(100n);
    expect(chain.timestamp).toBe(CHAIN_DEFAULTS.genesisTimestamp + 100n);
    expect(chain.blockNumber).toBe(2n);
  });

  it("should mine at an exact timestamp", () => {
    chain.setNextBlockTimestamp(CHAIN_DEFAULTS.genesisTimestamp + 500n);
    expect(chain.timestamp).toBe(CHAIN_DEFAULTS.genesisTimestamp + 500n);
  });

  it("should refuse to move time backwards", () => {
    expect(() => chain.setNextBlockTimestamp(CHAIN_DEFAULTS.genesisTimestamp - 1n)).toThrow(
      PreconditionViolationError
    );
    expect(() => chain.mine(-1n)).toThrow("Chain: time cannot go backwards");
  });
});

// ============================================
// TRANSACTION TESTS
// ============================================

describe("InMemoryChain transactions", () => {
  let chain: InMemoryChain;
  let token: MemoryBasisAsset;

  beforeEach(() => {
    chain = createInMemoryChain();
    token = chain.register(
      createMemoryToken({ address: deriveAddress("peg"), symbol: "PEG", operator })
    );
  });

  it("should commit state when the body succeeds", () => {
    const result = chain.transact(() => {
      token.mint(operator, alice, 10n);
      return "done";
    });

    expect(result).toBe("done");
    expect(token.balanceOf(alice)).toBe(10n);
    expect(chain.inTransaction).toBe(false);
  });

  it("should roll back every participant when the body throws", () => {
    expect(() =>
      chain.transact(() => {
        token.mint(operator, alice, 10n);
        throw new Error("boom");
      })
    ).toThrow("boom");

    expect(token.balanceOf(alice)).toBe(0n);
    expect(token.totalSupply()).toBe(0n);
  });

  it("should restore only to the savepoint when a nested call fails", () => {
    chain.transact(() => {
      token.mint(operator, alice, 10n);
      try {
        chain.transact(() => {
          token.mint(operator, alice, 5n);
          throw new Error("inner");
        });
      } catch {
        // the outer call continues
      }
    });

    expect(token.balanceOf(alice)).toBe(10n);
  });

  it("should run commit hooks only after the outermost commit", () => {
    const hook = vi.fn();

    chain.transact(() => {
      chain.transact(() => chain.afterCommit(hook));
      expect(hook).not.toHaveBeenCalled();
    });

    expect(hook).toHaveBeenCalledTimes(1);
  });

  it("should drop commit hooks of a reverted transaction", () => {
    const hook = vi.fn();

    expect(() =>
      chain.transact(() => {
        chain.transact(() => chain.afterCommit(hook));
        throw new Error("outer");
      })
    ).toThrow("outer");

    expect(hook).not.toHaveBeenCalled();
  });

  it("should run hooks immediately outside a transaction", () => {
    const hook = vi.fn();
    chain.afterCommit(hook);
    expect(hook).toHaveBeenCalledTimes(1);
  });
});

// ============================================
// BASIS ASSET TESTS
// ============================================

describe("MemoryBasisAsset", () => {
  let token: MemoryBasisAsset;

  beforeEach(() => {
    token = createMemoryToken({ address: deriveAddress("peg"), symbol: "PEG", operator });
    token.mint(operator, alice, 100n);
  });

  it("should only let the operator mint", () => {
    expect(() => token.mint(alice, alice, 1n)).toThrow(AuthorizationError);
    expect(() => token.mint(operator, zeroAddress, 1n)).toThrow("ERC20: mint to the zero address");
  });

  it("should report whether a mint increased the balance", () => {
    expect(token.mint(operator, bob, 1n)).toBe(true);
    expect(token.mint(operator, bob, 0n)).toBe(false);
  });

  it("should transfer and reject overdrafts", () => {
    token.transfer(alice, bob, 40n);
    expect(token.balanceOf(alice)).toBe(60n);
    expect(token.balanceOf(bob)).toBe(40n);
    expect(() => token.transfer(alice, bob, 61n)).toThrow("ERC20: transfer amount exceeds balance");
  });

  it("should spend allowance on transferFrom", () => {
    token.approve(alice, bob, 30n);
    token.transferFrom(bob, alice, bob, 20n);

    expect(token.allowance(alice, bob)).toBe(10n);
    expect(token.balanceOf(bob)).toBe(20n);
    expect(() => token.transferFrom(bob, alice, bob, 11n)).toThrow(
      "ERC20: transfer amount exceeds allowance"
    );
  });

  it("should burn from an account that approved the operator", () => {
    expect(() => token.burnFrom(operator, alice, 10n)).toThrow("ERC20: burn amount exceeds allowance");

    token.approve(alice, operator, 10n);
    token.burnFrom(operator, alice, 10n);

    expect(token.balanceOf(alice)).toBe(90n);
    expect(token.totalSupply()).toBe(90n);
    expect(token.allowance(alice, operator)).toBe(0n);
  });

  it("should transfer the operator role", () => {
    token.transferOperator(operator, bob);
    expect(isSameAddress(token.operator(), bob)).toBe(true);
    expect(() => token.mint(operator, alice, 1n)).toThrow(AuthorizationError);
  });
});
