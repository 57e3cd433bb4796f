/**
 * Oracle Gateway Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  InMemoryChain,
  MAX_UINT144,
  OracleFailureError,
  WAD,
  createInMemoryChain,
  deriveAddress,
} from "@seigniorage/shared";
import { OracleGateway, createOracleGateway } from "../oracle/oracle-gateway.js";
import { MockPriceOracle, createMockPriceOracle } from "../oracle/mock-price-oracle.js";

const peg = deriveAddress("peg");

describe("OracleGateway", () => {
  let chain: InMemoryChain;
  let oracle: MockPriceOracle;
  let gateway: OracleGateway;

  beforeEach(() => {
    chain = createInMemoryChain();
    oracle = chain.register(
      createMockPriceOracle({ address: deriveAddress("oracle"), token: peg, price: WAD, twapPrice: (WAD * 99n) / 100n })
    );
    gateway = createOracleGateway(chain);
  });

  it("should read consult and twap prices", () => {
    expect(gateway.tryConsult(oracle, peg)).toEqual({ ok: true, value: WAD });
    expect(gateway.getPrice(oracle, peg)).toBe(WAD);
    expect(gateway.getUpdatedPrice(oracle, peg)).toBe(990_000_000_000_000_000n);
  });

  it("should surface a consult failure as a Result", () => {
    oracle.setFailures({ failConsult: true });
    const result = gateway.tryConsult(oracle, peg);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(OracleFailureError);
      expect(result.error.message).toBe("Treasury: failed to consult peg price from the oracle");
      expect(result.error.underlying?.message).toBe("Oracle: consult unavailable");
    }
  });

  it("should hard fail on consult and twap failures", () => {
    oracle.setFailures({ failConsult: true, failTwap: true });
    expect(() => gateway.getPrice(oracle, peg)).toThrow(OracleFailureError);
    expect(() => gateway.getUpdatedPrice(oracle, peg)).toThrow(
      "Treasury: failed to consult peg price from the oracle"
    );
  });

  it("should treat a price beyond uint144 as a failure", () => {
    oracle.setPrice(MAX_UINT144 + 1n);
    expect(gateway.tryConsult(oracle, peg).ok).toBe(false);
    expect(() => gateway.getPrice(oracle, peg)).toThrow(OracleFailureError);
  });

  it("should update the oracle", () => {
    gateway.refreshPrice(oracle);
    expect(oracle.getUpdateCount()).toBe(1);
  });

  it("should swallow update failures and revert their partial effects", () => {
    oracle.setFailures({ failUpdate: true });
    expect(() => gateway.refreshPrice(oracle)).not.toThrow();
    expect(oracle.getUpdateCount()).toBe(0);
  });
});
