/**
 * Mock Price Oracle
 *
 * In-process oracle with settable prices and failure switches.
 */

import type { Address } from "viem";
import {
  treasuryLogger as logger,
  OracleFailureError,
  WAD,
  mulDiv,
  normalizeAddress,
  type Checkpointable,
} from "@seigniorage/shared";
import type { PriceOracle } from "../types.js";

const mockLogger = logger.child({ component: "mock-price-oracle" });

export interface MockPriceOracleConfig {
  address: Address;
  token: Address;
  price: bigint;
  twapPrice?: bigint;
}

interface MockOracleState {
  price: bigint;
  twapPrice: bigint;
  updateCount: number;
  failConsult: boolean;
  failTwap: boolean;
  failUpdate: boolean;
}

export class MockPriceOracle implements PriceOracle, Checkpointable {
  readonly address: Address;
  private readonly token: Address;
  private state: MockOracleState;

  constructor(config: MockPriceOracleConfig) {
    this.address = normalizeAddress(config.address);
    this.token = normalizeAddress(config.token);
    this.state = {
      price: config.price,
      twapPrice: config.twapPrice ?? config.price,
      updateCount: 0,
      failConsult: false,
      failTwap: false,
      failUpdate: false,
    };
  }

  checkpoint(): () => void {
    const saved = { ...this.state };
    return () => {
      this.state = saved;
    };
  }

  consult(token: Address, amountIn: bigint): bigint {
    if (this.state.failConsult) {
      throw new OracleFailureError("Oracle: consult unavailable");
    }
    this.assertToken(token);
    return mulDiv(this.state.price, amountIn, WAD);
  }

  twap(token: Address, amountIn: bigint): bigint {
    if (this.state.failTwap) {
      throw new OracleFailureError("Oracle: twap unavailable");
    }
    this.assertToken(token);
    return mulDiv(this.state.twapPrice, amountIn, WAD);
  }

  update(): void {
    this.state.updateCount += 1;
    if (this.state.failUpdate) {
      throw new OracleFailureError("Oracle: update unavailable");
    }
    mockLogger.debug({ updateCount: this.state.updateCount }, "Oracle updated");
  }

  // Test helpers
  setPrice(price: bigint, twapPrice: bigint = price): void {
    this.state.price = price;
    this.state.twapPrice = twapPrice;
  }

  setFailures(failures: Partial<Pick<MockOracleState, "failConsult" | "failTwap" | "failUpdate">>): void {
    this.state = { ...this.state, ...failures };
  }

  getUpdateCount(): number {
    return this.state.updateCount;
  }

  private assertToken(token: Address): void {
    if (normalizeAddress(token) !== this.token) {
      throw new OracleFailureError("Oracle: invalid token");
    }
  }
}

/**
 * Factory function
 */
export function createMockPriceOracle(config: MockPriceOracleConfig): MockPriceOracle {
  return new MockPriceOracle(config);
}
