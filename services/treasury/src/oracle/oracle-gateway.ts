/**
 * Oracle Gateway
 *
 * Every price read is fresh. Failures surface as Results and each call site
 * decides what a failure means:
 * - getPrice / getUpdatedPrice: hard fail, aborting the calling operation
 * - refreshPrice: best effort, failures are logged and dropped
 */

import type { Address } from "viem";
import {
  treasuryLogger as logger,
  InMemoryChain,
  MAX_UINT144,
  OracleFailureError,
  WAD,
  logError,
  toError,
  type Result,
} from "@seigniorage/shared";
import type { PriceOracle } from "../types.js";

const oracleLogger = logger.child({ component: "oracle-gateway" });

const CONSULT_FAILURE = "Treasury: failed to consult peg price from the oracle";

// ============================================
// ORACLE GATEWAY
// ============================================

export class OracleGateway {
  constructor(private readonly chain: InMemoryChain) {}

  /**
   * oracle.consult(token, 1e18) as a Result
   */
  tryConsult(oracle: PriceOracle, token: Address): Result<bigint, OracleFailureError> {
    return this.query(() => oracle.consult(token, WAD));
  }

  /**
   * oracle.twap(token, 1e18) as a Result
   */
  tryTwap(oracle: PriceOracle, token: Address): Result<bigint, OracleFailureError> {
    return this.query(() => oracle.twap(token, WAD));
  }

  /**
   * Current price; throws OracleFailureError on any oracle failure
   */
  getPrice(oracle: PriceOracle, token: Address): bigint {
    return this.unwrap(this.tryConsult(oracle, token));
  }

  /**
   * Time-weighted price; throws OracleFailureError on any oracle failure
   */
  getUpdatedPrice(oracle: PriceOracle, token: Address): bigint {
    return this.unwrap(this.tryTwap(oracle, token));
  }

  /**
   * Asks the oracle to update. Runs in its own savepoint so a failing
   * update leaves no partial oracle state behind.
   */
  refreshPrice(oracle: PriceOracle): void {
    try {
      this.chain.transact(() => oracle.update());
    } catch (error) {
      oracleLogger.warn({
        oracle: oracle.address,
        reason: toError(error).message,
      }, "Oracle update failed, continuing");
    }
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private query(read: () => bigint): Result<bigint, OracleFailureError> {
    try {
      const price = read();
      if (price < 0n || price > MAX_UINT144) {
        return {
          ok: false,
          error: new OracleFailureError(`${CONSULT_FAILURE}: price out of range`),
        };
      }
      return { ok: true, value: price };
    } catch (error) {
      return {
        ok: false,
        error: new OracleFailureError(CONSULT_FAILURE, toError(error)),
      };
    }
  }

  private unwrap(result: Result<bigint, OracleFailureError>): bigint {
    if (!result.ok) {
      logError(result.error, {
        component: "oracle-gateway",
        reason: result.error.underlying?.message ?? result.error.message,
      }, "Oracle read failed");
      throw result.error;
    }
    return result.value;
  }
}

/**
 * Factory function
 */
export function createOracleGateway(chain: InMemoryChain): OracleGateway {
  return new OracleGateway(chain);
}
