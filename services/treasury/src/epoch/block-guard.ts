/**
 * Block Guard
 *
 * One guarded call per block per origin and per sender. Blocks same-block
 * sequences such as buy-then-redeem around a manipulated price.
 */

import type { Address } from "viem";
import {
  GUARD_MESSAGES,
  ReentrancyViolationError,
  normalizeAddress,
  type CallContext,
} from "@seigniorage/shared";
import type { BlockGuardState } from "../types.js";

export function createBlockGuardState(): BlockGuardState {
  return {
    blockNumber: -1n,
    origins: new Set<Address>(),
    senders: new Set<Address>(),
  };
}

export class BlockGuard {
  /**
   * Marks the caller for this block, or throws if it already called
   */
  enter(state: BlockGuardState, blockNumber: bigint, ctx: CallContext): void {
    // Marks from earlier blocks can never match again
    if (state.blockNumber !== blockNumber) {
      state.blockNumber = blockNumber;
      state.origins.clear();
      state.senders.clear();
    }

    const sender = normalizeAddress(ctx.sender);
    const origin = normalizeAddress(ctx.origin ?? ctx.sender);

    if (state.origins.has(origin) || state.senders.has(sender)) {
      throw new ReentrancyViolationError(GUARD_MESSAGES.ONE_BLOCK_ONE_FUNCTION, blockNumber);
    }

    state.origins.add(origin);
    state.senders.add(sender);
  }
}

/**
 * Factory function
 */
export function createBlockGuard(): BlockGuard {
  return new BlockGuard();
}
