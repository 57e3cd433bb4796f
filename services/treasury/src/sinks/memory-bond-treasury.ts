/**
 * In-memory bond treasury with a settable vested total
 */

import type { Address } from "viem";
import { normalizeAddress, type Checkpointable } from "@seigniorage/shared";
import type { BondTreasury } from "../types.js";

export class MemoryBondTreasury implements BondTreasury, Checkpointable {
  readonly address: Address;
  private vested = 0n;

  constructor(address: Address) {
    this.address = normalizeAddress(address);
  }

  checkpoint(): () => void {
    const saved = this.vested;
    return () => {
      this.vested = saved;
    };
  }

  totalVested(): bigint {
    return this.vested;
  }

  setTotalVested(amount: bigint): void {
    this.vested = amount;
  }
}

export function createMemoryBondTreasury(address: Address): MemoryBondTreasury {
  return new MemoryBondTreasury(address);
}
