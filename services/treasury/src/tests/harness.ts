/**
 * Treasury test harness: tokens, oracle, masonry and an initialized
 * treasury on a fresh in-memory chain
 */

import type { Address } from "viem";
import {
  InMemoryChain,
  MemoryBasisAsset,
  WAD,
  createInMemoryChain,
  createMemoryToken,
  deriveAddress,
} from "@seigniorage/shared";
import {
  DEFAULT_TREASURY_PARAMETERS,
  type TreasuryParameters,
} from "../types.js";
import { MockPriceOracle, createMockPriceOracle } from "../oracle/mock-price-oracle.js";
import { MemoryMasonry, createMemoryMasonry } from "../sinks/memory-masonry.js";
import { MemoryBondTreasury, createMemoryBondTreasury } from "../sinks/memory-bond-treasury.js";
import { Treasury, createTreasury } from "../treasury.js";

export const OPERATOR = deriveAddress("operator");
export const ALICE = deriveAddress("alice");
export const BOB = deriveAddress("bob");
export const TREASURY = deriveAddress("treasury");

export const PERIOD = 6n * 60n * 60n;

export interface HarnessOptions {
  price?: bigint;
  parameters?: Partial<TreasuryParameters>;
  alicePeg?: bigint;
  aliceBonds?: bigint;
  treasuryPeg?: bigint;
  bondTreasuryPeg?: bigint;
  withBondTreasury?: boolean;
  startDelay?: bigint;
  handOverOperators?: boolean;
}

export interface Harness {
  chain: InMemoryChain;
  peg: MemoryBasisAsset;
  bond: MemoryBasisAsset;
  share: MemoryBasisAsset;
  oracle: MockPriceOracle;
  masonry: MemoryMasonry;
  bondTreasury: MemoryBondTreasury;
  treasury: Treasury;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const chain = createInMemoryChain();

  const token = (label: string, symbol: string) =>
    chain.register(createMemoryToken({ address: deriveAddress(label), symbol, operator: OPERATOR }));

  const peg = token("peg", "PEG");
  const bond = token("bond", "BOND");
  const share = token("share", "SHARE");

  const oracle = chain.register(
    createMockPriceOracle({ address: deriveAddress("oracle"), token: peg.address, price: options.price ?? WAD })
  );
  const masonry = chain.register(
    createMemoryMasonry({ address: deriveAddress("masonry"), operator: OPERATOR, pegToken: peg, shareToken: share })
  );
  const bondTreasury = chain.register(createMemoryBondTreasury(deriveAddress("bond-treasury")));

  const treasury = createTreasury({
    address: TREASURY,
    chain,
    config: {
      periodSeconds: PERIOD,
      parameters: { ...DEFAULT_TREASURY_PARAMETERS, ...options.parameters },
    },
  });

  // Balances are minted while the operator still controls the tokens
  peg.mint(OPERATOR, ALICE, options.alicePeg ?? 1_000_000n * WAD);
  if (options.aliceBonds) bond.mint(OPERATOR, ALICE, options.aliceBonds);
  if (options.treasuryPeg) peg.mint(OPERATOR, TREASURY, options.treasuryPeg);
  if (options.bondTreasuryPeg) peg.mint(OPERATOR, bondTreasury.address, options.bondTreasuryPeg);

  if (options.handOverOperators ?? true) {
    handOverOperators({ peg, bond, share, masonry }, TREASURY);
  }

  treasury.initialize(OPERATOR, {
    pegToken: peg,
    bondToken: bond,
    shareToken: share,
    oracle,
    masonry,
    bondTreasury: options.withBondTreasury ? bondTreasury : undefined,
    startTime: chain.timestamp + (options.startDelay ?? 0n),
  });

  return { chain, peg, bond, share, oracle, masonry, bondTreasury, treasury };
}

export function handOverOperators(
  contracts: Pick<Harness, "peg" | "bond" | "share" | "masonry">,
  to: Address
): void {
  contracts.peg.transferOperator(OPERATOR, to);
  contracts.bond.transferOperator(OPERATOR, to);
  contracts.share.transferOperator(OPERATOR, to);
  contracts.masonry.setOperator(OPERATOR, to);
}
