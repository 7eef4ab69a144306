import type { Address } from "viem";
import { AGGREGATOR_V3_ABI } from "../config/constants.js";
import { createChainClient, type ChainClient } from "./chain.js";

export interface PriceReading {
  value: bigint;
  asOf: number; // unix seconds
}

export interface PriceOracle {
  latestPrice(): Promise<PriceReading>;
}

// ============================================
// Chainlink aggregator
// ============================================

export class ChainlinkPriceOracle implements PriceOracle {
  private readonly client: ChainClient;

  constructor(
    private readonly feed: Address,
    rpcUrl: string
  ) {
    this.client = createChainClient(rpcUrl);
  }

  async latestPrice(): Promise<PriceReading> {
    const [, answer, , updatedAt] = await this.client.readContract({
      address: this.feed,
      abi: AGGREGATOR_V3_ABI,
      functionName: "latestRoundData",
    });

    if (answer < 0n) {
      throw new Error(`Negative price from feed ${this.feed}: ${answer}`);
    }

    return { value: answer, asOf: Number(updatedAt) };
  }
}

// ============================================
// Operator-set price (demo mode and tests)
// ============================================

export class ManualPriceOracle implements PriceOracle {
  constructor(
    private value: bigint,
    private readonly clock: () => number = () => Math.floor(Date.now() / 1000)
  ) {}

  setPrice(value: bigint): void {
    if (value < 0n) {
      throw new Error("Price must not be negative");
    }
    this.value = value;
  }

  async latestPrice(): Promise<PriceReading> {
    return { value: this.value, asOf: this.clock() };
  }
}
