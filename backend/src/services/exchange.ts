import type { Address } from "viem";
import { QUOTER_V2_ABI, UNISWAP } from "../config/constants.js";
import { createChainClient, type ChainClient } from "./chain.js";

/**
 * Converts funding token into target token. The engine books whatever output
 * the exchange reports and does not re-check the rate.
 */
export interface Exchange {
  swap(amountIn: bigint): Promise<bigint>;
}

// ============================================
// Uniswap V3 quoter fill
// ============================================

/**
 * Fills a swap at the QuoterV2 quote for the pair. This is the demo-mode fill:
 * nothing is broadcast, the quoted output is booked as the execution result.
 */
export class QuoterExchange implements Exchange {
  private readonly client: ChainClient;

  constructor(
    private readonly tokenIn: Address,
    private readonly tokenOut: Address,
    private readonly feeTier: number,
    rpcUrl: string
  ) {
    this.client = createChainClient(rpcUrl);
  }

  async swap(amountIn: bigint): Promise<bigint> {
    const { result } = await this.client.simulateContract({
      address: UNISWAP.QUOTER_V2,
      abi: QUOTER_V2_ABI,
      functionName: "quoteExactInputSingle",
      args: [
        {
          tokenIn: this.tokenIn,
          tokenOut: this.tokenOut,
          amountIn,
          fee: this.feeTier,
          sqrtPriceLimitX96: 0n,
        },
      ],
    });

    return result[0];
  }
}

// ============================================
// Fixed-rate fill (offline runs and tests)
// ============================================

export class FixedRateExchange implements Exchange {
  private failNext: Error | null = null;
  readonly swaps: bigint[] = [];

  /**
   * @param numerator - output per `denominator` units of input
   */
  constructor(
    private readonly numerator: bigint = 1n,
    private readonly denominator: bigint = 1n
  ) {
    if (denominator === 0n) {
      throw new Error("Exchange rate denominator must not be zero");
    }
  }

  rejectNextSwap(reason = "Swap reverted"): void {
    this.failNext = new Error(reason);
  }

  async swap(amountIn: bigint): Promise<bigint> {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    this.swaps.push(amountIn);
    return (amountIn * this.numerator) / this.denominator;
  }
}
