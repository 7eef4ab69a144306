import type { FrequencyClass } from "../models/Order.js";

// Sepolia Testnet Configuration

export const SECONDS_PER_DAY = 86_400;

// Nominal interval per frequency class (a month is a fixed 30 days)
export const FREQUENCY_SECONDS: Record<FrequencyClass, number> = {
  hourly: 3_600,
  daily: SECONDS_PER_DAY,
  weekly: 7 * SECONDS_PER_DAY,
  monthly: 30 * SECONDS_PER_DAY, // 2592000
};

export const FREQUENCY_CLASSES: readonly FrequencyClass[] = ["hourly", "daily", "weekly", "monthly"];

// Uniswap V3 Addresses on Sepolia
export const UNISWAP = {
  QUOTER_V2: "0xEd1f6473345F45b75F8179591dd5bA1888cf2FB3" as const,
};

// Token Addresses on Sepolia
export const TOKENS = {
  WETH: "0xfFf9976782d46CC05630D1f6eBAb18b2324d6B14" as const,
  USDC: "0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238" as const,
} as const;

// Chainlink ETH/USD feed on Sepolia
export const PRICE_FEEDS = {
  ETH_USD: "0x694AA1769357215DE4FAC081bf1f309aDC325306" as const,
} as const;

// ABIs
export const AGGREGATOR_V3_ABI = [
  {
    name: "latestRoundData",
    type: "function",
    inputs: [],
    outputs: [
      { name: "roundId", type: "uint80" },
      { name: "answer", type: "int256" },
      { name: "startedAt", type: "uint256" },
      { name: "updatedAt", type: "uint256" },
      { name: "answeredInRound", type: "uint80" },
    ],
    stateMutability: "view",
  },
] as const;

export const QUOTER_V2_ABI = [
  {
    name: "quoteExactInputSingle",
    type: "function",
    inputs: [
      {
        name: "params",
        type: "tuple",
        components: [
          { name: "tokenIn", type: "address" },
          { name: "tokenOut", type: "address" },
          { name: "amountIn", type: "uint256" },
          { name: "fee", type: "uint24" },
          { name: "sqrtPriceLimitX96", type: "uint160" },
        ],
      },
    ],
    outputs: [
      { name: "amountOut", type: "uint256" },
      { name: "sqrtPriceX96After", type: "uint160" },
      { name: "initializedTicksCrossed", type: "uint32" },
      { name: "gasEstimate", type: "uint256" },
    ],
    stateMutability: "nonpayable",
  },
] as const;
