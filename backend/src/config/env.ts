import { getAddress, isAddress, type Address } from "viem";
import { PRICE_FEEDS, TOKENS } from "./constants.js";

export interface BackendConfig {
  readonly nodeEnv: "development" | "production" | "test";
  readonly port: number;
  readonly mongoUri: string;
  readonly historyEnabled: boolean;
  readonly rpcUrl: string;
  readonly adminAddress: Address;
  readonly agentAddress: Address | null;
  readonly executionFee: bigint;
  readonly fundingToken: Address;
  readonly targetToken: Address;
  readonly priceFeed: Address;
  readonly quoterFeeTier: number;
  readonly demoMode: boolean;
  readonly demoPrice: bigint;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string, fallback?: string): string {
  const value = env[key] ?? fallback;
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
}

function requireNumber(env: Env, key: string, fallback: string): number {
  const value = Number(requireEnv(env, key, fallback));
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`);
  }
  return value;
}

function requireBigInt(env: Env, key: string, fallback: string): bigint {
  const raw = requireEnv(env, key, fallback);
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`);
  }
  return BigInt(raw);
}

function requireBoolean(env: Env, key: string, fallback: string): boolean {
  const value = requireEnv(env, key, fallback).toLowerCase();
  if (["true", "1", "yes"].includes(value)) return true;
  if (["false", "0", "no"].includes(value)) return false;
  throw new Error(`Environment variable ${key} must be a boolean`);
}

function requireAddress(env: Env, key: string, fallback?: string): Address {
  const value = requireEnv(env, key, fallback);
  if (!isAddress(value, { strict: false })) {
    throw new Error(`Environment variable ${key} must be an address`);
  }
  return getAddress(value);
}

function parseNodeEnv(value: string | undefined): BackendConfig["nodeEnv"] {
  if (value === "production" || value === "test") return value;
  return "development";
}

export function loadConfig(env: Env = process.env): BackendConfig {
  return Object.freeze({
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    port: requireNumber(env, "PORT", "3001"),
    mongoUri: requireEnv(env, "MONGODB_URI", "mongodb://localhost:27017/dca"),
    historyEnabled: requireBoolean(env, "HISTORY_ENABLED", "true"),
    rpcUrl: requireEnv(env, "RPC_URL", "https://ethereum-sepolia-rpc.publicnode.com"),
    adminAddress: requireAddress(env, "ADMIN_ADDRESS"),
    agentAddress: env.AGENT_ADDRESS ? requireAddress(env, "AGENT_ADDRESS") : null,
    executionFee: requireBigInt(env, "EXECUTION_FEE", "0"),
    fundingToken: requireAddress(env, "FUNDING_TOKEN", TOKENS.USDC),
    targetToken: requireAddress(env, "TARGET_TOKEN", TOKENS.WETH),
    priceFeed: requireAddress(env, "PRICE_FEED_ADDRESS", PRICE_FEEDS.ETH_USD),
    quoterFeeTier: requireNumber(env, "QUOTER_FEE_TIER", "3000"),
    demoMode: requireBoolean(env, "DEMO_MODE", "true"),
    demoPrice: requireBigInt(env, "DEMO_PRICE", "1000"),
  });
}
