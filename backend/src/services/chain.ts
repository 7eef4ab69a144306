import { createPublicClient, http } from "viem";
import { sepolia } from "viem/chains";

export const CHAIN = sepolia;

export function createChainClient(rpcUrl: string) {
  return createPublicClient({
    chain: CHAIN,
    transport: http(rpcUrl),
  });
}

export type ChainClient = ReturnType<typeof createChainClient>;
