import { getAddress, isAddress, type Address } from "viem";

export interface AgentConfig {
  readonly backendUrl: string;
  readonly agentAddress: Address;
  readonly cronSchedule: string;
  readonly port: number;
}

type Env = Record<string, string | undefined>;

export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const agent = env.AGENT_ADDRESS;
  if (!agent || !isAddress(agent, { strict: false })) {
    throw new Error("AGENT_ADDRESS must be set to the agent's address");
  }

  const port = Number(env.AGENT_SERVICE_PORT ?? "3002");
  if (!Number.isInteger(port) || port < 0) {
    throw new Error("AGENT_SERVICE_PORT must be a non-negative integer");
  }

  return Object.freeze({
    backendUrl: (env.BACKEND_URL || "http://localhost:3001").replace(/\/+$/, ""),
    agentAddress: getAddress(agent),
    // Every minute for testing; "0 * * * *" matches the hourly frequency class
    cronSchedule: env.CRON_SCHEDULE || "* * * * *",
    port,
  });
}
