// DCA Keeper Service
//
// Polls the backend for orders whose next execution is due and runs them
// through the agent-only preauthorize and execute endpoints.
//
// Usage:
//   npm run trigger   - Process all due orders once
//   npm run scheduler - Process due orders on a cron schedule
//   npm run server    - HTTP service with a manual trigger endpoint

export { BackendError, HttpBackendClient, type BackendClient, type DueOrder } from "./client.js";
export { loadAgentConfig, type AgentConfig } from "./config.js";
export {
  Keeper,
  startScheduler,
  stopScheduler,
  isSchedulerRunning,
  type KeeperRunSummary,
  type OrderOutcome,
} from "./keeper.js";
