import "dotenv/config";
import { HttpBackendClient } from "./client.js";
import { loadAgentConfig } from "./config.js";
import { Keeper } from "./keeper.js";

// ============================================
// One-shot trigger: process every due order once and exit
// ============================================

async function trigger() {
  const config = loadAgentConfig();
  const keeper = new Keeper(new HttpBackendClient(config.backendUrl, config.agentAddress));

  const summary = await keeper.processDueOrders();
  if (summary && summary.failed > 0) {
    process.exitCode = 1;
  }
}

trigger().catch((error: unknown) => {
  console.error("❌ Trigger failed:", error);
  process.exit(1);
});
