/**
 * Standalone keeper scheduler
 * Run with: npm run scheduler
 */

import "dotenv/config";
import { HttpBackendClient } from "./client.js";
import { loadAgentConfig } from "./config.js";
import { Keeper, startScheduler, stopScheduler } from "./keeper.js";

async function main() {
  console.log("🤖 Starting DCA Keeper Scheduler");
  console.log("=".repeat(50));

  const config = loadAgentConfig();
  const keeper = new Keeper(new HttpBackendClient(config.backendUrl, config.agentAddress), { pauseMs: 1000 });

  console.log(`   Backend URL: ${config.backendUrl}`);
  console.log(`   Agent: ${config.agentAddress}`);

  // Run immediately once
  console.log("\n🔄 Running initial check...");
  try {
    await keeper.processDueOrders();
  } catch (error) {
    console.error("❌ Initial check failed:", error);
  }

  startScheduler(keeper, config.cronSchedule);
  console.log("\n✅ Scheduler running. Press Ctrl+C to stop.\n");

  // Handle graceful shutdown
  const shutdown = () => {
    console.log("\n🛑 Shutting down scheduler...");
    stopScheduler();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start scheduler:", error);
  process.exit(1);
});
