import "dotenv/config";
import { bootstrap, createApp, createContext } from "./app.js";
import { connectDatabase, disconnectDatabase } from "./config/database.js";
import { loadConfig } from "./config/env.js";

// ============================================
// Start Server
// ============================================

async function main() {
  const config = loadConfig();

  if (config.historyEnabled) {
    await connectDatabase(config.mongoUri);
  } else {
    console.log("🗄️  History archive kept in memory (HISTORY_ENABLED=false)");
  }

  const context = createContext(config);
  await bootstrap(context);
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    console.log(`\n🚀 Server running on http://localhost:${config.port}`);
    console.log(`   Health: http://localhost:${config.port}/health`);
    console.log(`   API: http://localhost:${config.port}/api/orders`);
  });

  console.log("\n📋 Available Endpoints:");
  console.log("   GET    /health                       - Health check");
  console.log("   GET    /api/orders                   - List active orders");
  console.log("   GET    /api/orders/due               - Orders due for execution");
  console.log("   GET    /api/orders/upcoming          - Next scheduled executions");
  console.log("   GET    /api/orders/history/:owner    - Archived orders of an owner");
  console.log("   GET    /api/orders/:id               - Order details");
  console.log("   GET    /api/orders/:id/logs          - Execution logs");
  console.log("   POST   /api/orders                   - Create DCA order");
  console.log("   POST   /api/orders/:id/preauthorize  - Pre-trade check (agent)");
  console.log("   POST   /api/orders/:id/execute       - Execute one swap (agent)");
  console.log("   DELETE /api/orders/:id               - Cancel order (owner)");
  console.log("   POST   /api/orders/refunds/retry     - Settle pending refund");
  console.log("   POST   /api/admin/initialize         - Initialize engine (admin)");
  console.log("   PUT    /api/admin/agent              - Set agent (admin)");
  console.log("   PUT    /api/admin/fee                - Set execution fee (admin)");
  console.log("   GET    /api/stats                    - Engine statistics\n");

  const shutdown = () => {
    console.log("\n🛑 Shutting down...");
    server.close();
    context.recorder
      .flush()
      .then(() => (config.historyEnabled ? disconnectDatabase() : undefined))
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("❌ Shutdown failed:", error);
          process.exit(1);
        }
      );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start server:", error);
  process.exit(1);
});
