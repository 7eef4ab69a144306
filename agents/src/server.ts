import "dotenv/config";
import express from "express";
import cors from "cors";
import { HttpBackendClient } from "./client.js";
import { loadAgentConfig } from "./config.js";
import { Keeper, isSchedulerRunning, startScheduler, stopScheduler } from "./keeper.js";

const config = loadAgentConfig();
const keeper = new Keeper(new HttpBackendClient(config.backendUrl, config.agentAddress));

const app = express();

app.use(cors());
app.use(express.json());

// ============================================
// Health check endpoint
// ============================================

app.get("/health", (_req, res) => {
  res.json({
    status: "ok",
    processing: keeper.isProcessing,
    scheduler: isSchedulerRunning(),
    timestamp: new Date().toISOString(),
  });
});

// ============================================
// Trigger endpoint - check and execute ALL due orders
// ============================================

app.post("/trigger", async (_req, res) => {
  try {
    const results = await keeper.processDueOrders();

    if (!results) {
      res.status(409).json({ success: false, error: "A keeper run is already in progress" });
      return;
    }

    res.json({
      success: true,
      message: `Processed ${results.details.length} orders`,
      results,
    });
  } catch (error) {
    console.error("Trigger error:", error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : "Trigger failed",
    });
  }
});

// ============================================
// Scheduler control
// ============================================

app.post("/scheduler/start", (_req, res) => {
  try {
    startScheduler(keeper, config.cronSchedule);
    res.json({ success: true, running: isSchedulerRunning() });
  } catch (error) {
    res.status(400).json({ success: false, error: error instanceof Error ? error.message : "Failed to start" });
  }
});

app.post("/scheduler/stop", (_req, res) => {
  stopScheduler();
  res.json({ success: true, running: isSchedulerRunning() });
});

// ============================================
// Start server
// ============================================

app.listen(config.port, () => {
  console.log(`\n🤖 Keeper Service running on port ${config.port}`);
  console.log(`   Backend URL: ${config.backendUrl}`);
  console.log(`   Agent: ${config.agentAddress}`);
  console.log(`   Health check: http://localhost:${config.port}/health`);
  console.log(`   Trigger All: POST http://localhost:${config.port}/trigger`);
  console.log(`   Scheduler: POST http://localhost:${config.port}/scheduler/start | /scheduler/stop`);
});
