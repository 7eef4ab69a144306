import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { BackendConfig } from "./config/env.js";
import { DcaEngine, systemClock, type Clock } from "./engine/dca-engine.js";
import { isDcaError } from "./engine/errors.js";
import { LedgerCustody } from "./services/custody.js";
import { FixedRateExchange, QuoterExchange } from "./services/exchange.js";
import {
  InMemoryOrderHistoryStore,
  MongoOrderHistoryStore,
  OrderHistoryRecorder,
  type OrderHistoryStore,
} from "./services/history.js";
import { ChainlinkPriceOracle, ManualPriceOracle } from "./services/price-oracle.js";
import { createAdminRouter } from "./routes/admin.js";
import { bigintReplacer, sendError } from "./routes/http.js";
import { createOrdersRouter } from "./routes/orders.js";

export interface AppContext {
  config: BackendConfig;
  engine: DcaEngine;
  custody: LedgerCustody;
  // Only set in demo mode; otherwise prices come from the on-chain feed
  oracle: ManualPriceOracle | null;
  history: OrderHistoryStore;
  recorder: OrderHistoryRecorder;
  clock: Clock;
}

export interface ContextOverrides {
  clock?: Clock;
  history?: OrderHistoryStore;
}

export function createContext(config: BackendConfig, overrides: ContextOverrides = {}): AppContext {
  const clock = overrides.clock ?? systemClock;
  const custody = new LedgerCustody();
  const oracle = config.demoMode ? new ManualPriceOracle(config.demoPrice, clock) : null;

  const engine = new DcaEngine({
    admin: config.adminAddress,
    custody,
    clock,
    createOracle: (engineConfig) => oracle ?? new ChainlinkPriceOracle(engineConfig.priceFeed, config.rpcUrl),
    createExchange: (engineConfig) =>
      config.demoMode
        ? new FixedRateExchange()
        : new QuoterExchange(engineConfig.fundingAsset, engineConfig.targetAsset, config.quoterFeeTier, config.rpcUrl),
  });

  const history =
    overrides.history ?? (config.historyEnabled ? new MongoOrderHistoryStore() : new InMemoryOrderHistoryStore());
  const recorder = new OrderHistoryRecorder(history, clock);
  recorder.attach(engine.events);

  return { config, engine, custody, oracle, history, recorder, clock };
}

/**
 * Initialize the engine from configuration and apply the configured agent and
 * execution fee. Safe to call on an engine someone already initialized.
 */
export async function bootstrap(context: AppContext): Promise<void> {
  const { config, engine } = context;
  const admin = config.adminAddress;

  try {
    await engine.initialize(admin, {
      fundingAsset: config.fundingToken,
      targetAsset: config.targetToken,
      priceFeed: config.priceFeed,
    });
  } catch (error) {
    if (!isDcaError(error, "AlreadyInitialized")) throw error;
  }

  if (config.agentAddress) {
    await engine.setAgent(admin, config.agentAddress);
  }
  await engine.setExecutionFee(admin, config.executionFee);

  console.log(`⚙️  Engine initialized (${config.demoMode ? "demo" : "on-chain"} prices)`);
  console.log(`   Funding: ${config.fundingToken}`);
  console.log(`   Target: ${config.targetToken}`);
  console.log(`   Agent: ${config.agentAddress ?? "not set"}`);
}

// ============================================
// Express App Setup
// ============================================

export function createApp(context: AppContext): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.set("json replacer", bigintReplacer);

  // Request logging
  if (context.config.nodeEnv !== "test") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // Health check
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      initialized: context.engine.configuration() !== null,
      timestamp: new Date().toISOString(),
    });
  });

  app.use("/api/orders", createOrdersRouter(context));
  app.use("/api/admin", createAdminRouter(context));

  app.get("/api/stats", async (_req: Request, res: Response) => {
    try {
      const stats = await context.engine.stats();
      res.json({ success: true, stats });
    } catch (error) {
      sendError(res, error, "Failed to fetch stats");
    }
  });

  return app;
}
