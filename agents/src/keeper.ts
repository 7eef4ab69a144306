import cron, { type ScheduledTask } from "node-cron";
import type { Hex } from "viem";
import { BackendError, type BackendClient } from "./client.js";

// ============================================
// Types
// ============================================

export type OutcomeStatus = "success" | "failed" | "skipped";

export interface OrderOutcome {
  orderId: Hex;
  status: OutcomeStatus;
  amountOut?: string;
  completed?: boolean;
  code?: string;
  error?: string;
}

export interface KeeperRunSummary {
  success: number;
  failed: number;
  skipped: number;
  details: OrderOutcome[];
}

export interface KeeperOptions {
  // Pause between executions to stay under RPC rate limits
  pauseMs?: number;
}

function rejectionOf(orderId: Hex, error: unknown): OrderOutcome {
  if (error instanceof BackendError) {
    return {
      orderId,
      status: error.retryable ? "skipped" : "failed",
      code: error.code,
      error: error.message,
    };
  }
  return { orderId, status: "failed", error: error instanceof Error ? error.message : String(error) };
}

// ============================================
// Keeper
// ============================================

/**
 * Off-chain trigger: polls the backend for due orders and executes them one by
 * one. Only one run is in flight at a time.
 */
export class Keeper {
  private processing = false;

  constructor(
    private readonly client: BackendClient,
    private readonly options: KeeperOptions = {}
  ) {}

  get isProcessing(): boolean {
    return this.processing;
  }

  /**
   * Process every due order once.
   * @returns the run summary, or null when a run was already in progress
   */
  async processDueOrders(): Promise<KeeperRunSummary | null> {
    // Prevent concurrent processing
    if (this.processing) {
      console.log("⏳ Keeper already processing, skipping...");
      return null;
    }

    this.processing = true;
    const startTime = Date.now();

    try {
      console.log("\n" + "=".repeat(50));
      console.log(`🕐 Keeper run at ${new Date().toISOString()}`);
      console.log("=".repeat(50));

      const dueOrders = await this.client.fetchDueOrders();
      console.log(`📋 Found ${dueOrders.length} orders due for execution`);

      const summary: KeeperRunSummary = { success: 0, failed: 0, skipped: 0, details: [] };

      for (const [index, order] of dueOrders.entries()) {
        if (index > 0 && this.options.pauseMs) {
          await new Promise((resolve) => setTimeout(resolve, this.options.pauseMs));
        }

        console.log(`\n📦 Processing order ${order.id}`);
        const outcome = await this.processOrder(order.id);
        summary[outcome.status] += 1;
        summary.details.push(outcome);

        if (outcome.status === "success") {
          console.log(`   ✅ Swapped, ${outcome.amountOut} out${outcome.completed ? " (order completed)" : ""}`);
        } else if (outcome.status === "skipped") {
          console.log(`   ⏳ Skipped (${outcome.code}): ${outcome.error}`);
        } else {
          console.log(`   ❌ Failed: ${outcome.error}`);
        }
      }

      const duration = Date.now() - startTime;
      console.log("\n" + "-".repeat(50));
      console.log(`📊 Keeper Summary:`);
      console.log(`   ✅ Success: ${summary.success}`);
      console.log(`   ❌ Failed: ${summary.failed}`);
      console.log(`   ⏭️ Skipped: ${summary.skipped}`);
      console.log(`   ⏱️ Duration: ${duration}ms`);
      console.log("=".repeat(50) + "\n");

      return summary;
    } finally {
      this.processing = false;
    }
  }

  private async processOrder(orderId: Hex): Promise<OrderOutcome> {
    try {
      // Cheap gate first; the execute call re-checks everything
      await this.client.preauthorize(orderId);
    } catch (error) {
      return rejectionOf(orderId, error);
    }

    try {
      const receipt = await this.client.executeOrder(orderId);
      return { orderId, status: "success", amountOut: receipt.amountOut, completed: receipt.completed };
    } catch (error) {
      return rejectionOf(orderId, error);
    }
  }
}

// ============================================
// Cron Job Setup
// ============================================

let schedulerTask: ScheduledTask | null = null;

/**
 * Run the keeper on a cron schedule. Default: every minute.
 */
export function startScheduler(keeper: Keeper, cronExpression = "* * * * *"): void {
  if (schedulerTask) {
    console.log("⚠️ Scheduler already running");
    return;
  }
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: "${cronExpression}"`);
  }

  console.log(`🚀 Starting scheduler with cron: "${cronExpression}"`);

  schedulerTask = cron.schedule(cronExpression, () => {
    keeper.processDueOrders().catch((error: unknown) => {
      console.error("❌ Keeper run failed:", error);
    });
  });

  console.log("✅ Scheduler started");
}

export function stopScheduler(): void {
  if (schedulerTask) {
    schedulerTask.stop();
    schedulerTask = null;
    console.log("🛑 Scheduler stopped");
  }
}

export function isSchedulerRunning(): boolean {
  return schedulerTask !== null;
}
