import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { Server } from "node:http";
import type { Hex } from "viem";
import { bootstrap, createApp, createContext, type AppContext } from "../../backend/src/app.js";
import { loadConfig } from "../../backend/src/config/env.js";
import {
  BackendError,
  HttpBackendClient,
  type BackendClient,
  type DueOrder,
  type ExecutionReceipt,
  type Preauthorization,
} from "./client.js";
import { Keeper, isSchedulerRunning, startScheduler } from "./keeper.js";

function idOf(n: number): Hex {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

function due(n: number): DueOrder {
  return { id: idOf(n), owner: "0x1111111111111111111111111111111111111111", amountPerSwap: "3", nextExecution: 1_000 };
}

const RECEIPT: ExecutionReceipt = {
  amountIn: "3",
  amountOut: "6",
  price: "1000",
  remainingBalance: "97",
  completed: false,
};

/**
 * Scripted backend: per-order failures for either step, everything else succeeds.
 */
class FakeBackend implements BackendClient {
  orders: DueOrder[] = [];
  readonly preauthorizeFailures = new Map<Hex, Error>();
  readonly executeFailures = new Map<Hex, Error>();
  readonly executed: Hex[] = [];

  async fetchDueOrders(): Promise<DueOrder[]> {
    return this.orders;
  }

  async preauthorize(orderId: Hex): Promise<Preauthorization> {
    const failure = this.preauthorizeFailures.get(orderId);
    if (failure) throw failure;
    return { amountIn: "3", fee: "0", price: "1000" };
  }

  async executeOrder(orderId: Hex): Promise<ExecutionReceipt> {
    const failure = this.executeFailures.get(orderId);
    if (failure) throw failure;
    this.executed.push(orderId);
    return RECEIPT;
  }
}

describe("Keeper", () => {
  let backend: FakeBackend;
  let keeper: Keeper;

  beforeEach(() => {
    mock.method(console, "log", () => undefined);
    backend = new FakeBackend();
    keeper = new Keeper(backend);
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("should execute every due order", async () => {
    backend.orders = [due(1), due(2)];

    const summary = await keeper.processDueOrders();

    assert.deepEqual(summary, {
      success: 2,
      failed: 0,
      skipped: 0,
      details: [
        { orderId: idOf(1), status: "success", amountOut: "6", completed: false },
        { orderId: idOf(2), status: "success", amountOut: "6", completed: false },
      ],
    });
    assert.deepEqual(backend.executed, [idOf(1), idOf(2)]);
  });

  it("should report an empty run", async () => {
    assert.deepEqual(await keeper.processDueOrders(), { success: 0, failed: 0, skipped: 0, details: [] });
  });

  it("should skip orders rejected with a retryable code", async () => {
    backend.orders = [due(1), due(2)];
    backend.preauthorizeFailures.set(idOf(1), new BackendError("Price 1200 is above maximum 1100", "PriceAboveMaximum", true, 409));

    const summary = await keeper.processDueOrders();

    assert.equal(summary?.skipped, 1);
    assert.equal(summary?.success, 1);
    assert.deepEqual(summary?.details[0], {
      orderId: idOf(1),
      status: "skipped",
      code: "PriceAboveMaximum",
      error: "Price 1200 is above maximum 1100",
    });
    // A failed preauthorization never reaches execute
    assert.deepEqual(backend.executed, [idOf(2)]);
  });

  it("should count permanent rejections and transport errors as failures", async () => {
    backend.orders = [due(1), due(2), due(3)];
    backend.executeFailures.set(idOf(1), new BackendError("Order not found", "OrderNotFound", false, 404));
    backend.executeFailures.set(idOf(2), new Error("socket hang up"));

    const summary = await keeper.processDueOrders();

    assert.equal(summary?.failed, 2);
    assert.equal(summary?.success, 1);
    assert.deepEqual(summary?.details[1], { orderId: idOf(2), status: "failed", error: "socket hang up" });
  });

  it("should refuse to start a second run while one is in flight", async () => {
    let release: (orders: DueOrder[]) => void = () => undefined;
    backend.fetchDueOrders = () =>
      new Promise<DueOrder[]>((resolve) => {
        release = resolve;
      });

    const first = keeper.processDueOrders();
    assert.equal(keeper.isProcessing, true);
    assert.equal(await keeper.processDueOrders(), null);

    release([]);
    assert.deepEqual(await first, { success: 0, failed: 0, skipped: 0, details: [] });
    assert.equal(keeper.isProcessing, false);
  });

  it("should release the guard when the backend is unreachable", async () => {
    backend.fetchDueOrders = () => Promise.reject(new Error("Cannot connect to backend"));

    await assert.rejects(keeper.processDueOrders(), /Cannot connect/);
    assert.equal(keeper.isProcessing, false);
  });
});

describe("Keeper against the backend", () => {
  const OWNER = "0x1111111111111111111111111111111111111111";
  const AGENT = "0x3333333333333333333333333333333333333333";
  const ADMIN = "0x4444444444444444444444444444444444444444";
  const T0 = 1_700_000_000;
  const DAY = 86_400;

  let now: number;
  let context: AppContext;
  let server: Server;
  let keeper: Keeper;

  beforeEach(async () => {
    mock.method(console, "log", () => undefined);
    now = T0;
    const config = loadConfig({
      NODE_ENV: "test",
      ADMIN_ADDRESS: ADMIN,
      AGENT_ADDRESS: AGENT,
      EXECUTION_FEE: "1",
      HISTORY_ENABLED: "false",
      DEMO_MODE: "true",
      DEMO_PRICE: "1000",
    });
    context = createContext(config, { clock: () => now });
    await bootstrap(context);

    server = createApp(context).listen(0);
    await once(server, "listening");
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    keeper = new Keeper(new HttpBackendClient(`http://127.0.0.1:${address.port}`, AGENT));
  });

  afterEach(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, "close");
    mock.restoreAll();
  });

  it("should run a fee-paying order through every slice to completion", async () => {
    context.custody.credit(OWNER, 100n);
    const order = await context.engine.createOrder({
      owner: OWNER,
      totalAmount: 10n,
      frequencyClass: "daily",
      durationDays: 5,
      minPrice: 0n,
      maxPrice: 0n,
      feePayment: 1n,
    });
    assert.equal(order.amountPerSwap, 2n);
    assert.equal(order.totalSwaps, 5);

    for (let day = 1; day <= 5; day++) {
      now = T0 + day * DAY;
      assert.deepEqual(await keeper.processDueOrders(), {
        success: 1,
        failed: 0,
        skipped: 0,
        details: [{ orderId: order.id, status: "success", amountOut: "2", completed: day === 5 }],
      });
    }

    assert.equal(await context.engine.hasOrder(order.id), false);
    assert.equal((await context.engine.stats()).ordersCompleted, 1);
    assert.equal(context.custody.balanceOf(OWNER), 89n);
  });
});

describe("startScheduler", () => {
  it("should reject an invalid cron expression without scheduling", () => {
    const keeper = new Keeper(new FakeBackend());

    assert.throws(() => startScheduler(keeper, "every minute"), /Invalid cron expression/);
    assert.equal(isSchedulerRunning(), false);
  });
});
