import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { Order } from "../models/Order.js";
import { LedgerCustody } from "../services/custody.js";
import { FixedRateExchange } from "../services/exchange.js";
import { isDcaError } from "./errors.js";
import { OrderEventBus, type OrderEventOf } from "./events.js";
import { ExecutionEngine } from "./execution-engine.js";
import { LifecycleTerminator } from "./lifecycle-terminator.js";
import { OrderFactory } from "./order-factory.js";
import { OrderStore } from "./order-store.js";

const OWNER = "0x1111111111111111111111111111111111111111";
const OTHER = "0x2222222222222222222222222222222222222222";
const AGENT = "0x3333333333333333333333333333333333333333";
const T0 = 1_700_000_000;

describe("LifecycleTerminator", () => {
  let store: OrderStore;
  let custody: LedgerCustody;
  let events: OrderEventBus;
  let terminator: LifecycleTerminator;
  let order: Order;
  let cancelled: Array<OrderEventOf<"order.cancelled">>;

  beforeEach(async () => {
    store = new OrderStore();
    custody = new LedgerCustody();
    events = new OrderEventBus();
    terminator = new LifecycleTerminator(store, custody, events);
    cancelled = [];
    events.on("order.cancelled", (event) => cancelled.push(event));

    custody.credit(OWNER, 1_000n);
    order = await new OrderFactory(store, custody, events).create(
      {
        owner: OWNER,
        totalAmount: 100n,
        frequencyClass: "daily",
        durationDays: 30,
        minPrice: 900n,
        maxPrice: 1100n,
        feePayment: 0n,
      },
      T0,
      0n
    );
  });

  it("should refund the full budget when cancelled immediately", async () => {
    const receipt = await terminator.cancel(order.id, OWNER);

    assert.deepEqual(receipt, {
      orderId: order.id,
      owner: OWNER,
      reason: "cancelled",
      swapsExecuted: 0,
      remainingBalance: 100n,
      refunded: 100n,
      refundPending: false,
    });
    assert.equal(custody.balanceOf(OWNER), 1_000n);
    assert.equal(custody.vaultBalance(), 0n);
    assert.equal(store.containsId(order.id), false);
    assert.equal(cancelled.length, 1);
    assert.equal(cancelled[0]?.refunded, 100n);
    assert.equal(cancelled[0]?.order.remainingBalance, 0n);
  });

  it("should reject a second cancellation", async () => {
    await terminator.cancel(order.id, OWNER);

    await assert.rejects(
      terminator.cancel(order.id, OWNER),
      (error) => isDcaError(error, "OrderNotFound")
    );
    assert.equal(custody.balanceOf(OWNER), 1_000n);
  });

  it("should only let the owner cancel", async () => {
    await assert.rejects(
      terminator.cancel(order.id, OTHER),
      (error) => isDcaError(error, "NotOrderOwner")
    );
    assert.deepEqual(store.get(order.id), order);
  });

  it("should keep the order when the refund fails", async () => {
    custody.freeze(OWNER);

    await assert.rejects(
      terminator.cancel(order.id, OWNER),
      (error) => isDcaError(error, "CustodyTransferFailed")
    );
    assert.deepEqual(store.get(order.id), order);
    assert.equal(custody.vaultBalance(), 100n);
    assert.equal(cancelled.length, 0);
  });

  it("should refund only what is left after executions", async () => {
    const execution = new ExecutionEngine(store, new FixedRateExchange(), terminator, events, () => ({
      agent: AGENT,
      executionFee: 0n,
    }));
    await execution.execute(order.id, T0 + 86_400, 1000n, AGENT);

    const receipt = await terminator.cancel(order.id, OWNER);

    assert.equal(receipt.swapsExecuted, 1);
    assert.equal(receipt.refunded, 97n);
    assert.equal(custody.balanceOf(OWNER), 997n);
  });

  it("should report a missing pending refund", async () => {
    await assert.rejects(
      terminator.retryRefund(OWNER),
      (error) => isDcaError(error, "NoPendingRefund")
    );
    assert.equal(terminator.totalPendingRefunds(), 0n);
  });

  it("should keep a pending refund when completion cannot pay out", async () => {
    custody.freeze(OWNER);
    const receipt = await terminator.terminate(order.id, "completed");

    assert.equal(receipt.refunded, 0n);
    assert.equal(receipt.refundPending, true);
    assert.equal(store.containsId(order.id), false);
    assert.equal(terminator.pendingRefundOf(OWNER), 100n);

    // Still frozen: the pending amount survives a failed retry
    await assert.rejects(
      terminator.retryRefund(OWNER),
      (error) => isDcaError(error, "CustodyTransferFailed")
    );
    assert.equal(terminator.pendingRefundOf(OWNER), 100n);

    custody.unfreeze(OWNER);
    assert.equal(await terminator.retryRefund(OWNER), 100n);
    assert.equal(terminator.totalPendingRefunds(), 0n);
    assert.equal(custody.balanceOf(OWNER), 1_000n);
  });
});
