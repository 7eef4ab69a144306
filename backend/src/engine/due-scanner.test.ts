import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import type { Order, OrderId } from "../models/Order.js";
import { DueOrderScanner, isDue, nextEligibleTime } from "./due-scanner.js";
import { OrderStore } from "./order-store.js";

function idOf(n: number): OrderId {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

function makeOrder(n: number, lastExecutionTime: number, frequency = 100, endTime = 2_000): Order {
  return {
    id: idOf(n),
    owner: "0x1111111111111111111111111111111111111111",
    totalAmount: 100n,
    amountPerSwap: 10n,
    remainingBalance: 100n,
    fee: 0n,
    frequencyClass: "hourly",
    frequency,
    createdAt: 900,
    lastExecutionTime,
    endTime,
    minPrice: 0n,
    maxPrice: 0n,
    swapsExecuted: 0,
    totalSwaps: 10,
    totalAmountOut: 0n,
  };
}

describe("isDue", () => {
  const order = makeOrder(1, 1_000);

  it("should open the window one interval after the last execution", () => {
    assert.equal(nextEligibleTime(order), 1_100);
    assert.equal(isDue(order, 1_099), false);
    assert.equal(isDue(order, 1_100), true);
  });

  it("should include the end time and close after it", () => {
    assert.equal(isDue(order, 2_000), true);
    assert.equal(isDue(order, 2_001), false);
  });
});

describe("DueOrderScanner", () => {
  let store: OrderStore;
  let scanner: DueOrderScanner;

  beforeEach(() => {
    store = new OrderStore();
    scanner = new DueOrderScanner(store);
  });

  it("should return undefined when nothing is due", () => {
    assert.equal(scanner.findDue(1_500), undefined);

    store.insert(makeOrder(1, 1_000));
    assert.equal(scanner.findDue(1_050), undefined);
  });

  it("should break equal eligibility times by lowest id", () => {
    store.insert(makeOrder(2, 1_000));
    store.insert(makeOrder(1, 1_000));

    assert.equal(scanner.findDue(1_500), idOf(1));
  });

  it("should prefer the order that became eligible first", () => {
    store.insert(makeOrder(1, 1_000));
    store.insert(makeOrder(3, 950));

    assert.equal(scanner.findDue(1_500), idOf(3));
  });

  it("should skip orders whose period has ended", () => {
    store.insert(makeOrder(1, 1_000, 100, 1_200));
    store.insert(makeOrder(2, 1_100));

    assert.equal(scanner.findDue(1_300), idOf(2));
  });

  it("should list every due order in scan order", () => {
    store.insert(makeOrder(4, 1_000));
    store.insert(makeOrder(2, 1_000));
    store.insert(makeOrder(3, 900));
    store.insert(makeOrder(1, 1_400));

    assert.deepEqual(scanner.findAllDue(1_300), [idOf(3), idOf(2), idOf(4)]);
  });

  it("should list upcoming executions including orders not yet due", () => {
    store.insert(makeOrder(1, 1_400));
    store.insert(makeOrder(2, 1_000));
    store.insert(makeOrder(3, 1_950)); // next eligible 2_050 is past its end

    assert.deepEqual(scanner.upcoming(10), [
      { id: idOf(2), nextExecution: 1_100, endTime: 2_000 },
      { id: idOf(1), nextExecution: 1_500, endTime: 2_000 },
    ]);
    assert.equal(scanner.upcoming(1).length, 1);
  });
});
