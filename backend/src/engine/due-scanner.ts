import type { Order, OrderId } from "../models/Order.js";
import type { OrderStore } from "./order-store.js";

export function nextEligibleTime(order: Order): number {
  return order.lastExecutionTime + order.frequency;
}

export function isDue(order: Order, now: number): boolean {
  return now >= nextEligibleTime(order) && now <= order.endTime;
}

// Earliest next-eligible time first, then lowest id
function compareDue(a: Order, b: Order): number {
  const byTime = nextEligibleTime(a) - nextEligibleTime(b);
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Read-only view over the order store answering "which orders may execute now".
 */
export class DueOrderScanner {
  constructor(private readonly store: OrderStore) {}

  findDue(now: number): OrderId | undefined {
    let best: Order | undefined;
    for (const order of this.store.values()) {
      if (!isDue(order, now)) continue;
      if (!best || compareDue(order, best) < 0) {
        best = order;
      }
    }
    return best?.id;
  }

  findAllDue(now: number): OrderId[] {
    return this.store
      .values()
      .filter((order) => isDue(order, now))
      .sort(compareDue)
      .map((order) => order.id);
  }

  /**
   * Active orders sorted by when they next become eligible, due or not.
   */
  upcoming(limit: number): Array<{ id: OrderId; nextExecution: number; endTime: number }> {
    return this.store
      .values()
      .filter((order) => nextEligibleTime(order) <= order.endTime)
      .sort(compareDue)
      .slice(0, limit)
      .map((order) => ({ id: order.id, nextExecution: nextEligibleTime(order), endTime: order.endTime }));
  }
}
