import type { Address } from "viem";
import type { ExecutionReceipt, Order, OrderId, PreauthorizationResult } from "../models/Order.js";
import type { Exchange } from "../services/exchange.js";
import { DcaError } from "./errors.js";
import type { OrderEventBus } from "./events.js";
import type { LifecycleTerminator } from "./lifecycle-terminator.js";
import type { OrderStore } from "./order-store.js";

export interface ExecutionSettings {
  agent: Address | null;
}

export function checkPriceWindow(order: Order, price: bigint): void {
  if (order.minPrice !== 0n && price < order.minPrice) {
    throw new DcaError("PriceBelowMinimum", `Price ${price} is below minimum ${order.minPrice}`);
  }
  if (order.maxPrice !== 0n && price > order.maxPrice) {
    throw new DcaError("PriceAboveMaximum", `Price ${price} is above maximum ${order.maxPrice}`);
  }
}

export function isCompleted(order: Order, now: number): boolean {
  return (
    order.swapsExecuted >= order.totalSwaps ||
    now >= order.endTime ||
    order.remainingBalance < order.amountPerSwap
  );
}

/**
 * Runs one partial execution of a due order. `execute` is the only place that
 * debits `remainingBalance` during normal operation; `preauthorize` checks the
 * same gates without touching state.
 */
export class ExecutionEngine {
  constructor(
    private readonly store: OrderStore,
    private readonly exchange: Exchange,
    private readonly terminator: LifecycleTerminator,
    private readonly events: OrderEventBus,
    private readonly settings: () => ExecutionSettings
  ) {}

  private assertAgent(caller: Address): void {
    const { agent } = this.settings();
    if (!agent || agent !== caller) {
      throw new DcaError("Unauthorized", `${caller} is not the automation agent`);
    }
  }

  private requireOrder(orderId: OrderId): Order {
    const order = this.store.get(orderId);
    if (!order) {
      throw new DcaError("OrderNotFound", `Order ${orderId} not found`);
    }
    return order;
  }

  async execute(orderId: OrderId, now: number, price: bigint, caller: Address): Promise<ExecutionReceipt> {
    this.assertAgent(caller);
    const order = this.requireOrder(orderId);

    if (now < order.lastExecutionTime + order.frequency) {
      throw new DcaError(
        "TooEarly",
        `Order ${orderId} is not due until ${order.lastExecutionTime + order.frequency}`
      );
    }
    if (now > order.endTime) {
      throw new DcaError("PeriodEnded", `Order ${orderId} ended at ${order.endTime}`);
    }
    if (order.remainingBalance < order.amountPerSwap) {
      throw new DcaError(
        "InsufficientBalance",
        `Remaining balance ${order.remainingBalance} is below ${order.amountPerSwap}`
      );
    }
    checkPriceWindow(order, price);

    let amountOut: bigint;
    try {
      amountOut = await this.exchange.swap(order.amountPerSwap);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DcaError("ExchangeFailed", `Swap for order ${orderId} failed: ${reason}`, error);
    }

    const updated: Order = {
      ...order,
      remainingBalance: order.remainingBalance - order.amountPerSwap,
      swapsExecuted: order.swapsExecuted + 1,
      lastExecutionTime: now,
      totalAmountOut: order.totalAmountOut + amountOut,
    };
    this.store.update(updated);

    this.events.emit({
      type: "order.executed",
      orderId,
      owner: order.owner,
      amountIn: order.amountPerSwap,
      amountOut,
      price,
      executedAt: now,
      order: { ...updated },
    });

    const completed = isCompleted(updated, now);
    if (completed) {
      await this.terminator.terminate(orderId, "completed");
    }

    return {
      orderId,
      owner: order.owner,
      amountIn: order.amountPerSwap,
      amountOut,
      price,
      executedAt: now,
      swapsExecuted: updated.swapsExecuted,
      remainingBalance: updated.remainingBalance,
      completed,
    };
  }

  /**
   * Pre-trade gate used when the agent routes a swap externally. The execution
   * fee was collected at creation and sits outside `remainingBalance`, so the
   * balance gate is the same one `execute` applies. Debits nothing: the debit
   * belongs to `execute`.
   */
  preauthorize(orderId: OrderId, price: bigint, caller: Address): PreauthorizationResult {
    this.assertAgent(caller);
    const order = this.requireOrder(orderId);
    checkPriceWindow(order, price);

    if (order.remainingBalance < order.amountPerSwap) {
      throw new DcaError(
        "InsufficientBalance",
        `Remaining balance ${order.remainingBalance} is below ${order.amountPerSwap}`
      );
    }

    return { orderId, amountIn: order.amountPerSwap, fee: order.fee, price };
  }
}
