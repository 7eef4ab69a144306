import type { Address } from "viem";
import type { Order, OrderId } from "../models/Order.js";

export type OrderEvent =
  | { type: "order.created"; order: Order }
  | {
      type: "order.executed";
      orderId: OrderId;
      owner: Address;
      amountIn: bigint;
      amountOut: bigint;
      price: bigint;
      executedAt: number;
      order: Order;
    }
  | {
      type: "order.completed";
      orderId: OrderId;
      owner: Address;
      swapsExecuted: number;
      remainingBalance: bigint;
      order: Order;
    }
  | { type: "order.cancelled"; orderId: OrderId; owner: Address; refunded: bigint; order: Order }
  | { type: "order.refund_failed"; orderId: OrderId; owner: Address; amount: bigint; error: string }
  | { type: "order.refund_settled"; owner: Address; amount: bigint };

export type OrderEventType = OrderEvent["type"];

export type OrderEventOf<T extends OrderEventType> = Extract<OrderEvent, { type: T }>;

type Listener = (event: OrderEvent) => void;

function isEventOfType<T extends OrderEventType>(event: OrderEvent, type: T): event is OrderEventOf<T> {
  return event.type === type;
}

/**
 * Synchronous notification bus for order lifecycle events. A failing listener
 * is logged and never interrupts the engine operation that emitted the event.
 */
export class OrderEventBus {
  private readonly listeners = new Set<Listener>();

  on<T extends OrderEventType>(type: T, listener: (event: OrderEventOf<T>) => void): () => void {
    return this.onAny((event) => {
      if (isEventOfType(event, type)) {
        listener(event);
      }
    });
  }

  onAny(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: OrderEvent): void {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        console.error(`Event listener failed for ${event.type}`, error);
      }
    });
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}
