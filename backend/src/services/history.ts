import { getAddress, type Address, type Hex } from "viem";
import type { OrderEvent, OrderEventBus } from "../engine/events.js";
import type { FrequencyClass, Order, OrderId } from "../models/Order.js";
import { OrderHistory, type IExecutionLog, type IOrderHistory, type OrderStatus } from "../models/OrderHistory.js";

// ============================================
// Types
// ============================================

export interface ExecutionLog {
  timestamp: number;
  status: "success" | "failed";
  amountIn?: bigint;
  amountOut?: bigint;
  price?: bigint;
  errorCode?: string;
  error?: string;
}

export interface OrderHistoryRecord {
  order: Order;
  status: OrderStatus;
  refunded: bigint;
  refundPending: boolean;
  terminatedAt?: number;
  executionLogs: ExecutionLog[];
}

export interface Termination {
  status: Exclude<OrderStatus, "active">;
  refunded: bigint;
  refundPending: boolean;
  terminatedAt: number;
}

/**
 * Archive of orders and their execution logs. Unlike the order store it keeps
 * terminated orders.
 */
export interface OrderHistoryStore {
  saveOrder(order: Order): Promise<void>;
  appendLog(orderId: OrderId, log: ExecutionLog): Promise<void>;
  markTerminated(order: Order, termination: Termination): Promise<void>;
  get(orderId: OrderId): Promise<OrderHistoryRecord | null>;
  listByOwner(owner: Address): Promise<OrderHistoryRecord[]>;
}

// ============================================
// In-memory archive
// ============================================

export class InMemoryOrderHistoryStore implements OrderHistoryStore {
  private readonly records = new Map<OrderId, OrderHistoryRecord>();

  async saveOrder(order: Order): Promise<void> {
    const existing = this.records.get(order.id);
    this.records.set(order.id, {
      order: { ...order },
      status: existing?.status ?? "active",
      refunded: existing?.refunded ?? 0n,
      refundPending: existing?.refundPending ?? false,
      terminatedAt: existing?.terminatedAt,
      executionLogs: existing?.executionLogs ?? [],
    });
  }

  async appendLog(orderId: OrderId, log: ExecutionLog): Promise<void> {
    this.records.get(orderId)?.executionLogs.push({ ...log });
  }

  async markTerminated(order: Order, termination: Termination): Promise<void> {
    await this.saveOrder(order);
    const record = this.records.get(order.id);
    if (!record) return;
    record.status = termination.status;
    record.refunded = termination.refunded;
    record.refundPending = termination.refundPending;
    record.terminatedAt = termination.terminatedAt;
  }

  async get(orderId: OrderId): Promise<OrderHistoryRecord | null> {
    const record = this.records.get(orderId);
    return record ? { ...record, executionLogs: [...record.executionLogs] } : null;
  }

  async listByOwner(owner: Address): Promise<OrderHistoryRecord[]> {
    const account = getAddress(owner);
    return [...this.records.values()]
      .filter((record) => record.order.owner === account)
      .sort((a, b) => b.order.createdAt - a.order.createdAt);
  }
}

// ============================================
// MongoDB archive
// ============================================

function toLogDocument(log: ExecutionLog): IExecutionLog {
  return {
    timestamp: log.timestamp,
    status: log.status,
    amountIn: log.amountIn?.toString(),
    amountOut: log.amountOut?.toString(),
    price: log.price?.toString(),
    errorCode: log.errorCode,
    error: log.error,
  };
}

function fromLogDocument(log: IExecutionLog): ExecutionLog {
  return {
    timestamp: log.timestamp,
    status: log.status,
    amountIn: log.amountIn !== undefined ? BigInt(log.amountIn) : undefined,
    amountOut: log.amountOut !== undefined ? BigInt(log.amountOut) : undefined,
    price: log.price !== undefined ? BigInt(log.price) : undefined,
    errorCode: log.errorCode,
    error: log.error,
  };
}

function orderFields(order: Order) {
  return {
    owner: order.owner.toLowerCase(),
    totalAmount: order.totalAmount.toString(),
    amountPerSwap: order.amountPerSwap.toString(),
    remainingBalance: order.remainingBalance.toString(),
    fee: order.fee.toString(),
    totalAmountOut: order.totalAmountOut.toString(),
    frequencyClass: order.frequencyClass,
    frequency: order.frequency,
    openedAt: order.createdAt,
    lastExecutionTime: order.lastExecutionTime,
    endTime: order.endTime,
    minPrice: order.minPrice.toString(),
    maxPrice: order.maxPrice.toString(),
    swapsExecuted: order.swapsExecuted,
    totalSwaps: order.totalSwaps,
  };
}

function isHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value);
}

function toRecord(doc: IOrderHistory): OrderHistoryRecord {
  if (!isHex(doc.orderId)) {
    throw new Error(`Corrupt order id in history: ${doc.orderId}`);
  }
  const frequencyClass: FrequencyClass = doc.frequencyClass;
  return {
    order: {
      id: doc.orderId,
      owner: getAddress(doc.owner),
      totalAmount: BigInt(doc.totalAmount),
      amountPerSwap: BigInt(doc.amountPerSwap),
      remainingBalance: BigInt(doc.remainingBalance),
      fee: BigInt(doc.fee),
      frequencyClass,
      frequency: doc.frequency,
      createdAt: doc.openedAt,
      lastExecutionTime: doc.lastExecutionTime,
      endTime: doc.endTime,
      minPrice: BigInt(doc.minPrice),
      maxPrice: BigInt(doc.maxPrice),
      swapsExecuted: doc.swapsExecuted,
      totalSwaps: doc.totalSwaps,
      totalAmountOut: BigInt(doc.totalAmountOut),
    },
    status: doc.status,
    refunded: BigInt(doc.refunded),
    refundPending: doc.refundPending,
    terminatedAt: doc.terminatedAt,
    executionLogs: doc.executionLogs.map(fromLogDocument),
  };
}

export class MongoOrderHistoryStore implements OrderHistoryStore {
  async saveOrder(order: Order): Promise<void> {
    await OrderHistory.updateOne(
      { orderId: order.id },
      { $set: orderFields(order), $setOnInsert: { orderId: order.id, status: "active" } },
      { upsert: true }
    );
  }

  async appendLog(orderId: OrderId, log: ExecutionLog): Promise<void> {
    await OrderHistory.updateOne({ orderId }, { $push: { executionLogs: toLogDocument(log) } });
  }

  async markTerminated(order: Order, termination: Termination): Promise<void> {
    await OrderHistory.updateOne(
      { orderId: order.id },
      {
        $set: {
          ...orderFields(order),
          status: termination.status,
          refunded: termination.refunded.toString(),
          refundPending: termination.refundPending,
          terminatedAt: termination.terminatedAt,
        },
        $setOnInsert: { orderId: order.id },
      },
      { upsert: true }
    );
  }

  async get(orderId: OrderId): Promise<OrderHistoryRecord | null> {
    const doc = await OrderHistory.findOne({ orderId });
    return doc ? toRecord(doc) : null;
  }

  async listByOwner(owner: Address): Promise<OrderHistoryRecord[]> {
    const docs = await OrderHistory.find({ owner: owner.toLowerCase() }).sort({ openedAt: -1 });
    return docs.map(toRecord);
  }
}

// ============================================
// Event recorder
// ============================================

/**
 * Mirrors engine events into a history store. Writes are applied in event
 * order; a failed write is logged and the following writes still run.
 */
export class OrderHistoryRecorder {
  private pending: Promise<void> = Promise.resolve();
  private readonly refundFailures = new Set<OrderId>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly store: OrderHistoryStore,
    private readonly clock: () => number = () => Math.floor(Date.now() / 1000)
  ) {}

  attach(events: OrderEventBus): void {
    this.detach();
    this.unsubscribe = events.onAny((event) => this.enqueue(event));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Record a rejected execution attempt; rejections are not engine events.
   */
  recordFailure(orderId: OrderId, timestamp: number, errorCode: string, error: string): void {
    this.chain(`failure of ${orderId}`, () =>
      this.store.appendLog(orderId, { timestamp, status: "failed", errorCode, error })
    );
  }

  /**
   * Resolves once every write queued so far has settled.
   */
  flush(): Promise<void> {
    return this.pending;
  }

  private enqueue(event: OrderEvent): void {
    switch (event.type) {
      case "order.created":
        this.chain(event.type, () => this.store.saveOrder(event.order));
        break;
      case "order.executed":
        this.chain(event.type, async () => {
          await this.store.saveOrder(event.order);
          await this.store.appendLog(event.orderId, {
            timestamp: event.executedAt,
            status: "success",
            amountIn: event.amountIn,
            amountOut: event.amountOut,
            price: event.price,
          });
        });
        break;
      case "order.refund_failed":
        this.refundFailures.add(event.orderId);
        break;
      case "order.completed": {
        const refundPending = this.refundFailures.delete(event.orderId);
        this.chain(event.type, () =>
          this.store.markTerminated(event.order, {
            status: "completed",
            refunded: refundPending ? 0n : event.remainingBalance,
            refundPending,
            terminatedAt: event.order.lastExecutionTime,
          })
        );
        break;
      }
      case "order.cancelled":
        this.chain(event.type, () =>
          this.store.markTerminated(event.order, {
            status: "cancelled",
            refunded: event.refunded,
            refundPending: false,
            terminatedAt: this.clock(),
          })
        );
        break;
      case "order.refund_settled":
        break;
    }
  }

  private chain(label: string, write: () => Promise<void>): void {
    this.pending = this.pending.then(write).catch((error: unknown) => {
      console.error(`❌ History write failed (${label}):`, error);
    });
  }
}
