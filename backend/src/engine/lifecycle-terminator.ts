import type { Address } from "viem";
import type { OrderId, TerminationReason, TerminationReceipt } from "../models/Order.js";
import type { Custody } from "../services/custody.js";
import { DcaError } from "./errors.js";
import type { OrderEventBus } from "./events.js";
import type { OrderStore } from "./order-store.js";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The only path that deletes orders and the only path that refunds
 * `remainingBalance`.
 *
 * Cancellation refunds before removing, so a failed refund leaves the order
 * exactly as it was. Completion happens after a swap that cannot be undone:
 * the order is always removed, and a refund that fails is parked as a pending
 * refund for the owner instead of being dropped.
 */
export class LifecycleTerminator {
  private readonly pendingRefunds = new Map<Address, bigint>();

  constructor(
    private readonly store: OrderStore,
    private readonly custody: Custody,
    private readonly events: OrderEventBus
  ) {}

  async cancel(orderId: OrderId, caller: Address): Promise<TerminationReceipt> {
    const order = this.store.get(orderId);
    if (!order) {
      throw new DcaError("OrderNotFound", `Order ${orderId} not found`);
    }
    if (order.owner !== caller) {
      throw new DcaError("NotOrderOwner", `${caller} does not own order ${orderId}`);
    }
    return this.terminate(orderId, "cancelled");
  }

  async terminate(orderId: OrderId, reason: TerminationReason): Promise<TerminationReceipt> {
    const order = this.store.get(orderId);
    if (!order) {
      throw new DcaError("OrderNotFound", `Order ${orderId} not found`);
    }

    const balance = order.remainingBalance;
    let refunded = 0n;
    let refundPending = false;

    if (balance > 0n) {
      try {
        await this.custody.transferOut(order.owner, balance);
        refunded = balance;
      } catch (error) {
        if (reason === "cancelled") {
          throw new DcaError("CustodyTransferFailed", `Refund to ${order.owner} failed: ${errorMessage(error)}`, error);
        }
        this.addPendingRefund(order.owner, balance);
        refundPending = true;
        this.events.emit({
          type: "order.refund_failed",
          orderId,
          owner: order.owner,
          amount: balance,
          error: errorMessage(error),
        });
      }
    }

    this.store.removeById(orderId);
    const finalOrder = { ...order, remainingBalance: 0n };

    if (reason === "completed") {
      this.events.emit({
        type: "order.completed",
        orderId,
        owner: order.owner,
        swapsExecuted: order.swapsExecuted,
        remainingBalance: balance,
        order: finalOrder,
      });
    } else {
      this.events.emit({ type: "order.cancelled", orderId, owner: order.owner, refunded, order: finalOrder });
    }

    return {
      orderId,
      owner: order.owner,
      reason,
      swapsExecuted: order.swapsExecuted,
      remainingBalance: balance,
      refunded,
      refundPending,
    };
  }

  pendingRefundOf(owner: Address): bigint {
    return this.pendingRefunds.get(owner) ?? 0n;
  }

  totalPendingRefunds(): bigint {
    let total = 0n;
    for (const amount of this.pendingRefunds.values()) total += amount;
    return total;
  }

  /**
   * Pay out a parked refund. On failure the pending amount is kept.
   */
  async retryRefund(owner: Address): Promise<bigint> {
    const amount = this.pendingRefundOf(owner);
    if (amount === 0n) {
      throw new DcaError("NoPendingRefund", `No pending refund for ${owner}`);
    }

    try {
      await this.custody.transferOut(owner, amount);
    } catch (error) {
      throw new DcaError("CustodyTransferFailed", `Refund to ${owner} failed: ${errorMessage(error)}`, error);
    }

    this.pendingRefunds.delete(owner);
    this.events.emit({ type: "order.refund_settled", owner, amount });
    return amount;
  }

  private addPendingRefund(owner: Address, amount: bigint): void {
    this.pendingRefunds.set(owner, this.pendingRefundOf(owner) + amount);
  }
}
