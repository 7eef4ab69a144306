import type { Order, OrderId } from "../models/Order.js";
import { DcaError } from "./errors.js";

function cloneOrder(order: Order): Order {
  return { ...order };
}

/**
 * Active orders keyed by id, plus a dense index of the active ids.
 *
 * `positions` maps every id to its slot in `index`, so removal swaps the
 * target with the last slot and pops in O(1). The order of `ids()` changes on
 * removal and is not part of the contract.
 */
export class OrderStore {
  private readonly orders = new Map<OrderId, Order>();
  private readonly index: OrderId[] = [];
  private readonly positions = new Map<OrderId, number>();

  insert(order: Order): void {
    if (this.orders.has(order.id)) {
      throw new DcaError("DuplicateOrder", `Order ${order.id} already exists`);
    }

    this.orders.set(order.id, cloneOrder(order));
    this.positions.set(order.id, this.index.length);
    this.index.push(order.id);
  }

  get(id: OrderId): Order | undefined {
    const order = this.orders.get(id);
    return order ? cloneOrder(order) : undefined;
  }

  /**
   * Replace the stored record of an existing order.
   */
  update(order: Order): void {
    if (!this.orders.has(order.id)) {
      throw new DcaError("OrderNotFound", `Order ${order.id} not found`);
    }
    this.orders.set(order.id, cloneOrder(order));
  }

  /**
   * Remove an order from both the map and the index.
   * Returns the removed order, or undefined when the id is not active.
   */
  removeById(id: OrderId): Order | undefined {
    const order = this.orders.get(id);
    const position = this.positions.get(id);
    if (!order || position === undefined) {
      return undefined;
    }

    const lastPosition = this.index.length - 1;
    const lastId = this.index[lastPosition];
    if (position !== lastPosition && lastId !== undefined) {
      this.index[position] = lastId;
      this.positions.set(lastId, position);
    }
    this.index.pop();
    this.positions.delete(id);
    this.orders.delete(id);

    return order;
  }

  count(): number {
    return this.index.length;
  }

  containsId(id: OrderId): boolean {
    return this.positions.has(id);
  }

  ids(): OrderId[] {
    return [...this.index];
  }

  values(): Order[] {
    const result: Order[] = [];
    for (const id of this.index) {
      const order = this.orders.get(id);
      if (order) result.push(cloneOrder(order));
    }
    return result;
  }
}
