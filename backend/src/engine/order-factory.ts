import { encodePacked, getAddress, isAddress, keccak256, zeroAddress, type Address } from "viem";
import { FREQUENCY_SECONDS, SECONDS_PER_DAY } from "../config/constants.js";
import type { CreateOrderParams, FrequencyClass, Order, OrderId } from "../models/Order.js";
import type { Custody } from "../services/custody.js";
import { DcaError } from "./errors.js";
import type { OrderEventBus } from "./events.js";
import type { OrderStore } from "./order-store.js";

export interface Schedule {
  frequency: number;
  totalSwaps: number;
  amountPerSwap: bigint;
  durationSeconds: number;
}

export function isFrequencyClass(value: unknown): value is FrequencyClass {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(FREQUENCY_SECONDS, value);
}

/**
 * Derive the execution schedule for a budget. The division remainder of
 * `totalAmount / totalSwaps` is never executed; it is refunded on termination.
 */
export function deriveSchedule(
  totalAmount: bigint,
  frequencyClass: FrequencyClass,
  durationDays: number
): Schedule {
  if (totalAmount <= 0n) {
    throw new DcaError("InvalidSchedule", "totalAmount must be positive");
  }
  if (!Number.isSafeInteger(durationDays) || durationDays <= 0) {
    throw new DcaError("InvalidSchedule", "durationDays must be a positive integer");
  }
  if (!isFrequencyClass(frequencyClass)) {
    throw new DcaError("InvalidSchedule", `Unknown frequency: ${String(frequencyClass)}`);
  }

  const frequency = FREQUENCY_SECONDS[frequencyClass];
  const durationSeconds = durationDays * SECONDS_PER_DAY;
  if (!Number.isSafeInteger(durationSeconds)) {
    throw new DcaError("InvalidSchedule", `Duration of ${durationDays} days is too long`);
  }
  const totalSwaps = Math.floor(durationSeconds / frequency);
  if (totalSwaps === 0) {
    throw new DcaError("InvalidSchedule", `Duration of ${durationDays} days is shorter than one ${frequencyClass} interval`);
  }

  const amountPerSwap = totalAmount / BigInt(totalSwaps);
  if (amountPerSwap === 0n) {
    throw new DcaError("InvalidSchedule", `totalAmount ${totalAmount} cannot fund ${totalSwaps} swaps`);
  }

  return { frequency, totalSwaps, amountPerSwap, durationSeconds };
}

export function orderIdFor(owner: Address, timestamp: number, sequence: bigint): OrderId {
  return keccak256(encodePacked(["address", "uint64", "uint64"], [owner, BigInt(timestamp), sequence]));
}

export function normalizeOwner(owner: string): Address {
  if (!isAddress(owner, { strict: false }) || getAddress(owner) === zeroAddress) {
    throw new DcaError("InvalidConfiguration", `Invalid owner address: ${owner}`);
  }
  return getAddress(owner);
}

function validatePriceWindow(minPrice: bigint, maxPrice: bigint): void {
  if (minPrice < 0n || maxPrice < 0n) {
    throw new DcaError("InvalidSchedule", "Price bounds must not be negative");
  }
  if (minPrice !== 0n && maxPrice !== 0n && minPrice > maxPrice) {
    throw new DcaError("InvalidSchedule", `minPrice ${minPrice} is above maxPrice ${maxPrice}`);
  }
}

/**
 * Validates creation parameters, pulls the deposit into custody and inserts
 * the new order. The custody pull happens before any state changes.
 */
export class OrderFactory {
  private sequence = 0n;

  constructor(
    private readonly store: OrderStore,
    private readonly custody: Custody,
    private readonly events: OrderEventBus
  ) {}

  async create(params: CreateOrderParams, now: number, executionFee: bigint): Promise<Order> {
    const owner = normalizeOwner(params.owner);
    const schedule = deriveSchedule(params.totalAmount, params.frequencyClass, params.durationDays);
    validatePriceWindow(params.minPrice, params.maxPrice);

    const endTime = now + schedule.durationSeconds;
    if (!Number.isSafeInteger(endTime)) {
      throw new DcaError("InvalidSchedule", `Duration of ${params.durationDays} days runs past the supported time range`);
    }

    if (params.feePayment < executionFee) {
      throw new DcaError("InsufficientFee", `Fee payment ${params.feePayment} is below the execution fee ${executionFee}`);
    }

    const sequence = this.sequence + 1n;
    const id = orderIdFor(owner, now, sequence);
    if (this.store.containsId(id)) {
      throw new DcaError("DuplicateOrder", `Order ${id} already exists`);
    }

    try {
      await this.custody.transferIn(owner, params.totalAmount + params.feePayment);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DcaError("CustodyTransferFailed", `Deposit from ${owner} failed: ${reason}`, error);
    }

    const order: Order = {
      id,
      owner,
      totalAmount: params.totalAmount,
      amountPerSwap: schedule.amountPerSwap,
      remainingBalance: params.totalAmount,
      fee: params.feePayment,
      frequencyClass: params.frequencyClass,
      frequency: schedule.frequency,
      createdAt: now,
      lastExecutionTime: now,
      endTime,
      minPrice: params.minPrice,
      maxPrice: params.maxPrice,
      swapsExecuted: 0,
      totalSwaps: schedule.totalSwaps,
      totalAmountOut: 0n,
    };

    this.sequence = sequence;
    this.store.insert(order);
    this.events.emit({ type: "order.created", order: { ...order } });

    return order;
  }
}
