import type { Address, Hex } from "viem";

// Frequency classes
export type FrequencyClass = "hourly" | "daily" | "weekly" | "monthly";

// Termination reasons
export type TerminationReason = "completed" | "cancelled";

export type OrderId = Hex;

// Main order record held by the order store
export interface Order {
  // Identification
  id: OrderId;
  owner: Address;

  // Budget
  totalAmount: bigint; // Smallest unit of the funding token
  amountPerSwap: bigint;
  remainingBalance: bigint;
  fee: bigint; // Fee paid at creation, kept out of remainingBalance

  // Scheduling (unix seconds)
  frequencyClass: FrequencyClass;
  frequency: number;
  createdAt: number;
  lastExecutionTime: number;
  endTime: number;

  // Price window, 0 = unbounded
  minPrice: bigint;
  maxPrice: bigint;

  // Progress
  swapsExecuted: number;
  totalSwaps: number;
  totalAmountOut: bigint; // Sum of target-token output reported by the exchange
}

// User-supplied creation parameters
export interface CreateOrderParams {
  owner: Address;
  totalAmount: bigint;
  frequencyClass: FrequencyClass;
  durationDays: number;
  minPrice: bigint;
  maxPrice: bigint;
  feePayment: bigint;
}

// Engine configuration set once by the admin
export interface EngineConfig {
  fundingAsset: Address;
  targetAsset: Address;
  priceFeed: Address;
}

export interface ExecutionReceipt {
  orderId: OrderId;
  owner: Address;
  amountIn: bigint;
  amountOut: bigint;
  price: bigint;
  executedAt: number;
  swapsExecuted: number;
  remainingBalance: bigint;
  completed: boolean;
}

export interface PreauthorizationResult {
  orderId: OrderId;
  amountIn: bigint;
  fee: bigint;
  price: bigint;
}

export interface TerminationReceipt {
  orderId: OrderId;
  owner: Address;
  reason: TerminationReason;
  swapsExecuted: number;
  remainingBalance: bigint;
  refunded: bigint;
  refundPending: boolean;
}

export interface EngineStats {
  initialized: boolean;
  activeOrders: number;
  ordersCreated: number;
  ordersCompleted: number;
  ordersCancelled: number;
  swapsExecuted: number;
  collectedFees: bigint;
  pendingRefunds: bigint;
  executionFee: bigint;
  agent: Address | null;
}
