import mongoose, { Document, Schema } from "mongoose";
import type { FrequencyClass } from "./Order.js";

// Archive status of an order
export type OrderStatus = "active" | "completed" | "cancelled";

// Execution log entry (amounts as decimal strings)
export interface IExecutionLog {
  timestamp: number; // unix seconds
  status: "success" | "failed";
  amountIn?: string;
  amountOut?: string;
  price?: string;
  errorCode?: string;
  error?: string;
}

// Archived order document
export interface IOrderHistory extends Document {
  orderId: string;
  owner: string;
  status: OrderStatus;

  // Budget
  totalAmount: string;
  amountPerSwap: string;
  remainingBalance: string;
  fee: string;
  totalAmountOut: string;

  // Scheduling
  frequencyClass: FrequencyClass;
  frequency: number;
  openedAt: number;
  lastExecutionTime: number;
  endTime: number;

  // Price window
  minPrice: string;
  maxPrice: string;

  // Progress
  swapsExecuted: number;
  totalSwaps: number;

  // Termination
  refunded: string;
  refundPending: boolean;
  terminatedAt?: number;

  executionLogs: IExecutionLog[];

  // Metadata
  createdAt: Date;
  updatedAt: Date;
}

const ExecutionLogSchema = new Schema<IExecutionLog>({
  timestamp: { type: Number, required: true },
  status: { type: String, enum: ["success", "failed"], required: true },
  amountIn: { type: String },
  amountOut: { type: String },
  price: { type: String },
  errorCode: { type: String },
  error: { type: String },
});

const OrderHistorySchema = new Schema<IOrderHistory>(
  {
    orderId: {
      type: String,
      required: true,
      unique: true,
    },
    owner: {
      type: String,
      required: true,
      lowercase: true,
      index: true,
    },
    status: {
      type: String,
      enum: ["active", "completed", "cancelled"],
      default: "active",
      index: true,
    },

    totalAmount: { type: String, required: true },
    amountPerSwap: { type: String, required: true },
    remainingBalance: { type: String, required: true },
    fee: { type: String, default: "0" },
    totalAmountOut: { type: String, default: "0" },

    frequencyClass: {
      type: String,
      enum: ["hourly", "daily", "weekly", "monthly"],
      required: true,
    },
    frequency: { type: Number, required: true },
    openedAt: { type: Number, required: true },
    lastExecutionTime: { type: Number, required: true },
    endTime: { type: Number, required: true },

    minPrice: { type: String, default: "0" },
    maxPrice: { type: String, default: "0" },

    swapsExecuted: { type: Number, default: 0 },
    totalSwaps: { type: Number, required: true },

    refunded: { type: String, default: "0" },
    refundPending: { type: Boolean, default: false },
    terminatedAt: { type: Number },

    executionLogs: [ExecutionLogSchema],
  },
  {
    timestamps: true,
  }
);

// Index for owner history queries
OrderHistorySchema.index({ owner: 1, openedAt: -1 });

export const OrderHistory = mongoose.model<IOrderHistory>("OrderHistory", OrderHistorySchema);
