import type { Request, Response } from "express";
import { getAddress, isAddress, type Address } from "viem";
import { DcaError, type DcaErrorCode } from "../engine/errors.js";
import type { OrderId } from "../models/Order.js";

export const CALLER_HEADER = "x-caller-address";

/**
 * Malformed request input, rejected before it reaches the engine.
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

const STATUS_BY_CODE: Record<DcaErrorCode, number> = {
  InvalidSchedule: 400,
  InvalidConfiguration: 400,
  InsufficientFee: 400,
  Unauthorized: 403,
  NotOrderOwner: 403,
  OrderNotFound: 404,
  NotInitialized: 409,
  AlreadyInitialized: 409,
  DuplicateOrder: 409,
  TooEarly: 409,
  PeriodEnded: 409,
  InsufficientBalance: 409,
  PriceBelowMinimum: 409,
  PriceAboveMaximum: 409,
  NoPendingRefund: 409,
  CustodyTransferFailed: 502,
  ExchangeFailed: 502,
  OracleUnavailable: 502,
};

export function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof DcaError) {
    res.status(STATUS_BY_CODE[error.code]).json({
      success: false,
      error: error.message,
      code: error.code,
      retryable: error.retryable,
    });
    return;
  }

  if (error instanceof BadRequestError) {
    res.status(400).json({ success: false, error: error.message, code: "BadRequest", retryable: false });
    return;
  }

  console.error(`${fallback}:`, error);
  res.status(500).json({ success: false, error: fallback, code: "Internal", retryable: false });
}

export function callerOf(req: Request): Address {
  const header = req.header(CALLER_HEADER);
  if (!header || !isAddress(header, { strict: false })) {
    throw new DcaError("Unauthorized", `Missing or invalid ${CALLER_HEADER} header`);
  }
  return getAddress(header);
}

export function parseAddress(value: unknown, field: string): Address {
  if (typeof value !== "string" || !isAddress(value, { strict: false })) {
    throw new BadRequestError(`${field} must be an address`);
  }
  return getAddress(value);
}

export function parseAmount(value: unknown, field: string, fallback?: bigint): bigint {
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new BadRequestError(`${field} must be a non-negative integer (decimal string)`);
}

export function parseInteger(value: unknown, field: string, min?: number): number {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isSafeInteger(parsed)) {
    throw new BadRequestError(`${field} must be an integer`);
  }
  if (min !== undefined && parsed < min) {
    throw new BadRequestError(`${field} must be an integer of at least ${min}`);
  }
  return parsed;
}

export function parseOrderId(value: string): OrderId {
  if (!/^0x[0-9a-fA-F]{64}$/.test(value)) {
    throw new DcaError("OrderNotFound", `Order ${value} not found`);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

/**
 * JSON replacer that writes bigint amounts as decimal strings.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
