export type DcaErrorCode =
  | "InvalidSchedule"
  | "InvalidConfiguration"
  | "InsufficientFee"
  | "NotInitialized"
  | "AlreadyInitialized"
  | "Unauthorized"
  | "NotOrderOwner"
  | "OrderNotFound"
  | "DuplicateOrder"
  | "TooEarly"
  | "PeriodEnded"
  | "InsufficientBalance"
  | "PriceBelowMinimum"
  | "PriceAboveMaximum"
  | "CustodyTransferFailed"
  | "ExchangeFailed"
  | "OracleUnavailable"
  | "NoPendingRefund";

// Rejections the agent may resubmit later without changing the request
const RETRYABLE_CODES: ReadonlySet<DcaErrorCode> = new Set<DcaErrorCode>([
  "TooEarly",
  "PriceBelowMinimum",
  "PriceAboveMaximum",
  "CustodyTransferFailed",
  "ExchangeFailed",
  "OracleUnavailable",
]);

export function isRetryable(code: DcaErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

/**
 * Failure of an engine operation. Every engine operation that throws one of
 * these has left the order state exactly as it found it.
 */
export class DcaError extends Error {
  constructor(
    public readonly code: DcaErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "DcaError";
    this.cause = cause;
  }

  get retryable(): boolean {
    return isRetryable(this.code);
  }
}

export function isDcaError(error: unknown, code?: DcaErrorCode): error is DcaError {
  return error instanceof DcaError && (code === undefined || error.code === code);
}
