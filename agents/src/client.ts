import type { Address, Hex } from "viem";

// ============================================
// Types
// ============================================

export interface DueOrder {
  id: Hex;
  owner: string;
  amountPerSwap: string;
  nextExecution: number;
}

export interface Preauthorization {
  amountIn: string;
  fee: string;
  price: string;
}

export interface ExecutionReceipt {
  amountIn: string;
  amountOut: string;
  price: string;
  remainingBalance: string;
  completed: boolean;
}

/**
 * Backend rejected a request. `retryable` mirrors the engine's own
 * classification: a retryable rejection means "try again next cycle".
 */
export class BackendError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly status: number
  ) {
    super(message);
    this.name = "BackendError";
  }
}

export interface BackendClient {
  fetchDueOrders(): Promise<DueOrder[]>;
  preauthorize(orderId: Hex): Promise<Preauthorization>;
  executeOrder(orderId: Hex): Promise<ExecutionReceipt>;
}

// ============================================
// Response parsing
// ============================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHex(value: unknown): value is Hex {
  return typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value);
}

function text(record: JsonRecord, key: string): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  throw new Error(`Malformed backend response: missing ${key}`);
}

function toDueOrder(value: unknown): DueOrder {
  if (!isRecord(value) || !isHex(value.id) || typeof value.nextExecution !== "number") {
    throw new Error("Malformed backend response: bad order entry");
  }
  return {
    id: value.id,
    owner: text(value, "owner"),
    amountPerSwap: text(value, "amountPerSwap"),
    nextExecution: value.nextExecution,
  };
}

function toReceipt(value: unknown): ExecutionReceipt {
  if (!isRecord(value) || typeof value.completed !== "boolean") {
    throw new Error("Malformed backend response: bad receipt");
  }
  return {
    amountIn: text(value, "amountIn"),
    amountOut: text(value, "amountOut"),
    price: text(value, "price"),
    remainingBalance: text(value, "remainingBalance"),
    completed: value.completed,
  };
}

// ============================================
// HTTP client
// ============================================

export class HttpBackendClient implements BackendClient {
  constructor(
    private readonly baseUrl: string,
    private readonly agent: Address
  ) {}

  async fetchDueOrders(): Promise<DueOrder[]> {
    const data = await this.request("GET", "/api/orders/due");
    if (!Array.isArray(data.orders)) {
      throw new Error("Malformed backend response: missing orders");
    }
    return data.orders.map(toDueOrder);
  }

  async preauthorize(orderId: Hex): Promise<Preauthorization> {
    const data = await this.request("POST", `/api/orders/${orderId}/preauthorize`);
    return {
      amountIn: text(data, "amountIn"),
      fee: text(data, "fee"),
      price: text(data, "price"),
    };
  }

  async executeOrder(orderId: Hex): Promise<ExecutionReceipt> {
    const data = await this.request("POST", `/api/orders/${orderId}/execute`);
    return toReceipt(data.receipt);
  }

  private async request(method: "GET" | "POST", path: string): Promise<JsonRecord> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: { "content-type": "application/json", "x-caller-address": this.agent },
      });
    } catch (error) {
      throw new Error(`Cannot connect to backend at ${this.baseUrl}. Is the backend running?`, { cause: error });
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new Error(`Malformed backend response from ${path}`);
    }

    if (!response.ok || body.success !== true) {
      throw new BackendError(
        typeof body.error === "string" ? body.error : `Request failed with status ${response.status}`,
        typeof body.code === "string" ? body.code : "Unknown",
        body.retryable === true,
        response.status
      );
    }
    return body;
  }
}
