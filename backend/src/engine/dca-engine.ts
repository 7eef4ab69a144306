import { getAddress, isAddress, isAddressEqual, zeroAddress, type Address } from "viem";
import type {
  CreateOrderParams,
  EngineConfig,
  EngineStats,
  ExecutionReceipt,
  Order,
  OrderId,
  PreauthorizationResult,
  TerminationReceipt,
} from "../models/Order.js";
import type { Custody } from "../services/custody.js";
import type { Exchange } from "../services/exchange.js";
import type { PriceOracle } from "../services/price-oracle.js";
import { DueOrderScanner } from "./due-scanner.js";
import { DcaError } from "./errors.js";
import { OrderEventBus } from "./events.js";
import { ExecutionEngine, type ExecutionSettings } from "./execution-engine.js";
import { LifecycleTerminator } from "./lifecycle-terminator.js";
import { OrderFactory } from "./order-factory.js";
import { OrderStore } from "./order-store.js";

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface DcaEngineOptions {
  admin: Address;
  custody: Custody;
  createOracle: (config: EngineConfig) => PriceOracle;
  createExchange: (config: EngineConfig) => Exchange;
  clock?: Clock;
  events?: OrderEventBus;
}

function requireAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false }) || isAddressEqual(getAddress(value), zeroAddress)) {
    throw new DcaError("InvalidConfiguration", `${field} must be a non-zero address`);
  }
  return getAddress(value);
}

/**
 * Entry point for every order operation.
 *
 * Operations run one at a time through a FIFO lock: each one either applies
 * all of its state changes and transfers or none of them, and no caller ever
 * observes an order halfway through an operation.
 */
export class DcaEngine {
  readonly events: OrderEventBus;

  private readonly store = new OrderStore();
  private readonly scanner: DueOrderScanner;
  private readonly factory: OrderFactory;
  private readonly terminator: LifecycleTerminator;
  private readonly execution: ExecutionEngine;
  private readonly clock: Clock;
  private readonly admin: Address;

  private config: EngineConfig | null = null;
  private oracle: PriceOracle | null = null;
  private exchange: Exchange | null = null;
  private agent: Address | null = null;
  private executionFee = 0n;
  private collectedFees = 0n;
  private readonly counters = { created: 0, completed: 0, cancelled: 0, swaps: 0 };

  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: DcaEngineOptions) {
    this.admin = requireAddress(options.admin, "admin");
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new OrderEventBus();
    this.scanner = new DueOrderScanner(this.store);
    this.factory = new OrderFactory(this.store, options.custody, this.events);
    this.terminator = new LifecycleTerminator(this.store, options.custody, this.events);
    this.execution = new ExecutionEngine(
      this.store,
      {
        // Resolved per call: the exchange only exists after initialize()
        swap: (amountIn) => this.requireExchange().swap(amountIn),
      },
      this.terminator,
      this.events,
      (): ExecutionSettings => ({ agent: this.agent })
    );
  }

  private requireExchange(): Exchange {
    if (!this.exchange) {
      throw new DcaError("NotInitialized", "Engine has not been initialized");
    }
    return this.exchange;
  }

  // ============================================
  // Serialisation
  // ============================================

  private exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(task);
    // The caller receives the outcome through `run`; the queue only tracks completion
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private requireConfig(): EngineConfig {
    if (!this.config) {
      throw new DcaError("NotInitialized", "Engine has not been initialized");
    }
    return this.config;
  }

  private assertAdmin(caller: Address): void {
    if (!isAddressEqual(caller, this.admin)) {
      throw new DcaError("Unauthorized", `${caller} is not the admin`);
    }
  }

  private async readPrice(): Promise<bigint> {
    this.requireConfig();
    if (!this.oracle) {
      throw new DcaError("NotInitialized", "Price oracle is not configured");
    }
    try {
      const { value } = await this.oracle.latestPrice();
      return value;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DcaError("OracleUnavailable", `Price oracle read failed: ${reason}`, error);
    }
  }

  // ============================================
  // Administration
  // ============================================

  initialize(caller: Address, config: EngineConfig): Promise<EngineConfig> {
    return this.exclusive(() => {
      this.assertAdmin(caller);
      if (this.config) {
        throw new DcaError("AlreadyInitialized", "Engine is already initialized");
      }

      const fundingAsset = requireAddress(config.fundingAsset, "fundingAsset");
      const targetAsset = requireAddress(config.targetAsset, "targetAsset");
      const priceFeed = requireAddress(config.priceFeed, "priceFeed");
      if (isAddressEqual(fundingAsset, targetAsset)) {
        throw new DcaError("InvalidConfiguration", "fundingAsset and targetAsset must differ");
      }

      const resolved: EngineConfig = { fundingAsset, targetAsset, priceFeed };
      const oracle = this.options.createOracle(resolved);
      const exchange = this.options.createExchange(resolved);

      this.config = resolved;
      this.oracle = oracle;
      this.exchange = exchange;
      return { ...resolved };
    });
  }

  setAgent(caller: Address, agent: Address): Promise<Address> {
    return this.exclusive(() => {
      this.assertAdmin(caller);
      this.agent = requireAddress(agent, "agent");
      return this.agent;
    });
  }

  setExecutionFee(caller: Address, fee: bigint): Promise<bigint> {
    return this.exclusive(() => {
      this.assertAdmin(caller);
      if (fee < 0n) {
        throw new DcaError("InvalidConfiguration", "Execution fee must not be negative");
      }
      this.executionFee = fee;
      return fee;
    });
  }

  // ============================================
  // Order operations
  // ============================================

  createOrder(params: CreateOrderParams): Promise<Order> {
    return this.exclusive(async () => {
      this.requireConfig();
      const order = await this.factory.create(params, this.clock(), this.executionFee);
      this.collectedFees += order.fee;
      this.counters.created += 1;
      return order;
    });
  }

  executeOrder(orderId: OrderId, caller: Address): Promise<ExecutionReceipt> {
    return this.exclusive(async () => {
      const price = await this.readPrice();
      const receipt = await this.execution.execute(orderId, this.clock(), price, getAddress(caller));
      this.counters.swaps += 1;
      if (receipt.completed) this.counters.completed += 1;
      return receipt;
    });
  }

  preauthorize(orderId: OrderId, caller: Address): Promise<PreauthorizationResult> {
    return this.exclusive(async () => {
      const price = await this.readPrice();
      return this.execution.preauthorize(orderId, price, getAddress(caller));
    });
  }

  cancelOrder(orderId: OrderId, caller: Address): Promise<TerminationReceipt> {
    return this.exclusive(async () => {
      const receipt = await this.terminator.cancel(orderId, getAddress(caller));
      this.counters.cancelled += 1;
      return receipt;
    });
  }

  retryRefund(owner: Address, caller: Address): Promise<bigint> {
    return this.exclusive(() => {
      const account = getAddress(owner);
      if (!isAddressEqual(caller, account) && !isAddressEqual(caller, this.admin)) {
        throw new DcaError("Unauthorized", `${caller} may not settle refunds for ${account}`);
      }
      return this.terminator.retryRefund(account);
    });
  }

  // ============================================
  // Queries
  // ============================================

  getOrder(orderId: OrderId): Promise<Order> {
    return this.exclusive(() => {
      const order = this.store.get(orderId);
      if (!order) {
        throw new DcaError("OrderNotFound", `Order ${orderId} not found`);
      }
      return order;
    });
  }

  hasOrder(orderId: OrderId): Promise<boolean> {
    return this.exclusive(() => this.store.containsId(orderId));
  }

  countOrders(): Promise<number> {
    return this.exclusive(() => this.store.count());
  }

  listOrders(owner?: Address): Promise<Order[]> {
    return this.exclusive(() => {
      const orders = this.store.values().sort((a, b) => a.createdAt - b.createdAt);
      return owner ? orders.filter((order) => isAddressEqual(order.owner, owner)) : orders;
    });
  }

  findDue(): Promise<OrderId | undefined> {
    return this.exclusive(() => this.scanner.findDue(this.clock()));
  }

  dueOrders(): Promise<Order[]> {
    return this.exclusive(() => {
      const orders: Order[] = [];
      for (const id of this.scanner.findAllDue(this.clock())) {
        const order = this.store.get(id);
        if (order) orders.push(order);
      }
      return orders;
    });
  }

  upcoming(limit: number): Promise<Array<{ id: OrderId; nextExecution: number; endTime: number }>> {
    return this.exclusive(() => this.scanner.upcoming(limit));
  }

  pendingRefundOf(owner: Address): Promise<bigint> {
    return this.exclusive(() => this.terminator.pendingRefundOf(getAddress(owner)));
  }

  stats(): Promise<EngineStats> {
    return this.exclusive(() => ({
      initialized: this.config !== null,
      activeOrders: this.store.count(),
      ordersCreated: this.counters.created,
      ordersCompleted: this.counters.completed,
      ordersCancelled: this.counters.cancelled,
      swapsExecuted: this.counters.swaps,
      collectedFees: this.collectedFees,
      pendingRefunds: this.terminator.totalPendingRefunds(),
      executionFee: this.executionFee,
      agent: this.agent,
    }));
  }

  configuration(): EngineConfig | null {
    return this.config ? { ...this.config } : null;
  }
}
