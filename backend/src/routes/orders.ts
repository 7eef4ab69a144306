import { Router, Request, Response } from "express";
import { FREQUENCY_CLASSES } from "../config/constants.js";
import { nextEligibleTime } from "../engine/due-scanner.js";
import { isDcaError } from "../engine/errors.js";
import { isFrequencyClass } from "../engine/order-factory.js";
import type { Order } from "../models/Order.js";
import type { AppContext } from "../app.js";
import {
  BadRequestError,
  callerOf,
  parseAddress,
  parseAmount,
  parseInteger,
  parseOrderId,
  sendError,
} from "./http.js";

// ============================================
// Types for request bodies
// ============================================

interface CreateOrderBody {
  totalAmount?: unknown;
  frequency?: unknown;
  durationDays?: unknown;
  minPrice?: unknown;
  maxPrice?: unknown;
  feePayment?: unknown;
}

function present(order: Order) {
  return { ...order, nextExecution: nextEligibleTime(order) };
}

export function createOrdersRouter(context: AppContext): Router {
  const router = Router();
  const { engine, history, recorder, clock } = context;

  // ============================================
  // GET /orders - List active orders (optionally filter by owner)
  // ============================================
  router.get("/", async (req: Request, res: Response) => {
    try {
      const owner = req.query.owner !== undefined ? parseAddress(req.query.owner, "owner") : undefined;
      const orders = await engine.listOrders(owner);

      res.json({
        success: true,
        count: orders.length,
        orders: orders.map(present),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch orders");
    }
  });

  // ============================================
  // GET /orders/due - Orders eligible for execution now
  // IMPORTANT: This must be before /:id route
  // ============================================
  router.get("/due", async (_req: Request, res: Response) => {
    try {
      const orders = await engine.dueOrders();

      res.json({
        success: true,
        count: orders.length,
        orders: orders.map(present),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch due orders");
    }
  });

  // ============================================
  // GET /orders/upcoming - Next scheduled executions
  // ============================================
  router.get("/upcoming", async (req: Request, res: Response) => {
    try {
      const limit = req.query.limit !== undefined ? parseInteger(req.query.limit, "limit") : 10;
      const upcoming = await engine.upcoming(Math.max(1, limit));
      res.json({ success: true, upcoming });
    } catch (error) {
      sendError(res, error, "Failed to fetch upcoming executions");
    }
  });

  // ============================================
  // GET /orders/history/:owner - Archived orders of an owner
  // ============================================
  router.get("/history/:owner", async (req: Request, res: Response) => {
    try {
      const owner = parseAddress(req.params.owner, "owner");
      const records = await history.listByOwner(owner);

      res.json({
        success: true,
        count: records.length,
        orders: records.map(({ executionLogs, ...record }) => ({
          ...record,
          executions: executionLogs.length,
        })),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch order history");
    }
  });

  // ============================================
  // POST /orders/refunds/retry - Settle a parked refund
  // ============================================
  router.post("/refunds/retry", async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const owner = req.body?.owner !== undefined ? parseAddress(req.body.owner, "owner") : caller;
      const refunded = await engine.retryRefund(owner, caller);

      console.log(`💸 Settled pending refund of ${refunded} for ${owner}`);
      res.json({ success: true, owner, refunded });
    } catch (error) {
      sendError(res, error, "Failed to settle refund");
    }
  });

  // ============================================
  // GET /orders/:id - Active order details
  // ============================================
  router.get("/:id", async (req: Request, res: Response) => {
    try {
      const order = await engine.getOrder(parseOrderId(req.params.id));
      res.json({ success: true, order: present(order) });
    } catch (error) {
      sendError(res, error, "Failed to fetch order");
    }
  });

  // ============================================
  // GET /orders/:id/logs - Execution logs (also for terminated orders)
  // ============================================
  router.get("/:id/logs", async (req: Request, res: Response) => {
    try {
      const limit = req.query.limit !== undefined ? parseInteger(req.query.limit, "limit", 0) : 50;
      const offset = req.query.offset !== undefined ? parseInteger(req.query.offset, "offset", 0) : 0;
      const record = await history.get(parseOrderId(req.params.id));

      if (!record) {
        res.status(404).json({ success: false, error: "Order not found", code: "OrderNotFound", retryable: false });
        return;
      }

      // Newest first
      const logs = [...record.executionLogs]
        .sort((a, b) => b.timestamp - a.timestamp)
        .slice(offset, offset + limit);

      res.json({
        success: true,
        status: record.status,
        total: record.executionLogs.length,
        logs,
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch logs");
    }
  });

  // ============================================
  // POST /orders - Create a new DCA order
  // ============================================
  router.post("/", async (req: Request, res: Response) => {
    try {
      const owner = callerOf(req);
      const body: CreateOrderBody = req.body ?? {};

      if (!isFrequencyClass(body.frequency)) {
        throw new BadRequestError(`frequency must be one of ${FREQUENCY_CLASSES.join(", ")}`);
      }

      const order = await engine.createOrder({
        owner,
        totalAmount: parseAmount(body.totalAmount, "totalAmount"),
        frequencyClass: body.frequency,
        durationDays: parseInteger(body.durationDays, "durationDays"),
        minPrice: parseAmount(body.minPrice, "minPrice", 0n),
        maxPrice: parseAmount(body.maxPrice, "maxPrice", 0n),
        feePayment: parseAmount(body.feePayment, "feePayment", 0n),
      });

      console.log(`✅ Created DCA order: ${order.id} for ${owner}`);
      res.status(201).json({ success: true, order: present(order) });
    } catch (error) {
      sendError(res, error, "Failed to create order");
    }
  });

  // ============================================
  // POST /orders/:id/preauthorize - Pre-trade gate (agent only)
  // ============================================
  router.post("/:id/preauthorize", async (req: Request, res: Response) => {
    try {
      const result = await engine.preauthorize(parseOrderId(req.params.id), callerOf(req));
      res.json({ success: true, ...result });
    } catch (error) {
      sendError(res, error, "Failed to preauthorize execution");
    }
  });

  // ============================================
  // POST /orders/:id/execute - Run one scheduled execution (agent only)
  // ============================================
  router.post("/:id/execute", async (req: Request, res: Response) => {
    try {
      const orderId = parseOrderId(req.params.id);
      try {
        const receipt = await engine.executeOrder(orderId, callerOf(req));
        console.log(
          `🔄 Executed ${receipt.orderId}: ${receipt.amountIn} in, ${receipt.amountOut} out` +
            (receipt.completed ? " (completed)" : "")
        );
        res.json({ success: true, receipt });
      } catch (error) {
        if (isDcaError(error) && error.code !== "OrderNotFound" && error.code !== "Unauthorized") {
          recorder.recordFailure(orderId, clock(), error.code, error.message);
        }
        throw error;
      }
    } catch (error) {
      sendError(res, error, "Failed to execute order");
    }
  });

  // ============================================
  // DELETE /orders/:id - Cancel an order (owner only)
  // ============================================
  router.delete("/:id", async (req: Request, res: Response) => {
    try {
      const receipt = await engine.cancelOrder(parseOrderId(req.params.id), callerOf(req));

      console.log(`🛑 Cancelled order ${receipt.orderId}, refunded ${receipt.refunded}`);
      res.json({ success: true, receipt });
    } catch (error) {
      sendError(res, error, "Failed to cancel order");
    }
  });

  return router;
}
