import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { Server } from "node:http";
import express from "express";
import type { Hex } from "viem";
import { BackendError, HttpBackendClient } from "./client.js";
import { loadAgentConfig } from "./config.js";

const AGENT = "0x3333333333333333333333333333333333333333";
const DUE_ID: Hex = `0x${"0a".repeat(32)}`;
const LATE_ID: Hex = `0x${"0b".repeat(32)}`;

describe("HttpBackendClient", () => {
  let server: Server;
  let client: HttpBackendClient;
  const callers: Array<string | undefined> = [];

  before(async () => {
    // In-process stand-in for the backend's order routes
    const app = express();
    app.use((req, _res, next) => {
      callers.push(req.header("x-caller-address"));
      next();
    });
    app.get("/api/orders/due", (_req, res) => {
      res.json({
        success: true,
        count: 1,
        orders: [{ id: DUE_ID, owner: "0x1111111111111111111111111111111111111111", amountPerSwap: "3", nextExecution: 1_000 }],
      });
    });
    app.post(`/api/orders/${DUE_ID}/preauthorize`, (_req, res) => {
      res.json({ success: true, orderId: DUE_ID, amountIn: "3", fee: "0", price: "1000" });
    });
    app.post(`/api/orders/${DUE_ID}/execute`, (_req, res) => {
      res.json({
        success: true,
        receipt: { amountIn: "3", amountOut: "6", price: "1000", remainingBalance: "97", completed: false },
      });
    });
    app.post(`/api/orders/${LATE_ID}/execute`, (_req, res) => {
      res.status(409).json({ success: false, error: "Not due yet", code: "TooEarly", retryable: true });
    });

    server = app.listen(0);
    await once(server, "listening");
    const address = server.address();
    assert.ok(address !== null && typeof address === "object");
    client = new HttpBackendClient(`http://127.0.0.1:${address.port}`, AGENT);
  });

  after(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, "close");
  });

  it("should fetch due orders as the agent", async () => {
    const orders = await client.fetchDueOrders();

    assert.deepEqual(orders, [
      { id: DUE_ID, owner: "0x1111111111111111111111111111111111111111", amountPerSwap: "3", nextExecution: 1_000 },
    ]);
    assert.equal(callers.at(-1), AGENT);
  });

  it("should parse preauthorizations and receipts", async () => {
    assert.deepEqual(await client.preauthorize(DUE_ID), { amountIn: "3", fee: "0", price: "1000" });
    assert.deepEqual(await client.executeOrder(DUE_ID), {
      amountIn: "3",
      amountOut: "6",
      price: "1000",
      remainingBalance: "97",
      completed: false,
    });
  });

  it("should surface rejections with their code and retry class", async () => {
    await assert.rejects(
      client.executeOrder(LATE_ID),
      (error) =>
        error instanceof BackendError &&
        error.code === "TooEarly" &&
        error.retryable &&
        error.status === 409 &&
        error.message === "Not due yet"
    );
  });

  it("should fail on a response that is not JSON", async () => {
    await assert.rejects(
      client.preauthorize(LATE_ID),
      (error) => error instanceof Error && !(error instanceof BackendError)
    );
  });
});

describe("loadAgentConfig", () => {
  it("should require the agent address", () => {
    assert.throws(() => loadAgentConfig({}), /AGENT_ADDRESS/);
  });

  it("should apply defaults", () => {
    assert.deepEqual(loadAgentConfig({ AGENT_ADDRESS: AGENT }), {
      backendUrl: "http://localhost:3001",
      agentAddress: AGENT,
      cronSchedule: "* * * * *",
      port: 3002,
    });
  });

  it("should strip a trailing slash from the backend URL", () => {
    const config = loadAgentConfig({ AGENT_ADDRESS: AGENT, BACKEND_URL: "http://backend:4000/" });
    assert.equal(config.backendUrl, "http://backend:4000");
  });
});
