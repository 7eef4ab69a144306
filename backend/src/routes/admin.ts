import { Router, Request, Response } from "express";
import { isAddressEqual } from "viem";
import { DcaError } from "../engine/errors.js";
import type { AppContext } from "../app.js";
import { BadRequestError, callerOf, parseAddress, parseAmount, sendError } from "./http.js";

export function createAdminRouter(context: AppContext): Router {
  const router = Router();
  const { config, engine, custody, oracle } = context;

  function adminOf(req: Request) {
    const caller = callerOf(req);
    if (!isAddressEqual(caller, config.adminAddress)) {
      throw new DcaError("Unauthorized", `${caller} is not the admin`);
    }
    return caller;
  }

  function requireDemo(): void {
    if (!config.demoMode) {
      throw new BadRequestError("Only available in demo mode");
    }
  }

  // ============================================
  // POST /admin/initialize - One-time engine setup
  // ============================================
  router.post("/initialize", async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const body = req.body ?? {};
      const initialized = await engine.initialize(caller, {
        fundingAsset: parseAddress(body.fundingAsset ?? config.fundingToken, "fundingAsset"),
        targetAsset: parseAddress(body.targetAsset ?? config.targetToken, "targetAsset"),
        priceFeed: parseAddress(body.priceFeed ?? config.priceFeed, "priceFeed"),
      });

      console.log(`⚙️  Engine initialized by ${caller}`);
      res.json({ success: true, config: initialized });
    } catch (error) {
      sendError(res, error, "Failed to initialize engine");
    }
  });

  // ============================================
  // PUT /admin/agent - Replace the executing agent
  // ============================================
  router.put("/agent", async (req: Request, res: Response) => {
    try {
      const agent = await engine.setAgent(callerOf(req), parseAddress(req.body?.agent, "agent"));

      console.log(`🤖 Agent set to ${agent}`);
      res.json({ success: true, agent });
    } catch (error) {
      sendError(res, error, "Failed to set agent");
    }
  });

  // ============================================
  // PUT /admin/fee - Minimum fee for new orders
  // ============================================
  router.put("/fee", async (req: Request, res: Response) => {
    try {
      const fee = await engine.setExecutionFee(callerOf(req), parseAmount(req.body?.fee, "fee"));
      res.json({ success: true, executionFee: fee });
    } catch (error) {
      sendError(res, error, "Failed to set execution fee");
    }
  });

  // ============================================
  // Ledger custody (demo mode)
  // ============================================
  router.post("/ledger/credit", async (req: Request, res: Response) => {
    try {
      adminOf(req);
      requireDemo();
      const account = parseAddress(req.body?.account, "account");
      const amount = parseAmount(req.body?.amount, "amount");
      if (amount === 0n) {
        throw new BadRequestError("amount must be positive");
      }

      const balance = custody.credit(account, amount);
      console.log(`💰 Credited ${amount} to ${account}`);
      res.json({ success: true, account, balance });
    } catch (error) {
      sendError(res, error, "Failed to credit account");
    }
  });

  router.get("/ledger/:account", async (req: Request, res: Response) => {
    try {
      const account = parseAddress(req.params.account, "account");
      res.json({
        success: true,
        account,
        balance: custody.balanceOf(account),
        pendingRefund: await engine.pendingRefundOf(account),
        vault: custody.vaultBalance(),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch balance");
    }
  });

  // ============================================
  // PUT /admin/price - Operator-set price (demo mode)
  // ============================================
  router.put("/price", async (req: Request, res: Response) => {
    try {
      adminOf(req);
      requireDemo();
      const price = parseAmount(req.body?.price, "price");
      oracle?.setPrice(price);

      console.log(`📈 Price set to ${price}`);
      res.json({ success: true, price });
    } catch (error) {
      sendError(res, error, "Failed to set price");
    }
  });

  return router;
}
