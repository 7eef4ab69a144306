import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { getAddress } from "viem";
import { PRICE_FEEDS, TOKENS } from "./constants.js";
import { loadConfig } from "./env.js";

const ADMIN = "0x4444444444444444444444444444444444444444";

describe("loadConfig", () => {
  it("should fill defaults around the required admin address", () => {
    const config = loadConfig({ ADMIN_ADDRESS: ADMIN });

    assert.equal(config.nodeEnv, "development");
    assert.equal(config.port, 3001);
    assert.equal(config.adminAddress, ADMIN);
    assert.equal(config.agentAddress, null);
    assert.equal(config.executionFee, 0n);
    assert.equal(config.historyEnabled, true);
    assert.equal(config.demoMode, true);
    assert.equal(config.demoPrice, 1000n);
    assert.equal(config.quoterFeeTier, 3000);
    assert.equal(config.fundingToken, getAddress(TOKENS.USDC));
    assert.equal(config.targetToken, getAddress(TOKENS.WETH));
    assert.equal(config.priceFeed, getAddress(PRICE_FEEDS.ETH_USD));
    assert.ok(Object.isFrozen(config));
  });

  it("should read overrides", () => {
    const config = loadConfig({
      NODE_ENV: "test",
      ADMIN_ADDRESS: ADMIN,
      AGENT_ADDRESS: "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd",
      PORT: "4000",
      EXECUTION_FEE: "250",
      HISTORY_ENABLED: "false",
      DEMO_MODE: "no",
    });

    assert.equal(config.nodeEnv, "test");
    assert.equal(config.port, 4000);
    assert.equal(config.agentAddress, getAddress("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd"));
    assert.equal(config.executionFee, 250n);
    assert.equal(config.historyEnabled, false);
    assert.equal(config.demoMode, false);
  });

  it("should require the admin address", () => {
    assert.throws(() => loadConfig({}), /ADMIN_ADDRESS/);
    assert.throws(() => loadConfig({ ADMIN_ADDRESS: "not-an-address" }), /ADMIN_ADDRESS must be an address/);
  });

  it("should reject malformed numbers and flags", () => {
    assert.throws(() => loadConfig({ ADMIN_ADDRESS: ADMIN, PORT: "-1" }), /PORT/);
    assert.throws(() => loadConfig({ ADMIN_ADDRESS: ADMIN, EXECUTION_FEE: "1.5" }), /EXECUTION_FEE/);
    assert.throws(() => loadConfig({ ADMIN_ADDRESS: ADMIN, DEMO_MODE: "maybe" }), /DEMO_MODE/);
  });
});
