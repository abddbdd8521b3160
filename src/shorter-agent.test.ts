import { describe, it, expect } from "vitest";
import { ShorterAgent, TAKE_PROFIT_POSITIVE_RATE_STEPS, shortSpreadPct } from "./shorter-agent";
import type { MarketContext } from "./agent";
import { createTestContext } from "./test-utils/fixtures";

function makeShorter(): ShorterAgent {
  return new ShorterAgent("shorter-1", 400, { differenceThreshold: 5, stopLoss: 10, collateralization: 200 });
}

// Redemption price 2.8 against a market near 3.14: about 10.9% rich
function richMarket(): MarketContext {
  return createTestContext({ redemptionPrice: 2.8 });
}

describe("Shorter Agent", () => {
  it("should measure the spread against the redemption price in reference units", () => {
    expect(shortSpreadPct(3, 1500, 0.0025)).toBeCloseTo(20, 9);
    expect(shortSpreadPct(3.75, 1500, 0.0025)).toBe(0);
  });

  it("should stay flat while the spread is under its threshold", () => {
    const context = createTestContext({ redemptionPrice: 3.14 });
    const agent = makeShorter();

    expect(agent.decideAndAct(context).action).toBe("hold");
    expect(context.safes.openSafeCount()).toBe(0);
  });

  it("should mint against its whole wallet and sell the stablecoin", () => {
    const context = richMarket();
    const agent = makeShorter();
    const spotBefore = context.pool.spotPrice();

    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("open_short");
    expect(agent.hasPosition()).toBe(true);
    const [safe] = context.safes.safesOf("shorter-1");
    expect(safe.collateral).toBe(400);
    expect(safe.debt).toBeCloseTo((400 * 1500) / 2 / 2.8, 9);
    expect(agent.wallet().stable).toBe(0);
    expect(agent.wallet().ref).toBeGreaterThan(0);
    expect(context.pool.spotPrice()).toBeLessThan(spotBefore);
  });

  it("should only hold one short at a time", () => {
    const context = richMarket();
    const agent = makeShorter();
    agent.decideAndAct(context);

    expect(agent.decideAndAct(context).action).toBe("hold");
    expect(context.safes.openSafeCount()).toBe(1);
  });

  it("should stop out when the stablecoin rallies", () => {
    const context = richMarket();
    const agent = makeShorter();
    agent.decideAndAct(context);

    context.pool.swap("ref", 5_000);
    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("close_short");
    expect(decision.reason).toBe("stop loss");
    expect(context.safes.openSafeCount()).toBe(0);
    expect(agent.wallet().externalFunding).toBeGreaterThan(0);
    expect(agent.wallet().ref).toBe(400);
    expect(agent.wallet().stable).toBe(0);
  });

  it("should take profit once the price falls back to its entry redemption price", () => {
    const context = richMarket();
    const agent = makeShorter();
    agent.decideAndAct(context);

    context.pool.swap("stable", 1_000_000);
    expect(context.pool.spotPrice()).toBeLessThanOrEqual(2.8 / 1500);
    context.controller.restore({ ...context.controller.snapshot(), positiveRateSteps: TAKE_PROFIT_POSITIVE_RATE_STEPS });
    const decision = agent.decideAndAct(context);

    expect(decision.reason).toBe("take profit");
    expect(agent.wallet().externalFunding).toBe(0);
    expect(agent.wallet().ref).toBeGreaterThan(400);
  });

  it("should wait for four days of positive rate before taking profit", () => {
    const context = richMarket();
    const agent = makeShorter();
    agent.decideAndAct(context);

    context.pool.swap("stable", 1_000_000);
    context.controller.restore({ ...context.controller.snapshot(), positiveRateSteps: TAKE_PROFIT_POSITIVE_RATE_STEPS - 1 });
    const decision = agent.decideAndAct(context);

    expect(decision.reason).toBe("short still open");
    expect(agent.hasPosition()).toBe(true);
  });

  it("should keep the position through small moves", () => {
    const context = richMarket();
    const agent = makeShorter();
    agent.decideAndAct(context);

    context.pool.swap("ref", 1);
    expect(agent.decideAndAct(context).reason).toBe("short still open");
  });

  it("should roll back to a checkpoint", () => {
    const context = richMarket();
    const agent = makeShorter();
    const restore = agent.checkpoint();

    agent.decideAndAct(context);
    restore();

    expect(agent.hasPosition()).toBe(false);
    expect(agent.wallet()).toEqual({ ref: 400, stable: 0, externalFunding: 0 });
  });
});
