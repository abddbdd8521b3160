import { describe, it, expect } from "vitest";
import { LiquidityProviderAgent } from "./liquidity-provider-agent";
import { DeterministicRNG } from "./deterministic-rng";
import { SEED_HOLDER } from "./liquidity-pool";
import { DEFAULT_SIMULATION_CONFIG } from "./simulation-config";
import { createTestContext } from "./test-utils/fixtures";

function makeProvider(returnThreshold: number, believedValuation = 1_000_000_000): LiquidityProviderAgent {
  return new LiquidityProviderAgent("lp-1", 300, { believedValuation, returnThreshold });
}

describe("Liquidity Provider Agent", () => {
  it("should estimate a potential position without touching the pool", () => {
    const context = createTestContext();
    const before = context.pool.snapshot();

    const estimate = makeProvider(10).estimateReturn(context);

    expect(estimate).not.toBeNull();
    expect(estimate?.potential).toBe(true);
    expect(estimate?.poolShare).toBeGreaterThan(0);
    expect(context.pool.snapshot()).toEqual(before);
  });

  it("should enter with the whole wallet when the return clears the threshold", () => {
    const context = createTestContext();
    const agent = makeProvider(10);
    const spotBefore = context.pool.spotPrice();

    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("enter_pool");
    expect(agent.wallet().ref).toBe(0);
    expect(agent.wallet().stable).toBe(0);
    expect(context.pool.sharesOf("lp-1")).toBeGreaterThan(0);
    expect(context.pool.spotPrice()).toBeGreaterThan(spotBefore);

    const ledger = context.pool.sharesOf("lp-1") + context.pool.sharesOf(SEED_HOLDER);
    expect(ledger / context.pool.totalShares).toBeCloseTo(1, 12);
  });

  it("should stay out below the threshold", () => {
    const context = createTestContext();
    const agent = makeProvider(1_000);

    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("hold");
    expect(decision.expectedReturn).toBeLessThan(1_000);
    expect(agent.wallet().ref).toBe(300);
    expect(context.pool.sharesOf("lp-1")).toBe(0);
  });

  it("should exit within the same call once the return drops below the threshold", () => {
    const context = createTestContext();
    const agent = makeProvider(10);
    agent.decideAndAct(context);

    // A steep negative rate makes the convergence term cost almost 100%
    context.controller.restore({ ...context.controller.snapshot(), redemptionRate: -0.001 });
    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("exit_pool");
    expect(decision.expectedReturn).toBeLessThan(10);
    expect(context.pool.sharesOf("lp-1")).toBe(0);
    expect(agent.wallet().stable).toBe(0);
    expect(agent.wallet().ref).toBeCloseTo(300, 6);

    expect(agent.decideAndAct(context).action).toBe("hold");
    expect(context.pool.sharesOf("lp-1")).toBe(0);
  });

  it("should hold while already in the pool and still satisfied", () => {
    const context = createTestContext();
    const agent = makeProvider(10);
    agent.decideAndAct(context);
    const shares = context.pool.sharesOf("lp-1");

    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("hold");
    expect(context.pool.sharesOf("lp-1")).toBe(shares);
  });

  it("should expect more from a higher token valuation", () => {
    const context = createTestContext();
    const low = makeProvider(10, 1_000_000_000).estimateReturn(context);
    const high = makeProvider(10, 2_000_000_000).estimateReturn(context);

    expect(low).not.toBeNull();
    expect(high).not.toBeNull();
    expect(high?.expectedReturn ?? 0).toBeGreaterThan(low?.expectedReturn ?? 0);
  });

  it("should report the last estimate and its pool share", () => {
    const context = createTestContext();
    const agent = makeProvider(10);
    const decision = agent.decideAndAct(context);
    const diagnostics = agent.diagnostics(context);

    expect(diagnostics.expectedReturn).toBe(decision.expectedReturn);
    expect(diagnostics.poolShare).toBe(context.pool.poolShare(context.pool.sharesOf("lp-1")));
    expect(diagnostics.netWorthRef).toBeCloseTo(diagnostics.poolShare * context.pool.totalValueInRef(), 9);
  });

  it("should roll back to a checkpoint", () => {
    const context = createTestContext();
    const agent = makeProvider(10);
    const restore = agent.checkpoint();

    agent.decideAndAct(context);
    restore();

    expect(agent.wallet()).toEqual({ ref: 300, stable: 0, externalFunding: 0 });
  });

  it("should draw its parameters inside the configured bounds", () => {
    const agent = LiquidityProviderAgent.draw("lp-7", new DeterministicRNG(3), DEFAULT_SIMULATION_CONFIG.liquidityProvider);

    expect(agent.wallet().ref).toBeGreaterThanOrEqual(100);
    expect(agent.wallet().ref).toBeLessThan(500);
    expect(agent.params.returnThreshold).toBeGreaterThanOrEqual(200);
    expect(agent.params.believedValuation).toBeGreaterThanOrEqual(1_000_000_000);
    expect(Object.keys(agent.describe())).toEqual(["believedValuation", "returnThreshold"]);
  });
});
