import { describe, it, expect } from "vitest";
import { LONG_OPEN_COLLATERALIZATION, TrendLongAgent, weeklyTrend } from "./trend-long-agent";
import { DeterministicRNG } from "./deterministic-rng";
import { DEFAULT_SIMULATION_CONFIG } from "./simulation-config";
import { createTestContext, weeklyOracle } from "./test-utils/fixtures";

const WEEK = 168;

describe("Trend Long Agent", () => {
  describe("weeklyTrend", () => {
    const oracle = weeklyOracle(1500, [5, 5, -3, -3]);

    it("should need a full run of rising weeks", () => {
      expect(weeklyTrend(oracle, 2 * WEEK, 2, "up")).toBe(true);
      expect(weeklyTrend(oracle, 2 * WEEK, 1, "up")).toBe(true);
      expect(weeklyTrend(oracle, 3 * WEEK, 2, "up")).toBe(false);
    });

    it("should be false until enough history exists", () => {
      expect(weeklyTrend(oracle, 2 * WEEK, 3, "up")).toBe(false);
      expect(weeklyTrend(oracle, WEEK - 1, 1, "up")).toBe(false);
    });

    it("should detect falling weeks", () => {
      expect(weeklyTrend(oracle, 4 * WEEK, 2, "down")).toBe(true);
      expect(weeklyTrend(oracle, 4 * WEEK, 3, "down")).toBe(false);
    });
  });

  it("should wait for the uptrend", () => {
    const context = createTestContext({ oracle: weeklyOracle(1500, [5, 5, -3]), step: 100 });
    const agent = new TrendLongAgent("long-1", 400, { upWeeks: 2, downWeeks: 1, stopLoss: 50 });

    expect(agent.decideAndAct(context).action).toBe("hold");
    expect(agent.hasPosition()).toBe(false);
  });

  it("should mint, sell and relock the proceeds after the uptrend", () => {
    const context = createTestContext({ oracle: weeklyOracle(1500, [5, 5, -3]), step: 2 * WEEK });
    const agent = new TrendLongAgent("long-1", 400, { upWeeks: 2, downWeeks: 1, stopLoss: 50 });
    const refPrice = context.oracle.priceAt(2 * WEEK);

    const decision = agent.decideAndAct(context);

    expect(decision.action).toBe("open_long");
    expect(agent.wallet().ref).toBe(0);
    expect(agent.wallet().stable).toBe(0);
    const [safe] = context.safes.safesOf("long-1");
    expect(safe.debt).toBeCloseTo((400 * refPrice) / (LONG_OPEN_COLLATERALIZATION / 100) / 3.14, 9);
    expect(safe.collateral).toBeGreaterThan(400);
    expect(context.safes.collateralization(safe.id, refPrice, 3.14)).toBeGreaterThan(LONG_OPEN_COLLATERALIZATION);
  });

  it("should unwind after the configured falling weeks", () => {
    const oracle = weeklyOracle(1500, [5, 5, -3]);
    const agent = new TrendLongAgent("long-1", 400, { upWeeks: 2, downWeeks: 1, stopLoss: 50 });
    const context = createTestContext({ oracle, step: 2 * WEEK });
    agent.decideAndAct(context);
    const collateral = context.safes.safesOf("long-1")[0].collateral;

    const decision = agent.decideAndAct({ ...context, step: 3 * WEEK });

    expect(decision.action).toBe("close_long");
    expect(decision.reason).toBe("downtrend");
    expect(context.safes.openSafeCount()).toBe(0);
    expect(agent.wallet().externalFunding).toBeGreaterThan(0);
    expect(agent.wallet().ref).toBe(collateral);
  });

  it("should unwind before collateralization falls under 150%", () => {
    const oracle = weeklyOracle(1500, [5, 5, -45]);
    const agent = new TrendLongAgent("long-1", 400, { upWeeks: 2, downWeeks: 5, stopLoss: 50 });
    const context = createTestContext({ oracle, step: 2 * WEEK });
    agent.decideAndAct(context);

    const decision = agent.decideAndAct({ ...context, step: 3 * WEEK });

    expect(decision.reason).toBe("close to liquidation");
    expect(agent.hasPosition()).toBe(false);
  });

  it("should hold an open long without a trigger", () => {
    const oracle = weeklyOracle(1500, [5, 5, 1]);
    const agent = new TrendLongAgent("long-1", 400, { upWeeks: 2, downWeeks: 1, stopLoss: 50 });
    const context = createTestContext({ oracle, step: 2 * WEEK });
    agent.decideAndAct(context);

    expect(agent.decideAndAct({ ...context, step: 3 * WEEK }).reason).toBe("long still open");
  });

  it("should draw whole-week run lengths", () => {
    const agent = TrendLongAgent.draw("long-3", new DeterministicRNG(11), DEFAULT_SIMULATION_CONFIG.trendLong);

    expect(Number.isInteger(agent.params.upWeeks)).toBe(true);
    expect(agent.params.upWeeks).toBeGreaterThanOrEqual(1);
    expect(agent.params.downWeeks).toBeLessThanOrEqual(10);
  });

  it("should reach both ends of the run-length bounds", () => {
    const rng = new DeterministicRNG("weeks");
    const config = { ...DEFAULT_SIMULATION_CONFIG.trendLong, upWeeks: { lower: 1, upper: 2 } };
    const drawn = new Set<number>();
    for (let i = 0; i < 64; i++) {
      drawn.add(TrendLongAgent.draw(`long-${i}`, rng, config).params.upWeeks);
    }

    expect(drawn).toEqual(new Set([1, 2]));
  });
});
