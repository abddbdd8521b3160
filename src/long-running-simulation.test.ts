/**
 * Long-running simulation test
 *
 * Two months of hourly steps over a random-walk oracle with every agent type
 * present, checking that the market stays well-formed the whole way.
 */

import { describe, it, expect } from "vitest";
import { Scheduler } from "./scheduler";
import type { SimulationResult } from "./scheduler";
import { SEED_HOLDER } from "./liquidity-pool";
import { buildTestConfig } from "./test-utils/fixtures";

const longRun = {
  seed: "long-run",
  agents: 50,
  days: 60,
  oracle: { kind: "random_walk", finalPrice: 1800 },
  proportions: { liquidityProvider: 30, shorter: 50, trendLong: 20 },
  liquidityProvider: { returnThreshold: { lower: 50, upper: 150 } },
  trendLong: { upWeeks: { lower: 1, upper: 3 }, downWeeks: { lower: 1, upper: 3 } },
  controller: { kp: 0.0002 },
};

describe("Long-Running 60-Day Simulation", () => {
  let result: SimulationResult;
  let scheduler: Scheduler;

  it("should run to the horizon or halt cleanly", () => {
    scheduler = Scheduler.fromConfig(buildTestConfig(longRun));
    result = scheduler.run();

    expect(["completed", "pool_depleted", "numeric_divergence"]).toContain(result.status);
    expect(result.series).toHaveLength(result.stepsCompleted);
    if (result.status === "completed") {
      expect(result.stepsCompleted).toBe(60 * 24);
      expect(result.haltedAtStep).toBeNull();
    } else {
      expect(result.haltedAtStep).toBe(result.stepsCompleted);
    }
  });

  it("should keep every recorded price finite and positive", () => {
    for (const point of result.series) {
      expect(Number.isFinite(point.redemptionPrice)).toBe(true);
      expect(point.redemptionPrice).toBeGreaterThan(0);
      expect(point.spotPrice).toBeGreaterThan(0);
      expect(point.twap).toBeGreaterThan(0);
      expect(point.twapFiat).toBe(point.twap * point.referencePrice);
      expect(Number.isFinite(point.redemptionRate)).toBe(true);
    }
  });

  it("should keep the oracle inside its bounds", () => {
    for (const point of result.series) {
      expect(point.referencePrice).toBeGreaterThanOrEqual(1500);
      expect(point.referencePrice).toBeLessThanOrEqual(2000);
    }
  });

  it("should leave the pool funded and its share ledger balanced", () => {
    const { pool } = scheduler.market;

    expect(pool.reserveStable).toBeGreaterThan(0);
    expect(pool.reserveRef).toBeGreaterThan(0);
    expect((pool.agentShareTotal() + pool.sharesOf(SEED_HOLDER)) / pool.totalShares).toBeCloseTo(1, 9);
  });

  it("should report every agent with a non-negative wallet", () => {
    expect(result.agents).toHaveLength(50);
    for (const agent of result.agents) {
      expect(agent.wallet.ref).toBeGreaterThanOrEqual(0);
      expect(agent.wallet.stable).toBeGreaterThanOrEqual(0);
      expect(agent.wallet.externalFunding).toBeGreaterThanOrEqual(0);
      expect(agent.poolShare).toBeGreaterThanOrEqual(0);
      expect(agent.poolShare).toBeLessThanOrEqual(1);
    }
  });
});
