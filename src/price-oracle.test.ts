import { describe, it, expect } from "vitest";
import { PriceOracle, boundedRandomWalk, linspace } from "./price-oracle";
import { DeterministicRNG } from "./deterministic-rng";
import { DEFAULT_SIMULATION_CONFIG } from "./simulation-config";
import type { OracleConfig } from "./simulation-config";

const walkConfig: OracleConfig = { ...DEFAULT_SIMULATION_CONFIG.oracle, kind: "random_walk" };

describe("Price Oracle", () => {
  it("should hold a constant price", () => {
    const oracle = PriceOracle.fromConfig({ ...walkConfig, kind: "constant" }, 5, new DeterministicRNG(1));

    expect(oracle.length).toBe(5);
    expect(oracle.path()).toEqual([1500, 1500, 1500, 1500, 1500]);
  });

  it("should interpolate a linear path between the endpoints", () => {
    const oracle = PriceOracle.fromConfig({ ...walkConfig, kind: "linear" }, 5, new DeterministicRNG(1));
    expect(oracle.path()).toEqual([1500, 1625, 1750, 1875, 2000]);
  });

  it("should not draw from the generator for deterministic paths", () => {
    const rng = new DeterministicRNG(1);
    PriceOracle.fromConfig({ ...walkConfig, kind: "linear" }, 100, rng);
    expect(rng.drawCount()).toBe(0);
  });

  it("should keep a bounded walk inside its band and pinned to its endpoints", () => {
    const rng = new DeterministicRNG("walk");
    const prices = boundedRandomWalk(rng, {
      length: 24 * 30,
      lowerBound: 1500,
      upperBound: 2000,
      start: 1500,
      end: 2000,
      std: 50,
    });

    expect(prices).toHaveLength(720);
    expect(prices[0]).toBeCloseTo(1500, 9);
    expect(prices[719]).toBeCloseTo(2000, 9);
    for (const price of prices) {
      expect(price).toBeGreaterThanOrEqual(1500 - 1e-9);
      expect(price).toBeLessThanOrEqual(2000 + 1e-9);
    }
    expect(rng.drawCount()).toBe(720);
  });

  it("should reproduce the walk from the same seed", () => {
    const a = PriceOracle.fromConfig(walkConfig, 200, new DeterministicRNG(7));
    const b = PriceOracle.fromConfig(walkConfig, 200, new DeterministicRNG(7));
    const c = PriceOracle.fromConfig(walkConfig, 200, new DeterministicRNG(8));

    expect(a.path()).toEqual(b.path());
    expect(a.path()).not.toEqual(c.path());
  });

  it("should build a multi-decade walk without exhausting the stack", () => {
    const length = 30 * 8760;
    const oracle = PriceOracle.fromConfig(walkConfig, length, new DeterministicRNG("decades"));

    let lowest = Number.POSITIVE_INFINITY;
    let highest = Number.NEGATIVE_INFINITY;
    for (const price of oracle.path()) {
      lowest = Math.min(lowest, price);
      highest = Math.max(highest, price);
    }

    expect(oracle.length).toBe(length);
    expect(oracle.priceAt(0)).toBeCloseTo(1500, 9);
    expect(oracle.priceAt(length - 1)).toBeCloseTo(2000, 9);
    expect(lowest).toBeGreaterThanOrEqual(1500 - 1e-9);
    expect(highest).toBeLessThanOrEqual(2000 + 1e-9);
  });

  it("should collapse to the trend line when the band is empty", () => {
    const prices = boundedRandomWalk(new DeterministicRNG(1), {
      length: 3,
      lowerBound: 1800,
      upperBound: 1800,
      start: 1800,
      end: 1800,
      std: 5,
    });
    expect(prices).toEqual([1800, 1800, 1800]);
  });

  it("should reject steps outside the path", () => {
    const oracle = new PriceOracle("constant", [1, 2]);

    expect(oracle.priceAt(1)).toBe(2);
    expect(() => oracle.priceAt(2)).toThrow(RangeError);
    expect(() => oracle.priceAt(-1)).toThrow(RangeError);
  });

  it("should reject non-finite prices", () => {
    expect(() => new PriceOracle("constant", [1, Number.NaN])).toThrow("oracle price at step 1 diverged to NaN");
  });

  it("should build evenly spaced points", () => {
    expect(linspace(0, 1, 1)).toEqual([0]);
    expect(linspace(0, 10, 3)).toEqual([0, 5, 10]);
  });
});
