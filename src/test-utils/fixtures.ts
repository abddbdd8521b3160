/**
 * Test utilities: small configs, market contexts and scripted agents
 */

import type { Agent, AgentDecision, AgentDiagnostics, MarketContext, Wallet } from "../agent";
import { Controller } from "../controller";
import type { ControllerParams } from "../controller";
import { LiquidityPool } from "../liquidity-pool";
import { PriceOracle } from "../price-oracle";
import { SafeEngine } from "../safe-engine";
import { DEFAULT_SIMULATION_CONFIG, mergeConfig, parseSimulationConfig } from "../simulation-config";
import type { SimulationConfig } from "../simulation-config";

export const TEST_POOL = { initialStable: 10_000_000, initialRef: 20_940 };

export const TEST_CONTROLLER: ControllerParams = {
  kp: 0.00023,
  ki: 0,
  kd: 0,
  updatePeriod: 4,
  warmupSteps: 0,
};

/**
 * Small, fast config (10 agents, 2 days, flat oracle) with overrides merged in
 */
export function buildTestConfig(overrides: unknown = {}): SimulationConfig {
  const base = mergeConfig(DEFAULT_SIMULATION_CONFIG, {
    seed: "test-seed",
    agents: 10,
    days: 2,
    oracle: { kind: "constant" },
  });
  return parseSimulationConfig(mergeConfig(base, overrides));
}

export interface TestContextOptions {
  pool?: LiquidityPool;
  controller?: Controller;
  oracle?: PriceOracle;
  safes?: SafeEngine;
  step?: number;
  redemptionPrice?: number;
}

export function createTestContext(options: TestContextOptions = {}): MarketContext {
  return {
    pool: options.pool ?? new LiquidityPool(TEST_POOL.initialStable, TEST_POOL.initialRef),
    controller: options.controller ?? new Controller(TEST_CONTROLLER, options.redemptionPrice ?? 3.14),
    oracle: options.oracle ?? new PriceOracle("constant", new Array<number>(24 * 60).fill(1500)),
    safes: options.safes ?? new SafeEngine(),
    step: options.step ?? 0,
    params: { rewardTokensPerDay: 334, rewardTokenSupply: 1_000_000 },
  };
}

/**
 * Oracle whose price moves by `weeklyMoves[i]` (in %) over week i
 */
export function weeklyOracle(startPrice: number, weeklyMoves: number[]): PriceOracle {
  const prices: number[] = [];
  let price = startPrice;
  for (const move of weeklyMoves) {
    const weekEnd = price * (1 + move / 100);
    for (let hour = 0; hour < 168; hour++) {
      prices.push(price + ((weekEnd - price) * hour) / 168);
    }
    price = weekEnd;
  }
  prices.push(price);
  return new PriceOracle("linear", prices);
}

/**
 * Agent that trades on the pool and then throws
 */
export class ThrowingAgent implements Agent {
  readonly id: string;
  readonly kind = "shorter" as const;
  private state: Wallet = { ref: 5, stable: 0, externalFunding: 0 };
  private readonly error: Error;

  constructor(id: string, error: Error) {
    this.id = id;
    this.error = error;
  }

  decideAndAct(context: MarketContext): AgentDecision {
    this.state.stable += context.pool.swap("ref", this.state.ref);
    this.state.ref = 0;
    context.safes.openSafe(this.id, 1, 200, 1500, 3.14);
    throw this.error;
  }

  checkpoint(): () => void {
    const saved = { ...this.state };
    return () => {
      this.state = saved;
    };
  }

  diagnostics(): AgentDiagnostics {
    return { expectedReturn: null, poolShare: 0, netWorthRef: this.state.ref };
  }

  wallet(): Readonly<Wallet> {
    return this.state;
  }

  describe(): Record<string, number> {
    return {};
  }
}
