/**
 * Hourly step loop
 *
 * Per step: read the oracle, shuffle the agents with the run's generator, let
 * each act in turn against the live pool, then feed the pool's spot price to
 * the TWAP and advance the controller. Each agent's turn is all-or-nothing:
 * pool, safes and the agent's own state are rolled back if it throws.
 */

import type { Agent, AgentAction, AgentDecision, AgentKind, MarketContext, Wallet } from "./agent";
import { createAgents } from "./agent-factory";
import { Controller } from "./controller";
import { DeterministicRNG } from "./deterministic-rng";
import { NumericDivergenceError, isTerminalMarketError } from "./errors";
import { LiquidityPool } from "./liquidity-pool";
import { PriceOracle } from "./price-oracle";
import type { Profiler } from "./profiler";
import { SafeEngine } from "./safe-engine";
import { parseSimulationConfig, resolveInitialRedemptionPrice, totalSteps } from "./simulation-config";
import type { SimulationConfig } from "./simulation-config";
import { TwapTracker } from "./twap-tracker";

export const RUN_STATUSES = ["completed", "pool_depleted", "numeric_divergence"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export interface SeriesPoint {
  step: number;
  referencePrice: number;
  // Stablecoin price in reference-asset units
  spotPrice: number;
  // Stablecoin price in fiat
  marketPrice: number;
  // TWAP in reference-asset units, and the same in fiat
  twap: number;
  twapFiat: number;
  redemptionPrice: number;
  redemptionRate: number;
}

export interface AgentDiagnosticsPoint {
  step: number;
  agentId: string;
  kind: AgentKind;
  action: AgentAction;
  expectedReturn: number | null;
  poolShare: number;
  netWorthRef: number;
}

export interface AgentSummary {
  id: string;
  kind: AgentKind;
  wallet: Wallet;
  shares: number;
  poolShare: number;
  parameters: Record<string, number>;
}

export interface SimulationResult {
  status: RunStatus;
  haltedAtStep: number | null;
  haltReason: string | null;
  stepsCompleted: number;
  series: SeriesPoint[];
  agentDiagnostics: AgentDiagnosticsPoint[];
  agents: AgentSummary[];
}

export interface MarketState {
  pool: LiquidityPool;
  controller: Controller;
  oracle: PriceOracle;
  safes: SafeEngine;
  twap: TwapTracker;
  agents: Agent[];
  rng: DeterministicRNG;
}

export interface SchedulerOptions {
  profiler?: Profiler;
  verbose?: boolean;
  onStep?: (point: SeriesPoint) => void;
}

/**
 * Build every run component from a validated config. Draw order is fixed:
 * the oracle path first, then the agent population.
 */
export function buildMarket(config: SimulationConfig): MarketState {
  const rng = new DeterministicRNG(config.seed);
  const oracle = PriceOracle.fromConfig(config.oracle, totalSteps(config), rng);
  const agents = createAgents(config, rng);
  const pool = new LiquidityPool(config.pool.initialStable, config.pool.initialRef);
  const controller = new Controller(
    {
      kp: config.controller.kp,
      ki: config.controller.ki,
      kd: config.controller.kd,
      updatePeriod: config.controller.updatePeriod,
      warmupSteps: config.controller.warmupSteps,
    },
    resolveInitialRedemptionPrice(config)
  );
  const twap = new TwapTracker(pool.spotPrice(), config.twap.horizon);

  return { pool, controller, oracle, safes: new SafeEngine(), twap, agents, rng };
}

export class Scheduler {
  readonly config: SimulationConfig;
  readonly market: MarketState;
  private readonly options: SchedulerOptions;
  private currentStep = 0;
  private readonly series: SeriesPoint[] = [];
  private readonly diagnostics: AgentDiagnosticsPoint[] = [];

  constructor(config: SimulationConfig, market: MarketState, options: SchedulerOptions = {}) {
    if (market.oracle.length < totalSteps(config)) {
      throw new RangeError(`Oracle covers ${market.oracle.length} steps, run needs ${totalSteps(config)}`);
    }
    this.config = config;
    this.market = market;
    this.options = options;
  }

  static fromConfig(input: unknown, options: SchedulerOptions = {}): Scheduler {
    const config = parseSimulationConfig(input);
    return new Scheduler(config, buildMarket(config), options);
  }

  get step(): number {
    return this.currentStep;
  }

  get horizon(): number {
    return totalSteps(this.config);
  }

  isFinished(): boolean {
    return this.currentStep >= this.horizon;
  }

  marketContext(): MarketContext {
    const { pool, controller, oracle, safes } = this.market;
    return {
      pool,
      controller,
      oracle,
      safes,
      step: this.currentStep,
      params: {
        rewardTokensPerDay: this.config.rewards.tokensPerDay,
        rewardTokenSupply: this.config.rewards.tokenSupply,
      },
    };
  }

  /**
   * Run one hourly step and return its series point
   */
  runStep(): SeriesPoint {
    if (this.isFinished()) {
      throw new RangeError(`Run already finished after ${this.horizon} steps`);
    }

    const { pool, controller, oracle, twap, rng } = this.market;
    const step = this.currentStep;
    const context = this.marketContext();

    const referencePrice = this.time("oracle", () => oracle.priceAt(step));
    const order = this.time("shuffle", () => rng.shuffle(this.market.agents));

    this.time("agents", () => {
      for (const agent of order) {
        const decision = this.actAtomically(agent, context);
        if (this.inDiagnosticsWindow(step)) {
          this.diagnostics.push({
            step,
            agentId: agent.id,
            kind: agent.kind,
            action: decision.action,
            ...agent.diagnostics(context),
          });
        }
      }
    });

    const spotPrice = pool.spotPrice();
    const twapValue = this.time("twap", () => twap.update(step, spotPrice));
    const twapFiat = twapValue * referencePrice;
    const update = this.time("controller", () => controller.advance(step, twapFiat));

    const point: SeriesPoint = {
      step,
      referencePrice,
      spotPrice,
      marketPrice: spotPrice * referencePrice,
      twap: twapValue,
      twapFiat,
      redemptionPrice: update.redemptionPrice,
      redemptionRate: update.redemptionRate,
    };
    this.series.push(point);
    this.currentStep++;
    this.options.onStep?.(point);
    return point;
  }

  /**
   * Step to the horizon. Pool depletion and numeric divergence end the run
   * early with the history so far; any other error propagates.
   */
  run(): SimulationResult {
    let status: RunStatus = "completed";
    let haltedAtStep: number | null = null;
    let haltReason: string | null = null;

    if (this.options.verbose) {
      console.log(
        `[Scheduler] Starting run seed=${this.config.seed}: ${this.market.agents.length} agents, ${this.horizon} steps`
      );
    }

    while (!this.isFinished()) {
      try {
        this.runStep();
      } catch (error) {
        if (!isTerminalMarketError(error)) {
          throw error;
        }
        status = error instanceof NumericDivergenceError ? "numeric_divergence" : "pool_depleted";
        haltedAtStep = this.currentStep;
        haltReason = error.message;
        console.warn(`[Scheduler] Run halted at step ${haltedAtStep}: ${error.message}`);
        break;
      }

      if (this.options.verbose && this.currentStep % (24 * 30) === 0) {
        const last = this.series[this.series.length - 1];
        console.log(
          `[Scheduler] Day ${this.currentStep / 24}: market=${last.marketPrice.toFixed(4)} redemption=${last.redemptionPrice.toFixed(4)} rate=${last.redemptionRate.toExponential(3)}`
        );
      }
    }

    return this.result(status, haltedAtStep, haltReason);
  }

  private result(status: RunStatus, haltedAtStep: number | null, haltReason: string | null): SimulationResult {
    const { pool } = this.market;
    return {
      status,
      haltedAtStep,
      haltReason,
      stepsCompleted: this.series.length,
      series: [...this.series],
      agentDiagnostics: [...this.diagnostics],
      agents: this.market.agents.map((agent) => {
        const shares = pool.sharesOf(agent.id);
        return {
          id: agent.id,
          kind: agent.kind,
          wallet: { ...agent.wallet() },
          shares,
          poolShare: pool.poolShare(shares),
          parameters: agent.describe(),
        };
      }),
    };
  }

  private actAtomically(agent: Agent, context: MarketContext): AgentDecision {
    const { pool, safes } = this.market;
    const poolSnapshot = pool.snapshot();
    const safesSnapshot = safes.snapshot();
    const restoreAgent = agent.checkpoint();

    try {
      return agent.decideAndAct(context);
    } catch (error) {
      pool.restore(poolSnapshot);
      safes.restore(safesSnapshot);
      restoreAgent();
      throw error;
    }
  }

  private inDiagnosticsWindow(step: number): boolean {
    const window = this.config.diagnostics;
    return window !== null && step >= window.fromStep && step < window.toStep;
  }

  private time<T>(phase: string, fn: () => T): T {
    return this.options.profiler ? this.options.profiler.time(phase, fn) : fn();
  }
}

/**
 * Validate, build and run a whole simulation
 */
export function runSimulation(input: unknown, options: SchedulerOptions = {}): SimulationResult {
  return Scheduler.fromConfig(input, options).run();
}
