/**
 * Trend-following long on the reference asset
 *
 * Watches week-over-week oracle moves. After `upWeeks` rising weeks in a row
 * it mints at 145.01%, sells the stablecoin and locks the proceeds as extra
 * collateral. It unwinds after `downWeeks` falling weeks, on stop loss, or
 * when collateralization drops under 150%.
 */

import {
  drawUniform,
  positionNetWorth,
  repayAndCloseSafe,
  sellAllStable,
  unrealizedLossPct,
} from "./agent";
import type { Agent, AgentDecision, AgentDiagnostics, MarketContext, Wallet } from "./agent";
import type { DeterministicRNG } from "./deterministic-rng";
import type { PriceOracle } from "./price-oracle";
import { STEPS_PER_WEEK } from "./simulation-config";
import type { SimulationConfig } from "./simulation-config";
import { logDecision, logTrade } from "./trade-logging";

export const LONG_OPEN_COLLATERALIZATION = 145.01;
export const LONG_EXIT_COLLATERALIZATION = 150;

export interface TrendLongParams {
  upWeeks: number;
  downWeeks: number;
  stopLoss: number;
}

interface LongPosition {
  safeId: number;
  entryNetWorth: number;
}

interface TrendLongState {
  wallet: Wallet;
  position: LongPosition | null;
}

/**
 * True when each of the last `weeks` weeks moved in `direction`.
 * False until enough history exists.
 */
export function weeklyTrend(oracle: PriceOracle, step: number, weeks: number, direction: "up" | "down"): boolean {
  if (step < STEPS_PER_WEEK * weeks) return false;

  for (let week = 0; week < weeks; week++) {
    const later = oracle.priceAt(step - STEPS_PER_WEEK * week);
    const earlier = oracle.priceAt(step - STEPS_PER_WEEK * (week + 1));
    const moved = direction === "up" ? earlier < later : earlier > later;
    if (!moved) return false;
  }
  return true;
}

export class TrendLongAgent implements Agent {
  readonly id: string;
  readonly kind = "trend_long" as const;
  readonly params: TrendLongParams;
  private state: TrendLongState;

  constructor(id: string, refHoldings: number, params: TrendLongParams) {
    this.id = id;
    this.params = params;
    this.state = {
      wallet: { ref: refHoldings, stable: 0, externalFunding: 0 },
      position: null,
    };
  }

  static draw(id: string, rng: DeterministicRNG, config: SimulationConfig["trendLong"]): TrendLongAgent {
    const refHoldings = drawUniform(rng, config.refHoldings);
    const upWeeks = rng.randomInt(config.upWeeks.lower, config.upWeeks.upper);
    const downWeeks = rng.randomInt(config.downWeeks.lower, config.downWeeks.upper);
    const stopLoss = drawUniform(rng, config.stopLoss);
    return new TrendLongAgent(id, refHoldings, { upWeeks, downWeeks, stopLoss });
  }

  hasPosition(): boolean {
    return this.state.position !== null;
  }

  decideAndAct(context: MarketContext): AgentDecision {
    const { oracle, step } = context;
    const position = this.state.position;

    if (position === null) {
      if (this.state.wallet.ref > 0 && weeklyTrend(oracle, step, this.params.upWeeks, "up")) {
        logDecision(this.id, step, `${this.params.upWeeks} rising weeks, going long`);
        this.open(context);
        return { action: "open_long", expectedReturn: null, reason: "uptrend" };
      }
      return { action: "hold", expectedReturn: null, reason: "no uptrend" };
    }

    const reason = this.closeReason(context, position);
    if (reason) {
      logDecision(this.id, step, `closing long: ${reason}`);
      repayAndCloseSafe(context, this.id, this.state.wallet, position.safeId);
      this.state.position = null;
      return { action: "close_long", expectedReturn: null, reason };
    }
    return { action: "hold", expectedReturn: null, reason: "long still open" };
  }

  private closeReason(context: MarketContext, position: LongPosition): string | null {
    const { controller, oracle, safes, step } = context;

    if (weeklyTrend(oracle, step, this.params.downWeeks, "down")) {
      return "downtrend";
    }
    const netWorth = this.netWorth(context, position);
    if (netWorth <= 0 || unrealizedLossPct(netWorth, position.entryNetWorth) > this.params.stopLoss) {
      return "stop loss";
    }
    const ratio = safes.collateralization(position.safeId, oracle.priceAt(step), controller.redemptionPrice);
    if (ratio < LONG_EXIT_COLLATERALIZATION) {
      return "close to liquidation";
    }
    return null;
  }

  private netWorth(context: MarketContext, position: LongPosition): number {
    const safe = context.safes.getSafe(position.safeId);
    return positionNetWorth(context.pool, this.state.wallet, safe.collateral, safe.debt);
  }

  private open(context: MarketContext): void {
    const { pool, controller, oracle, safes, step } = context;
    const wallet = this.state.wallet;
    const entryNetWorth = wallet.ref;

    const { safeId, debt } = safes.openSafe(
      this.id,
      wallet.ref,
      LONG_OPEN_COLLATERALIZATION,
      oracle.priceAt(step),
      controller.redemptionPrice
    );
    wallet.ref = 0;
    wallet.stable += debt;
    const proceeds = sellAllStable(pool, wallet);
    safes.addCollateral(safeId, proceeds);
    wallet.ref -= proceeds;

    this.state.position = { safeId, entryNetWorth };
    logTrade(this.id, step, `opened safe ${safeId}: minted ${debt.toFixed(4)} stable, relocked ${proceeds.toFixed(6)} ref`);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  diagnostics(context: MarketContext): AgentDiagnostics {
    const position = this.state.position;
    return {
      expectedReturn: null,
      poolShare: 0,
      netWorthRef: position ? this.netWorth(context, position) : this.state.wallet.ref,
    };
  }

  wallet(): Readonly<Wallet> {
    return this.state.wallet;
  }

  describe(): Record<string, number> {
    return {
      upWeeks: this.params.upWeeks,
      downWeeks: this.params.downWeeks,
      stopLoss: this.params.stopLoss,
    };
  }
}
