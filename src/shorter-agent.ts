/**
 * Shorter: mints stablecoin against its reference asset and sells it when
 * the market trades far enough above the redemption price, then buys it back.
 *
 * Close order: non-positive net worth, stop loss, take profit. Profit is
 * taken once spot is back at the redemption price recorded when the short
 * was opened and the rate has stayed positive for the last four days.
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
import type { SimulationConfig } from "./simulation-config";
import { logDecision, logTrade } from "./trade-logging";

export const TAKE_PROFIT_POSITIVE_RATE_STEPS = 96;

export interface ShorterParams {
  differenceThreshold: number;
  stopLoss: number;
  collateralization: number;
}

interface ShortPosition {
  safeId: number;
  entryNetWorth: number;
  // Redemption price (fiat) when the short was opened
  targetPrice: number;
}

interface ShorterState {
  wallet: Wallet;
  position: ShortPosition | null;
  lastSpread: number | null;
}

/**
 * How far the market sits above the redemption price, in %
 */
export function shortSpreadPct(redemptionPriceFiat: number, oraclePrice: number, spotPrice: number): number {
  return 100 * (1 - redemptionPriceFiat / oraclePrice / spotPrice);
}

export class ShorterAgent implements Agent {
  readonly id: string;
  readonly kind = "shorter" as const;
  readonly params: ShorterParams;
  private state: ShorterState;

  constructor(id: string, refHoldings: number, params: ShorterParams) {
    this.id = id;
    this.params = params;
    this.state = {
      wallet: { ref: refHoldings, stable: 0, externalFunding: 0 },
      position: null,
      lastSpread: null,
    };
  }

  static draw(id: string, rng: DeterministicRNG, config: SimulationConfig["shorter"]): ShorterAgent {
    const refHoldings = drawUniform(rng, config.refHoldings);
    const differenceThreshold = drawUniform(rng, config.differenceThreshold);
    const stopLoss = drawUniform(rng, config.stopLoss);
    const collateralization = drawUniform(rng, config.collateralization);
    return new ShorterAgent(id, refHoldings, { differenceThreshold, stopLoss, collateralization });
  }

  hasPosition(): boolean {
    return this.state.position !== null;
  }

  decideAndAct(context: MarketContext): AgentDecision {
    const { pool, controller, oracle, step } = context;
    const oraclePrice = oracle.priceAt(step);
    const spot = pool.spotPrice();
    const spread = shortSpreadPct(controller.redemptionPrice, oraclePrice, spot);
    this.state.lastSpread = spread;

    const position = this.state.position;
    if (position === null) {
      if (spread > this.params.differenceThreshold && this.state.wallet.ref > 0) {
        logDecision(this.id, step, `spread ${spread.toFixed(2)}% > ${this.params.differenceThreshold.toFixed(2)}%, shorting`);
        this.open(context);
        return { action: "open_short", expectedReturn: spread, reason: "spread above threshold" };
      }
      return { action: "hold", expectedReturn: spread, reason: "spread too small" };
    }

    const reason = this.closeReason(context, position);
    if (reason) {
      logDecision(this.id, step, `closing short: ${reason}`);
      repayAndCloseSafe(context, this.id, this.state.wallet, position.safeId);
      this.state.position = null;
      return { action: "close_short", expectedReturn: spread, reason };
    }

    return { action: "hold", expectedReturn: spread, reason: "short still open" };
  }

  private closeReason(context: MarketContext, position: ShortPosition): string | null {
    const netWorth = this.netWorth(context, position);
    if (netWorth <= 0) {
      return "net worth exhausted";
    }
    if (unrealizedLossPct(netWorth, position.entryNetWorth) > this.params.stopLoss) {
      return "stop loss";
    }
    const oraclePrice = context.oracle.priceAt(context.step);
    if (
      context.pool.spotPrice() <= position.targetPrice / oraclePrice &&
      context.controller.positiveRateSteps >= TAKE_PROFIT_POSITIVE_RATE_STEPS
    ) {
      return "take profit";
    }
    return null;
  }

  private netWorth(context: MarketContext, position: ShortPosition): number {
    const safe = context.safes.getSafe(position.safeId);
    return positionNetWorth(context.pool, this.state.wallet, safe.collateral, safe.debt);
  }

  private open(context: MarketContext): void {
    const { pool, controller, oracle, safes, step } = context;
    const wallet = this.state.wallet;
    const entryNetWorth = wallet.ref;
    const collateral = wallet.ref;

    const { safeId, debt } = safes.openSafe(
      this.id,
      collateral,
      this.params.collateralization,
      oracle.priceAt(step),
      controller.redemptionPrice
    );
    wallet.ref = 0;
    wallet.stable += debt;
    const proceeds = sellAllStable(pool, wallet);

    this.state.position = { safeId, entryNetWorth, targetPrice: controller.redemptionPrice };
    logTrade(this.id, step, `opened safe ${safeId}: minted ${debt.toFixed(4)} stable, sold for ${proceeds.toFixed(6)} ref`);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  diagnostics(context: MarketContext): AgentDiagnostics {
    const position = this.state.position;
    const wallet = this.state.wallet;
    return {
      expectedReturn: this.state.lastSpread,
      poolShare: 0,
      netWorthRef: position ? this.netWorth(context, position) : wallet.ref + wallet.stable * context.pool.spotPrice(),
    };
  }

  wallet(): Readonly<Wallet> {
    return this.state.wallet;
  }

  describe(): Record<string, number> {
    return {
      differenceThreshold: this.params.differenceThreshold,
      stopLoss: this.params.stopLoss,
      collateralization: this.params.collateralization,
    };
  }
}
