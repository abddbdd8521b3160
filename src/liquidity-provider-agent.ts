/**
 * Liquidity provider chasing the reward-token drop
 *
 * Enters with its whole wallet (swap the entire-wallet size, deposit both
 * sides) when the expected annual return reaches its threshold, and leaves
 * completely, selling the withdrawn stablecoin, when it falls below.
 */

import {
  clampDust,
  convergenceTermPct,
  drawUniform,
  marketPriceFiat,
  rewardYieldPct,
  sellAllStable,
} from "./agent";
import type { Agent, AgentDecision, AgentDiagnostics, MarketContext, Wallet } from "./agent";
import type { DeterministicRNG } from "./deterministic-rng";
import type { LiquidityPool } from "./liquidity-pool";
import type { SimulationConfig } from "./simulation-config";
import { logDecision, logTrade } from "./trade-logging";

export interface LiquidityProviderParams {
  believedValuation: number;
  returnThreshold: number;
}

interface LiquidityProviderState {
  wallet: Wallet;
  lastExpectedReturn: number | null;
}

export interface ReturnEstimate {
  expectedReturn: number;
  poolShare: number;
  potential: boolean;
}

export class LiquidityProviderAgent implements Agent {
  readonly id: string;
  readonly kind = "liquidity_provider" as const;
  readonly params: LiquidityProviderParams;
  private state: LiquidityProviderState;

  constructor(id: string, refHoldings: number, params: LiquidityProviderParams) {
    this.id = id;
    this.params = params;
    this.state = {
      wallet: { ref: refHoldings, stable: 0, externalFunding: 0 },
      lastExpectedReturn: null,
    };
  }

  static draw(id: string, rng: DeterministicRNG, config: SimulationConfig["liquidityProvider"]): LiquidityProviderAgent {
    const refHoldings = drawUniform(rng, config.refHoldings);
    const returnThreshold = drawUniform(rng, config.returnThreshold);
    const believedValuation = drawUniform(rng, config.believedValuation);
    return new LiquidityProviderAgent(id, refHoldings, { believedValuation, returnThreshold });
  }

  inPool(pool: LiquidityPool): boolean {
    return pool.sharesOf(this.id) > 0;
  }

  /**
   * Expected annual return in % of the current position, or of the position
   * the whole wallet would buy (evaluated on a cloned pool). Null when the
   * agent has nothing to put to work.
   */
  estimateReturn(context: MarketContext): ReturnEstimate | null {
    const { pool, controller, oracle, step, params } = context;
    const shares = pool.sharesOf(this.id);
    const oraclePrice = oracle.priceAt(step);

    let valuation: LiquidityPool;
    let poolShare: number;
    let potential: boolean;

    if (shares > 0) {
      valuation = pool;
      poolShare = pool.poolShare(shares);
      potential = false;
    } else if (this.state.wallet.ref > 0) {
      valuation = pool.clone();
      const size = valuation.entireWalletSwapSize(this.state.wallet.ref);
      valuation.swap("ref", size);
      const receipt = valuation.addLiquidity(this.id, { asset: "ref", amount: this.state.wallet.ref - size });
      poolShare = valuation.poolShare(receipt.shares);
      potential = true;
    } else {
      return null;
    }

    const shareValueFiat = valuation.totalValueInRef() * poolShare * oraclePrice;
    const rewardYield = rewardYieldPct({
      believedValuation: this.params.believedValuation,
      rewardTokenSupply: params.rewardTokenSupply,
      rewardTokensPerDay: params.rewardTokensPerDay,
      poolShare,
      shareValueFiat,
    });
    const convergence = convergenceTermPct(
      controller.forwardRedemptionPrice(),
      marketPriceFiat(pool, oraclePrice),
      controller.redemptionRate
    );

    return { expectedReturn: rewardYield + convergence, poolShare, potential };
  }

  decideAndAct(context: MarketContext): AgentDecision {
    const estimate = this.estimateReturn(context);
    this.state.lastExpectedReturn = estimate ? estimate.expectedReturn : null;

    if (!estimate) {
      return { action: "hold", expectedReturn: null, reason: "nothing to provide" };
    }

    const { expectedReturn } = estimate;
    const threshold = this.params.returnThreshold;
    const inPool = this.inPool(context.pool);

    if (expectedReturn >= threshold && !inPool) {
      logDecision(this.id, context.step, `expected ${expectedReturn.toFixed(2)}% >= ${threshold.toFixed(2)}%, entering`);
      this.enter(context);
      return { action: "enter_pool", expectedReturn, reason: "return at or above threshold" };
    }

    if (expectedReturn < threshold && inPool) {
      logDecision(this.id, context.step, `expected ${expectedReturn.toFixed(2)}% < ${threshold.toFixed(2)}%, exiting`);
      this.exit(context);
      return { action: "exit_pool", expectedReturn, reason: "return below threshold" };
    }

    return { action: "hold", expectedReturn, reason: inPool ? "staying in pool" : "staying out" };
  }

  private enter(context: MarketContext): void {
    const { pool, step } = context;
    const wallet = this.state.wallet;

    const size = pool.entireWalletSwapSize(wallet.ref);
    const stableBought = pool.swap("ref", size);
    const receipt = pool.addLiquidity(this.id, { asset: "ref", amount: wallet.ref - size });

    wallet.ref = 0;
    wallet.stable = clampDust(wallet.stable + stableBought - receipt.amountStable, stableBought);

    logTrade(
      this.id,
      step,
      `swapped ${size.toFixed(6)} ref, deposited ${receipt.amountRef.toFixed(6)} ref + ${receipt.amountStable.toFixed(4)} stable for ${receipt.shares.toFixed(6)} shares`
    );
  }

  private exit(context: MarketContext): void {
    const { pool, step } = context;
    const wallet = this.state.wallet;
    const shares = pool.sharesOf(this.id);

    const withdrawn = pool.removeLiquidity(this.id, shares);
    wallet.ref += withdrawn.amountRef;
    wallet.stable += withdrawn.amountStable;
    const sold = sellAllStable(pool, wallet);

    logTrade(this.id, step, `burned ${shares.toFixed(6)} shares, sold stable for ${sold.toFixed(6)} ref`);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }

  diagnostics(context: MarketContext): AgentDiagnostics {
    const { pool } = context;
    const poolShare = pool.poolShare(pool.sharesOf(this.id));
    const wallet = this.state.wallet;

    return {
      expectedReturn: this.state.lastExpectedReturn,
      poolShare,
      netWorthRef: wallet.ref + wallet.stable * pool.spotPrice() + poolShare * pool.totalValueInRef(),
    };
  }

  wallet(): Readonly<Wallet> {
    return this.state.wallet;
  }

  describe(): Record<string, number> {
    return {
      believedValuation: this.params.believedValuation,
      returnThreshold: this.params.returnThreshold,
    };
  }
}
