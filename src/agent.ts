/**
 * Agent contract and shared strategy math
 *
 * Every strategy is a class implementing `Agent`; the scheduler calls
 * `decideAndAct` once per agent per step and nothing else mutates the market.
 * Return estimates and valuations are free functions over explicit inputs so
 * the three strategies share them without a common base class.
 */

import type { Controller } from "./controller";
import type { DeterministicRNG } from "./deterministic-rng";
import type { LiquidityPool } from "./liquidity-pool";
import type { PriceOracle } from "./price-oracle";
import type { SafeEngine } from "./safe-engine";
import type { UniformBounds } from "./simulation-config";
import { DAYS_PER_YEAR } from "./simulation-config";
import { logTrade } from "./trade-logging";

export const AGENT_KINDS = ["liquidity_provider", "shorter", "trend_long"] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

export const AGENT_ACTIONS = [
  "hold",
  "enter_pool",
  "exit_pool",
  "open_short",
  "close_short",
  "open_long",
  "close_long",
] as const;
export type AgentAction = (typeof AGENT_ACTIONS)[number];

export interface Wallet {
  ref: number;
  stable: number;
  // Reference asset brought in from outside to cover a buyback shortfall
  externalFunding: number;
}

export interface MarketParams {
  rewardTokensPerDay: number;
  rewardTokenSupply: number;
}

export interface MarketContext {
  pool: LiquidityPool;
  controller: Controller;
  oracle: PriceOracle;
  safes: SafeEngine;
  step: number;
  params: MarketParams;
}

export interface AgentDecision {
  action: AgentAction;
  expectedReturn: number | null;
  reason: string;
}

export interface AgentDiagnostics {
  expectedReturn: number | null;
  poolShare: number;
  netWorthRef: number;
}

export interface Agent {
  readonly id: string;
  readonly kind: AgentKind;

  decideAndAct(context: MarketContext): AgentDecision;

  /**
   * Capture mutable state; calling the returned function puts it back
   */
  checkpoint(): () => void;

  diagnostics(context: MarketContext): AgentDiagnostics;

  wallet(): Readonly<Wallet>;

  /**
   * Strategy parameters drawn at creation, for reporting
   */
  describe(): Record<string, number>;
}

// Amounts within this relative distance of zero are treated as spent
export const DUST_TOLERANCE = 1e-9;

export function clampDust(amount: number, scale: number): number {
  return Math.abs(amount) <= DUST_TOLERANCE * Math.max(1, Math.abs(scale)) ? 0 : amount;
}

export function drawUniform(rng: DeterministicRNG, bounds: UniformBounds): number {
  return rng.randomFloat(bounds.lower, bounds.upper);
}

/**
 * Stablecoin market price in fiat: pool spot (ref per coin) times the oracle
 */
export function marketPriceFiat(pool: LiquidityPool, oraclePrice: number): number {
  return pool.spotPrice() * oraclePrice;
}

export interface RewardYieldInput {
  believedValuation: number;
  rewardTokenSupply: number;
  rewardTokensPerDay: number;
  poolShare: number;
  shareValueFiat: number;
}

/**
 * Annualized liquidity-mining yield in %:
 * 100 * (V_token * D * share * 365 / V_share - 1)
 */
export function rewardYieldPct(input: RewardYieldInput): number {
  const tokenValue = input.believedValuation / input.rewardTokenSupply;
  const yearlyReward = tokenValue * input.rewardTokensPerDay * input.poolShare * DAYS_PER_YEAR;
  return 100 * (yearlyReward / input.shareValueFiat - 1);
}

/**
 * Expected gain (rate > 0) or cost from the market converging to the
 * projected redemption price, in %
 */
export function convergenceTermPct(forwardRedemptionPrice: number, marketPrice: number, redemptionRate: number): number {
  const gap = 100 * Math.abs(1 - forwardRedemptionPrice / marketPrice);
  return redemptionRate > 0 ? gap : -gap;
}

/**
 * Reference asset needed to buy `debt` stablecoin back from the pool,
 * given `stableOnHand`. Infinity when the pool cannot supply it.
 */
export function refNeededForDebt(pool: LiquidityPool, debt: number, stableOnHand: number): number {
  const missing = debt - stableOnHand;
  if (missing <= 0) return 0;
  if (missing >= pool.reserveStable) return Number.POSITIVE_INFINITY;
  return pool.quoteInputForExactOutput("stable", missing);
}

/**
 * Net worth in reference asset of a wallet plus one safe, marked at the cost
 * of buying its debt back
 */
export function positionNetWorth(pool: LiquidityPool, wallet: Wallet, collateral: number, debt: number): number {
  return wallet.ref + collateral - refNeededForDebt(pool, debt, wallet.stable);
}

export function unrealizedLossPct(netWorth: number, entryNetWorth: number): number {
  return 100 * (1 - netWorth / entryNetWorth);
}

/**
 * Buy the safe's debt back, repay, and take the collateral home.
 * A shortfall of reference asset is funded from outside and recorded.
 */
export function repayAndCloseSafe(context: MarketContext, agentId: string, wallet: Wallet, safeId: number): void {
  const { pool, safes, step } = context;
  const safe = safes.getSafe(safeId);

  const missing = safe.debt - wallet.stable;
  if (missing > 0) {
    const cost = pool.quoteInputForExactOutput("stable", missing);
    if (cost > wallet.ref) {
      const shortfall = cost - wallet.ref;
      wallet.externalFunding += shortfall;
      wallet.ref += shortfall;
      logTrade(agentId, step, `topped up ${shortfall.toFixed(6)} ref to cover the buyback`);
    }
    pool.swapForExactOutput("stable", missing);
    wallet.ref = clampDust(wallet.ref - cost, cost);
    wallet.stable = 0;
  } else {
    wallet.stable -= safe.debt;
  }

  wallet.ref += safes.closeSafe(safeId);
  logTrade(agentId, step, `closed safe ${safeId}, repaid ${safe.debt.toFixed(4)} stable`);
}

/**
 * Sell the whole stablecoin wallet into the pool
 */
export function sellAllStable(pool: LiquidityPool, wallet: Wallet): number {
  if (wallet.stable <= 0) return 0;
  const received = pool.swap("stable", wallet.stable);
  wallet.stable = 0;
  wallet.ref += received;
  return received;
}
