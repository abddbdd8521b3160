/**
 * Population builder: each agent's strategy is drawn by the configured
 * proportions, then its parameters from the strategy's distributions.
 */

import type { Agent, AgentKind } from "./agent";
import type { DeterministicRNG } from "./deterministic-rng";
import { LiquidityProviderAgent } from "./liquidity-provider-agent";
import { ShorterAgent } from "./shorter-agent";
import type { SimulationConfig } from "./simulation-config";
import { TrendLongAgent } from "./trend-long-agent";

const ID_PREFIX: Record<AgentKind, string> = {
  liquidity_provider: "lp",
  shorter: "shorter",
  trend_long: "long",
};

export function createAgent(kind: AgentKind, index: number, rng: DeterministicRNG, config: SimulationConfig): Agent {
  const id = `${ID_PREFIX[kind]}-${index}`;
  switch (kind) {
    case "liquidity_provider":
      return LiquidityProviderAgent.draw(id, rng, config.liquidityProvider);
    case "shorter":
      return ShorterAgent.draw(id, rng, config.shorter);
    case "trend_long":
      return TrendLongAgent.draw(id, rng, config.trendLong);
  }
}

export function createAgents(config: SimulationConfig, rng: DeterministicRNG): Agent[] {
  const weights: Array<{ item: AgentKind; weight: number }> = [
    { item: "liquidity_provider", weight: config.proportions.liquidityProvider },
    { item: "shorter", weight: config.proportions.shorter },
    { item: "trend_long", weight: config.proportions.trendLong },
  ];

  const agents: Agent[] = [];
  for (let index = 0; index < config.agents; index++) {
    agents.push(createAgent(rng.weightedChoice(weights), index, rng, config));
  }
  return agents;
}

export function countByKind(agents: readonly Agent[]): Record<AgentKind, number> {
  const counts: Record<AgentKind, number> = { liquidity_provider: 0, shorter: 0, trend_long: 0 };
  for (const agent of agents) {
    counts[agent.kind]++;
  }
  return counts;
}
