/**
 * Exogenous reference-asset price path
 *
 * The whole path is generated up front from the run's generator so that a
 * seed pins down every price the agents will ever see.
 */

import { DeterministicRNG } from "./deterministic-rng";
import { assertFinite } from "./errors";
import type { OracleConfig } from "./simulation-config";

export type OracleKind = OracleConfig["kind"];

export class PriceOracle {
  readonly kind: OracleKind;
  private readonly prices: readonly number[];

  constructor(kind: OracleKind, prices: readonly number[]) {
    if (prices.length === 0) {
      throw new RangeError("PriceOracle needs at least one price");
    }
    prices.forEach((price, step) => assertFinite(`oracle price at step ${step}`, price));
    this.kind = kind;
    this.prices = prices;
  }

  static fromConfig(config: OracleConfig, length: number, rng: DeterministicRNG): PriceOracle {
    switch (config.kind) {
      case "constant":
        return new PriceOracle("constant", new Array<number>(length).fill(config.initialPrice));
      case "linear":
        return new PriceOracle("linear", linspace(config.initialPrice, config.finalPrice, length));
      case "random_walk":
        return new PriceOracle(
          "random_walk",
          boundedRandomWalk(rng, {
            length,
            lowerBound: config.lowerBound,
            upperBound: config.upperBound,
            start: config.initialPrice,
            end: config.finalPrice,
            std: config.randomWalkStd,
          })
        );
    }
  }

  get length(): number {
    return this.prices.length;
  }

  priceAt(step: number): number {
    if (!Number.isInteger(step) || step < 0 || step >= this.prices.length) {
      throw new RangeError(`No oracle price for step ${step} (path has ${this.prices.length} steps)`);
    }
    return this.prices[step];
  }

  path(): readonly number[] {
    return this.prices;
  }
}

/**
 * Evenly spaced values from start to end inclusive; the last one is exactly `end`
 */
export function linspace(start: number, end: number, length: number): number[] {
  if (length <= 0) return [];
  if (length === 1) return [start];

  const values: number[] = [];
  for (let i = 0; i < length - 1; i++) {
    values.push(start + ((end - start) * i) / (length - 1));
  }
  values.push(end);
  return values;
}

export interface BoundedWalkOptions {
  length: number;
  lowerBound: number;
  upperBound: number;
  start: number;
  end: number;
  std: number;
}

/**
 * Random walk around the start->end trend line, folded back into the bounds.
 *
 * The walk's deviation from its own endpoint-to-endpoint line is scaled so its
 * spread fits the band, then any excursion past a bound is reflected back.
 */
export function boundedRandomWalk(rng: DeterministicRNG, options: BoundedWalkOptions): number[] {
  const { length, lowerBound, upperBound, start, end, std } = options;
  if (length <= 0) return [];
  if (lowerBound > start || lowerBound > end || start > upperBound || end > upperBound) {
    throw new RangeError(`Walk endpoints ${start} -> ${end} outside [${lowerBound}, ${upperBound}]`);
  }

  const walk: number[] = [];
  let position = 0;
  for (let i = 0; i < length; i++) {
    position += std * (rng.random() - 0.5);
    walk.push(position);
  }

  const trendLine = linspace(start, end, length);
  const band = upperBound - lowerBound;
  if (band <= 0) {
    return trendLine;
  }

  const walkTrend = linspace(walk[0], walk[length - 1], length);
  const deltas = walk.map((value, i) => value - walkTrend[i]);
  let highest = Number.NEGATIVE_INFINITY;
  let lowest = Number.POSITIVE_INFINITY;
  for (const delta of deltas) {
    if (delta > highest) highest = delta;
    if (delta < lowest) lowest = delta;
  }
  const spread = highest - lowest;
  const scale = Math.max(1, spread / band);

  return trendLine.map((trend, i) => {
    let delta = deltas[i] / scale;
    const toUpper = upperBound - trend;
    const toLower = lowerBound - trend;

    if (delta - toUpper >= 0) {
      delta = toUpper - (delta - toUpper);
    }
    if (toLower - delta >= 0) {
      delta = toLower + (toLower - delta);
    }
    return trend + delta;
  });
}
