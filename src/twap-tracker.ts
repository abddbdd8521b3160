/**
 * Time-weighted average of the pool's spot price over a sliding horizon
 */

import { assertFinite } from "./errors";

export const DEFAULT_TWAP_HORIZON = 16;

export interface TwapSample {
  timestamp: number;
  price: number;
}

export class TwapTracker {
  private readonly horizon: number;
  private readonly initialPrice: number;
  private window: TwapSample[] = [];
  private average: number;

  constructor(initialPrice: number, horizon: number = DEFAULT_TWAP_HORIZON) {
    if (!Number.isInteger(horizon) || horizon <= 0) {
      throw new RangeError(`TWAP horizon must be a positive integer, got ${horizon}`);
    }
    this.initialPrice = assertFinite("initial TWAP price", initialPrice);
    this.horizon = horizon;
    this.average = initialPrice;
  }

  /**
   * Record a price and return the refreshed average.
   * Samples at or before `timestamp - horizon` fall out of the window.
   */
  update(timestamp: number, price: number): number {
    assertFinite("TWAP sample", price);
    const last = this.window[this.window.length - 1];
    if (last && timestamp <= last.timestamp) {
      throw new RangeError(`TWAP timestamps must increase (got ${timestamp} after ${last.timestamp})`);
    }

    this.window.push({ timestamp, price });
    const cutoff = timestamp - this.horizon;
    while (this.window.length > 0 && this.window[0].timestamp <= cutoff) {
      this.window.shift();
    }

    this.average = this.weightedMean();
    return this.average;
  }

  value(): number {
    return this.average;
  }

  samples(): readonly TwapSample[] {
    return this.window;
  }

  reset(): void {
    this.window = [];
    this.average = this.initialPrice;
  }

  private weightedMean(): number {
    // Running mean: a constant window reproduces its price exactly
    let mean = 0;
    let weight = 0;
    let previous: number | null = null;

    for (const sample of this.window) {
      const duration = previous === null ? 1 : sample.timestamp - previous;
      weight += duration;
      mean += ((sample.price - mean) * duration) / weight;
      previous = sample.timestamp;
    }

    return weight > 0 ? mean : this.initialPrice;
  }
}
