/**
 * Deterministic RNG using seedrandom for reproducible simulation runs.
 * Each run owns one instance; nothing reads Math.random.
 */

import seedrandom from "seedrandom";

export type Seed = string | number;

export class DeterministicRNG {
  private rng: seedrandom.PRNG;
  private draws = 0;

  constructor(seed: Seed) {
    this.rng = seedrandom(String(seed));
  }

  /**
   * Random number in [0, 1)
   */
  random(): number {
    this.draws++;
    return this.rng();
  }

  /**
   * Random integer in [min, max] (inclusive)
   */
  randomInt(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  /**
   * Random float in [min, max)
   */
  randomFloat(min: number, max: number): number {
    return this.random() * (max - min) + min;
  }

  /**
   * Shuffle array (Fisher-Yates), returning a new array
   */
  shuffle<T>(array: readonly T[]): T[] {
    const result = [...array];
    for (let i = result.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  /**
   * Weighted random choice. Non-positive weights are never picked.
   */
  weightedChoice<T>(items: ReadonlyArray<{ item: T; weight: number }>): T {
    const candidates = items.filter((entry) => entry.weight > 0);
    if (candidates.length === 0) {
      throw new Error("weightedChoice needs at least one positive weight");
    }

    const totalWeight = candidates.reduce((sum, entry) => sum + entry.weight, 0);
    let remaining = this.random() * totalWeight;

    for (const { item, weight } of candidates) {
      remaining -= weight;
      if (remaining < 0) {
        return item;
      }
    }

    return candidates[candidates.length - 1].item;
  }

  /**
   * Number of values drawn so far (diagnostics only)
   */
  drawCount(): number {
    return this.draws;
  }
}
