/**
 * Redemption-rate feedback controller
 *
 * Every step the redemption price compounds at the current rate. On update
 * steps the rate is recomputed from the gap between the redemption price and
 * the market price (TWAP in fiat): proportional, plus optional integral and
 * derivative terms. A positive error (market below target) yields a positive
 * rate, so the target drifts up and holders are paid to keep the coin.
 */

import { NumericDivergenceError, assertFinite } from "./errors";
import { STEPS_PER_YEAR } from "./simulation-config";
import type { ControllerConfig } from "./simulation-config";

export type ControllerParams = Omit<ControllerConfig, "initialRedemptionPrice">;

export interface ControllerState {
  redemptionPrice: number;
  redemptionRate: number;
  integral: number;
  lastError: number | null;
  updates: number;
  // Consecutive steps that ended with a positive rate in force
  positiveRateSteps: number;
}

export interface ControllerStep {
  step: number;
  redemptionPrice: number;
  redemptionRate: number;
  error: number | null;
  updated: boolean;
}

export interface RateTerms {
  proportional: number;
  integral: number;
  derivative: number;
  rate: number;
}

export class Controller {
  readonly params: ControllerParams;
  private state: ControllerState;

  constructor(params: ControllerParams, initialRedemptionPrice: number) {
    if (!Number.isInteger(params.updatePeriod) || params.updatePeriod <= 0) {
      throw new RangeError(`Controller update period must be a positive integer, got ${params.updatePeriod}`);
    }
    assertFinite("initial redemption price", initialRedemptionPrice);
    if (initialRedemptionPrice <= 0) {
      throw new NumericDivergenceError("initial redemption price", initialRedemptionPrice);
    }

    this.params = params;
    this.state = {
      redemptionPrice: initialRedemptionPrice,
      redemptionRate: 0,
      integral: 0,
      lastError: null,
      updates: 0,
      positiveRateSteps: 0,
    };
  }

  get redemptionPrice(): number {
    return this.state.redemptionPrice;
  }

  get redemptionRate(): number {
    return this.state.redemptionRate;
  }

  get updateCount(): number {
    return this.state.updates;
  }

  get positiveRateSteps(): number {
    return this.state.positiveRateSteps;
  }

  isUpdateStep(step: number): boolean {
    return step >= this.params.warmupSteps && step % this.params.updatePeriod === 0;
  }

  /**
   * Rate terms for an error without committing them
   */
  computeRate(error: number): RateTerms {
    const { kp, ki, kd, updatePeriod } = this.params;
    const proportional = kp * error;
    const integral = this.state.integral + ki * error * updatePeriod;
    const derivative =
      this.state.lastError === null ? 0 : (kd * (error - this.state.lastError)) / updatePeriod;

    return { proportional, integral, derivative, rate: proportional + integral + derivative };
  }

  /**
   * Compound the redemption price with the rate in force, then recompute the
   * rate if this is an update step.
   */
  advance(step: number, marketPrice: number): ControllerStep {
    assertFinite("market price", marketPrice);

    const compounded = this.state.redemptionPrice * (1 + this.state.redemptionRate);
    assertFinite("redemption price", compounded);
    if (compounded <= 0) {
      throw new NumericDivergenceError("redemption price", compounded);
    }
    this.state.redemptionPrice = compounded;

    if (!this.isUpdateStep(step)) {
      this.countPositiveRate();
      return { step, redemptionPrice: compounded, redemptionRate: this.state.redemptionRate, error: null, updated: false };
    }

    const error = assertFinite("controller error", compounded - marketPrice);
    const terms = this.computeRate(error);
    assertFinite("redemption rate", terms.rate);

    this.state.integral = terms.integral;
    this.state.lastError = error;
    this.state.redemptionRate = terms.rate;
    this.state.updates++;
    this.countPositiveRate();

    return { step, redemptionPrice: compounded, redemptionRate: terms.rate, error, updated: true };
  }

  /**
   * Redemption price `steps` ahead if the current rate held (default one year)
   */
  forwardRedemptionPrice(steps: number = STEPS_PER_YEAR): number {
    return assertFinite(
      "forward redemption price",
      this.state.redemptionPrice * Math.pow(1 + this.state.redemptionRate, steps)
    );
  }

  private countPositiveRate(): void {
    this.state.positiveRateSteps = this.state.redemptionRate > 0 ? this.state.positiveRateSteps + 1 : 0;
  }

  snapshot(): ControllerState {
    return { ...this.state };
  }

  restore(state: ControllerState): void {
    this.state = { ...state };
  }
}
