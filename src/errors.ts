/**
 * Error taxonomy for the simulation engine
 *
 * InvalidAmount and InsufficientShares mean an agent asked for something a
 * correct strategy never asks for; they propagate and abort the run.
 * PoolDepleted and NumericDivergence are terminal states of the simulated
 * market and are reported by the scheduler as the run's outcome.
 */

export type SimulationErrorCode =
  | "INVALID_AMOUNT"
  | "POOL_DEPLETED"
  | "INSUFFICIENT_SHARES"
  | "INVALID_CONFIGURATION"
  | "NUMERIC_DIVERGENCE";

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = "SimulationError";
    this.code = code;
  }
}

export class InvalidAmountError extends SimulationError {
  public readonly amount: number;

  constructor(operation: string, amount: number) {
    super("INVALID_AMOUNT", `${operation}: amount must be a positive finite number, got ${amount}`);
    this.name = "InvalidAmountError";
    this.amount = amount;
  }
}

export class PoolDepletedError extends SimulationError {
  constructor(message: string) {
    super("POOL_DEPLETED", message);
    this.name = "PoolDepletedError";
  }
}

export class InsufficientSharesError extends SimulationError {
  public readonly holder: string;
  public readonly requested: number;
  public readonly available: number;

  constructor(holder: string, requested: number, available: number) {
    super(
      "INSUFFICIENT_SHARES",
      `${holder} tried to burn ${requested} shares but holds ${available}`
    );
    this.name = "InsufficientSharesError";
    this.holder = holder;
    this.requested = requested;
    this.available = available;
  }
}

export class InvalidConfigurationError extends SimulationError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIGURATION", `Invalid simulation configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class NumericDivergenceError extends SimulationError {
  public readonly quantity: string;
  public readonly value: number;

  constructor(quantity: string, value: number) {
    super("NUMERIC_DIVERGENCE", `${quantity} diverged to ${value}`);
    this.name = "NumericDivergenceError";
    this.quantity = quantity;
    this.value = value;
  }
}

/**
 * Throw NumericDivergenceError unless the value is a finite number
 */
export function assertFinite(quantity: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new NumericDivergenceError(quantity, value);
  }
  return value;
}

export function isTerminalMarketError(error: unknown): error is PoolDepletedError | NumericDivergenceError {
  return error instanceof PoolDepletedError || error instanceof NumericDivergenceError;
}
