/**
 * Simulation configuration
 *
 * One validated record per run. Defaults mirror the reference parameter set
 * (200 agents over a year, a ~60M USD pool, 20/80 liquidity providers vs
 * shorters). JSON files are merged over the defaults, then a few numeric
 * environment variables can override the global knobs.
 */

import * as fs from "fs";
import { z } from "zod";
import { InvalidConfigurationError } from "./errors";

export const STEPS_PER_DAY = 24;
export const STEPS_PER_WEEK = 7 * STEPS_PER_DAY;
export const STEPS_PER_YEAR = 365 * STEPS_PER_DAY;
export const DAYS_PER_YEAR = 365;

// Minimum collateralization a safe may be opened at, in %
export const MIN_COLLATERALIZATION_PCT = 145;

const finitePositive = z.number().finite().positive();
const finiteNonNegative = z.number().finite().nonnegative();

function boundsSchema(base: z.ZodNumber) {
  return z
    .object({ lower: base, upper: base })
    .refine((b) => b.lower <= b.upper, { message: "lower bound must not exceed upper bound" });
}

const oracleSchema = z
  .object({
    kind: z.enum(["constant", "linear", "random_walk"]),
    initialPrice: finitePositive,
    finalPrice: finitePositive,
    lowerBound: finitePositive,
    upperBound: finitePositive,
    randomWalkStd: finiteNonNegative,
  })
  .superRefine((oracle, ctx) => {
    if (oracle.kind !== "random_walk") return;
    if (oracle.lowerBound > oracle.upperBound) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "lowerBound must not exceed upperBound" });
    }
    for (const key of ["initialPrice", "finalPrice"] as const) {
      if (oracle[key] < oracle.lowerBound || oracle[key] > oracle.upperBound) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} must lie within [lowerBound, upperBound]`,
        });
      }
    }
  });

export const simulationConfigSchema = z
  .object({
    seed: z.union([z.string().min(1), z.number().int()]),
    agents: z.number().int().nonnegative(),
    days: z.number().int().positive(),
    oracle: oracleSchema,
    rewards: z.object({
      tokensPerDay: finiteNonNegative,
      tokenSupply: finitePositive,
    }),
    pool: z.object({
      initialStable: finitePositive,
      initialRef: finitePositive,
    }),
    proportions: z.object({
      liquidityProvider: finiteNonNegative,
      shorter: finiteNonNegative,
      trendLong: finiteNonNegative,
    }),
    liquidityProvider: z.object({
      refHoldings: boundsSchema(finitePositive),
      believedValuation: boundsSchema(finitePositive),
      returnThreshold: boundsSchema(z.number().finite()),
    }),
    shorter: z.object({
      refHoldings: boundsSchema(finitePositive),
      differenceThreshold: boundsSchema(finiteNonNegative),
      stopLoss: boundsSchema(finitePositive),
      collateralization: boundsSchema(z.number().finite().gt(MIN_COLLATERALIZATION_PCT)),
    }),
    trendLong: z.object({
      refHoldings: boundsSchema(finitePositive),
      upWeeks: boundsSchema(z.number().int().positive()),
      downWeeks: boundsSchema(z.number().int().positive()),
      stopLoss: boundsSchema(finitePositive),
    }),
    controller: z.object({
      kp: z.number().finite(),
      ki: z.number().finite(),
      kd: z.number().finite(),
      updatePeriod: z.number().int().positive(),
      warmupSteps: z.number().int().nonnegative(),
      initialRedemptionPrice: finitePositive.nullable(),
    }),
    twap: z.object({
      horizon: z.number().int().positive(),
    }),
    diagnostics: z
      .object({
        fromStep: z.number().int().nonnegative(),
        toStep: z.number().int().positive(),
      })
      .refine((d) => d.fromStep < d.toStep, { message: "fromStep must be before toStep" })
      .nullable(),
  })
  .superRefine((config, ctx) => {
    const { liquidityProvider, shorter, trendLong } = config.proportions;
    const total = liquidityProvider + shorter + trendLong;
    if (Math.abs(total - 100) > 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["proportions"],
        message: `agent proportions must sum to 100, got ${total}`,
      });
    }
  });

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;
export type UniformBounds = SimulationConfig["shorter"]["stopLoss"];
export type OracleConfig = SimulationConfig["oracle"];
export type ControllerConfig = SimulationConfig["controller"];

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  seed: "redemption-sim",
  agents: 200,
  days: 365,
  oracle: {
    kind: "random_walk",
    initialPrice: 1500,
    finalPrice: 2000,
    lowerBound: 1500,
    upperBound: 2000,
    randomWalkStd: 5,
  },
  rewards: {
    tokensPerDay: 334,
    tokenSupply: 1_000_000,
  },
  pool: {
    initialStable: 10_000_000,
    initialRef: 20_940,
  },
  proportions: {
    liquidityProvider: 20,
    shorter: 80,
    trendLong: 0,
  },
  liquidityProvider: {
    refHoldings: { lower: 100, upper: 500 },
    believedValuation: { lower: 1_000_000_000, upper: 2_000_000_000 },
    returnThreshold: { lower: 200, upper: 300 },
  },
  shorter: {
    refHoldings: { lower: 300, upper: 500 },
    differenceThreshold: { lower: 3, upper: 8 },
    stopLoss: { lower: 10, upper: 50 },
    collateralization: { lower: 150, upper: 300 },
  },
  trendLong: {
    refHoldings: { lower: 300, upper: 500 },
    upWeeks: { lower: 1, upper: 10 },
    downWeeks: { lower: 1, upper: 10 },
    stopLoss: { lower: 10, upper: 50 },
  },
  controller: {
    kp: 0.00002,
    ki: 0.000001,
    kd: 0,
    updatePeriod: 4,
    warmupSteps: 3,
    initialRedemptionPrice: null,
  },
  twap: {
    horizon: 16,
  },
  diagnostics: null,
};

/**
 * Validate an arbitrary value as a configuration record.
 * Every issue is reported at once.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const result = simulationConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new InvalidConfigurationError(issues);
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge plain objects; arrays and scalars in `override` win.
 */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readNumberEnv(env: NodeJS.ProcessEnv, name: string): number | null {
  const raw = env[name];
  if (!raw) return null;
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Apply SIM_SEED / SIM_DAYS / SIM_AGENTS on top of a raw config object
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  const overrides: Record<string, unknown> = {};

  if (env.SIM_SEED) {
    overrides.seed = env.SIM_SEED;
  }
  const days = readNumberEnv(env, "SIM_DAYS");
  if (days !== null) {
    overrides.days = days;
  }
  const agents = readNumberEnv(env, "SIM_AGENTS");
  if (agents !== null) {
    overrides.agents = agents;
  }

  return mergeConfig(raw, overrides);
}

/**
 * Build a validated config from a JSON file (optional) merged over defaults
 */
export function loadSimulationConfig(filePath?: string, env: NodeJS.ProcessEnv = process.env): SimulationConfig {
  let fromFile: unknown = {};

  if (filePath) {
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new InvalidConfigurationError([`cannot read ${filePath}: ${describeError(error)}`]);
    }
    try {
      fromFile = JSON.parse(text);
    } catch (error) {
      throw new InvalidConfigurationError([`${filePath} is not valid JSON: ${describeError(error)}`]);
    }
  }

  return parseSimulationConfig(applyEnvOverrides(mergeConfig(DEFAULT_SIMULATION_CONFIG, fromFile), env));
}

/**
 * Redemption price at step 0: configured, or the pool's seed price in fiat
 */
export function resolveInitialRedemptionPrice(config: SimulationConfig): number {
  if (config.controller.initialRedemptionPrice !== null) {
    return config.controller.initialRedemptionPrice;
  }
  return config.oracle.initialPrice * (config.pool.initialRef / config.pool.initialStable);
}

export function totalSteps(config: SimulationConfig): number {
  return config.days * STEPS_PER_DAY;
}
