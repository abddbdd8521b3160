/**
 * Run the same configuration over several seeds (and optionally several
 * proportional gains) and print one summary row per run.
 *
 * Usage: tsx scripts/sweep-simulations.ts [--config file.json] [--seeds 5]
 *        [--kp 0.00002,0.0002] [--days n]
 */

import { SimulationError } from "../src/errors";
import { runSimulation } from "../src/scheduler";
import { formatSummaryRow, summarizeRun, SUMMARY_TABLE_HEADER } from "../src/series-export";
import { loadSimulationConfig, mergeConfig } from "../src/simulation-config";

const DEFAULT_SEED_COUNT = 5;

function readStringArg(flag: string): string | null {
  const argWithValue = process.argv.find((arg) => arg.startsWith(`${flag}=`));
  if (argWithValue) return argWithValue.split("=").slice(1).join("=");

  const flagIndex = process.argv.indexOf(flag);
  if (flagIndex === -1 || flagIndex + 1 >= process.argv.length) return null;
  return process.argv[flagIndex + 1];
}

function readNumberArg(flag: string): number | null {
  const value = readStringArg(flag);
  if (value === null) return null;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

function readGainList(flag: string): number[] | null {
  const value = readStringArg(flag);
  if (value === null) return null;
  const gains = value
    .split(",")
    .map((part) => parseFloat(part.trim()))
    .filter((gain) => Number.isFinite(gain));
  return gains.length > 0 ? gains : null;
}

function main(): void {
  const base = loadSimulationConfig(readStringArg("--config") ?? undefined);
  const seedCount = readNumberArg("--seeds") ?? DEFAULT_SEED_COUNT;
  const days = readNumberArg("--days") ?? base.days;
  const gains = readGainList("--kp") ?? [base.controller.kp];

  console.log(`[Sweep] ${seedCount} seeds x ${gains.length} gains, ${days} days each`);
  console.log(`\n${"kp".padEnd(12)} ${SUMMARY_TABLE_HEADER}`);

  let halted = 0;
  for (const kp of gains) {
    for (let i = 0; i < seedCount; i++) {
      const seed = `${base.seed}-${i}`;
      const result = runSimulation(mergeConfig(base, { seed, days, controller: { kp } }));
      if (result.status !== "completed") halted++;
      console.log(`${String(kp).padEnd(12)} ${formatSummaryRow(seed, summarizeRun(result))}`);
    }
  }

  console.log(`\n[Sweep] ${halted} of ${seedCount * gains.length} runs halted early`);
}

try {
  main();
} catch (error) {
  if (error instanceof SimulationError) {
    console.error(`[Sweep] ${error.code}: ${error.message}`);
  } else {
    console.error("[Sweep] Unexpected failure:", error);
  }
  process.exitCode = 1;
}
