/**
 * Run one simulation, store it, and optionally write the series as CSV
 *
 * Usage: tsx scripts/run-simulation.ts [--config file.json] [--seed s] [--days n]
 *        [--db path] [--csv out.csv] [--profile] [--log all|none|<agentId>]
 */

import * as fs from "fs";
import * as path from "path";
import { SimulationError } from "../src/errors";
import { Profiler } from "../src/profiler";
import { RunStorage } from "../src/run-storage";
import { Scheduler } from "../src/scheduler";
import { formatSummaryRow, seriesToCsv, summarizeRun, SUMMARY_TABLE_HEADER } from "../src/series-export";
import { loadSimulationConfig, mergeConfig, parseSimulationConfig } from "../src/simulation-config";
import {
  formatTradeLog,
  getTradeLoggingMode,
  getTradeLogs,
  getTradeLogStats,
  setTradeLoggingMode,
} from "../src/trade-logging";

const MAX_PRINTED_LOGS = 200;

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

function main(): void {
  const configPath = readStringArg("--config") ?? undefined;
  const seed = readStringArg("--seed");
  const days = readNumberArg("--days");
  const dbPath = readStringArg("--db");
  const csvPath = readStringArg("--csv");
  const logMode = readStringArg("--log");
  const profiler = process.argv.includes("--profile") ? new Profiler() : undefined;

  const overrides: Record<string, unknown> = {};
  if (seed !== null) overrides.seed = seed;
  if (days !== null) overrides.days = days;
  const config = parseSimulationConfig(mergeConfig(loadSimulationConfig(configPath), overrides));

  if (logMode !== null) setTradeLoggingMode(logMode);

  console.log(`[Simulate] seed=${config.seed} agents=${config.agents} days=${config.days} oracle=${config.oracle.kind}`);
  const started = Date.now();
  const result = Scheduler.fromConfig(config, { profiler }).run();
  console.log(`[Simulate] ${result.stepsCompleted} steps in ${((Date.now() - started) / 1000).toFixed(2)}s`);

  const storage = dbPath === null ? new RunStorage() : new RunStorage(dbPath);
  try {
    const runId = storage.saveRun(config, result, configPath ? path.basename(configPath) : null);
    console.log(`[Simulate] Stored as run ${runId}`);
  } finally {
    storage.close();
  }

  if (csvPath !== null) {
    fs.mkdirSync(path.dirname(path.resolve(csvPath)), { recursive: true });
    fs.writeFileSync(csvPath, seriesToCsv(result.series), "utf-8");
    console.log(`[Simulate] Series written to ${csvPath}`);
  }

  console.log(`\n${SUMMARY_TABLE_HEADER}`);
  console.log(formatSummaryRow(String(config.seed), summarizeRun(result)));
  if (result.haltReason !== null) {
    console.log(`\nHalted at step ${result.haltedAtStep}: ${result.haltReason}`);
  }

  if (getTradeLoggingMode() !== "none") {
    const logs = getTradeLogs();
    const stats = getTradeLogStats();
    console.log(`\n=== Trade log [${getTradeLoggingMode()}] (${stats.totalLogs} entries, last ${Math.min(logs.length, MAX_PRINTED_LOGS)}) ===`);
    for (const entry of logs.slice(-MAX_PRINTED_LOGS)) {
      console.log(formatTradeLog(entry));
    }
  }

  profiler?.printStats();

  process.exitCode = result.status === "completed" ? 0 : 2;
}

try {
  main();
} catch (error) {
  if (error instanceof SimulationError) {
    console.error(`[Simulate] ${error.code}: ${error.message}`);
  } else {
    console.error("[Simulate] Unexpected failure:", error);
  }
  process.exitCode = 1;
}
