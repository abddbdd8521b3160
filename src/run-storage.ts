/**
 * SQLite run store
 *
 * One row per run in `runs` (config as JSON), plus the step series and the
 * optional per-agent diagnostics in their own tables. Pass ":memory:" for a
 * throwaway database.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { AGENT_ACTIONS, AGENT_KINDS } from "./agent";
import { RUN_STATUSES } from "./scheduler";
import type { AgentDiagnosticsPoint, RunStatus, SeriesPoint, SimulationResult } from "./scheduler";
import { parseSimulationConfig } from "./simulation-config";
import type { SimulationConfig } from "./simulation-config";

export const DEFAULT_DB_PATH = path.join(process.cwd(), ".local-storage", "simulation-runs.db");

const runStatusSchema = z.enum(RUN_STATUSES);
const agentKindSchema = z.enum(AGENT_KINDS);
const agentActionSchema = z.enum(AGENT_ACTIONS);

export interface RunSummary {
  id: number;
  label: string | null;
  seed: string;
  status: RunStatus;
  haltedAtStep: number | null;
  haltReason: string | null;
  stepsCompleted: number;
  createdAt: number;
}

export interface StoredRun extends RunSummary {
  config: SimulationConfig;
}

interface RunRow {
  id: number;
  label: string | null;
  seed: string;
  status: string;
  halted_at_step: number | null;
  halt_reason: string | null;
  steps_completed: number;
  config_json: string;
  created_at: number;
}

interface SeriesRow {
  step: number;
  reference_price: number;
  spot_price: number;
  market_price: number;
  twap: number;
  twap_fiat: number;
  redemption_price: number;
  redemption_rate: number;
}

interface DiagnosticsRow {
  step: number;
  agent_id: string;
  kind: string;
  action: string;
  expected_return: number | null;
  pool_share: number;
  net_worth_ref: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    label TEXT,
    seed TEXT NOT NULL,
    status TEXT NOT NULL,
    halted_at_step INTEGER,
    halt_reason TEXT,
    steps_completed INTEGER NOT NULL,
    config_json TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS series_points (
    run_id INTEGER NOT NULL,
    step INTEGER NOT NULL,
    reference_price REAL NOT NULL,
    spot_price REAL NOT NULL,
    market_price REAL NOT NULL,
    twap REAL NOT NULL,
    twap_fiat REAL NOT NULL,
    redemption_price REAL NOT NULL,
    redemption_rate REAL NOT NULL,
    PRIMARY KEY (run_id, step),
    FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS agent_diagnostics (
    run_id INTEGER NOT NULL,
    step INTEGER NOT NULL,
    agent_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    action TEXT NOT NULL,
    expected_return REAL,
    pool_share REAL NOT NULL,
    net_worth_ref REAL NOT NULL,
    PRIMARY KEY (run_id, step, agent_id),
    FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
  );
`;

function toSummary(row: RunRow): RunSummary {
  return {
    id: row.id,
    label: row.label,
    seed: row.seed,
    status: runStatusSchema.parse(row.status),
    haltedAtStep: row.halted_at_step,
    haltReason: row.halt_reason,
    stepsCompleted: row.steps_completed,
    createdAt: row.created_at,
  };
}

export class RunStorage {
  private readonly db: Database.Database;

  constructor(filePath: string = DEFAULT_DB_PATH) {
    if (filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }

    this.db = new Database(filePath);
    if (filePath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("synchronous = NORMAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  /**
   * Store a finished run in one transaction and return its id
   */
  saveRun(config: SimulationConfig, result: SimulationResult, label: string | null = null): number {
    const insertRun = this.db.prepare<[string | null, string, string, number | null, string | null, number, string, number]>(`
      INSERT INTO runs (label, seed, status, halted_at_step, halt_reason, steps_completed, config_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertPoint = this.db.prepare<[number, number, number, number, number, number, number, number, number]>(`
      INSERT INTO series_points (run_id, step, reference_price, spot_price, market_price, twap, twap_fiat, redemption_price, redemption_rate)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertDiagnostics = this.db.prepare<[number, number, string, string, string, number | null, number, number]>(`
      INSERT INTO agent_diagnostics (run_id, step, agent_id, kind, action, expected_return, pool_share, net_worth_ref)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction((): number => {
      const info = insertRun.run(
        label,
        String(config.seed),
        result.status,
        result.haltedAtStep,
        result.haltReason,
        result.stepsCompleted,
        JSON.stringify(config),
        Date.now()
      );
      const runId = Number(info.lastInsertRowid);

      for (const point of result.series) {
        insertPoint.run(
          runId,
          point.step,
          point.referencePrice,
          point.spotPrice,
          point.marketPrice,
          point.twap,
          point.twapFiat,
          point.redemptionPrice,
          point.redemptionRate
        );
      }
      for (const entry of result.agentDiagnostics) {
        insertDiagnostics.run(
          runId,
          entry.step,
          entry.agentId,
          entry.kind,
          entry.action,
          entry.expectedReturn,
          entry.poolShare,
          entry.netWorthRef
        );
      }
      return runId;
    });

    const runId = save();
    console.log(`[RunStorage] Saved run ${runId} (${result.series.length} points, status ${result.status})`);
    return runId;
  }

  listRuns(): RunSummary[] {
    return this.db
      .prepare<[], RunRow>("SELECT * FROM runs ORDER BY id")
      .all()
      .map(toSummary);
  }

  getRun(runId: number): StoredRun | null {
    const row = this.db.prepare<[number], RunRow>("SELECT * FROM runs WHERE id = ?").get(runId);
    if (!row) return null;
    return { ...toSummary(row), config: parseSimulationConfig(JSON.parse(row.config_json)) };
  }

  loadSeries(runId: number): SeriesPoint[] {
    return this.db
      .prepare<[number], SeriesRow>(
        `SELECT step, reference_price, spot_price, market_price, twap, twap_fiat, redemption_price, redemption_rate
         FROM series_points WHERE run_id = ? ORDER BY step`
      )
      .all(runId)
      .map((row) => ({
        step: row.step,
        referencePrice: row.reference_price,
        spotPrice: row.spot_price,
        marketPrice: row.market_price,
        twap: row.twap,
        twapFiat: row.twap_fiat,
        redemptionPrice: row.redemption_price,
        redemptionRate: row.redemption_rate,
      }));
  }

  loadAgentDiagnostics(runId: number, agentId?: string): AgentDiagnosticsPoint[] {
    const rows = agentId
      ? this.db
          .prepare<[number, string], DiagnosticsRow>(
            "SELECT * FROM agent_diagnostics WHERE run_id = ? AND agent_id = ? ORDER BY step, agent_id"
          )
          .all(runId, agentId)
      : this.db
          .prepare<[number], DiagnosticsRow>("SELECT * FROM agent_diagnostics WHERE run_id = ? ORDER BY step, agent_id")
          .all(runId);

    return rows.map((row) => ({
      step: row.step,
      agentId: row.agent_id,
      kind: agentKindSchema.parse(row.kind),
      action: agentActionSchema.parse(row.action),
      expectedReturn: row.expected_return,
      poolShare: row.pool_share,
      netWorthRef: row.net_worth_ref,
    }));
  }

  deleteRun(runId: number): boolean {
    return this.db.prepare<[number]>("DELETE FROM runs WHERE id = ?").run(runId).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
