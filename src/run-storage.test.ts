/**
 * RunStorage: run, series and diagnostics round-trip through an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RunStorage } from "./run-storage";
import { runSimulation } from "./scheduler";
import type { AgentDiagnosticsPoint } from "./scheduler";
import { buildTestConfig } from "./test-utils/fixtures";

function byStepThenAgent(a: AgentDiagnosticsPoint, b: AgentDiagnosticsPoint): number {
  if (a.step !== b.step) return a.step - b.step;
  return a.agentId < b.agentId ? -1 : a.agentId > b.agentId ? 1 : 0;
}

describe("RunStorage", () => {
  let storage: RunStorage;

  beforeEach(() => {
    storage = new RunStorage(":memory:");
  });

  afterEach(() => {
    storage.close();
  });

  it("should store and reload a run with its series", () => {
    const config = buildTestConfig({ days: 1 });
    const result = runSimulation(config);

    const runId = storage.saveRun(config, result, "baseline");
    const stored = storage.getRun(runId);

    expect(stored).not.toBeNull();
    expect(stored?.label).toBe("baseline");
    expect(stored?.seed).toBe("test-seed");
    expect(stored?.status).toBe("completed");
    expect(stored?.haltedAtStep).toBeNull();
    expect(stored?.stepsCompleted).toBe(24);
    expect(stored?.config).toEqual(config);
    expect(storage.loadSeries(runId)).toEqual(result.series);
  });

  it("should store agent diagnostics ordered by step and agent", () => {
    const config = buildTestConfig({ days: 1, diagnostics: { fromStep: 0, toStep: 2 } });
    const result = runSimulation(config);
    const runId = storage.saveRun(config, result);

    const loaded = storage.loadAgentDiagnostics(runId);

    expect(loaded).toHaveLength(20);
    expect(loaded).toEqual([...result.agentDiagnostics].sort(byStepThenAgent));
  });

  it("should filter diagnostics by agent", () => {
    const config = buildTestConfig({ days: 1, diagnostics: { fromStep: 0, toStep: 3 } });
    const result = runSimulation(config);
    const runId = storage.saveRun(config, result);
    const agentId = result.agents[0].id;

    const loaded = storage.loadAgentDiagnostics(runId, agentId);

    expect(loaded.map((entry) => entry.step)).toEqual([0, 1, 2]);
    expect(new Set(loaded.map((entry) => entry.agentId))).toEqual(new Set([agentId]));
  });

  it("should list runs in insertion order", () => {
    const config = buildTestConfig({ agents: 0, days: 1 });
    const result = runSimulation(config);

    const first = storage.saveRun(config, result, "a");
    const second = storage.saveRun(config, result, "b");

    expect(storage.listRuns().map((run) => [run.id, run.label])).toEqual([
      [first, "a"],
      [second, "b"],
    ]);
  });

  it("should delete a run together with its series", () => {
    const config = buildTestConfig({ agents: 0, days: 1 });
    const runId = storage.saveRun(config, runSimulation(config));

    expect(storage.deleteRun(runId)).toBe(true);
    expect(storage.getRun(runId)).toBeNull();
    expect(storage.loadSeries(runId)).toEqual([]);
    expect(storage.deleteRun(runId)).toBe(false);
  });

  it("should return null for an unknown run", () => {
    expect(storage.getRun(42)).toBeNull();
  });
});
