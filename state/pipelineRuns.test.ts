import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type BetterSqlite3 from "better-sqlite3";
import { openDatabase } from "./db.js";
import {
  finishPipelineRun,
  getPipelineRun,
  getRecentRuns,
  getStageRuns,
  recordStageRun,
  startPipelineRun,
} from "./pipelineRuns.js";

describe("state/pipelineRuns", () => {
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("should start a run as running with no finish time", () => {
    startPipelineRun(db, { id: "run-1", pluginType: "transformers", pluginName: "dbt", environment: "dev" });

    const run = getPipelineRun(db, "run-1");
    assert.equal(run?.status, "running");
    assert.equal(run?.environment, "dev");
    assert.equal(run?.dry_run, 0);
    assert.equal(run?.finished_at, null);
  });

  it("should finish a run with status and truncated error", () => {
    startPipelineRun(db, { id: "run-1", pluginType: "transformers", pluginName: "dbt" });
    finishPipelineRun(db, "run-1", "failed", "x".repeat(2500));

    const run = getPipelineRun(db, "run-1");
    assert.equal(run?.status, "failed");
    assert.equal(run?.error?.length, 2000);
    assert.notEqual(run?.finished_at, null);
  });

  it("should return undefined for an unknown run", () => {
    assert.equal(getPipelineRun(db, "missing"), undefined);
  });

  it("should list stage runs in insertion order with rounded durations", () => {
    startPipelineRun(db, { id: "run-1", pluginType: "transformers", pluginName: "dbt" });
    recordStageRun(db, { runId: "run-1", stage: "clean", exitCode: 0, signal: null, success: true, durationMs: 10.4 });
    recordStageRun(db, { runId: "run-1", stage: "deps", exitCode: 143, signal: "SIGTERM", success: false, durationMs: 7.6 });

    assert.deepEqual(
      getStageRuns(db, "run-1").map((s) => [s.stage, s.exit_code, s.signal, s.success, s.duration_ms]),
      [
        ["clean", 0, null, 1, 10],
        ["deps", 143, "SIGTERM", 0, 8],
      ],
    );
  });

  it("should reject stage runs for an unknown pipeline run", () => {
    assert.throws(() =>
      recordStageRun(db, { runId: "missing", stage: "clean", exitCode: 0, signal: null, success: true, durationMs: 1 }),
    );
  });

  it("should list the most recent runs first up to the limit", () => {
    for (const id of ["run-1", "run-2", "run-3"]) {
      startPipelineRun(db, { id, pluginType: "transformers", pluginName: "dbt" });
    }

    assert.deepEqual(
      getRecentRuns(db, 2).map((r) => r.id),
      ["run-3", "run-2"],
    );
  });
});
