import type BetterSqlite3 from "better-sqlite3";

export type PipelineRunStatus = "running" | "success" | "failed" | "cancelled";

export interface PipelineRunInput {
  readonly id: string;
  readonly pluginType: string;
  readonly pluginName: string;
  readonly environment?: string;
  readonly dryRun?: boolean;
}

export interface StageRunInput {
  readonly runId: string;
  readonly stage: string;
  readonly exitCode: number;
  readonly signal: string | null;
  readonly success: boolean;
  readonly durationMs: number;
}

export interface PipelineRunRow {
  readonly id: string;
  readonly plugin_type: string;
  readonly plugin_name: string;
  readonly environment: string | null;
  readonly status: PipelineRunStatus;
  readonly error: string | null;
  readonly dry_run: number;
  readonly started_at: string;
  readonly finished_at: string | null;
}

export interface StageRunRow {
  readonly id: number;
  readonly run_id: string;
  readonly stage: string;
  readonly exit_code: number;
  readonly signal: string | null;
  readonly success: number;
  readonly duration_ms: number;
  readonly created_at: string;
}

const MAX_ERROR_LENGTH = 2000;

export function startPipelineRun(db: BetterSqlite3.Database, run: PipelineRunInput): void {
  db.prepare(
    `INSERT INTO pipeline_runs (id, plugin_type, plugin_name, environment, dry_run)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(run.id, run.pluginType, run.pluginName, run.environment ?? null, run.dryRun ? 1 : 0);
}

export function recordStageRun(db: BetterSqlite3.Database, stage: StageRunInput): number {
  const result = db.prepare(
    `INSERT INTO stage_runs (run_id, stage, exit_code, signal, success, duration_ms)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    stage.runId,
    stage.stage,
    stage.exitCode,
    stage.signal,
    stage.success ? 1 : 0,
    Math.round(stage.durationMs),
  );

  return Number(result.lastInsertRowid);
}

export function finishPipelineRun(
  db: BetterSqlite3.Database,
  runId: string,
  status: Exclude<PipelineRunStatus, "running">,
  error?: string,
): void {
  db.prepare(
    `UPDATE pipeline_runs
     SET status = ?, error = ?, finished_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
     WHERE id = ?`,
  ).run(status, error ? error.slice(0, MAX_ERROR_LENGTH) : null, runId);
}

export function getPipelineRun(
  db: BetterSqlite3.Database,
  runId: string,
): PipelineRunRow | undefined {
  return db.prepare(
    `SELECT id, plugin_type, plugin_name, environment, status, error, dry_run, started_at, finished_at
     FROM pipeline_runs
     WHERE id = ?`,
  ).get(runId) as PipelineRunRow | undefined;
}

export function getRecentRuns(
  db: BetterSqlite3.Database,
  limit: number = 20,
): readonly PipelineRunRow[] {
  return db.prepare(
    `SELECT id, plugin_type, plugin_name, environment, status, error, dry_run, started_at, finished_at
     FROM pipeline_runs
     ORDER BY started_at DESC, rowid DESC
     LIMIT ?`,
  ).all(limit) as PipelineRunRow[];
}

export function getStageRuns(
  db: BetterSqlite3.Database,
  runId: string,
): readonly StageRunRow[] {
  return db.prepare(
    `SELECT id, run_id, stage, exit_code, signal, success, duration_ms, created_at
     FROM stage_runs
     WHERE run_id = ?
     ORDER BY id ASC`,
  ).all(runId) as StageRunRow[];
}
