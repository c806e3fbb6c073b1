import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { openDatabase } from "./db.js";

describe("state/db", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-db-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should create the run tables with every column on a fresh database", () => {
    const db = openDatabase(":memory:");
    const columns = db.pragma("table_info(pipeline_runs)") as ReadonlyArray<{ name: string }>;
    db.close();

    assert.deepEqual(
      columns.map((c) => c.name),
      ["id", "plugin_type", "plugin_name", "environment", "status", "error", "dry_run", "started_at", "finished_at"],
    );
  });

  it("should create the parent directory and reopen an existing file", () => {
    const dbPath = path.join(dir, ".pipewright", "pipewright.db");

    openDatabase(dbPath).close();
    const db = openDatabase(dbPath);
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all() as ReadonlyArray<{ name: string }>;
    db.close();

    assert.deepEqual(
      tables.map((t) => t.name),
      ["pipeline_runs", "stage_runs"],
    );
  });
});
