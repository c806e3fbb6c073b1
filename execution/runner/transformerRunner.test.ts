import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type BetterSqlite3 from "better-sqlite3";
import { getPluginRunDir } from "../../config/paths.js";
import type { RunnerConfig } from "../../config/runner.js";
import { loadProject } from "../../projects/manifestLoader.js";
import type { ProjectContext } from "../../projects/manifestLoader.js";
import { openDatabase } from "../../state/db.js";
import { getPipelineRun, getRecentRuns, getStageRuns } from "../../state/pipelineRuns.js";
import { RunFailure } from "./errors.js";
import type { Invocation } from "./invocation.js";
import type { InvokeFn } from "./processSupervisor.js";
import { createBufferSink } from "./streamSink.js";
import { buildTransformerArgs, runTransformer } from "./transformerRunner.js";

const MANIFEST = `
version: 1
plugins:
  transformers:
    - name: dbt
      config:
        project_dir: transform
        models: tag:nightly
`;

const RUNNER_CONFIG: RunnerConfig = { stageTimeoutMs: 0, killGraceMs: 1_000, environment: undefined };

describe("buildTransformerArgs", () => {
  it("should pass non-run stages through as the command", () => {
    assert.deepEqual(buildTransformerArgs("clean", { dryRun: true, models: "a" }), ["clean"]);
    assert.deepEqual(buildTransformerArgs("deps", { dryRun: false }), ["deps"]);
  });

  it("should add the model selector to the run stage", () => {
    assert.deepEqual(buildTransformerArgs("run", { dryRun: false, models: "tag:nightly" }), [
      "run",
      "--models",
      "tag:nightly",
    ]);
  });

  it("should compile instead of run under dry run", () => {
    assert.deepEqual(buildTransformerArgs("run", { dryRun: true }), ["compile"]);
  });
});

describe("runTransformer", () => {
  let rootDir: string;
  let project: ProjectContext;
  let db: BetterSqlite3.Database;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-transform-"));
    fs.writeFileSync(path.join(rootDir, "pipewright.yml"), MANIFEST, "utf-8");
    project = loadProject(rootDir);
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  function recordingInvoke(failOn?: string): { invoke: InvokeFn; invocations: Invocation[]; configSeen: boolean[] } {
    const invocations: Invocation[] = [];
    const configSeen: boolean[] = [];
    const configPath = path.join(getPluginRunDir(project.rootDir, "dbt"), "config.json");

    const invoke: InvokeFn = async (invocation, sink) => {
      invocations.push(invocation);
      configSeen.push(fs.existsSync(configPath));
      sink.writeLine("stdout", `ran ${invocation.args.join(" ")}`);
      return {
        exitCode: invocation.args[0] === failOn ? 1 : 0,
        signal: null,
        drained: { stdout: true, stderr: true },
        durationMs: 5,
      };
    };
    return { invoke, invocations, configSeen };
  }

  it("should run clean, deps and run with the configured model selector", async () => {
    const { invoke, invocations, configSeen } = recordingInvoke();
    const sink = createBufferSink();

    const result = await runTransformer({
      project,
      session: db,
      sink,
      runnerConfig: RUNNER_CONFIG,
      invoke,
      invokerOptions: { terminalEnv: {} },
    });

    assert.deepEqual(
      invocations.map((i) => i.args),
      [["clean"], ["deps"], ["run", "--models", "tag:nightly"]],
    );
    assert.ok(invocations.every((i) => i.command === "dbt" && i.cwd === project.rootDir));
    assert.deepEqual(configSeen, [true, true, true]);
    assert.equal(sink.text(), "ran clean\nran deps\nran run --models tag:nightly");
    assert.deepEqual(result.stages.map((s) => s.stage), ["clean", "deps", "run"]);

    assert.equal(getPipelineRun(db, result.runId)?.status, "success");
    assert.deepEqual(
      getStageRuns(db, result.runId).map((s) => [s.stage, s.exit_code, s.success]),
      [
        ["clean", 0, 1],
        ["deps", 0, 1],
        ["run", 0, 1],
      ],
    );
    assert.equal(fs.existsSync(path.join(getPluginRunDir(project.rootDir, "dbt"), "config.json")), false);
  });

  it("should compile with an overriding model selector under dry run", async () => {
    const { invoke, invocations } = recordingInvoke();

    const result = await runTransformer({
      project,
      session: db,
      dryRun: true,
      models: "orders",
      sink: createBufferSink(),
      runnerConfig: RUNNER_CONFIG,
      invoke,
      invokerOptions: { terminalEnv: {} },
    });

    assert.deepEqual(invocations.at(-1)?.args, ["compile", "--models", "orders"]);
    assert.equal(getPipelineRun(db, result.runId)?.dry_run, 1);
  });

  it("should record the failure and stop at the failing stage", async () => {
    const { invoke, invocations } = recordingInvoke("deps");

    await assert.rejects(
      runTransformer({
        project,
        session: db,
        sink: createBufferSink(),
        runnerConfig: RUNNER_CONFIG,
        invoke,
        invokerOptions: { terminalEnv: {} },
      }),
      (error: unknown) => {
        assert.ok(error instanceof RunFailure);
        assert.equal(error.message, "`dbt deps` failed");
        assert.deepEqual(error.codes, { transformers: 1 });
        return true;
      },
    );

    assert.equal(invocations.length, 2);
    const [run] = getRecentRuns(db, 1);
    assert.equal(run.status, "failed");
    assert.equal(run.error, "`dbt deps` failed");
    assert.deepEqual(
      getStageRuns(db, run.id).map((s) => [s.stage, s.success]),
      [
        ["clean", 1],
        ["deps", 0],
      ],
    );
  });
});
