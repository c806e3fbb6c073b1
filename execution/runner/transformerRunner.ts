import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../../config/logger.js";
import { loadRunnerConfig } from "../../config/runner.js";
import type { RunnerConfig } from "../../config/runner.js";
import { findTransformer } from "../../projects/manifest.schema.js";
import type { PluginType } from "../../projects/manifest.schema.js";
import type { ProjectContext } from "../../projects/manifestLoader.js";
import { recordStageRun } from "../../state/pipelineRuns.js";
import { PluginInvoker } from "../plugins/pluginInvoker.js";
import type { PluginInvokerOptions } from "../plugins/pluginInvoker.js";
import { getStringSetting } from "../plugins/pluginSettings.js";
import type { InvokeFn } from "./processSupervisor.js";
import type { StageResult } from "./runnerTypes.js";
import { runStages } from "./stagedInvoker.js";
import { createLoggerSink } from "./streamSink.js";
import type { StreamSink } from "./streamSink.js";

export const TRANSFORMER_ROLE: PluginType = "transformers";
export const TRANSFORMER_STAGES: readonly string[] = ["clean", "deps", "run"];

export interface TransformerRunContext {
  readonly project: ProjectContext;
  readonly session: BetterSqlite3.Database;
  readonly transformerName?: string;
  readonly dryRun?: boolean;
  /** Overrides the transformer's `models` setting. */
  readonly models?: string;
  readonly sink?: StreamSink;
  readonly signal?: AbortSignal;
  readonly runnerConfig?: RunnerConfig;
  readonly invoke?: InvokeFn;
  readonly invokerOptions?: PluginInvokerOptions;
}

export interface TransformerRunResult {
  readonly runId: string;
  readonly stages: readonly StageResult[];
}

export interface TransformerArgsOptions {
  readonly dryRun: boolean;
  readonly models?: string;
}

/** "run" becomes "compile" under dry run; only that stage takes the model selector. */
export function buildTransformerArgs(stage: string, options: TransformerArgsOptions): readonly string[] {
  if (stage !== "run") {
    return [stage];
  }

  const command = options.dryRun ? "compile" : "run";
  return options.models ? [command, "--models", options.models] : [command];
}

export async function runTransformer(context: TransformerRunContext): Promise<TransformerRunResult> {
  const transformer = findTransformer(context.project.manifest, context.transformerName);
  const invoker = new PluginInvoker(context.project, transformer, context.invokerOptions);
  const runnerConfig = context.runnerConfig ?? loadRunnerConfig();
  const dryRun = context.dryRun ?? false;
  const models = context.models ?? getStringSetting(invoker.resolved, "models");
  const sink = context.sink ?? createLoggerSink({ plugin: transformer.name });

  logger.info(
    { transformer: transformer.name, dryRun, models: models ?? null, environment: context.project.activeEnvironment?.name ?? null },
    "Running transformer",
  );

  return invoker.prepared(
    context.session,
    async (run) => {
      const stages = await runStages(
        TRANSFORMER_STAGES,
        (stage) => invoker.invocation(buildTransformerArgs(stage, { dryRun, models })),
        sink,
        TRANSFORMER_ROLE,
        {
          toolName: transformer.name,
          signal: context.signal,
          timeoutMs: runnerConfig.stageTimeoutMs,
          killGraceMs: runnerConfig.killGraceMs,
          invoke: context.invoke,
          onStageResult: (result) =>
            recordStageRun(run.session, {
              runId: run.runId,
              stage: result.stage,
              exitCode: result.outcome.exitCode,
              signal: result.outcome.signal,
              success: result.success,
              durationMs: result.outcome.durationMs,
            }),
        },
      );

      logger.info({ transformer: transformer.name, runId: run.runId }, "Transformer run completed");
      return { runId: run.runId, stages };
    },
    { dryRun },
  );
}
