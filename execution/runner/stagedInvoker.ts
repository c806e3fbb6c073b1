import { logger } from "../../config/logger.js";
import { LaunchError, RunCancelledError, RunFailure, StageLaunchError } from "./errors.js";
import type { Invocation } from "./invocation.js";
import { invokeProcess } from "./processSupervisor.js";
import type { InvokeFn, InvokeOptions } from "./processSupervisor.js";
import type { StageResult, StagedRunState } from "./runnerTypes.js";
import type { StreamSink } from "./streamSink.js";

export type InvocationFactory = (stage: string) => Invocation | Promise<Invocation>;

export interface StagedRunOptions extends InvokeOptions {
  /** Name used in failure messages, e.g. "dbt" renders "`dbt run` failed". */
  readonly toolName?: string;
  readonly onTransition?: (state: StagedRunState) => void;
  readonly onStageResult?: (result: StageResult) => void;
  readonly invoke?: InvokeFn;
}

/**
 * Runs the stages strictly in order against one tool and stops at the first
 * stage that cannot start or exits non-zero.
 */
export async function runStages(
  stages: readonly string[],
  makeInvocation: InvocationFactory,
  sink: StreamSink,
  role: string,
  options: StagedRunOptions = {},
): Promise<readonly StageResult[]> {
  if (stages.length === 0) {
    throw new TypeError("runStages requires at least one stage");
  }

  const invoke = options.invoke ?? invokeProcess;
  const transition = (state: StagedRunState): void => options.onTransition?.(state);
  const results: StageResult[] = [];

  transition({ status: "not_started" });

  for (const [index, stage] of stages.entries()) {
    transition({ status: "running", stage, index });

    let result: StageResult;
    try {
      const invocation = await makeInvocation(stage);
      logger.info({ role, stage, command: invocation.command, args: invocation.args }, "Running stage");

      const outcome = await invoke(invocation, sink, {
        signal: options.signal,
        timeoutMs: options.timeoutMs,
        killGraceMs: options.killGraceMs,
      });
      result = { stage, outcome, success: outcome.exitCode === 0 };
    } catch (error) {
      transition({ status: "failed", stage, index });
      throw attachStage(error, stage, role);
    }

    results.push(result);
    options.onStageResult?.(result);

    if (!result.success) {
      transition({ status: "failed", stage, index });
      logger.warn({ role, stage, exitCode: result.outcome.exitCode }, "Stage failed");
      throw new RunFailure(
        describeStageFailure(stage, role, result.outcome.exitCode, options.toolName),
        stage,
        role,
        result.outcome.exitCode,
      );
    }
  }

  transition({ status: "succeeded" });
  return results;
}

function attachStage(error: unknown, stage: string, role: string): unknown {
  if (error instanceof LaunchError) {
    return new StageLaunchError(stage, role, error);
  }
  if (error instanceof RunCancelledError) {
    error.stage = stage;
  }
  return error;
}

function describeStageFailure(
  stage: string,
  role: string,
  exitCode: number,
  toolName: string | undefined,
): string {
  if (toolName) {
    return `\`${toolName} ${stage}\` failed`;
  }
  return `Stage "${stage}" failed (${role} exited with code ${exitCode})`;
}
