import { spawn } from "node:child_process";
import type { ChildProcessByStdio } from "node:child_process";
import { once } from "node:events";
import os from "node:os";
import type { Readable } from "node:stream";
import { finished } from "node:stream/promises";
import { logger } from "../../config/logger.js";
import { LaunchError, RunCancelledError } from "./errors.js";
import type { CancelReason } from "./errors.js";
import { formatCommandLine } from "./invocation.js";
import type { Invocation } from "./invocation.js";
import { SIGNAL_EXIT_BASE } from "./runnerTypes.js";
import type { ExitOutcome, StreamName } from "./runnerTypes.js";
import { LineSplitter } from "./streamSink.js";
import type { StreamSink } from "./streamSink.js";

export interface InvokeOptions {
  readonly signal?: AbortSignal;
  /** 0 or undefined disables the timeout. */
  readonly timeoutMs?: number;
  readonly killGraceMs?: number;
}

export type InvokeFn = (
  invocation: Invocation,
  sink: StreamSink,
  options?: InvokeOptions,
) => Promise<ExitOutcome>;

const DEFAULT_KILL_GRACE_MS = 5_000;

type SupervisedChild = ChildProcessByStdio<null, Readable, Readable>;

interface ProcessExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * Launches one process and captures all of its output. Resolves only after
 * stdout and stderr reached end-of-stream and the process exited.
 */
export const invokeProcess: InvokeFn = async (invocation, sink, options = {}) => {
  const commandLine = formatCommandLine(invocation);

  if (options.signal?.aborted) {
    throw new RunCancelledError(commandLine, "aborted", null);
  }

  const startedAt = Date.now();
  const child = await launch(invocation, commandLine);

  logger.debug({ pid: child.pid, command: commandLine, cwd: invocation.cwd }, "Process started");

  const exited = waitForExit(child);
  const stdoutDrain = drainStream(child.stdout, "stdout", sink);
  const stderrDrain = drainStream(child.stderr, "stderr", sink);

  const cancellation: { reason: CancelReason | null } = { reason: null };
  let killTimer: NodeJS.Timeout | undefined;

  const terminate = (reason: CancelReason): void => {
    if (cancellation.reason !== null || child.exitCode !== null || child.signalCode !== null) return;
    cancellation.reason = reason;
    logger.warn({ pid: child.pid, command: commandLine, reason }, "Terminating process");
    child.kill("SIGTERM");
    killTimer = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        logger.warn({ pid: child.pid, command: commandLine }, "Process ignored SIGTERM, sending SIGKILL");
        child.kill("SIGKILL");
      }
    }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
  };

  const onAbort = (): void => terminate("aborted");
  options.signal?.addEventListener("abort", onAbort, { once: true });
  // An abort while the child was spawning has already fired.
  if (options.signal?.aborted) {
    terminate("aborted");
  }

  const timeoutTimer =
    options.timeoutMs && options.timeoutMs > 0
      ? setTimeout(() => terminate("timeout"), options.timeoutMs)
      : undefined;

  try {
    const [stdoutResult, stderrResult, exitResult] = await Promise.allSettled([
      stdoutDrain,
      stderrDrain,
      exited,
    ]);

    reportDrainFailure(stdoutResult, "stdout", commandLine);
    reportDrainFailure(stderrResult, "stderr", commandLine);

    if (exitResult.status === "rejected") {
      throw exitResult.reason;
    }

    const outcome: ExitOutcome = {
      exitCode: toExitCode(exitResult.value),
      signal: exitResult.value.signal,
      drained: {
        stdout: stdoutResult.status === "fulfilled",
        stderr: stderrResult.status === "fulfilled",
      },
      durationMs: Date.now() - startedAt,
    };

    logger.debug(
      { pid: child.pid, command: commandLine, exitCode: outcome.exitCode, durationMs: outcome.durationMs },
      "Process exited",
    );

    if (cancellation.reason !== null) {
      throw new RunCancelledError(commandLine, cancellation.reason, outcome);
    }

    return outcome;
  } finally {
    clearTimeout(timeoutTimer);
    clearTimeout(killTimer);
    options.signal?.removeEventListener("abort", onAbort);
  }
};

async function launch(invocation: Invocation, commandLine: string): Promise<SupervisedChild> {
  let child: SupervisedChild;
  try {
    child = spawn(invocation.command, [...invocation.args], {
      cwd: invocation.cwd,
      env: { ...process.env, ...invocation.env },
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch (error) {
    throw new LaunchError(commandLine, toError(error));
  }

  try {
    await once(child, "spawn");
  } catch (error) {
    child.stdout.destroy();
    child.stderr.destroy();
    throw new LaunchError(commandLine, toError(error));
  }

  return child;
}

function waitForExit(child: SupervisedChild): Promise<ProcessExit> {
  return new Promise((resolve, reject) => {
    child.once("exit", (code, signal) => resolve({ code, signal }));
    child.once("error", reject);
  });
}

async function drainStream(stream: Readable, name: StreamName, sink: StreamSink): Promise<void> {
  const splitter = new LineSplitter();
  let sinkError: unknown = null;

  const forward = (lines: readonly string[]): void => {
    if (sinkError !== null) return;
    try {
      for (const line of lines) {
        sink.writeLine(name, line);
      }
    } catch (error) {
      sinkError = error;
    }
  };

  stream.on("data", (chunk: Buffer) => forward(splitter.push(chunk)));

  await finished(stream);
  forward(splitter.flush());

  if (sinkError !== null) {
    throw sinkError;
  }
}

function reportDrainFailure(
  result: PromiseSettledResult<void>,
  stream: StreamName,
  commandLine: string,
): void {
  if (result.status === "fulfilled") return;
  logger.warn(
    { stream, command: commandLine, error: toError(result.reason).message },
    "Output stream could not be fully drained",
  );
}

function toExitCode(exit: ProcessExit): number {
  if (exit.code !== null) return exit.code;
  const signalNumber = Object.entries(os.constants.signals).find(([name]) => name === exit.signal)?.[1];
  return SIGNAL_EXIT_BASE + (signalNumber ?? 0);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
