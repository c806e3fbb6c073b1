import type { ExitOutcome } from "./runnerTypes.js";

export class LaunchError extends Error {
  readonly code: string | undefined;

  constructor(
    readonly commandLine: string,
    cause: Error,
  ) {
    super(`Cannot start \`${commandLine}\`: ${cause.message}`, { cause });
    this.name = "LaunchError";
    this.code = readErrnoCode(cause);
  }
}

export class StageLaunchError extends Error {
  constructor(
    readonly stage: string,
    readonly role: string,
    readonly launchError: LaunchError,
  ) {
    super(`Stage "${stage}" could not start: ${launchError.message}`, { cause: launchError });
    this.name = "StageLaunchError";
  }
}

export class RunFailure extends Error {
  readonly codes: Readonly<Record<string, number>>;

  constructor(
    message: string,
    readonly stage: string,
    readonly role: string,
    readonly exitCode: number,
  ) {
    super(message);
    this.name = "RunFailure";
    this.codes = Object.freeze({ [role]: exitCode });
  }
}

export type CancelReason = "aborted" | "timeout";

export class RunCancelledError extends Error {
  stage: string | undefined;

  constructor(
    readonly commandLine: string,
    readonly reason: CancelReason,
    readonly outcome: ExitOutcome | null,
  ) {
    super(
      reason === "timeout"
        ? `\`${commandLine}\` timed out and was terminated`
        : `\`${commandLine}\` was cancelled`,
    );
    this.name = "RunCancelledError";
  }
}

function readErrnoCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
