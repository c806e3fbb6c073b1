import { LaunchError, RunCancelledError, RunFailure, StageLaunchError } from "./errors.js";

export interface FailureReport {
  readonly message: string;
  readonly exitCode: number;
}

const EXIT_FAILURE = 1;
const EXIT_TIMEOUT = 124;
const EXIT_INTERRUPTED = 130;

export function describeFailure(error: unknown): FailureReport {
  if (error instanceof RunFailure) {
    const codes = Object.entries(error.codes)
      .map(([role, code]) => `${role}=${code}`)
      .join(", ");
    return { message: `${error.message} (exit codes: ${codes})`, exitCode: EXIT_FAILURE };
  }

  if (error instanceof StageLaunchError) {
    return {
      message: `Stage "${error.stage}" of ${error.role} could not start: ${error.launchError.message}`,
      exitCode: EXIT_FAILURE,
    };
  }

  if (error instanceof LaunchError) {
    return { message: error.message, exitCode: EXIT_FAILURE };
  }

  if (error instanceof RunCancelledError) {
    const where = error.stage ? ` during stage "${error.stage}"` : "";
    return {
      message: `${error.message}${where}`,
      exitCode: error.reason === "timeout" ? EXIT_TIMEOUT : EXIT_INTERRUPTED,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { message, exitCode: EXIT_FAILURE };
}
