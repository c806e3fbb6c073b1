export interface RunnerConfig {
  readonly stageTimeoutMs: number;
  readonly killGraceMs: number;
  readonly environment: string | undefined;
}

const DEFAULT_KILL_GRACE_MS = 5_000;

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    stageTimeoutMs: readNonNegativeInt(env.PIPEWRIGHT_STAGE_TIMEOUT_MS, 0),
    killGraceMs: readNonNegativeInt(env.PIPEWRIGHT_KILL_GRACE_MS, DEFAULT_KILL_GRACE_MS),
    environment: env.PIPEWRIGHT_ENVIRONMENT || undefined,
  };
}

function readNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) return fallback;
  return value;
}
