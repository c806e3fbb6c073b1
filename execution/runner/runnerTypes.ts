export type StreamName = "stdout" | "stderr";

export interface DrainStatus {
  readonly stdout: boolean;
  readonly stderr: boolean;
}

export interface ExitOutcome {
  readonly exitCode: number;
  readonly signal: NodeJS.Signals | null;
  readonly drained: DrainStatus;
  readonly durationMs: number;
}

export interface StageResult {
  readonly stage: string;
  readonly outcome: ExitOutcome;
  readonly success: boolean;
}

export type StagedRunState =
  | { readonly status: "not_started" }
  | { readonly status: "running"; readonly stage: string; readonly index: number }
  | { readonly status: "failed"; readonly stage: string; readonly index: number }
  | { readonly status: "succeeded" };

export const SIGNAL_EXIT_BASE = 128;
