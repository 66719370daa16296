import type { ExecutionHandle } from "../remote/executor.js";

export type Target = string;

/** Everything one batch needs, fixed for the lifetime of the batch. */
export type BatchPlan = {
  command: string;
  expectedExitCode: number;
  targets: readonly Target[];
  maxProcs: number;
  /** Per-target deadline in milliseconds; null disables it. */
  timeoutMs: number | null;
};

export type RunningEntry = {
  readonly target: Target;
  readonly handle: ExecutionHandle;
  readonly startedAt: number;
  readonly deadline: number | null;
  /** Resolves once the handle has settled. */
  readonly settled: Promise<void>;
};

export type SuccessRecord = {
  target: Target;
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
};

export type FailureKind = "unexpected-exit-code" | "timeout" | "terminated";

export type FailureRecord =
  | {
      target: Target;
      kind: "unexpected-exit-code";
      exitCode: number;
      stdout: string;
      stderr: string;
      durationMs: number;
    }
  | { target: Target; kind: "timeout"; durationMs: number }
  | { target: Target; kind: "terminated"; reason: string; durationMs: number };

export type BatchResult = {
  readonly successes: readonly SuccessRecord[];
  readonly failures: readonly FailureRecord[];
  readonly startedAt: number;
  readonly finishedAt: number;
};

export type BatchCallbacks = {
  onTargetStart?: (target: Target) => void;
  onSuccess?: (record: SuccessRecord) => void;
  onFailure?: (record: FailureRecord) => void;
};
