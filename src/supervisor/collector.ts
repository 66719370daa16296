import type { ExecutionOutcome } from "../remote/executor.js";
import type { BatchResult, FailureRecord, RunningEntry, SuccessRecord } from "./types.js";

export type Classified = { ok: true; record: SuccessRecord } | { ok: false; record: FailureRecord };

/** Turn an ended execution into a success or failure record. */
export function classify(
  entry: RunningEntry,
  outcome: ExecutionOutcome,
  expectedExitCode: number,
  finishedAt: number,
): Classified {
  const target = entry.target;
  const durationMs = finishedAt - entry.startedAt;

  switch (outcome.kind) {
    case "exited":
      if (outcome.exitCode === expectedExitCode) {
        return {
          ok: true,
          record: { target, stdout: outcome.stdout, stderr: outcome.stderr, exitCode: outcome.exitCode, durationMs },
        };
      }
      return {
        ok: false,
        record: {
          target,
          kind: "unexpected-exit-code",
          exitCode: outcome.exitCode,
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          durationMs,
        },
      };
    case "signaled":
      return { ok: false, record: { target, kind: "terminated", reason: `killed by ${outcome.signal}`, durationMs } };
    case "error":
      return { ok: false, record: { target, kind: "terminated", reason: outcome.message, durationMs } };
  }
}

/** Record for an execution killed at its deadline. Carries no exit code. */
export function timedOut(entry: RunningEntry, now: number): Classified {
  return { ok: false, record: { target: entry.target, kind: "timeout", durationMs: now - entry.startedAt } };
}

/** Append-only sink for one batch's records, in completion order. */
export class ResultCollector {
  private successes: SuccessRecord[] = [];
  private failures: FailureRecord[] = [];

  add(result: Classified): void {
    if (result.ok) {
      this.successes.push(result.record);
    } else {
      this.failures.push(result.record);
    }
  }

  get count(): number {
    return this.successes.length + this.failures.length;
  }

  /** Freeze the collected records into the batch's result. */
  finish(startedAt: number, finishedAt: number): BatchResult {
    return Object.freeze({
      successes: Object.freeze([...this.successes]),
      failures: Object.freeze([...this.failures]),
      startedAt,
      finishedAt,
    });
  }
}
