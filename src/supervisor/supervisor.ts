import type { ExecutionHandle, RemoteExecutor } from "../remote/executor.js";
import { BatchPlanSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { err, ok, type Result } from "../utils/result.js";
import { type Classified, classify, ResultCollector, timedOut } from "./collector.js";
import { RunSet } from "./run-set.js";
import type { BatchCallbacks, BatchPlan, BatchResult, Target } from "./types.js";

export type SupervisorOptions = {
  /** Millisecond clock used for start stamps and deadlines (default: Date.now). */
  clock?: () => number;
};

const supLog = log.child("supervisor");

/**
 * Runs one command across a batch of targets with at most `maxProcs`
 * executions alive at once, killing any that outlive the timeout.
 */
export class Supervisor {
  private executor: RemoteExecutor;
  private clock: () => number;

  constructor(executor: RemoteExecutor, opts?: SupervisorOptions) {
    this.executor = executor;
    this.clock = opts?.clock ?? Date.now;
  }

  async run(plan: BatchPlan, callbacks?: BatchCallbacks): Promise<BatchResult> {
    const { command, expectedExitCode, targets, maxProcs, timeoutMs } = parseOrThrow(BatchPlanSchema, plan, "batch plan");
    const startedAt = this.clock();
    const queue: Target[] = [...targets];
    const runSet = new RunSet(maxProcs, this.clock);
    const collector = new ResultCollector();

    supLog.info(`Running on ${queue.length} target(s)`, { executor: this.executor.name, maxProcs, timeoutMs });

    // A throwing callback must not abort the batch for other targets
    const notify = (name: keyof BatchCallbacks, target: Target, fn: () => void): void => {
      try {
        fn();
      } catch (e) {
        supLog.error(`${name} callback threw for "${target}"`, { error: e instanceof Error ? e.message : String(e) });
      }
    };

    const emit = (result: Classified): void => {
      collector.add(result);
      const { target } = result.record;
      if (result.ok) {
        const record = result.record;
        supLog.debug(`"${target}" succeeded`, { exitCode: record.exitCode });
        notify("onSuccess", target, () => callbacks?.onSuccess?.(record));
      } else {
        const record = result.record;
        supLog.debug(`"${target}" failed`, { kind: record.kind });
        notify("onFailure", target, () => callbacks?.onFailure?.(record));
      }
    };

    while (true) {
      // Refill up to the ceiling
      while (queue.length > 0 && runSet.hasCapacity()) {
        const target = queue.shift();
        if (target === undefined) break;
        const handle = this.launch(target, command);
        if (!handle.ok) {
          emit({ ok: false, record: { target, kind: "terminated", reason: handle.error, durationMs: 0 } });
          continue;
        }
        runSet.admit(target, handle.value, timeoutMs);
        notify("onTargetStart", target, () => callbacks?.onTargetStart?.(target));
      }

      if (queue.length === 0 && runSet.size === 0) break;

      await runSet.waitForChange();

      for (const { entry, outcome, finishedAt } of runSet.takeExited()) {
        emit(classify(entry, outcome, expectedExitCode, finishedAt));
      }

      const now = this.clock();
      const expired = runSet.takeExpired(now);
      for (const entry of expired) {
        supLog.warn(`"${entry.target}" exceeded ${timeoutMs}ms, killing`);
        entry.handle.kill();
        emit(timedOut(entry, now));
      }
    }

    // Killed executions keep their slot until they settle; none outlives the batch
    await runSet.drain();

    const result = collector.finish(startedAt, this.clock());
    supLog.info("Batch finished", {
      successes: result.successes.length,
      failures: result.failures.length,
      durationMs: result.finishedAt - result.startedAt,
    });
    return result;
  }

  private launch(target: Target, command: string): Result<ExecutionHandle, string> {
    try {
      supLog.debug(`Launching "${target}"`);
      return ok(this.executor.spawn(target, command));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      supLog.error(`Could not launch "${target}"`, { error: reason });
      return err(reason);
    }
  }
}
