import { ParallelSshError } from "../errors.js";
import type { ExecutionHandle, ExecutionOutcome } from "../remote/executor.js";
import type { RunningEntry, Target } from "./types.js";

export type ExitedEntry = {
  entry: RunningEntry;
  outcome: ExecutionOutcome;
  finishedAt: number;
};

/** Longest delay a Node timer accepts; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Bounded set of running executions. Only entries still in the set record
 * their outcome, so a removed entry can never be observed twice.
 * Killed entries keep their slot until their execution has settled.
 */
export class RunSet {
  private running = new Map<ExecutionHandle, RunningEntry>();
  private reaping = new Map<ExecutionHandle, RunningEntry>();
  private exited = new Map<ExecutionHandle, { outcome: ExecutionOutcome; finishedAt: number }>();
  private capacity: number;
  private clock: () => number;

  constructor(capacity: number, clock: () => number = Date.now) {
    this.capacity = capacity;
    this.clock = clock;
  }

  /** Entries still waiting to be classified. */
  get size(): number {
    return this.running.size;
  }

  /** Killed entries whose execution has not settled yet. */
  get reapingCount(): number {
    return this.reaping.size;
  }

  hasCapacity(): boolean {
    return this.running.size + this.reaping.size < this.capacity;
  }

  admit(target: Target, handle: ExecutionHandle, timeoutMs: number | null): RunningEntry {
    if (!this.hasCapacity()) {
      throw new ParallelSshError("RUN_SET_FULL", `Run set is full (${this.capacity}); cannot admit "${target}"`);
    }
    const startedAt = this.clock();
    const record = (outcome: ExecutionOutcome): void => {
      this.reaping.delete(handle);
      if (this.running.has(handle)) {
        this.exited.set(handle, { outcome, finishedAt: this.clock() });
      }
    };
    const settled = handle.done.then(record, (err: unknown) =>
      record({ kind: "error", message: err instanceof Error ? err.message : String(err) }),
    );
    const entry: RunningEntry = {
      target,
      handle,
      startedAt,
      deadline: timeoutMs === null ? null : startedAt + timeoutMs,
      settled,
    };
    this.running.set(handle, entry);
    return entry;
  }

  /** Remove and return every entry whose execution has ended. */
  takeExited(): ExitedEntry[] {
    const out: ExitedEntry[] = [];
    for (const [handle, { outcome, finishedAt }] of this.exited) {
      const entry = this.running.get(handle);
      if (entry) out.push({ entry, outcome, finishedAt });
      this.running.delete(handle);
    }
    this.exited.clear();
    return out;
  }

  /**
   * Remove and return every still-running entry whose deadline is at or
   * before `now`. They keep their slot until their execution settles.
   */
  takeExpired(now: number): RunningEntry[] {
    const out: RunningEntry[] = [];
    for (const [handle, entry] of this.running) {
      if (entry.deadline !== null && now >= entry.deadline && !this.exited.has(handle)) {
        out.push(entry);
      }
    }
    for (const entry of out) {
      this.running.delete(entry.handle);
      this.reaping.set(entry.handle, entry);
    }
    return out;
  }

  /** Wait for every killed execution to settle. */
  async drain(): Promise<void> {
    await Promise.all([...this.reaping.values()].map((e) => e.settled));
  }

  /** Earliest deadline among running entries, or null when none has one. */
  nextDeadline(): number | null {
    let next: number | null = null;
    for (const entry of this.running.values()) {
      if (entry.deadline !== null && (next === null || entry.deadline < next)) {
        next = entry.deadline;
      }
    }
    return next;
  }

  /**
   * Resolve as soon as any running or killed execution settles or the
   * earliest deadline passes. Resolves immediately if something is already
   * waiting to be observed.
   */
  async waitForChange(): Promise<void> {
    if ((this.running.size === 0 && this.reaping.size === 0) || this.exited.size > 0) return;

    const waits: Promise<void>[] = [...this.running.values(), ...this.reaping.values()].map((e) => e.settled);
    const deadline = this.nextDeadline();
    let timer: NodeJS.Timeout | undefined;
    if (deadline !== null) {
      waits.push(
        new Promise<void>((resolve) => {
          // Far deadlines wake early and the caller waits again
          timer = setTimeout(resolve, Math.min(MAX_TIMER_MS, Math.max(0, deadline - this.clock())));
        }),
      );
    }

    try {
      await Promise.race(waits);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
