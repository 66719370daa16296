import { describe, expect, it, vi } from "vitest";
import { ParallelSshError, ValidationError } from "../src/errors.js";
import type { ExecutionOutcome, RemoteExecutor } from "../src/remote/executor.js";
import { FunctionExecutor } from "../src/remote/function-executor.js";
import { Supervisor } from "../src/supervisor/supervisor.js";
import type { BatchPlan } from "../src/supervisor/types.js";
import { scriptedExecutor } from "./helpers/executors.js";

function plan(overrides: Partial<BatchPlan>): BatchPlan {
  return {
    command: "uptime",
    expectedExitCode: 0,
    targets: [],
    maxProcs: 1,
    timeoutMs: null,
    ...overrides,
  };
}

const targetsOf = (records: readonly { target: string }[]): string[] => records.map((r) => r.target).sort();

type StubbornHost = { exitAfterMs?: number; reapMs: number };

/** Executions that only exit when told to, and take `reapMs` to go away once killed. */
function stubbornExecutor(hosts: Record<string, StubbornHost>) {
  const stats = { live: 0, maxLive: 0 };
  const executor: RemoteExecutor = {
    name: "stubborn",
    type: "function",
    spawn(target) {
      const host = hosts[target] ?? { reapMs: 0 };
      stats.live++;
      stats.maxLive = Math.max(stats.maxLive, stats.live);
      const controller = new AbortController();
      const done = new Promise<ExecutionOutcome>((resolve) => {
        const finish = (outcome: ExecutionOutcome): void => {
          stats.live--;
          resolve(outcome);
        };
        let timer: NodeJS.Timeout | undefined;
        if (host.exitAfterMs !== undefined) {
          timer = setTimeout(() => finish({ kind: "exited", exitCode: 0, stdout: "", stderr: "" }), host.exitAfterMs);
        }
        controller.signal.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            setTimeout(() => finish({ kind: "signaled", signal: "SIGKILL", stdout: "", stderr: "" }), host.reapMs);
          },
          { once: true },
        );
      });
      return { target, done, kill: () => controller.abort() };
    },
  };
  return { executor, stats };
}

describe("Supervisor", () => {
  it("runs every target and never exceeds the ceiling", async () => {
    const { executor, stats } = scriptedExecutor({
      h1: { delayMs: 30 },
      h2: { delayMs: 30 },
      h3: { delayMs: 30 },
    });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1", "h2", "h3"], maxProcs: 2 }));

    expect(targetsOf(result.successes)).toEqual(["h1", "h2", "h3"]);
    expect(result.failures).toEqual([]);
    expect(stats.maxActive).toBe(2);
    expect(stats.commands).toEqual(["uptime", "uptime", "uptime"]);
  });

  it("launches targets in list order", async () => {
    const { executor, stats } = scriptedExecutor();
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["a", "b", "c"], maxProcs: 1 }));

    expect(stats.started).toEqual(["a", "b", "c"]);
    expect(result.successes.map((s) => s.target)).toEqual(["a", "b", "c"]);
  });

  it("captures output and exit code of successful targets", async () => {
    const { executor } = scriptedExecutor({ h1: { stdout: "load 0.1\n", stderr: "warn\n" } });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1"] }));

    expect(result.successes).toEqual([
      { target: "h1", stdout: "load 0.1\n", stderr: "warn\n", exitCode: 0, durationMs: expect.any(Number) },
    ]);
  });

  it("classifies every target exactly once", async () => {
    const hosts: Record<string, { delayMs: number; exitCode: number }> = {};
    const targets: string[] = [];
    for (let i = 0; i < 20; i++) {
      targets.push(`host-${i}`);
      hosts[`host-${i}`] = { delayMs: (i * 7) % 17, exitCode: i % 2 };
    }
    const { executor, stats } = scriptedExecutor(hosts);
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets, maxProcs: 4 }));

    expect(result.successes).toHaveLength(10);
    expect(result.failures).toHaveLength(10);
    expect([...targetsOf(result.successes), ...targetsOf(result.failures)].sort()).toEqual([...targets].sort());
    expect(stats.maxActive).toBeLessThanOrEqual(4);
  });

  it("kills targets that outlive the timeout", async () => {
    const { executor } = scriptedExecutor({
      h1: { delayMs: 10 },
      h2: { delayMs: 5_000 },
    });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1", "h2"], maxProcs: 2, timeoutMs: 200 }));

    expect(result.successes.map((s) => s.target)).toEqual(["h1"]);
    expect(result.failures).toEqual([{ target: "h2", kind: "timeout", durationMs: expect.any(Number) }]);
    const [timeout] = result.failures;
    expect(timeout.durationMs).toBeGreaterThanOrEqual(200);
    expect(timeout.durationMs).toBeLessThan(2_000);
  });

  it("never times out when no timeout is set", async () => {
    const { executor } = scriptedExecutor({
      h1: { delayMs: 150 },
      h2: { delayMs: 150 },
    });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1", "h2"], maxProcs: 2, timeoutMs: null }));

    expect(targetsOf(result.successes)).toEqual(["h1", "h2"]);
    expect(result.failures).toEqual([]);
  });

  it("moves the success boundary with the expected exit code", async () => {
    const { executor } = scriptedExecutor({
      h1: { exitCode: 3 },
      h2: { exitCode: 0, stdout: "fine" },
    });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1", "h2"], maxProcs: 2, expectedExitCode: 3 }));

    expect(result.successes.map((s) => [s.target, s.exitCode])).toEqual([["h1", 3]]);
    expect(result.failures).toEqual([
      {
        target: "h2",
        kind: "unexpected-exit-code",
        exitCode: 0,
        stdout: "fine",
        stderr: "",
        durationMs: expect.any(Number),
      },
    ]);
  });

  it("records a throwing executor function as terminated", async () => {
    const executor = new FunctionExecutor({
      fn: async (target) => {
        if (target === "bad") throw new Error("connection reset");
        return { exitCode: 0 };
      },
    });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["good", "bad"], maxProcs: 2 }));

    expect(result.successes.map((s) => s.target)).toEqual(["good"]);
    expect(result.failures).toEqual([
      { target: "bad", kind: "terminated", reason: "connection reset", durationMs: expect.any(Number) },
    ]);
  });

  it("records a failed spawn without affecting other targets", async () => {
    const inner = new FunctionExecutor({ fn: async () => ({ exitCode: 0 }) });
    const executor: RemoteExecutor = {
      name: "flaky",
      type: "function",
      spawn(target, command) {
        if (target === "h2") throw new Error("spawn EAGAIN");
        return inner.spawn(target, command);
      },
    };
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["h1", "h2", "h3"], maxProcs: 1 }));

    expect(result.successes.map((s) => s.target)).toEqual(["h1", "h3"]);
    expect(result.failures).toEqual([{ target: "h2", kind: "terminated", reason: "spawn EAGAIN", durationMs: 0 }]);
  });

  it("reaps killed executions before reusing their slot", async () => {
    let live = 0;
    let maxLive = 0;
    const executor: RemoteExecutor = {
      name: "slow-reap",
      type: "function",
      spawn(target) {
        live++;
        maxLive = Math.max(maxLive, live);
        const controller = new AbortController();
        const done = new Promise<ExecutionOutcome>((resolve) => {
          controller.signal.addEventListener(
            "abort",
            () => {
              setTimeout(() => {
                live--;
                resolve({ kind: "signaled", signal: "SIGKILL", stdout: "", stderr: "" });
              }, 20);
            },
            { once: true },
          );
        });
        return { target, done, kill: () => controller.abort() };
      },
    };
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["a", "b", "c", "d"], maxProcs: 2, timeoutMs: 50 }));

    expect(result.successes).toEqual([]);
    expect(result.failures.map((f) => f.kind)).toEqual(["timeout", "timeout", "timeout", "timeout"]);
    expect(maxLive).toBe(2);
    expect(live).toBe(0);
  });

  it("keeps timing out other targets while a killed one is slow to go away", async () => {
    const { executor, stats } = stubbornExecutor({
      stuck: { reapMs: 1_000 },
      quick: { exitAfterMs: 20, reapMs: 0 },
      next: { reapMs: 10 },
    });
    const sup = new Supervisor(executor);
    const start = Date.now();
    const failedAt: Record<string, number> = {};

    const result = await sup.run(plan({ targets: ["stuck", "quick", "next"], maxProcs: 2, timeoutMs: 100 }), {
      onFailure: (r) => {
        failedAt[r.target] = Date.now() - start;
      },
    });

    expect(result.successes.map((s) => s.target)).toEqual(["quick"]);
    expect(targetsOf(result.failures)).toEqual(["next", "stuck"]);
    expect(result.failures.map((f) => f.kind)).toEqual(["timeout", "timeout"]);
    expect(failedAt.next).toBeLessThan(600);
    expect(stats.maxLive).toBe(2);
    // The batch still waits for the stuck execution before resolving
    expect(stats.live).toBe(0);
    expect(Date.now() - start).toBeGreaterThanOrEqual(1_000);
  });

  it("holds the slot of a killed execution until it has gone away", async () => {
    const { executor, stats } = stubbornExecutor({
      a: { reapMs: 300 },
      b: { exitAfterMs: 10, reapMs: 0 },
    });
    const sup = new Supervisor(executor);
    const started: Record<string, number> = {};
    const start = Date.now();

    await sup.run(plan({ targets: ["a", "b"], maxProcs: 1, timeoutMs: 50 }), {
      onTargetStart: (t) => {
        started[t] = Date.now() - start;
      },
    });

    expect(started.b).toBeGreaterThanOrEqual(300);
    expect(stats.maxLive).toBe(1);
  });

  it("keeps going when a callback throws", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { executor } = scriptedExecutor({ b: { exitCode: 1 } });
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: ["a", "b", "c"], maxProcs: 2 }), {
      onTargetStart: () => {
        throw new Error("start listener broke");
      },
      onSuccess: () => {
        throw new Error("success listener broke");
      },
      onFailure: () => {
        throw new Error("failure listener broke");
      },
    });

    expect(targetsOf(result.successes)).toEqual(["a", "c"]);
    expect(targetsOf(result.failures)).toEqual(["b"]);
    expect(error).toHaveBeenCalledTimes(6);
    expect(error.mock.calls[0]?.[0]).toContain('[supervisor] onTargetStart callback threw for "a"');
    error.mockRestore();
  });

  it("reports progress through callbacks", async () => {
    const { executor } = scriptedExecutor({ b: { exitCode: 1 } });
    const sup = new Supervisor(executor);
    const started: string[] = [];
    const succeeded: string[] = [];
    const failed: string[] = [];

    await sup.run(plan({ targets: ["a", "b", "c"], maxProcs: 3 }), {
      onTargetStart: (t) => started.push(t),
      onSuccess: (r) => succeeded.push(r.target),
      onFailure: (r) => failed.push(r.target),
    });

    expect(started).toEqual(["a", "b", "c"]);
    expect(succeeded.sort()).toEqual(["a", "c"]);
    expect(failed).toEqual(["b"]);
  });

  it("returns an empty, frozen result for no targets", async () => {
    const { executor, stats } = scriptedExecutor();
    const sup = new Supervisor(executor);

    const result = await sup.run(plan({ targets: [] }));

    expect(result.successes).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.successes)).toBe(true);
    expect(stats.started).toEqual([]);
  });

  it("rejects a plan without capacity", async () => {
    const { executor } = scriptedExecutor();
    const sup = new Supervisor(executor);

    const run = sup.run(plan({ targets: ["a"], maxProcs: 0 }));

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    await expect(run).rejects.toBeInstanceOf(ParallelSshError);
  });
});
