import { log } from "../utils/logger.js";
import type { ExecutionHandle, ExecutionOutcome, RemoteExecutor } from "./executor.js";

export type RemoteFunctionResult = {
  exitCode: number;
  stdout?: string;
  stderr?: string;
};

/**
 * Stands in for a remote host. `signal` aborts when the supervisor kills
 * the execution; the function should stop its work when it does.
 */
export type RemoteFunction = (
  target: string,
  command: string,
  signal: AbortSignal,
) => Promise<RemoteFunctionResult>;

export type FunctionExecutorOptions = {
  name?: string;
  fn: RemoteFunction;
};

/** In-process executor: each "execution" is a call to `fn`. */
export class FunctionExecutor implements RemoteExecutor {
  readonly name: string;
  readonly type = "function" as const;

  private fn: RemoteFunction;

  constructor(opts: FunctionExecutorOptions) {
    this.name = opts.name ?? "function";
    this.fn = opts.fn;
  }

  spawn(target: string, command: string): ExecutionHandle {
    const controller = new AbortController();

    const killed = new Promise<ExecutionOutcome>((resolve) => {
      controller.signal.addEventListener(
        "abort",
        () => resolve({ kind: "signaled", signal: "SIGKILL", stdout: "", stderr: "" }),
        { once: true },
      );
    });

    const ran = Promise.resolve()
      .then(() => this.fn(target, command, controller.signal))
      .then(
        (res): ExecutionOutcome => ({
          kind: "exited",
          exitCode: res.exitCode,
          stdout: res.stdout ?? "",
          stderr: res.stderr ?? "",
        }),
        (err: unknown): ExecutionOutcome => {
          if (!controller.signal.aborted) {
            log.warn(`[${this.name}] Function for "${target}" threw`, { error: String(err) });
          }
          return { kind: "error", message: err instanceof Error ? err.message : String(err) };
        },
      );

    return {
      target,
      done: Promise.race([killed, ran]),
      kill: () => controller.abort(),
    };
  }
}
