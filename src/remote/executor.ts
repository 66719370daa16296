/**
 * How one execution ended, as observed by the executor.
 * `exited` carries an exit code; the other kinds never do.
 */
export type ExecutionOutcome =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "signaled"; signal: string; stdout: string; stderr: string }
  | { kind: "error"; message: string };

/** A single in-flight execution against one target. */
export type ExecutionHandle = {
  target: string;
  /** Settles once the execution has ended and been reaped. Never rejects. */
  done: Promise<ExecutionOutcome>;
  /** Forcibly terminate the execution. Calling it after `done` settled is a no-op. */
  kill(): void;
};

export interface RemoteExecutor {
  name: string;
  type: "ssh" | "function" | string;

  /** Start running `command` against `target`. Must not block. */
  spawn(target: string, command: string): ExecutionHandle;
}
