import { ExecaError, execa } from "execa";
import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import { decodeOutput } from "./decode.js";
import type { ExecutionHandle, ExecutionOutcome, RemoteExecutor } from "./executor.js";

export type SshExecutorOptions = {
  /** Path to the ssh executable (default: config `ssh.binary`). */
  binary?: string;
  /** Arguments placed before the target (default: config `ssh.options`). */
  options?: string[];
};

const sshLog = log.child("ssh");

/** Runs each target's command as `<ssh> <options...> <target> <command>`. */
export class SshExecutor implements RemoteExecutor {
  readonly name = "ssh";
  readonly type = "ssh" as const;
  readonly binary: string;

  private options: string[];

  constructor(opts: SshExecutorOptions = {}) {
    const { ssh } = getConfig();
    this.binary = opts.binary ?? ssh.binary;
    this.options = [...(opts.options ?? ssh.options)];
  }

  argv(target: string, command: string): string[] {
    return [...this.options, target, command];
  }

  spawn(target: string, command: string): ExecutionHandle {
    sshLog.debug(`Spawning ${this.binary} for "${target}"`);

    const subprocess = execa(this.binary, this.argv(target, command), {
      reject: false,
      stdin: "ignore",
      encoding: "buffer",
      stripFinalNewline: false,
      // Own process group, so a kill also reaches whatever the command left behind
      detached: true,
    });

    const done = subprocess.then(
      (result): ExecutionOutcome => {
        const stdout = decodeOutput(result.stdout);
        const stderr = decodeOutput(result.stderr);
        if (result.exitCode !== undefined) {
          return { kind: "exited", exitCode: result.exitCode, stdout, stderr };
        }
        if (result.signal !== undefined) {
          return { kind: "signaled", signal: result.signal, stdout, stderr };
        }
        const message = result instanceof ExecaError ? result.shortMessage : `${this.binary} ended without an exit code`;
        return { kind: "error", message };
      },
      (err: unknown): ExecutionOutcome => ({
        kind: "error",
        message: err instanceof Error ? err.message : String(err),
      }),
    );

    return {
      target,
      done,
      kill: () => {
        const { pid } = subprocess;
        if (pid === undefined) return;
        try {
          process.kill(-pid, "SIGKILL");
        } catch (e) {
          sshLog.debug(`Could not kill process group ${pid} for "${target}"`, {
            error: e instanceof Error ? e.message : String(e),
          });
          subprocess.kill("SIGKILL");
        }
      },
    };
  }
}
