import { getConfig } from "./config.js";
import { BatchInProgressError, type SshCompatibilityError } from "./errors.js";
import type { RemoteExecutor } from "./remote/executor.js";
import { checkSshBinary, type SshInfo } from "./remote/ssh-check.js";
import { SshExecutor } from "./remote/ssh-executor.js";
import {
  ExitCodeSchema,
  MaxProcsSchema,
  ParallelSshOptionsSchema,
  parseOrThrow,
  TargetListSchema,
  TimeoutSecondsSchema,
} from "./schemas.js";
import { Supervisor } from "./supervisor/supervisor.js";
import type { BatchCallbacks, BatchResult, FailureRecord, SuccessRecord, Target } from "./supervisor/types.js";
import { log } from "./utils/logger.js";
import { err, ok, type Result } from "./utils/result.js";

export type ParallelSshOptions = {
  targets?: Target[];
  /** Concurrency ceiling (default: config `limits.maxProcs`). */
  maxProcs?: number;
  /** Per-target timeout in seconds; null disables it (default: config `limits.timeoutSeconds`). */
  timeoutSeconds?: number | null;
  /** Only used by `ParallelSsh.create`. */
  sshBinary?: string;
  /** Clock for start stamps and deadlines (for testing). */
  clock?: () => number;
};

/**
 * Runs a command on every configured target, one batch at a time.
 * Setters only affect batches started after they are called.
 */
export class ParallelSsh {
  readonly executor: RemoteExecutor;
  /** Set when built through `create`. */
  readonly ssh?: SshInfo;

  private supervisor: Supervisor;
  private targets: Target[];
  private maxProcs: number;
  private timeoutSeconds: number | null;
  private lastResult?: BatchResult;
  private running = false;

  constructor(executor: RemoteExecutor, opts: ParallelSshOptions = {}, ssh?: SshInfo) {
    const { clock, ...rest } = opts;
    const parsed = parseOrThrow(ParallelSshOptionsSchema, rest, "options");
    const { limits } = getConfig();

    this.executor = executor;
    this.ssh = ssh;
    this.supervisor = new Supervisor(executor, { clock });
    this.targets = parsed.targets ?? [];
    this.maxProcs = parsed.maxProcs ?? limits.maxProcs;
    this.timeoutSeconds = parsed.timeoutSeconds !== undefined ? parsed.timeoutSeconds : limits.timeoutSeconds;
  }

  /**
   * Check the ssh executable and build an instance around it.
   * An incompatible or missing executable is returned, not thrown.
   */
  static async create(opts: ParallelSshOptions = {}): Promise<Result<ParallelSsh, SshCompatibilityError>> {
    const check = await checkSshBinary(opts.sshBinary);
    if (!check.ok) {
      log.error(check.error.message, { code: check.error.code });
      return err(check.error);
    }
    const executor = new SshExecutor({ binary: check.value.binary });
    return ok(new ParallelSsh(executor, opts, check.value));
  }

  setTargetList(targets: Target[]): void {
    this.targets = parseOrThrow(TargetListSchema, targets, "target list");
  }

  setMaxProcs(maxProcs: number): void {
    this.maxProcs = parseOrThrow(MaxProcsSchema, maxProcs, "maxProcs");
  }

  /** Seconds, or null to let targets run for as long as they take. */
  setTimeout(seconds: number | null): void {
    this.timeoutSeconds = parseOrThrow(TimeoutSecondsSchema, seconds, "timeout");
  }

  getTargetList(): readonly Target[] {
    return [...this.targets];
  }

  getMaxProcs(): number {
    return this.maxProcs;
  }

  getTimeout(): number | null {
    return this.timeoutSeconds;
  }

  /**
   * Run `command` on every target and classify each one. Resolves once all
   * targets are classified; per-target failures are recorded, never thrown.
   */
  async run(command: string, expectedExitCode = 0, callbacks?: BatchCallbacks): Promise<BatchResult> {
    if (this.running) throw new BatchInProgressError();
    const code = parseOrThrow(ExitCodeSchema, expectedExitCode, "expected exit code");

    this.running = true;
    this.lastResult = undefined;
    try {
      const result = await this.supervisor.run(
        {
          command,
          expectedExitCode: code,
          targets: [...this.targets],
          maxProcs: this.maxProcs,
          timeoutMs: this.timeoutSeconds === null ? null : this.timeoutSeconds * 1000,
        },
        callbacks,
      );
      this.lastResult = result;
      return result;
    } finally {
      this.running = false;
    }
  }

  /** Successes of the most recently completed batch. */
  getSuccesses(): readonly SuccessRecord[] {
    return this.lastResult?.successes ?? [];
  }

  /** Failures of the most recently completed batch. */
  getFailures(): readonly FailureRecord[] {
    return this.lastResult?.failures ?? [];
  }
}
