export type ErrorCode =
  | "VALIDATION_FAILED"
  | "SSH_NOT_RUNNABLE"
  | "SSH_VERSION_FAILED"
  | "SSH_NO_OUTPUT"
  | "SSH_INCOMPATIBLE"
  | "BATCH_IN_PROGRESS"
  | "RUN_SET_FULL";

/** Base class for every error this package raises or returns. */
export class ParallelSshError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParallelSshError";
    this.code = code;
  }
}

export class ValidationError extends ParallelSshError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** The remote-shell executable is missing or is not OpenSSH. */
export class SshCompatibilityError extends ParallelSshError {
  readonly binary: string;

  constructor(code: ErrorCode, binary: string, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "SshCompatibilityError";
    this.binary = binary;
  }
}

export class BatchInProgressError extends ParallelSshError {
  constructor() {
    super("BATCH_IN_PROGRESS", "A batch is already running; wait for it to finish before starting another");
    this.name = "BatchInProgressError";
  }
}
