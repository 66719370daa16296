// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { ParallelSshConfig } from "./config.js";

// Errors
export { ParallelSshError, ValidationError, SshCompatibilityError, BatchInProgressError } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TargetSchema,
  TargetListSchema,
  MaxProcsSchema,
  TimeoutSecondsSchema,
  ExitCodeSchema,
  BatchPlanSchema,
  ParallelSshOptionsSchema,
} from "./schemas.js";

// Core
export { ParallelSsh } from "./parallel-ssh.js";
export type { ParallelSshOptions } from "./parallel-ssh.js";
export { Supervisor } from "./supervisor/supervisor.js";
export type { SupervisorOptions } from "./supervisor/supervisor.js";
export { RunSet } from "./supervisor/run-set.js";
export { ResultCollector, classify, timedOut } from "./supervisor/collector.js";
export type {
  BatchCallbacks,
  BatchPlan,
  BatchResult,
  FailureKind,
  FailureRecord,
  RunningEntry,
  SuccessRecord,
  Target,
} from "./supervisor/types.js";

// Executors
export type { ExecutionHandle, ExecutionOutcome, RemoteExecutor } from "./remote/executor.js";
export { SshExecutor } from "./remote/ssh-executor.js";
export type { SshExecutorOptions } from "./remote/ssh-executor.js";
export { FunctionExecutor } from "./remote/function-executor.js";
export type { FunctionExecutorOptions, RemoteFunction, RemoteFunctionResult } from "./remote/function-executor.js";
export { checkSshBinary } from "./remote/ssh-check.js";
export type { SshInfo } from "./remote/ssh-check.js";
export { decodeOutput } from "./remote/decode.js";

// Utils
export { log, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { ok, err } from "./utils/result.js";
export type { Result } from "./utils/result.js";
export { parseTargetList, readTargetFile } from "./targets.js";
export { formatReport } from "./report.js";
