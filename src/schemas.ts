import { z } from "zod";
import { ValidationError } from "./errors.js";

export const TargetSchema = z
  .string()
  .min(1, "target must be a non-empty host identifier")
  .refine((t) => t === t.trim(), "target must not have surrounding whitespace");

export const TargetListSchema = z.array(TargetSchema);

export const MaxProcsSchema = z.number().int().positive();

/** Seconds; null disables the per-target deadline. */
export const TimeoutSecondsSchema = z.number().positive().finite().nullable();

export const ExitCodeSchema = z.number().int().min(0).max(255);

export const BatchPlanSchema = z.object({
  command: z.string(),
  expectedExitCode: ExitCodeSchema,
  targets: TargetListSchema,
  maxProcs: MaxProcsSchema,
  timeoutMs: z.number().positive().finite().nullable(),
});

export const ParallelSshOptionsSchema = z.object({
  targets: TargetListSchema.optional(),
  maxProcs: MaxProcsSchema.optional(),
  timeoutSeconds: TimeoutSecondsSchema.optional(),
  sshBinary: z.string().min(1).optional(),
});

/** Parse `value` or throw a ValidationError naming `what` and the first issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}${where}: ${issue?.message ?? "unknown issue"}`);
  }
  return result.data;
}
