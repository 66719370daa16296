export type ParallelSshConfig = {
  ssh: {
    /** Remote-shell executable. */
    binary: string;
    /** Arguments placed before the target on every invocation. */
    options: string[];
    versionCheckTimeoutMs: number;
  };
  limits: {
    maxProcs: number;
    /** Per-target wall-clock limit; null disables it. */
    timeoutSeconds: number | null;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

const DEFAULTS: ParallelSshConfig = {
  ssh: {
    binary: "/usr/bin/ssh",
    // -n: stdin from /dev/null, -q: quiet, BatchMode: never prompt
    options: ["-nqo", "BatchMode=yes"],
    versionCheckTimeoutMs: 5_000,
  },
  limits: {
    maxProcs: 1,
    timeoutSeconds: null,
  },
};

let current: ParallelSshConfig = structuredClone(DEFAULTS);

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result = structuredClone(base);
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined && typeof val === "object" && !Array.isArray(val) && val !== null) {
      (result as Record<string, unknown>)[key as string] = deepMerge(
        result[key] as Record<string, unknown>,
        val as DeepPartial<Record<string, unknown>>,
      );
    } else if (val !== undefined) {
      (result as Record<string, unknown>)[key as string] = Array.isArray(val) ? [...val] : val;
    }
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<ParallelSshConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<ParallelSshConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<ParallelSshConfig> = Object.freeze(structuredClone(DEFAULTS));
