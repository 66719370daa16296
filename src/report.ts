import type { BatchResult, FailureRecord } from "./supervisor/types.js";

function describeFailure(f: FailureRecord): string {
  switch (f.kind) {
    case "unexpected-exit-code":
      return `exit code ${f.exitCode}`;
    case "timeout":
      return "timeout exceeded";
    case "terminated":
      return `terminated (${f.reason})`;
  }
}

function indent(text: string): string[] {
  return text
    .replace(/\n$/, "")
    .split("\n")
    .map((line) => `    ${line}`);
}

/** Plain-text summary of a batch, successes first. */
export function formatReport(result: BatchResult, opts: { showOutput?: boolean } = {}): string {
  const showOutput = opts.showOutput ?? true;
  const lines: string[] = [];

  for (const s of result.successes) {
    lines.push(`[ok] ${s.target} (exit ${s.exitCode}, ${s.durationMs}ms)`);
    if (showOutput && s.stdout.length > 0) lines.push(...indent(s.stdout));
  }
  for (const f of result.failures) {
    lines.push(`[x] ${f.target}: ${describeFailure(f)}`);
  }

  lines.push(
    `${result.successes.length} succeeded, ${result.failures.length} failed in ${result.finishedAt - result.startedAt}ms`,
  );
  return lines.join("\n");
}
