#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { configure, getConfig } from "./config.js";
import { ParallelSsh } from "./parallel-ssh.js";
import { checkSshBinary } from "./remote/ssh-check.js";
import { formatReport } from "./report.js";
import { readTargetFile } from "./targets.js";
import { setLogLevel } from "./utils/logger.js";

const program = new Command();

function intArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function secondsArg(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Not a positive number of seconds.");
  return n;
}

program
  .name("ssh-fanout")
  .description("Run one command across many hosts over SSH")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--ssh <path>", "Path to the ssh executable");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean; ssh?: string }>();
  if (opts.debug) setLogLevel("debug");
  if (opts.ssh) configure({ ssh: { binary: opts.ssh } });
});

// --- run ---
program
  .command("run")
  .description("Run a command on every host and report each host's outcome")
  .argument("<command>", "Command to run on each host")
  .option("-H, --host <host...>", "Target hosts")
  .option("-f, --hosts-file <path>", "File with one host per line")
  .option("-p, --max-procs <n>", "Max hosts running at once", intArg)
  .option("-t, --timeout <seconds>", "Per-host timeout", secondsArg)
  .option("-e, --expect <code>", "Exit code counted as success", intArg, 0)
  .option("-q, --quiet", "Do not print captured output")
  .action(
    async (
      command: string,
      opts: {
        host?: string[];
        hostsFile?: string;
        maxProcs?: number;
        timeout?: number;
        expect: number;
        quiet?: boolean;
      },
    ) => {
      const targets = [...(opts.host ?? []), ...(opts.hostsFile ? await readTargetFile(opts.hostsFile) : [])];
      if (targets.length === 0) {
        console.error("No hosts given. Use -H <host...> or -f <file>.");
        process.exitCode = 1;
        return;
      }

      const created = await ParallelSsh.create({
        targets,
        maxProcs: opts.maxProcs,
        timeoutSeconds: opts.timeout,
      });
      if (!created.ok) {
        console.error(created.error.message);
        process.exitCode = 1;
        return;
      }

      const result = await created.value.run(command, opts.expect);
      console.log(formatReport(result, { showOutput: !opts.quiet }));
      if (result.failures.length > 0) process.exitCode = 1;
    },
  );

// --- check ---
program
  .command("check")
  .description("Check that the ssh executable is a compatible OpenSSH client")
  .action(async () => {
    const res = await checkSshBinary(getConfig().ssh.binary);
    if (!res.ok) {
      console.error(`[x] ${res.error.message}`);
      process.exitCode = 1;
      return;
    }
    console.log(`[+] ${res.value.binary}: ${res.value.version}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
