import { ExecaError, execa } from "execa";
import { getConfig } from "../config.js";
import { SshCompatibilityError } from "../errors.js";
import { log } from "../utils/logger.js";
import { err, ok, type Result } from "../utils/result.js";

export type SshInfo = {
  binary: string;
  /** Version banner as printed by `ssh -V`, trimmed. */
  version: string;
};

/**
 * Check that `binary` is an OpenSSH client. OpenSSH prints its banner to
 * stderr, so both streams are read together.
 */
export async function checkSshBinary(binary?: string): Promise<Result<SshInfo, SshCompatibilityError>> {
  const { ssh } = getConfig();
  const bin = binary ?? ssh.binary;
  const cmd = `${bin} -V`;

  const res = await execa(bin, ["-V"], {
    reject: false,
    stdin: "ignore",
    all: true,
    timeout: ssh.versionCheckTimeoutMs,
  });

  if (res.exitCode === undefined) {
    const detail = res instanceof ExecaError ? res.shortMessage : "no exit code";
    log.error(`Could not run ${cmd}`, { detail });
    return err(new SshCompatibilityError("SSH_NOT_RUNNABLE", bin, `Could not run ${cmd}: ${detail}`, { cause: res }));
  }
  if (res.exitCode !== 0) {
    return err(new SshCompatibilityError("SSH_VERSION_FAILED", bin, `${cmd} returned non-zero exit code ${res.exitCode}`));
  }

  const version = (res.all ?? "").trim();
  if (version.length === 0) {
    return err(new SshCompatibilityError("SSH_NO_OUTPUT", bin, `No output from ${cmd}`));
  }
  if (!version.toLowerCase().includes("openssh")) {
    return err(
      new SshCompatibilityError("SSH_INCOMPATIBLE", bin, `Expecting OpenSSH implementation: ${cmd} reported ${version}`),
    );
  }

  log.debug("SSH client is compatible", { binary: bin, version });
  return ok({ binary: bin, version });
}
