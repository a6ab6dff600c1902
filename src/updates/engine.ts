// Two-phase update check: optional index refresh, then the listing command.
// Package managers disagree on exit codes and output shape, so the engine only
// normalises at line granularity; the profile command owns the line format.

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DistroProfile } from "../types/distro.js";
import type { UpdateResult } from "../types/update.js";
import type { CommandResult, CommandRunner, RunOptions } from "../execution/runner.js";
import { WORKDIR_ENV } from "../distro/profiles.js";
import { logger } from "../logger.js";
import { NotifierError, PreCheckFailedError, UpdateCheckFailedError } from "../shared/errors.js";

/** Pre-check statuses that mean "ran fine" (dnf check-update exits 100 when updates exist). */
const BENIGN_PRE_CHECK_STATUSES: ReadonlySet<number> = new Set([0, 100]);

/** Shell statuses for "found but not executable" and "not found". */
const NOT_INVOKED_STATUSES: ReadonlySet<number> = new Set([126, 127]);

const EMPTY_UPDATE_RESULT: UpdateResult = Object.freeze({ lines: [], count: 0, found: false });

/** Split captured output into update lines. Trailing line breaks are not lines. */
export function parseUpdateLines(stdout: string): UpdateResult {
  const trimmed = stdout.replace(/(\r?\n)+$/, "");
  if (trimmed === "") return EMPTY_UPDATE_RESULT;
  const lines = trimmed.split(/\r?\n/);
  return { lines, count: lines.length, found: true };
}

/**
 * Both phases share a private scratch directory, exposed to the commands as
 * $UPDATES_NOTIFIER_WORKDIR and removed once the check ends.
 */
export async function runUpdateCheck(profile: DistroProfile, runner: CommandRunner): Promise<UpdateResult> {
  const workdir = mkdtempSync(join(tmpdir(), "updates-notifier-"));
  try {
    return await runPhases(profile, runner, { env: { [WORKDIR_ENV]: workdir } });
  } finally {
    rmSync(workdir, { recursive: true, force: true });
  }
}

async function runPhases(profile: DistroProfile, runner: CommandRunner, options: RunOptions): Promise<UpdateResult> {
  if (profile.preCheckCommand !== undefined) {
    const command = profile.preCheckCommand;
    const pre = await invoke(runner, command, options, (cause) => new PreCheckFailedError(command, null, cause));
    if (!BENIGN_PRE_CHECK_STATUSES.has(pre.exitCode)) {
      logger.debug({ command, exitCode: pre.exitCode, stderr: pre.stderr.trim() }, "Pre-check failed");
      throw new PreCheckFailedError(command, pre.exitCode, pre.stderr.trim() || undefined);
    }
  }

  const command = profile.updateCheckCommand;
  const check = await invoke(runner, command, options, (cause) => new UpdateCheckFailedError(command, null, cause));
  // Some tools exit non-zero precisely because updates exist; only "could not run" is fatal.
  if (NOT_INVOKED_STATUSES.has(check.exitCode)) {
    throw new UpdateCheckFailedError(command, check.exitCode, check.stderr.trim() || undefined);
  }

  const result = parseUpdateLines(check.stdout);
  logger.debug({ family: profile.familyId, count: result.count, exitCode: check.exitCode }, "Update check complete");
  return result;
}

async function invoke(
  runner: CommandRunner,
  command: string,
  options: RunOptions,
  wrap: (cause: string) => NotifierError,
): Promise<CommandResult> {
  try {
    return await runner.run(command, options);
  } catch (err) {
    throw wrap(err instanceof Error ? err.message : String(err));
  }
}
