import type { CommandRunner } from "./runner.js";
import { logger } from "../logger.js";
import { MissingDependencyError } from "../shared/errors.js";

/** Check if a command exists on the system. */
export async function commandExists(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.run(`command -v ${name} >/dev/null 2>&1`);
  return result.exitCode === 0;
}

/**
 * Probe every required tool, one at a time, and fail once with the full list of
 * missing ones. Names come from the built-in profile table, never from user input.
 */
export async function checkDependencies(runner: CommandRunner, names: Iterable<string>): Promise<void> {
  const missing: string[] = [];
  for (const name of names) {
    if (!(await commandExists(runner, name))) missing.push(name);
  }
  if (missing.length > 0) {
    logger.debug({ missing }, "Missing dependencies");
    throw new MissingDependencyError(missing);
  }
}
