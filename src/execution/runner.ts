// Command execution layer: profile commands and dependency probes pass through here.
// Commands are shell strings run under bash; a non-zero exit is a result, not an error.
// Only a failure to start the process at all is thrown.
import execa from "execa";
import { logger } from "../logger.js";
import { NotifierError, NotifierErrorCode } from "../shared/errors.js";

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface RunOptions {
  /** Added to the inherited environment. */
  env?: Record<string, string>;
}

/** Executes a shell command string and captures its output. */
export interface CommandRunner {
  run(command: string, options?: RunOptions): Promise<CommandResult>;
}

/** Local runner over execa. No timeout: a hanging package manager hangs the run. */
export class ShellRunner implements CommandRunner {
  constructor(private readonly shell = "/bin/bash") {}

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    logger.debug({ command, env: options.env }, "Executing");
    const result = await execa(command, {
      shell: this.shell,
      env: options.env,
      reject: false,
      stripFinalNewline: false,
    }).catch((err: unknown) => {
      throw spawnFailure(command, err);
    });
    // execa leaves exitCode unset when the process was killed or never started.
    let exitCode: number = result.exitCode;
    if (typeof exitCode !== "number") {
      if (!result.signal) throw spawnFailure(command, `${this.shell} did not start`);
      exitCode = 128;
    }
    logger.debug({ command, exitCode, signal: result.signal }, "Command finished");
    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode };
  }
}

function spawnFailure(command: string, cause: unknown): NotifierError {
  return new NotifierError(NotifierErrorCode.COMMAND_SPAWN_FAILED, `Command failed to spawn: ${command}`, {
    cause: cause instanceof Error ? cause.message : String(cause),
  });
}
