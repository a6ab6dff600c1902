import { existsSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { PROGRAM_NAME, VERSION } from "./version.js";
import { NotifierError, NotifierErrorCode, SUPPORTED_FAMILIES_HINT } from "./shared/errors.js";

export interface CliOptions {
  config?: string;
  distro?: string;
  prefix: string;
}

/** Parse outcome: run the pipeline, or exit now (help/version already printed). */
export type CliParseResult = { kind: "run"; options: CliOptions } | { kind: "exit"; exitCode: number };

export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

function buildProgram(output?: CliOutput): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description("Check for updates and notify them (if any) via Telegram bot.")
    .version(`${PROGRAM_NAME} ${VERSION}`, "-v, --version", "Display the program version.")
    .helpOption("-h, --help", "Display this help message and exit.")
    .option("-c, --config <path>", "Telegram bot configuration file (default: telegram_config.yaml/yml/json).")
    .option(
      "-d, --distro <family>",
      `Linux family distro, disabling auto-detection (supported: ${SUPPORTED_FAMILIES_HINT}).`,
    )
    .option("-p, --prefix <path>", "Prefix path (location) to run against a local prefix.")
    .allowExcessArguments(false)
    .exitOverride();
  // Parse errors are reported by main alongside the remediation hint.
  program.configureOutput({ ...output, outputError: () => undefined });
  return program;
}

/**
 * Parse argv (including node and script entries). Validation that needs the
 * filesystem (prefix existence) happens here so it fails before any work starts.
 */
export function parseCliOptions(argv: string[], output?: CliOutput): CliParseResult {
  const program = buildProgram(output);
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
        return { kind: "exit", exitCode: 0 };
      }
      throw new NotifierError(NotifierErrorCode.INVALID_OPTION, err.message.replace(/^error:\s*/, ""), { code: err.code }, [
        `Try '${PROGRAM_NAME} --help' or '${PROGRAM_NAME} -h' for more information.`,
      ]);
    }
    throw err;
  }

  const opts = program.opts<{ config?: string; distro?: string; prefix?: string }>();
  const prefix = opts.prefix ?? "";
  if (prefix && !existsSync(prefix)) {
    throw new NotifierError(NotifierErrorCode.INVALID_PREFIX, `the specified prefix path '${prefix}' does not exist.`, { prefix }, [
      "Ensure the specified prefix path exists to be able to run the program.",
    ]);
  }
  return { kind: "run", options: { config: opts.config, distro: opts.distro, prefix } };
}

/** Message plus remediation, the way every fatal error reaches the operator. */
export function formatFailure(err: NotifierError): string {
  const lines = [`${PROGRAM_NAME}: ${err.message}`];
  if (err.remediation.length > 0) lines.push("", ...err.remediation);
  return lines.join("\n");
}
