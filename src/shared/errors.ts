export enum NotifierErrorCode {
  NOT_SUPPORTED = "NOT_SUPPORTED",
  DISTRO_UNKNOWN = "DISTRO_UNKNOWN",
  PRE_CHECK_FAILED = "PRE_CHECK_FAILED",
  UPDATE_CHECK_FAILED = "UPDATE_CHECK_FAILED",
  MISSING_DEPENDENCY = "MISSING_DEPENDENCY",
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",
  CONFIG_INVALID = "CONFIG_INVALID",
  INVALID_PREFIX = "INVALID_PREFIX",
  INVALID_OPTION = "INVALID_OPTION",
  COMMAND_SPAWN_FAILED = "COMMAND_SPAWN_FAILED",
}

export const SUPPORTED_FAMILIES_HINT = "arch, debian, gentoo, rhel, suse";

export class NotifierError extends Error {
  readonly code: NotifierErrorCode;
  readonly context?: Record<string, unknown>;
  readonly remediation: string[];

  constructor(
    code: NotifierErrorCode,
    message: string,
    context?: Record<string, unknown>,
    remediation: string[] = []
  ) {
    super(message);
    this.name = "NotifierError";
    this.code = code;
    this.context = context;
    this.remediation = remediation;
  }
}

export class NotSupportedError extends NotifierError {
  readonly family: string;

  constructor(family: string) {
    super(
      NotifierErrorCode.NOT_SUPPORTED,
      `the distro '${family}' is not (yet) supported.`,
      { family },
      [`The possible distro/family values are ${SUPPORTED_FAMILIES_HINT}.`]
    );
    this.name = "NotSupportedError";
    this.family = family;
  }
}

export class PreCheckFailedError extends NotifierError {
  readonly command: string;
  readonly exitStatus: number | null;

  constructor(command: string, exitStatus: number | null, cause?: string) {
    super(
      NotifierErrorCode.PRE_CHECK_FAILED,
      `something went wrong running '${command}'.`,
      { command, exitStatus, cause },
      ["Ensure this pre-update check command runs to be able to check for updates."]
    );
    this.name = "PreCheckFailedError";
    this.command = command;
    this.exitStatus = exitStatus;
  }
}

export class UpdateCheckFailedError extends NotifierError {
  readonly command: string;
  readonly exitStatus: number | null;

  constructor(command: string, exitStatus: number | null, cause?: string) {
    super(
      NotifierErrorCode.UPDATE_CHECK_FAILED,
      `could not run the update check '${command}'.`,
      { command, exitStatus, cause },
      ["Ensure the package manager tools for your distro are installed and on PATH."]
    );
    this.name = "UpdateCheckFailedError";
    this.command = command;
    this.exitStatus = exitStatus;
  }
}

export class MissingDependencyError extends NotifierError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      NotifierErrorCode.MISSING_DEPENDENCY,
      "to run this program, you need the following commands/dependencies:",
      { missing },
      [missing.join(" ")]
    );
    this.name = "MissingDependencyError";
    this.missing = missing;
  }
}
