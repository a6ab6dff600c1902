import pino from "pino";

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "warn";
}

let beforeLog: (() => void) | undefined;

/** Run `hook` before every emitted log line (disabled levels never reach it); pass nothing to clear. */
export function setBeforeLogHook(hook?: () => void): void {
  beforeLog = hook;
}

// stdout belongs to the progress line and the final report, so logs go to fd 2.
export const logger = pino(
  {
    name: "updates-notifier",
    level: defaultLevel(),
    hooks: {
      logMethod(inputArgs, method) {
        beforeLog?.();
        return method.apply(this, inputArgs);
      },
    },
  },
  pino.destination(2),
);
