// Status-line spinner that runs beside the pipeline.
// The pipeline is the only writer of `label`; the redraw timer only reads it.
// stop() is idempotent and is wired to every exit path by withProgress() and installExitHandlers().

import { setBeforeLogHook } from "../logger.js";

const FRAMES = ["/", "-", "\\", "|"];
const REDRAW_INTERVAL_MS = 40;

const CLEAR_LINE = "\r\x1b[K";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

/** The slice of a TTY stream the reporter draws on. */
export interface StatusStream {
  write(chunk: string): boolean;
  readonly isTTY?: boolean;
}

export interface ProgressReporterOptions {
  stream?: StatusStream;
  intervalMs?: number;
}

export class ProgressReporter {
  private readonly stream: StatusStream;
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | undefined;
  private frame = 0;
  private label = "";

  constructor(options: ProgressReporterOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.intervalMs = options.intervalMs ?? REDRAW_INTERVAL_MS;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  get currentLabel(): string {
    return this.label;
  }

  /** Start redrawing. Does nothing on a non-TTY stream or when already running. */
  start(initialLabel: string): void {
    this.label = initialLabel;
    if (this.running || !this.stream.isTTY) return;
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => this.redraw(), this.intervalMs);
    // The pipeline's own I/O keeps the process alive, not the spinner.
    this.timer.unref();
    // A log line lands on a cleared line; the next redraw starts below it.
    setBeforeLogHook(() => this.stream.write(CLEAR_LINE));
    this.redraw();
  }

  /** Picked up on the next redraw. */
  setLabel(label: string): void {
    this.label = label;
  }

  /** Stop the timer and leave a clean line with the cursor visible. Safe to call repeatedly. */
  stop(): void {
    if (this.timer === undefined) return;
    clearInterval(this.timer);
    this.timer = undefined;
    setBeforeLogHook();
    this.stream.write(CLEAR_LINE + SHOW_CURSOR);
  }

  private redraw(): void {
    this.stream.write(`${CLEAR_LINE}${FRAMES[this.frame]} ${this.label}`);
    this.frame = (this.frame + 1) % FRAMES.length;
  }
}

/** Run `task` with the reporter started, and stopped however the task ends. */
export async function withProgress<T>(
  reporter: ProgressReporter,
  initialLabel: string,
  task: (reporter: ProgressReporter) => Promise<T>,
): Promise<T> {
  reporter.start(initialLabel);
  try {
    return await task(reporter);
  } finally {
    reporter.stop();
  }
}

const SIGNAL_EXIT_CODES: Readonly<Record<"SIGINT" | "SIGTERM", number>> = { SIGINT: 130, SIGTERM: 143 };

/** The slice of `process` the exit handlers attach to. */
export interface ExitHandlerHost {
  once(event: "exit", listener: NodeJS.ExitListener): unknown;
  once(event: NodeJS.Signals, listener: NodeJS.SignalsListener): unknown;
  exit(code?: number): void;
}

/** Stop the reporter on process exit, and on SIGINT/SIGTERM before exiting 130/143. */
export function installExitHandlers(reporter: ProgressReporter, host: ExitHandlerHost = process): void {
  host.once("exit", () => reporter.stop());
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    host.once(signal, () => {
      reporter.stop();
      host.exit(SIGNAL_EXIT_CODES[signal]);
    });
  }
}
