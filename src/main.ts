#!/usr/bin/env node

import { formatFailure, parseCliOptions } from "./cli.js";
import { runPipeline, type PipelineDeps } from "./pipeline.js";
import { installExitHandlers, ProgressReporter, withProgress } from "./progress/reporter.js";
import { ShellRunner } from "./execution/runner.js";
import { FetchHttpClient } from "./telegram/client.js";
import { HostSystemInfoProvider } from "./system/info.js";
import { detectFamily } from "./distro/detector.js";
import { loadConfig } from "./config/loader.js";
import { renderReport } from "./report/composer.js";
import { NotifierError } from "./shared/errors.js";
import { PROGRAM_NAME } from "./version.js";
import { logger } from "./logger.js";

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliOptions(argv);
  if (parsed.kind === "exit") return parsed.exitCode;
  const { options } = parsed;

  const progress = new ProgressReporter();
  installExitHandlers(progress);

  const runner = new ShellRunner();
  const deps: PipelineDeps = {
    runner,
    http: new FetchHttpClient(),
    detectFamily,
    loadConfig: (path) => loadConfig(path),
    systemInfo: (config) => new HostSystemInfoProvider(runner, { prefix: options.prefix, publicIpUrl: config.publicIpUrl }),
    progress,
  };

  const summary = await withProgress(progress, "Checking the command-line options...", () => runPipeline(options, deps));
  process.stdout.write(`Process completed!\n\n${renderReport(summary.report)}\n`);
  return 0;
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof NotifierError) {
      logger.debug({ code: err.code, context: err.context }, err.message);
      process.stderr.write(`${formatFailure(err)}\n`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      logger.fatal({ error: message }, "Unexpected failure");
      process.stderr.write(`${PROGRAM_NAME}: ${message}\n`);
    }
    process.exitCode = 1;
  });
