// Orchestration: resolve profile → load config → check tools → gather host info
// → run the update check → compose → chunk → dispatch.
// Every fatal check runs before the first package-manager command or network call.

import type { CliOptions } from "./cli.js";
import type { CommandRunner } from "./execution/runner.js";
import type { HttpClient } from "./telegram/client.js";
import type { SystemInfoProvider } from "./system/info.js";
import type { ConfigResult } from "./config/loader.js";
import type { DistroProfile } from "./types/distro.js";
import type { Chunk, DispatchOutcome, ReportBody, UpdateResult } from "./types/update.js";
import type { NotifierConfig } from "./types/config.js";
import type { ProgressReporter } from "./progress/reporter.js";
import { collectDependencies, resolveProfile } from "./distro/profiles.js";
import { checkDependencies } from "./execution/dependencies.js";
import { runUpdateCheck } from "./updates/engine.js";
import { composeReport } from "./report/composer.js";
import { chunkReport } from "./report/chunker.js";
import { dispatchChunks } from "./telegram/dispatcher.js";
import { logger } from "./logger.js";

export const STAGE_LABELS = {
  detect: "Detecting the Linux distro/family...",
  config: "Reading the Telegram bot configuration...",
  dependencies: "Checking the required dependencies...",
  systemInfo: "Fetching the system information...",
  updates: "Checking for updates...",
  dispatch: "Sending the updates notification via Telegram...",
} as const;

export interface PipelineDeps {
  runner: CommandRunner;
  http: HttpClient;
  detectFamily: (prefix: string) => string;
  loadConfig: (explicitPath?: string) => ConfigResult;
  systemInfo: (config: NotifierConfig) => SystemInfoProvider;
  progress: ProgressReporter;
}

export interface PipelineSummary {
  profile: DistroProfile;
  result: UpdateResult;
  report: ReportBody;
  chunks: Chunk[];
  outcomes: DispatchOutcome[];
}

export async function runPipeline(options: CliOptions, deps: PipelineDeps): Promise<PipelineSummary> {
  const { progress } = deps;

  progress.setLabel(STAGE_LABELS.detect);
  const profile = resolveProfile(options.distro ?? deps.detectFamily(options.prefix));
  logger.debug({ family: profile.familyId, manual: options.distro !== undefined }, "Profile resolved");

  progress.setLabel(STAGE_LABELS.config);
  const { config } = deps.loadConfig(options.config);

  progress.setLabel(STAGE_LABELS.dependencies);
  await checkDependencies(deps.runner, collectDependencies(profile));

  progress.setLabel(STAGE_LABELS.systemInfo);
  const info = await deps.systemInfo(config).gather();

  progress.setLabel(STAGE_LABELS.updates);
  const result = await runUpdateCheck(profile, deps.runner);

  const report = composeReport(info, result);
  const chunks = chunkReport(report);

  progress.setLabel(STAGE_LABELS.dispatch);
  const outcomes = await dispatchChunks(chunks, config.credentials, deps.http, config.apiBaseUrl);
  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  logger.info({ updates: result.count, chunks: chunks.length, failed }, "Run complete");

  return { profile, result, report, chunks, outcomes };
}
