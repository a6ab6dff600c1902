// Config loader: reads the Telegram bot settings from a YAML or JSON file.
// JSON is valid YAML, so one parser covers both formats.
// Lookup: explicit path, then UPDATES_NOTIFIER_CONFIG, then the default names in
// the working directory and in ~/.config/updates-notifier/.
import { readFileSync, existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { NotifierConfig } from "../types/config.js";
import { DEFAULT_TELEGRAM_API_BASE_URL } from "../telegram/dispatcher.js";
import { DEFAULT_PUBLIC_IP_URL } from "../system/info.js";
import { NotifierError, NotifierErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const CONFIG_FILE_NAMES = ["telegram_config.yaml", "telegram_config.yml", "telegram_config.json"];
const USER_CONFIG_DIR = join(homedir(), ".config", "updates-notifier");

const ConfigFileSchema = z.object({
  bot_token: z.string().trim().min(1, "bot_token must be a non-empty string"),
  chat_id: z
    .union([z.string().trim().min(1, "chat_id must not be empty"), z.number().int()])
    .transform((value) => String(value)),
  api_base_url: z.string().url().default(DEFAULT_TELEGRAM_API_BASE_URL),
  public_ip_url: z.string().url().default(DEFAULT_PUBLIC_IP_URL),
});

const CONFIG_EXAMPLE = [
  "telegram_config.yaml",
  "====================",
  'bot_token: "yourtoken"',
  'chat_id: "-yourchatid"',
  "",
  "telegram_config.json",
  "====================",
  "{",
  '    "bot_token": "yourtoken",',
  '    "chat_id": "-yourchatid"',
  "}",
];

export interface ConfigResult {
  config: NotifierConfig;
  configPath: string;
}

export interface LocateOptions {
  cwd?: string;
  userConfigDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** Resolve which config file to read, or throw CONFIG_NOT_FOUND. */
export function locateConfig(explicitPath?: string, options: LocateOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const envPath = (options.env ?? process.env).UPDATES_NOTIFIER_CONFIG;
  const requested = explicitPath ?? envPath;

  if (requested) {
    const path = resolve(cwd, requested);
    if (existsSync(path)) return path;
    throw new NotifierError(NotifierErrorCode.CONFIG_NOT_FOUND, `the config file '${requested}' does not exist.`, { path }, [
      "Point --config at an existing YAML or JSON file with the following content:",
      "",
      ...CONFIG_EXAMPLE,
    ]);
  }

  const dirs = [cwd, options.userConfigDir ?? USER_CONFIG_DIR];
  for (const dir of dirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const path = join(dir, name);
      if (existsSync(path)) return path;
    }
  }

  throw new NotifierError(NotifierErrorCode.CONFIG_NOT_FOUND, "No config file (telegram_config.yaml/json) was found.", { searched: dirs }, [
    `Make sure you have your telegram bot config file in ${dirs.join(" or ")} with the following content:`,
    "",
    ...CONFIG_EXAMPLE,
  ]);
}

/** Parse and validate config file content. */
export function parseConfig(raw: string, configPath: string): NotifierConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new NotifierError(NotifierErrorCode.CONFIG_INVALID, `could not parse the config file '${configPath}'.`, {
      cause: err instanceof Error ? err.message : String(err),
    }, ["Check the file is valid YAML or JSON."]);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new NotifierError(NotifierErrorCode.CONFIG_INVALID, `the config file '${configPath}' is invalid.`, { issues }, [
      ...issues,
      "",
      ...CONFIG_EXAMPLE,
    ]);
  }

  return {
    credentials: { token: result.data.bot_token, chatId: result.data.chat_id },
    apiBaseUrl: result.data.api_base_url,
    publicIpUrl: result.data.public_ip_url,
  };
}

export function loadConfig(explicitPath?: string, options: LocateOptions = {}): ConfigResult {
  const configPath = locateConfig(explicitPath, options);
  const config = parseConfig(readFileSync(configPath, "utf-8"), configPath);
  logger.debug({ configPath }, "Configuration loaded");
  return { config, configPath };
}
