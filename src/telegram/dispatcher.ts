import type { BotCredentials } from "../types/config.js";
import type { Chunk, DispatchOutcome } from "../types/update.js";
import type { HttpClient } from "./client.js";
import { logger } from "../logger.js";

export const DEFAULT_TELEGRAM_API_BASE_URL = "https://api.telegram.org";

export function sendMessageUrl(token: string, baseUrl: string = DEFAULT_TELEGRAM_API_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, "")}/bot${token}/sendMessage`;
}

/** Replace the bot token in a URL or message before it reaches a log line. */
export function redactToken(text: string, token: string): string {
  return token ? text.split(token).join("<redacted>") : text;
}

/**
 * Send chunks one after another, in order. A failed chunk is recorded and the
 * next one is still attempted; nothing is retried.
 */
export async function dispatchChunks(
  chunks: readonly Chunk[],
  credentials: BotCredentials,
  http: HttpClient,
  baseUrl: string = DEFAULT_TELEGRAM_API_BASE_URL,
): Promise<DispatchOutcome[]> {
  const url = sendMessageUrl(credentials.token, baseUrl);
  const outcomes: DispatchOutcome[] = [];

  for (const chunk of chunks) {
    let outcome: DispatchOutcome;
    try {
      const response = await http.postForm(url, { chat_id: credentials.chatId, text: chunk.text });
      outcome = response.ok
        ? { ordinal: chunk.ordinal, ok: true, status: response.status }
        : { ordinal: chunk.ordinal, ok: false, cause: "http", status: response.status };
    } catch (err) {
      const message = redactToken(err instanceof Error ? err.message : String(err), credentials.token);
      outcome = { ordinal: chunk.ordinal, ok: false, cause: "transport", message };
    }

    if (outcome.ok) {
      logger.debug({ ordinal: chunk.ordinal, of: chunks.length, length: chunk.text.length }, "Chunk sent");
    } else {
      logger.warn({ ...outcome, of: chunks.length, url: redactToken(url, credentials.token) }, "Telegram sendMessage failed");
    }
    outcomes.push(outcome);
  }

  return outcomes;
}
