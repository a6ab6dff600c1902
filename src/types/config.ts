/** Telegram bot credentials read from the config file. */
export interface BotCredentials {
  readonly token: string;
  readonly chatId: string;
}

export interface NotifierConfig {
  readonly credentials: BotCredentials;
  readonly apiBaseUrl: string;
  readonly publicIpUrl: string;
}
