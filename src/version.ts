export const PROGRAM_NAME = "updates-notifier";
export const VERSION = "1.0.0";
