export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVEL_NAMES = ["error", "warn", "info", "debug"] as const satisfies readonly LogLevel[];

export interface LogEntry {
  level: string;
  message: string;
  component?: string;
  [key: string]: unknown;
}
