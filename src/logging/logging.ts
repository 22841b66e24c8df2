/**
 * Logging
 *
 * Thin wrapper over a shared winston logger. Each Logger is bound to a
 * component name which is attached to every entry as metadata.
 *
 * @example
 * ```ts
 * const logger = getLogger("copy");
 * logger.debug("skipped", { mediaType, digest });
 * ```
 */

import winston from "winston";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logging.types";

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let rootLogger: winston.Logger | null = null;
const loggerCache = new Map<string, Logger>();

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: () => winston.Logger
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt("debug", message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt("info", message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt("warn", message, undefined, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.logAt("error", message, error, metadata);
  }

  /**
   * e.g. `getLogger("graph").child("copy")` logs as "graph.copy"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(level: LogLevel, message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error instanceof Error) {
      meta["error"] = error.message;
      if (error.stack) meta["errorStack"] = error.stack;
    } else if (error !== undefined) {
      meta["error"] = String(error);
    }
    this.winstonLogger().log(level, message, meta);
  }
}

export interface LoggingOptions {
  level?: LogLevel;
  /** Replaces the default stderr console transport */
  transports?: winston.transport[];
}

const textFormat = winston.format.printf((info) => {
  const level = info.level.toUpperCase().padStart(5);
  const component = typeof info["component"] === "string" ? ` [${info["component"]}]` : "";
  return `${level}${component} ${String(info.message)}`;
});

/**
 * (Re)configure the root logger. Loggers handed out earlier pick up the
 * new configuration on their next call.
 */
export function initializeLogging(options: LoggingOptions = {}): winston.Logger {
  if (rootLogger) {
    rootLogger.close();
  }
  const logger = winston.createLogger({
    levels: LOG_LEVELS,
    level: options.level ?? "info",
    transports: options.transports ?? [
      new winston.transports.Console({
        format: textFormat,
        stderrLevels: Object.keys(LOG_LEVELS),
      }),
    ],
  });
  rootLogger = logger;
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, getRootLogger);
  loggerCache.set(component, logger);
  return logger;
}

function getRootLogger(): winston.Logger {
  return rootLogger ?? initializeLogging({ level: levelFromEnv(process.env["OCI_ENGINE_LOG_LEVEL"]) });
}

function levelFromEnv(value: string | undefined): LogLevel | undefined {
  return LOG_LEVEL_NAMES.find((level) => level === value);
}
