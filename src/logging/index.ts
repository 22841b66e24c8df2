export { Logger, initializeLogging, getLogger, setLogLevel, type LoggingOptions } from "./logging";
export { LOG_LEVEL_NAMES, type LogLevel, type LogEntry } from "./logging.types";
