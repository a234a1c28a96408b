export { createLogger, silentLogger, errorMessage } from "./logger.js";
export type { Logger, LogLevel, LogMeta, LoggerOptions } from "./logger.js";
export { createTracing } from "./tracing.js";
export type { Tracing } from "./tracing.js";
