// Error classes
export { TemplateError, ConfigError } from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr, map, mapErr, andThen, all, tryCatch, tryCatchAsync } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { Logger, logger } from "./logger.js";
export { resolveLogLevel, LogLevelSchema, LOG_LEVEL_ENV } from "./config.js";
export type { LogLevel } from "./config.js";
