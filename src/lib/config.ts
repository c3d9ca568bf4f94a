/**
 * Environment configuration
 */

import { z } from "zod";

export const LOG_LEVEL_ENV = "PROMPT_TEMPLATE_LOG_LEVEL";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Log levels from most to least verbose
 */
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Read the initial log level from the environment
 *
 * Unknown or empty values fall back to "info".
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  const result = LogLevelSchema.safeParse(raw);
  return result.success ? result.data : "info";
}
