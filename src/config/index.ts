/**
 * Configuration for scripts that run pipelines.
 *
 * Usage:
 *   import { loadConfig } from "../src/config/index.js";
 *
 *   const config = loadConfig();
 *   const logger = createLogger({ level: config.logLevel, logDir: config.logDir });
 */

import { z } from "zod";
import { ConfigError, readEnv, readEnvBool, type Env } from "./env.js";
import { formatZodIssues } from "./validation.js";

export { ConfigError, readEnv, readEnvBool, type Env } from "./env.js";
export {
  ValidationError,
  formatZodIssues,
  type ValidationIssue,
} from "./validation.js";

export const AppConfigSchema = z
  .object({
    /** Minimum log level (LOG_LEVEL) */
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    /** Directory for log files (LOG_DIR) */
    logDir: z.string(),
    /** Append log entries to a file as well as the console (LOG_TO_FILE) */
    logToFile: z.boolean(),
    /** Name reported in log entries (APP_NAME) */
    appName: z.string(),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Build configuration from environment variables, applying defaults.
 *
 * @throws ConfigError listing each invalid variable
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const result = AppConfigSchema.safeParse({
    logLevel: readEnv(env, "LOG_LEVEL") ?? "info",
    logDir: readEnv(env, "LOG_DIR") ?? "output/logs",
    logToFile: readEnvBool(env, "LOG_TO_FILE", false),
    appName: readEnv(env, "APP_NAME") ?? "rowflow",
  });

  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error.issues));
  }

  return Object.freeze(result.data);
}
