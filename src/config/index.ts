/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import "dotenv/config";
import { z } from "zod";
import { LOG_LEVELS } from "../logging/logger.js";
import { ConfigError, optionalEnv, optionalEnvBool, type EnvSource } from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

export const AppConfigSchema = z.object({
  /** Current environment */
  env: z.enum(["development", "production", "test"]),

  /** Minimum log level */
  logLevel: z.enum(LOG_LEVELS),

  /** Application name, included in CLI reports */
  appName: z.string().min(1),

  /** Directory for log files */
  logDir: z.string().min(1),

  /** Also write log entries to <logDir>/<appName>.log */
  logToFile: z.boolean(),

  /** Default unknown-field policy when parsing payloads */
  strictParsing: z.boolean(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Build configuration from an environment map.
 * Fails fast with ConfigError on any invalid value.
 */
export function loadAppConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const result = AppConfigSchema.safeParse({
    env: optionalEnv(env, "NODE_ENV", "development"),
    logLevel: optionalEnv(env, "LOG_LEVEL", "info"),
    appName: optionalEnv(env, "APP_NAME", "research-stream-schemas"),
    logDir: optionalEnv(env, "LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool(env, "LOG_TO_FILE", false),
    strictParsing: optionalEnvBool(env, "SCHEMA_STRICT_PARSING", false),
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return Object.freeze(result.data);
}

let current: Readonly<AppConfig> | null = null;

/**
 * Process-wide configuration, loaded from process.env on first use.
 */
export function getConfig(): Readonly<AppConfig> {
  current ??= loadAppConfig();
  return current;
}
