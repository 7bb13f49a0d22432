/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvPath } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export rule tables and thresholds
export * from "./rules/index.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode (forces debug logging) */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Write log files in addition to the console */
  readonly logToFile: boolean;
  /** Application name, also the log file's base name */
  readonly appName: string;
  /** Base directory for report files written with --save */
  readonly outputDir: string;
  /** JSON file overriding the default filter rules */
  readonly filterRulesPath?: string;
  /** JSON file overriding the default quality thresholds */
  readonly qualityThresholdsPath?: string;
}

/**
 * Load configuration from the environment.
 * Every value has a default except the optional override paths. Paths are
 * resolved against the working directory.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnvPath("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "transcript-review"),
    outputDir: optionalEnvPath("OUTPUT_DIR", "output"),
    filterRulesPath: optionalEnvPath("FILTER_RULES_PATH"),
    qualityThresholdsPath: optionalEnvPath("QUALITY_THRESHOLDS_PATH"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate configuration values.
 * Call this at startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!ENVIRONMENTS.some((env) => env === appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be ${ENVIRONMENTS.join(", ")}.`,
      "NODE_ENV"
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`,
      "LOG_LEVEL"
    );
  }
}

/**
 * Resolve the effective log level, honouring DEBUG.
 */
export function resolveLogLevel(appConfig: AppConfig = config): LogLevel {
  if (appConfig.debug) {
    return "debug";
  }
  return isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info";
}
