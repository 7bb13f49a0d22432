/**
 * Environment variables for the review tools.
 *
 * Values are trimmed; a variable set to whitespace counts as unset.
 */

import "dotenv/config";
import { resolve } from "node:path";

export class ConfigError extends Error {
  /** Environment variable at fault, when there is one */
  public readonly key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * A file or directory path, resolved against the working directory.
 * Unset paths resolve `defaultValue` when one is given.
 */
export function optionalEnvPath(key: string): string | undefined;
export function optionalEnvPath(key: string, defaultValue: string): string;
export function optionalEnvPath(key: string, defaultValue?: string): string | undefined {
  const value = readEnv(key) ?? defaultValue;
  return value === undefined ? undefined : resolve(value);
}

const BOOLEAN_WORDS = new Map<string, boolean>([
  ["true", true],
  ["1", true],
  ["yes", true],
  ["on", true],
  ["false", false],
  ["0", false],
  ["no", false],
  ["off", false],
]);

/**
 * Case-insensitive: true/false, 1/0, yes/no, on/off.
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = BOOLEAN_WORDS.get(value.toLowerCase());
  if (parsed === undefined) {
    throw new ConfigError(
      `${key} must be one of ${[...BOOLEAN_WORDS.keys()].join("/")}, got: ${value}`,
      key
    );
  }
  return parsed;
}
