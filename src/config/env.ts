/**
 * Environment variable access for entry points.
 *
 * Importing this module loads `.env` into `process.env`, so only scripts
 * import it; the library never does.
 */

import "dotenv/config";
import { ValidationError, type ValidationIssue } from "./validation.js";

export type Env = Readonly<Record<string, string | undefined>>;

export class ConfigError extends ValidationError {
  constructor(issues: ValidationIssue[]) {
    super("Invalid configuration", issues);
    this.name = "ConfigError";
  }
}

/**
 * Read a variable, treating the empty string as unset.
 */
export function readEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

/**
 * Read a boolean variable.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function readEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new ConfigError([
    {
      path: [key],
      message: `must be a boolean (true/false/1/0/yes/no), got: ${value}`,
      code: "invalid_boolean",
    },
  ]);
}
