/**
 * Settings of the dispatch tool itself, read from the environment.
 * The per-run pipeline configuration lives in ./pipeline.
 */

import {
  SettingsError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { SettingsError } from "./env.js";

export * from "./pipeline/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppSettings {
  /** Current environment (development, production, test) */
  readonly env: string;
  readonly logLevel: LogLevel;
  readonly appName: string;
  /** Executable run once per sample */
  readonly analysisCommand: string;
  /** Executable run once after every sample unit has finished */
  readonly mergeCommand: string;
  /** Maximum units running at once; 0 means no bound */
  readonly maxParallel: number;
  /** Shell used to apply `module load` directives before a unit starts */
  readonly moduleShell: string;
  /** Write the run log under the output directory */
  readonly logToFile: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate settings from an environment map.
 * Fails fast on values that cannot be used.
 */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env
): AppSettings {
  const environment = optionalEnv("NODE_ENV", "development", env);
  if (!ENVIRONMENTS.some((name) => name === environment)) {
    throw new SettingsError(
      `Invalid NODE_ENV: ${environment}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new SettingsError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return {
    env: environment,
    logLevel,
    appName: optionalEnv("APP_NAME", "sample-dispatch", env),
    analysisCommand: optionalEnv("ANALYSIS_COMMAND", "sample-analysis", env),
    mergeCommand: optionalEnv("MERGE_COMMAND", "merge-tracks", env),
    maxParallel: optionalEnvInt("MAX_PARALLEL", 0, env),
    moduleShell: optionalEnv("MODULE_SHELL", "bash", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", true, env),
  };
}
