/**
 * Configuration module for devprompt.toml parsing and environment overrides.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';

export { ConfigParseError, buildConfig, getDefaultConfig, parseConfig } from './parser.js';
export type {
  ClaudeConfig,
  CliSettingsConfig,
  Config,
  InterviewConfig,
  ModelAssignments,
  OutputConfig,
  PartialConfig,
  RetrySettings,
} from './types.js';
export {
  DEFAULT_CLAUDE,
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_INTERVIEW,
  DEFAULT_MODEL_ASSIGNMENTS,
  DEFAULT_OUTPUT,
  DEFAULT_RETRY,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrides, EnvRecord } from './env.js';

/** Config file looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'devprompt.toml';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Explicit config path; it must exist. */
  path?: string;
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord;
}

/**
 * Loads configuration from a file (if any) and applies environment overrides.
 *
 * Without an explicit path, `devprompt.toml` is read when present and
 * defaults are used otherwise.
 *
 * @throws ConfigParseError when an explicit path does not exist or any file is invalid.
 * @throws EnvCoercionError when an environment override cannot be coerced.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const filePath = options.path ?? DEFAULT_CONFIG_FILE;

  let config: Config;
  if (await safeExists(filePath)) {
    config = parseConfig(await safeReadFile(filePath));
  } else if (options.path !== undefined) {
    throw new ConfigParseError(`Config file not found: ${options.path}`);
  } else {
    config = getDefaultConfig();
  }

  return applyEnvOverrides(config, env);
}
