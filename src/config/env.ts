/**
 * Environment variable overrides for configuration.
 *
 * `DEVPROMPT_<SECTION>_<FIELD>` maps to `config.<section>.<field>`; a few
 * shortcuts (e.g. `DEVPROMPT_OFFLINE`) are provided as well.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { buildConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

type EnvValueType = 'string' | 'number' | 'boolean';

interface EnvMapping {
  section: keyof Config;
  field: string;
  type: EnvValueType;
  description: string;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Shortcuts
  DEVPROMPT_PLANNER_MODEL: {
    section: 'models',
    field: 'planner_model',
    type: 'string',
    description: 'Override the planner model (shortcut for DEVPROMPT_MODELS_PLANNER_MODEL)',
  },
  DEVPROMPT_GENERATOR_MODEL: {
    section: 'models',
    field: 'generator_model',
    type: 'string',
    description: 'Override the generator model (shortcut for DEVPROMPT_MODELS_GENERATOR_MODEL)',
  },
  DEVPROMPT_MAX_QUESTIONS: {
    section: 'interview',
    field: 'max_questions',
    type: 'number',
    description: 'Override the question limit (shortcut for DEVPROMPT_INTERVIEW_MAX_QUESTIONS)',
  },
  DEVPROMPT_OFFLINE: {
    section: 'interview',
    field: 'offline',
    type: 'boolean',
    description: 'Disable model calls (shortcut for DEVPROMPT_INTERVIEW_OFFLINE)',
  },

  // Full paths
  DEVPROMPT_MODELS_PLANNER_MODEL: {
    section: 'models',
    field: 'planner_model',
    type: 'string',
    description: 'Override the planner model',
  },
  DEVPROMPT_MODELS_GENERATOR_MODEL: {
    section: 'models',
    field: 'generator_model',
    type: 'string',
    description: 'Override the generator model',
  },
  DEVPROMPT_INTERVIEW_MAX_QUESTIONS: {
    section: 'interview',
    field: 'max_questions',
    type: 'number',
    description: 'Override the maximum number of questions',
  },
  DEVPROMPT_INTERVIEW_ADAPTIVE_TIMEOUT_MS: {
    section: 'interview',
    field: 'adaptive_timeout_ms',
    type: 'number',
    description: 'Override the adaptive selection timeout in milliseconds',
  },
  DEVPROMPT_INTERVIEW_ADAPTIVE_STOPPING: {
    section: 'interview',
    field: 'adaptive_stopping',
    type: 'boolean',
    description: 'Enable or disable experience-aware early stopping (true/false)',
  },
  DEVPROMPT_INTERVIEW_OFFLINE: {
    section: 'interview',
    field: 'offline',
    type: 'boolean',
    description: 'Disable model calls (true/false)',
  },
  DEVPROMPT_OUTPUT_VENDOR: {
    section: 'output',
    field: 'vendor',
    type: 'string',
    description: 'Vendor file to write (cursor, continue, aider)',
  },
  DEVPROMPT_OUTPUT_DIRECTORY: {
    section: 'output',
    field: 'directory',
    type: 'string',
    description: 'Directory the vendor file is written to',
  },
  DEVPROMPT_CLAUDE_EXECUTABLE: {
    section: 'claude',
    field: 'executable',
    type: 'string',
    description: 'Path to the claude executable',
  },
  DEVPROMPT_CLAUDE_TIMEOUT_MS: {
    section: 'claude',
    field: 'timeout_ms',
    type: 'number',
    description: 'Override the Claude Code subprocess timeout in milliseconds',
  },
  DEVPROMPT_RETRY_MAX_RETRIES: {
    section: 'retry',
    field: 'max_retries',
    type: 'number',
    description: 'Override the number of generation retries',
  },
  DEVPROMPT_RETRY_BASE_DELAY_MS: {
    section: 'retry',
    field: 'base_delay_ms',
    type: 'number',
    description: 'Override the retry base delay in milliseconds',
  },
  DEVPROMPT_CLI_COLORS: {
    section: 'cli',
    field: 'colors',
    type: 'boolean',
    description: 'Enable or disable colored output (true/false)',
  },
  DEVPROMPT_CLI_WELCOME: {
    section: 'cli',
    field: 'welcome',
    type: 'boolean',
    description: 'Show or hide the welcome banner (true/false)',
  },
};

function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);
  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitive.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }
  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, type: EnvValueType, envVar: string): string | number | boolean {
  switch (type) {
    case 'string':
      return value;
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Raw override table, keyed by section then field.
 */
export type EnvOverrides = Record<string, Record<string, string | number | boolean>>;

/**
 * Reads DEVPROMPT_* variables into a raw override table.
 *
 * Empty variables are ignored. Later entries of the mapping win when a
 * shortcut and its full path are both set.
 *
 * @throws EnvCoercionError if a variable cannot be coerced.
 *
 * @example
 * ```typescript
 * readEnvOverrides({ DEVPROMPT_MAX_QUESTIONS: '5' });
 * // { interview: { max_questions: 5 } }
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrides {
  const overrides: EnvOverrides = {};

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    const section = (overrides[mapping.section] ??= {});
    section[mapping.field] = coerceValue(value, mapping.type, envVar);
  }

  return overrides;
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Overridden values go through the same validation as config file values.
 *
 * @throws EnvCoercionError if a variable cannot be coerced.
 * @throws ConfigParseError if a coerced value is out of range.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return buildConfig(readEnvOverrides(env), config);
}

/**
 * Documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
