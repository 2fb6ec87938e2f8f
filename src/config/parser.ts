/**
 * TOML configuration parser for devprompt.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG } from './defaults.js';
import type {
  ClaudeConfig,
  CliSettingsConfig,
  Config,
  InterviewConfig,
  ModelAssignments,
  OutputConfig,
  RetrySettings,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates a number that must be a positive integer.
 */
function validatePositiveInteger(value: unknown, fieldPath: string): number {
  const num = validateNumber(value, fieldPath);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a positive integer, got ${String(num)}`
    );
  }
  return num;
}

/**
 * Validates a number that must be finite and not negative.
 */
function validateNonNegative(value: unknown, fieldPath: string): number {
  const num = validateNumber(value, fieldPath);
  if (!Number.isFinite(num) || num < 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a finite non-negative number, got ${String(num)}`
    );
  }
  return num;
}

/**
 * Returns the table for a section, or undefined when it is absent.
 */
function sectionTable(raw: unknown, section: string): Record<string, unknown> | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof raw}`);
  }
  return raw;
}

function parseModelAssignments(raw: unknown, base: ModelAssignments): ModelAssignments {
  const table = sectionTable(raw, 'models');
  const result: ModelAssignments = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('planner_model' in table) {
    result.planner_model = validateString(table.planner_model, 'models.planner_model');
  }
  if ('generator_model' in table) {
    result.generator_model = validateString(table.generator_model, 'models.generator_model');
  }

  return result;
}

function parseInterview(raw: unknown, base: InterviewConfig): InterviewConfig {
  const table = sectionTable(raw, 'interview');
  const result: InterviewConfig = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('max_questions' in table) {
    result.max_questions = validatePositiveInteger(
      table.max_questions,
      'interview.max_questions'
    );
  }
  if ('adaptive_timeout_ms' in table) {
    result.adaptive_timeout_ms = validatePositiveInteger(
      table.adaptive_timeout_ms,
      'interview.adaptive_timeout_ms'
    );
  }
  if ('adaptive_stopping' in table) {
    result.adaptive_stopping = validateBoolean(
      table.adaptive_stopping,
      'interview.adaptive_stopping'
    );
  }
  if ('offline' in table) {
    result.offline = validateBoolean(table.offline, 'interview.offline');
  }

  return result;
}

function parseOutput(raw: unknown, base: OutputConfig): OutputConfig {
  const table = sectionTable(raw, 'output');
  const result: OutputConfig = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('vendor' in table) {
    result.vendor = validateString(table.vendor, 'output.vendor');
  }
  if ('directory' in table) {
    result.directory = validateString(table.directory, 'output.directory');
    if (result.directory.trim() === '') {
      throw new ConfigParseError("Invalid value for 'output.directory': must not be empty");
    }
  }

  return result;
}

function parseClaude(raw: unknown, base: ClaudeConfig): ClaudeConfig {
  const table = sectionTable(raw, 'claude');
  const result: ClaudeConfig = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('executable' in table) {
    result.executable = validateString(table.executable, 'claude.executable');
  }
  if ('timeout_ms' in table) {
    result.timeout_ms = validatePositiveInteger(table.timeout_ms, 'claude.timeout_ms');
  }

  return result;
}

function parseRetry(raw: unknown, base: RetrySettings): RetrySettings {
  const table = sectionTable(raw, 'retry');
  const result: RetrySettings = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('max_retries' in table) {
    result.max_retries = validateNonNegative(table.max_retries, 'retry.max_retries');
    if (!Number.isInteger(result.max_retries)) {
      throw new ConfigParseError(
        `Invalid value for 'retry.max_retries': must be an integer, got ${String(result.max_retries)}`
      );
    }
  }
  if ('base_delay_ms' in table) {
    result.base_delay_ms = validateNonNegative(table.base_delay_ms, 'retry.base_delay_ms');
  }

  return result;
}

function parseCliSettings(raw: unknown, base: CliSettingsConfig): CliSettingsConfig {
  const table = sectionTable(raw, 'cli');
  const result: CliSettingsConfig = { ...base };
  if (table === undefined) {
    return result;
  }

  if ('colors' in table) {
    result.colors = validateBoolean(table.colors, 'cli.colors');
  }
  if ('welcome' in table) {
    result.welcome = validateBoolean(table.welcome, 'cli.welcome');
  }

  return result;
}

/**
 * Validates a raw configuration table section by section, merging the values
 * it sets over a base configuration.
 *
 * @param raw - Parsed TOML (or override) table.
 * @param base - Configuration the values are merged over.
 * @throws ConfigParseError for invalid field types or values.
 */
export function buildConfig(raw: Record<string, unknown>, base: Config = DEFAULT_CONFIG): Config {
  return {
    models: parseModelAssignments(raw.models, base.models),
    interview: parseInterview(raw.interview, base.interview),
    output: parseOutput(raw.output, base.output),
    claude: parseClaude(raw.claude, base.claude),
    retry: parseRetry(raw.retry, base.retry),
    cli: parseCliSettings(raw.cli, base.cli),
  };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [interview]
 * max_questions = 5
 * `);
 * config.interview.max_questions; // 5
 * config.models.planner_model; // "haiku"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return buildConfig(parsed);
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return buildConfig({});
}
