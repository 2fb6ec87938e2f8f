/**
 * Default configuration values for devprompt.toml.
 *
 * @packageDocumentation
 */

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
 * Default model assignments. The planner runs on every question, so it uses
 * the fastest model.
 */
export const DEFAULT_MODEL_ASSIGNMENTS: ModelAssignments = {
  planner_model: 'haiku',
  generator_model: 'sonnet',
};

export const DEFAULT_INTERVIEW: InterviewConfig = {
  max_questions: 8,
  adaptive_timeout_ms: 20000,
  adaptive_stopping: false,
  offline: false,
};

export const DEFAULT_OUTPUT: OutputConfig = {
  vendor: '',
  directory: '.',
};

export const DEFAULT_CLAUDE: ClaudeConfig = {
  executable: 'claude',
  timeout_ms: 120000,
};

export const DEFAULT_RETRY: RetrySettings = {
  max_retries: 2,
  base_delay_ms: 1000,
};

export const DEFAULT_CLI_CONFIG: CliSettingsConfig = {
  colors: true,
  welcome: true,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  models: DEFAULT_MODEL_ASSIGNMENTS,
  interview: DEFAULT_INTERVIEW,
  output: DEFAULT_OUTPUT,
  claude: DEFAULT_CLAUDE,
  retry: DEFAULT_RETRY,
  cli: DEFAULT_CLI_CONFIG,
};
