/**
 * Configuration types for devprompt.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Model role aliases mapped to Claude Code model identifiers.
 */
export interface ModelAssignments {
  /** Model that picks and phrases the next interview question. */
  planner_model: string;
  /** Model that writes the final rules prompt. */
  generator_model: string;
}

/**
 * Interview loop settings.
 */
export interface InterviewConfig {
  /** Upper bound on counted questions (answered or skipped). */
  max_questions: number;
  /** Time budget for one adaptive selection call, in milliseconds. */
  adaptive_timeout_ms: number;
  /** Enables experience-aware early stopping and lowered caps. */
  adaptive_stopping: boolean;
  /** Skips every model call: deterministic questions and template output. */
  offline: boolean;
}

/**
 * Output settings.
 */
export interface OutputConfig {
  /** Vendor key to write (cursor, continue, aider); empty prints to stdout. */
  vendor: string;
  /** Directory the vendor file is written to. */
  directory: string;
}

/**
 * Claude Code CLI settings.
 */
export interface ClaudeConfig {
  /** Path or name of the claude executable. */
  executable: string;
  /** Default subprocess timeout in milliseconds. */
  timeout_ms: number;
}

/**
 * Retry settings for prompt generation.
 */
export interface RetrySettings {
  max_retries: number;
  base_delay_ms: number;
}

/**
 * Terminal presentation settings.
 */
export interface CliSettingsConfig {
  /** Enable ANSI colors. */
  colors: boolean;
  /** Show the welcome banner before the interview. */
  welcome: boolean;
}

/**
 * Complete configuration for devprompt.
 */
export interface Config {
  models: ModelAssignments;
  interview: InterviewConfig;
  output: OutputConfig;
  claude: ClaudeConfig;
  retry: RetrySettings;
  cli: CliSettingsConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export type PartialConfig = {
  [K in keyof Config]?: Partial<Config[K]>;
};
