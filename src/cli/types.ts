/**
 * CLI types and interfaces for devprompt.
 */

import type { InputReader, OutputWriter } from '../interview/cli.js';
import type { ModelRouter } from '../router/types.js';
import type { Config } from '../config/types.js';
import type { EnvRecord } from '../config/env.js';
import type { VendorRegistry } from '../vendors/registry.js';

/**
 * Display options shared by CLI formatters.
 */
export interface DisplayOptions {
  /** Whether to use colors in output. */
  colors: boolean;
}

/**
 * Options of the interview command, as parsed from argv.
 */
export interface CliOptions {
  /** Vendor key from `-o/--output-format`. */
  outputFormat?: string;
  /** Directory for the vendor file. */
  outputDir?: string;
  maxQuestions?: number;
  offline: boolean;
  /** TOML question catalog to load instead of the built-in one. */
  catalogPath?: string;
  configPath?: string;
  noWelcome: boolean;
  debug: boolean;
}

/**
 * Parsed command line.
 */
export type ParsedCommand =
  | { readonly command: 'interview'; readonly options: CliOptions }
  | { readonly command: 'vendors' }
  | { readonly command: 'help' }
  | { readonly command: 'version' };

/**
 * Side-effecting collaborators of the commands, injectable for tests.
 */
export interface CliDependencies {
  /** Writer for the interview and the final prompt. */
  writer: OutputWriter;
  /** Receives structured log lines. */
  logSink: (line: string) => void;
  createReader: () => Promise<InputReader>;
  /**
   * Connects to the model router.
   *
   * @throws ClaudeCodeNotInstalledError when the CLI is missing.
   */
  createRouter: (config: Config) => Promise<ModelRouter>;
  env: EnvRecord;
  /** Directory analyzed for project context. */
  cwd: string;
  now: () => Date;
  /** Vendors `--output-format` can name. */
  vendors: VendorRegistry;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}
