/**
 * Error suggestion system for the devprompt CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { CatalogParseError } from '../catalog/catalog.js';
import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { ClaudeCodeNotInstalledError } from '../router/claude-code-client.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { UnknownVendorError } from '../vendors/types.js';
import { CliUsageError } from './args.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types the CLI reports.
 */
export type ErrorType =
  | 'usage'
  | 'config'
  | 'catalog'
  | 'unknown_vendor'
  | 'claude_unavailable'
  | 'file_system'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [{ text: 'See the available options', action: 'devprompt --help' }],
  config: [
    { text: 'Check devprompt.toml for typos and value types' },
    { text: 'Check DEVPROMPT_* environment variables' },
  ],
  catalog: [{ text: 'Check the question catalog passed with --catalog' }],
  unknown_vendor: [{ text: 'List the supported vendors', action: 'devprompt vendors' }],
  claude_unavailable: [
    { text: 'Install the Claude Code CLI and make sure it is on your PATH' },
    { text: 'Or run without model calls', action: 'devprompt --offline' },
  ],
  file_system: [{ text: 'Check that the output directory is writable', action: '--output-dir <dir>' }],
  unknown: [{ text: 'Re-run with debug logging', action: 'devprompt --debug' }],
};

/**
 * Maps an error to the type used for suggestions.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (error instanceof ConfigParseError || error instanceof EnvCoercionError) {
    return 'config';
  }
  if (error instanceof CatalogParseError) {
    return 'catalog';
  }
  if (error instanceof UnknownVendorError) {
    return 'unknown_vendor';
  }
  if (error instanceof ClaudeCodeNotInstalledError) {
    return 'claude_unavailable';
  }
  if (
    error instanceof PathValidationError ||
    (error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'ENOENT'))
  ) {
    return 'file_system';
  }
  return 'unknown';
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param errorType - Type selecting the suggestions.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  errorType: ErrorType,
  options: DisplayOptions = { colors: true }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  const lines = [`${redCode}Error:${resetCode} ${errorMessage}`, '', `${boldCode}Suggestions:${resetCode}`];
  ERROR_SUGGESTIONS[errorType].forEach((suggestion, i) => {
    lines.push(formatSuggestion(suggestion, i + 1, options));
  });
  return lines.join('\n');
}
