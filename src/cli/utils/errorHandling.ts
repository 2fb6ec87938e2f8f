/**
 * Shared error handling utilities for CLI commands.
 */

import { classifyError, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Runs a command handler and turns a thrown error into exit code 1, after
 * writing the message with suggestions through `writeError`.
 *
 * @returns The exit code.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  writeError: (text: string) => void,
  options: DisplayOptions = { colors: true }
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeError(formatErrorWithSuggestions(message, classifyError(error), options));
    return 1;
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with the resulting code.
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions = { colors: true }
): void {
  void (async () => {
    const exitCode = await runWithErrorHandling(
      fn,
      (text) => {
        process.stderr.write(text + '\n');
      },
      options
    );
    process.exit(exitCode);
  })();
}
