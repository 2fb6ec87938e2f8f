#!/usr/bin/env node

/**
 * devprompt CLI entry point.
 */

import { createReadlineReader, defaultOutputWriter } from '../interview/cli.js';
import { createClaudeCodeClient } from '../router/claude-code-client.js';
import { createDefaultVendorRegistry } from '../vendors/registry.js';
import { CliUsageError, helpText, parseCliArgs } from './args.js';
import { handleInterviewCommand } from './commands/interview.js';
import { handleVendorsCommand } from './commands/vendors.js';
import { getVersion, handleVersionCommand } from './commands/version.js';
import type { CliDependencies, ParsedCommand } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Production collaborators: terminal IO, the Claude Code client and the
 * process environment.
 */
export function createDefaultDependencies(): CliDependencies {
  const now = (): Date => new Date();
  return {
    writer: defaultOutputWriter,
    logSink: (line) => {
      process.stderr.write(line);
    },
    createReader: createReadlineReader,
    createRouter: (config) =>
      createClaudeCodeClient({
        models: config.models,
        executablePath: config.claude.executable,
        timeoutMs: config.claude.timeout_ms,
      }),
    env: process.env,
    cwd: process.cwd(),
    now,
    vendors: createDefaultVendorRegistry(now),
  };
}

function parseOrExit(args: readonly string[]): ParsedCommand {
  try {
    return parseCliArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`Error: ${error.message}\n\nRun "devprompt --help" for usage information.\n`);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const parsed = parseOrExit(process.argv.slice(2));

  switch (parsed.command) {
    case 'help':
      defaultOutputWriter.writeLine(helpText(getVersion()));
      process.exit(0);
      break;
    case 'version':
      withErrorHandling(() => handleVersionCommand(defaultOutputWriter));
      break;
    case 'vendors':
      withErrorHandling(() =>
        handleVendorsCommand(defaultOutputWriter, createDefaultDependencies().vendors)
      );
      break;
    case 'interview':
      withErrorHandling(() =>
        handleInterviewCommand(parsed.options, createDefaultDependencies())
      );
      break;
  }
}

main();
