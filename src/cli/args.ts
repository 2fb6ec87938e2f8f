/**
 * Command line parsing for devprompt.
 */

import { getEnvVarDocumentation } from '../config/env.js';
import type { CliOptions, ParsedCommand } from './types.js';

/**
 * Error thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Parses argv (without the node and script entries).
 *
 * @example
 * ```typescript
 * parseCliArgs(['-o', 'cursor', '--offline']);
 * // { command: 'interview', options: { outputFormat: 'cursor', offline: true, ... } }
 * ```
 *
 * @throws CliUsageError on unknown flags, missing values or bad numbers.
 */
export function parseCliArgs(args: readonly string[]): ParsedCommand {
  const first = args[0];
  if (first === 'vendors') {
    return { command: 'vendors' };
  }
  if (first === 'help') {
    return { command: 'help' };
  }
  if (first === 'version') {
    return { command: 'version' };
  }

  const options: CliOptions = { offline: false, noWelcome: false, debug: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { command: 'help' };
      case '-v':
      case '--version':
        return { command: 'version' };
      case '-o':
      case '--output-format':
        options.outputFormat = requireValue(args, i, arg);
        i++;
        break;
      case '--output-dir':
        options.outputDir = requireValue(args, i, arg);
        i++;
        break;
      case '--max-questions':
        options.maxQuestions = parsePositiveInteger(requireValue(args, i, arg), arg);
        i++;
        break;
      case '--catalog':
        options.catalogPath = requireValue(args, i, arg);
        i++;
        break;
      case '--config':
        options.configPath = requireValue(args, i, arg);
        i++;
        break;
      case '--offline':
        options.offline = true;
        break;
      case '--no-welcome':
        options.noWelcome = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      default:
        throw new CliUsageError(
          arg?.startsWith('-') === true ? `Unknown option: ${arg}` : `Unknown command: ${String(arg)}`
        );
    }
  }

  return { command: 'interview', options };
}

/**
 * Usage text printed by `--help`.
 */
export function helpText(version: string): string {
  return `
devprompt v${version}

Interviews you about how you code and writes the answers as rules for your
coding assistant.

USAGE:
  devprompt [options]
  devprompt vendors

OPTIONS:
  -o, --output-format <vendor>  Write a rules file for a vendor (cursor, continue, aider)
  --output-dir <dir>            Directory for the rules file (default: .)
  --max-questions <n>           Maximum number of questions
  --offline                     Skip model calls: built-in question order and template output
  --catalog <file>              Load questions from a TOML catalog
  --config <file>               Config file (default: devprompt.toml when present)
  --no-welcome                  Skip the welcome banner
  --debug                       Write debug logs to stderr
  -h, --help                    Show this help
  -v, --version                 Show version information

COMMANDS:
  vendors                       List supported vendors

ENVIRONMENT:
${environmentHelp()}

EXAMPLES:
  devprompt
  devprompt -o cursor
  devprompt --offline --max-questions 5 -o aider --output-dir ~/project
`;
}

function environmentHelp(): string {
  return Object.entries(getEnvVarDocumentation())
    .map(([name, doc]) => `  ${name} (${doc.type})\n      ${doc.description}`)
    .join('\n');
}
