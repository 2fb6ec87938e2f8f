/**
 * Version command handler for the devprompt CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { OutputWriter } from '../../interview/cli.js';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version?: string };
    return typeof packageJson.version === 'string' ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

export function handleVersionCommand(writer: OutputWriter): CliCommandResult {
  writer.writeLine(`devprompt v${getVersion()}`);
  return { exitCode: 0 };
}
