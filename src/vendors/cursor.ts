/**
 * Cursor rules file (`.cursorrules`).
 *
 * @packageDocumentation
 */

import type { ProfileSnapshot } from '../profile/store.js';
import { GENERATOR_NAME, type VendorAdapter } from './types.js';

/**
 * Formats a date as YYYY-MM-DD in UTC.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Writes the prompt after a comment header summarising the profile.
 */
export class CursorAdapter implements VendorAdapter {
  readonly key = 'cursor';
  readonly vendorName = 'Cursor AI';
  readonly outputFilename = '.cursorrules';

  constructor(private readonly now: () => Date = () => new Date()) {}

  formatPrompt(prompt: string, snapshot: ProfileSnapshot): string {
    const profile = [
      snapshot.display('experience_level', 'Developer'),
      snapshot.display('primary_languages'),
    ]
      .filter((part) => part !== '')
      .join(' ');

    const header = [
      `# Generated with ${GENERATOR_NAME}`,
      `# Profile: ${profile}`,
      `# Generated on: ${formatDate(this.now())}`,
      `# Intended use: ${snapshot.display('intended_use', 'Coding assistance')}`,
    ];
    return `${header.join('\n')}\n\n${prompt}`;
  }
}
