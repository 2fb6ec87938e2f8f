/**
 * Aider configuration file (`.aider.conf.yml`).
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import type { ProfileSnapshot } from '../profile/store.js';
import { GENERATOR_NAME, type VendorAdapter } from './types.js';

export class AiderAdapter implements VendorAdapter {
  readonly key = 'aider';
  readonly vendorName = 'Aider';
  readonly outputFilename = '.aider.conf.yml';

  formatPrompt(prompt: string, snapshot: ProfileSnapshot): string {
    const header = [
      `# Generated with ${GENERATOR_NAME}`,
      `# Profile: ${snapshot.display('experience_level', 'Developer')}`,
      `# Languages: ${snapshot.display('primary_languages')}`,
    ];
    const body = yaml.dump(
      {
        'system-message': prompt,
        'auto-commits': false,
        'dirty-commits': true,
      },
      { lineWidth: -1 }
    );
    return `${header.join('\n')}\n\n${body}`;
  }
}
