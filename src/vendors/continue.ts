/**
 * Continue rules file (`.continuerules`), a JSON document.
 *
 * @packageDocumentation
 */

import type { ProfileSnapshot } from '../profile/store.js';
import { GENERATOR_NAME, type VendorAdapter } from './types.js';

/**
 * Shape of the generated `.continuerules` document.
 */
export interface ContinueRules {
  systemMessage: string;
  generatedBy: string;
  profile: {
    languages: string;
    experience: string;
    project: string;
  };
}

export class ContinueAdapter implements VendorAdapter {
  readonly key = 'continue';
  readonly vendorName = 'Continue';
  readonly outputFilename = '.continuerules';

  formatPrompt(prompt: string, snapshot: ProfileSnapshot): string {
    const rules: ContinueRules = {
      systemMessage: prompt,
      generatedBy: GENERATOR_NAME,
      profile: {
        languages: snapshot.display('primary_languages'),
        experience: snapshot.display('experience_level'),
        project: snapshot.display('current_project'),
      },
    };
    return JSON.stringify(rules, null, 2) + '\n';
  }
}
