/**
 * Renderer types.
 *
 * @packageDocumentation
 */

import type { ProfileSnapshot } from '../profile/store.js';

/**
 * Turns a finished profile into the rules prompt handed to vendor adapters.
 */
export interface Renderer {
  render(snapshot: ProfileSnapshot): Promise<string>;
}

/**
 * Experience tier used to pick generator instructions.
 */
export type ExperienceTier = 'beginner' | 'intermediate' | 'advanced';

/**
 * Notice prepended to output rendered from an aborted interview.
 */
export const PARTIAL_PROFILE_NOTICE =
  '> Note: this profile is incomplete. The interview ended early, so unanswered preferences fall back to common defaults.';
