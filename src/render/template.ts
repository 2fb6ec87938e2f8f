/**
 * Deterministic rules document built straight from the profile.
 *
 * @packageDocumentation
 */

import type { FieldDefinition } from '../profile/fields.js';
import type { ProfileSnapshot } from '../profile/store.js';
import { PARTIAL_PROFILE_NOTICE, type Renderer } from './types.js';

export const TEMPLATE_TITLE = '# Coding Assistant Rules';

const INTRO =
  'Assume industry-standard conventions for each language unless a rule below says otherwise.';

/**
 * Renders one section per field, in field declaration order. Unanswered
 * fields state their default assumption.
 *
 * @example
 * ```typescript
 * const text = renderRulesTemplate(snapshot, DEFAULT_FIELDS);
 * // # Coding Assistant Rules
 * //
 * // Assume industry-standard conventions ...
 * //
 * // ## Intended Use
 * // web apps
 * ```
 */
export function renderRulesTemplate(
  snapshot: ProfileSnapshot,
  fields: readonly FieldDefinition[]
): string {
  const parts = [TEMPLATE_TITLE];
  if (snapshot.partial) {
    parts.push(PARTIAL_PROFILE_NOTICE);
  }
  parts.push(INTRO);

  for (const field of fields) {
    const body = snapshot.isAnswered(field.name)
      ? snapshot.display(field.name)
      : `Default: ${field.defaultAssumption}`;
    parts.push(`## ${field.label}\n${body}`);
  }

  return parts.join('\n\n') + '\n';
}

/**
 * Renderer over {@link renderRulesTemplate}. Never calls a model.
 */
export class TemplateRenderer implements Renderer {
  constructor(private readonly fields: readonly FieldDefinition[]) {}

  render(snapshot: ProfileSnapshot): Promise<string> {
    return Promise.resolve(renderRulesTemplate(snapshot, this.fields));
  }
}
