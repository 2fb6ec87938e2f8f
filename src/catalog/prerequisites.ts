/**
 * Prerequisite evaluation and prompt templating against a profile view.
 *
 * @packageDocumentation
 */

import { describeAnswer, formatAnswer, humanizeFieldName } from '../profile/fields.js';
import type { FieldName } from '../profile/fields.js';
import type { ProfileView } from '../profile/store.js';
import type { Prerequisite } from './types.js';

/**
 * Evaluates a prerequisite. An absent prerequisite always holds.
 *
 * @example
 * ```typescript
 * evaluatePrerequisite(
 *   { kind: 'matches', field: 'experience_level', anyOf: ['beginner'] },
 *   store
 * );
 * ```
 */
export function evaluatePrerequisite(
  prerequisite: Prerequisite | undefined,
  profile: ProfileView
): boolean {
  if (prerequisite === undefined) {
    return true;
  }

  switch (prerequisite.kind) {
    case 'answered':
      return profile.isAnswered(prerequisite.field);
    case 'matches': {
      const value = profile.get(prerequisite.field);
      if (value === undefined || !profile.isAnswered(prerequisite.field)) {
        return false;
      }
      const text = describeAnswer(value).toLowerCase();
      return prerequisite.anyOf.some((needle) => text.includes(needle.toLowerCase()));
    }
    case 'all':
      return prerequisite.of.every((nested) => evaluatePrerequisite(nested, profile));
    case 'any':
      return prerequisite.of.some((nested) => evaluatePrerequisite(nested, profile));
  }
}

/**
 * Collects every field a prerequisite refers to.
 */
export function prerequisiteFields(prerequisite: Prerequisite): FieldName[] {
  switch (prerequisite.kind) {
    case 'answered':
    case 'matches':
      return [prerequisite.field];
    case 'all':
    case 'any':
      return prerequisite.of.flatMap(prerequisiteFields);
  }
}

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*(?:\|([^}]*))?\}\}/g;

/**
 * Lists the field names referenced by placeholders in a prompt template.
 */
export function templateFields(template: string): FieldName[] {
  return [...template.matchAll(PLACEHOLDER)].map((match) => match[1] ?? '');
}

/**
 * Renders a prompt template against the current answers.
 *
 * Unanswered placeholders use their fallback text, or `your <field name>`
 * when none is given.
 *
 * @example
 * ```typescript
 * renderTemplate('How do you test {{primary_languages|your code}}?', store);
 * // "How do you test TypeScript, Go?"
 * ```
 */
export function renderTemplate(template: string, profile: ProfileView): string {
  return template.replace(PLACEHOLDER, (_match, field: string, fallback: string | undefined) => {
    const value = profile.get(field);
    if (value !== undefined && profile.isAnswered(field)) {
      return formatAnswer(value);
    }
    return fallback !== undefined ? fallback.trim() : `your ${humanizeFieldName(field)}`;
  });
}
