/**
 * Question catalog types.
 *
 * @packageDocumentation
 */

import type { FieldDefinition, FieldName } from '../profile/fields.js';

/**
 * Data-driven condition on the profile that must hold before a question is
 * eligible.
 *
 * - `answered`: the field has a non-empty answer
 * - `matches`: the field is answered and its text mentions one of `anyOf`
 *   (case-insensitive substring)
 * - `all` / `any`: conjunction / disjunction of nested prerequisites
 */
export type Prerequisite =
  | { readonly kind: 'answered'; readonly field: FieldName }
  | { readonly kind: 'matches'; readonly field: FieldName; readonly anyOf: readonly string[] }
  | { readonly kind: 'all'; readonly of: readonly Prerequisite[] }
  | { readonly kind: 'any'; readonly of: readonly Prerequisite[] };

/**
 * A catalog question.
 */
export interface Question {
  /** Unique question id. */
  readonly id: string;
  /** Profile fields an answer to this question fills (at least one). */
  readonly fields: readonly FieldName[];
  /** Fallback ordering key; higher is asked first. */
  readonly priority: number;
  /** Condition that must hold for the question to be eligible. */
  readonly prerequisite?: Prerequisite;
  /**
   * Prompt template. `{{field}}` and `{{field|fallback}}` placeholders are
   * filled from the current answers.
   */
  readonly prompt: string;
  /** Short hint shown under the question. */
  readonly hint?: string;
}

/**
 * Input for building a QuestionCatalog.
 */
export interface CatalogDefinition {
  readonly fields: readonly FieldDefinition[];
  readonly questions: readonly Question[];
}
