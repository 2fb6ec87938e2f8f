/**
 * Profile Store: the evolving set of answered fields.
 *
 * The interview loop is the only mutator. Renderers and vendor adapters only
 * ever see a {@link ProfileSnapshot}, which is a frozen copy.
 *
 * @packageDocumentation
 */

import {
  coerceAnswer,
  formatAnswer,
  isEmptyAnswer,
  type AnswerValue,
  type FieldDefinition,
  type FieldName,
  type ListAnswer,
} from './fields.js';

/**
 * Read-only view over profile answers, shared by the live store and snapshots.
 * Prerequisites and prompt templates are evaluated against this view.
 */
export interface ProfileView {
  /** Returns the answer for a field, if any. */
  get(field: FieldName): AnswerValue | undefined;
  /** True when the field has a non-empty answer. */
  isAnswered(field: FieldName): boolean;
  /** Answered field names in answer order (most recent last). */
  answeredFields(): readonly FieldName[];
}

// Stored answers are frozen copies so neither callers nor snapshots can alter them
function freezeAnswer(value: AnswerValue): AnswerValue {
  if (value.kind === 'list') {
    const list: ListAnswer = { kind: 'list', items: Object.freeze([...value.items]) };
    return Object.freeze(list);
  }
  return Object.freeze({ ...value });
}

/**
 * Immutable copy of a profile, handed to renderers and vendor adapters.
 */
export class ProfileSnapshot implements ProfileView {
  private readonly values: ReadonlyMap<FieldName, AnswerValue>;
  /** Field names in the order they were (last) answered. */
  readonly order: readonly FieldName[];
  /** True when the interview was aborted before completion. */
  readonly partial: boolean;

  constructor(
    values: ReadonlyMap<FieldName, AnswerValue>,
    order: readonly FieldName[],
    partial: boolean
  ) {
    this.values = new Map(values);
    this.order = Object.freeze([...order]);
    this.partial = partial;
    Object.freeze(this);
  }

  get(field: FieldName): AnswerValue | undefined {
    return this.values.get(field);
  }

  isAnswered(field: FieldName): boolean {
    const value = this.values.get(field);
    return value !== undefined && !isEmptyAnswer(value);
  }

  answeredFields(): readonly FieldName[] {
    return this.order.filter((field) => this.isAnswered(field));
  }

  /** Stored entries in answer order, including empty ones. */
  entries(): [FieldName, AnswerValue][] {
    const entries: [FieldName, AnswerValue][] = [];
    for (const field of this.order) {
      const value = this.values.get(field);
      if (value !== undefined) {
        entries.push([field, value]);
      }
    }
    return entries;
  }

  /**
   * Returns the display text of a field's answer.
   *
   * @param field - The field name.
   * @param fallback - Text returned when the field is unanswered.
   */
  display(field: FieldName, fallback = ''): string {
    const value = this.values.get(field);
    return value !== undefined && !isEmptyAnswer(value) ? formatAnswer(value) : fallback;
  }

  /**
   * Converts answered fields to a plain record of display strings, in answer
   * order. Used for serialization into prompts and vendor files.
   */
  toRecord(): Readonly<Record<string, string>> {
    return Object.fromEntries(
      this.answeredFields().map((field) => [field, this.display(field)] as const)
    );
  }
}

/**
 * Options for creating a ProfileStore.
 */
export interface ProfileStoreOptions {
  /** Field definitions used for shape coercion and required checks. */
  readonly fields: readonly FieldDefinition[];
  /**
   * Field names in question-catalog priority order. Fields missing from this
   * list follow in declaration order.
   */
  readonly priorityOrder?: readonly FieldName[];
}

/**
 * Mutable store of profile answers.
 *
 * @example
 * ```typescript
 * const store = new ProfileStore({ fields: DEFAULT_FIELDS });
 * store.merge('primary_languages', 'TypeScript, Go');
 * store.merge('primary_languages', 'Rust'); // overwrites
 * store.snapshot().display('primary_languages'); // "Rust"
 * ```
 */
export class ProfileStore implements ProfileView {
  private readonly fields: ReadonlyMap<FieldName, FieldDefinition>;
  private readonly requiredOrder: readonly FieldName[];
  private readonly values = new Map<FieldName, AnswerValue>();
  private order: FieldName[] = [];

  constructor(options: ProfileStoreOptions) {
    this.fields = new Map(options.fields.map((field) => [field.name, field] as const));

    const ordered = [...(options.priorityOrder ?? [])].filter((name) => this.fields.has(name));
    for (const field of options.fields) {
      if (!ordered.includes(field.name)) {
        ordered.push(field.name);
      }
    }
    this.requiredOrder = ordered.filter((name) => this.fields.get(name)?.required === true);
  }

  /**
   * Inserts or overwrites the value of a field.
   *
   * A string is coerced through the field's declared shape; text that does not
   * fit (or an unknown field) is stored as a raw answer.
   *
   * @param field - The field name.
   * @param value - The answer value or free text.
   * @returns The stored value.
   */
  merge(field: FieldName, value: AnswerValue | string): AnswerValue {
    const stored = freezeAnswer(typeof value === 'string' ? this.coerce(field, value) : value);

    this.values.set(field, stored);
    this.order = this.order.filter((name) => name !== field);
    this.order.push(field);

    return stored;
  }

  get(field: FieldName): AnswerValue | undefined {
    return this.values.get(field);
  }

  has(field: FieldName): boolean {
    return this.values.has(field);
  }

  isAnswered(field: FieldName): boolean {
    const value = this.values.get(field);
    return value !== undefined && !isEmptyAnswer(value);
  }

  answeredFields(): readonly FieldName[] {
    return this.order.filter((field) => this.isAnswered(field));
  }

  /** Number of stored entries, including empty ones. */
  get size(): number {
    return this.values.size;
  }

  /**
   * True iff every required field has a non-empty answer.
   */
  isRequiredComplete(): boolean {
    return this.requiredOrder.every((field) => this.isAnswered(field));
  }

  /**
   * Required fields without a non-empty answer, in catalog priority order.
   */
  unansweredRequiredFields(): readonly FieldName[] {
    return this.requiredOrder.filter((field) => !this.isAnswered(field));
  }

  /**
   * Returns an immutable copy of the current answers.
   *
   * @param options - `partial` marks a snapshot taken from an aborted interview.
   */
  snapshot(options: { partial?: boolean } = {}): ProfileSnapshot {
    return new ProfileSnapshot(this.values, this.order, options.partial ?? false);
  }

  private coerce(field: FieldName, text: string): AnswerValue {
    const definition = this.fields.get(field);
    if (definition === undefined) {
      return { kind: 'raw', text: text.trim() };
    }
    return coerceAnswer(definition.shape, text);
  }
}
