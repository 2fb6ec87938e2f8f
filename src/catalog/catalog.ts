/**
 * Static registry of interview questions.
 *
 * @packageDocumentation
 */

import type { FieldDefinition, FieldName } from '../profile/fields.js';
import { ProfileStore, type ProfileView } from '../profile/store.js';
import { evaluatePrerequisite, prerequisiteFields, renderTemplate, templateFields } from './prerequisites.js';
import type { CatalogDefinition, Question } from './types.js';

/**
 * Error raised when a catalog definition is invalid.
 */
export class CatalogParseError extends Error {
  /** Location of the failing entry, e.g. `questions[2].fields[0]`. */
  public readonly path: string;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  constructor(message: string, path: string, cause?: Error) {
    super(`${path}: ${message}`);
    this.name = 'CatalogParseError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Fallback ordering: priority descending, then id ascending.
 */
export function compareQuestions(a: Question, b: Question): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/**
 * Read-only question catalog, validated at construction.
 *
 * @example
 * ```typescript
 * const catalog = new QuestionCatalog({ fields: DEFAULT_FIELDS, questions });
 * const store = catalog.createStore();
 * const first = catalog.fallbackOrder(store)[0];
 * ```
 */
export class QuestionCatalog {
  readonly fields: readonly FieldDefinition[];
  readonly questions: readonly Question[];
  private readonly fieldsByName: ReadonlyMap<FieldName, FieldDefinition>;
  private readonly questionsById: ReadonlyMap<string, Question>;
  private readonly priorityOrder: readonly FieldName[];

  /**
   * @throws CatalogParseError when ids repeat, fields are unknown or priorities
   * are not finite numbers.
   */
  constructor(definition: CatalogDefinition) {
    this.fieldsByName = validateFields(definition.fields);
    this.questionsById = validateQuestions(definition.questions, this.fieldsByName);
    this.fields = Object.freeze([...definition.fields]);
    this.questions = Object.freeze([...definition.questions]);
    this.priorityOrder = computeFieldPriorityOrder(this.fields, this.questions);
  }

  /**
   * Lazily yields questions whose prerequisite holds and whose target fields
   * are not all answered, in declaration order. Each call re-reads the
   * profile.
   */
  *candidates(profile: ProfileView): Generator<Question, void, undefined> {
    for (const question of this.questions) {
      if (question.fields.every((field) => profile.isAnswered(field))) {
        continue;
      }
      if (evaluatePrerequisite(question.prerequisite, profile)) {
        yield question;
      }
    }
  }

  /**
   * Candidates sorted by priority descending, id ascending.
   */
  fallbackOrder(profile: ProfileView): Question[] {
    return [...this.candidates(profile)].sort(compareQuestions);
  }

  /**
   * Field names ordered by the highest priority of any question targeting
   * them. Ties keep declaration order; untargeted fields come last.
   */
  fieldPriorityOrder(): readonly FieldName[] {
    return this.priorityOrder;
  }

  get(id: string): Question | undefined {
    return this.questionsById.get(id);
  }

  has(id: string): boolean {
    return this.questionsById.has(id);
  }

  field(name: FieldName): FieldDefinition | undefined {
    return this.fieldsByName.get(name);
  }

  /**
   * Renders a question's prompt template against the current answers.
   */
  renderPrompt(question: Question, profile: ProfileView): string {
    return renderTemplate(question.prompt, profile);
  }

  /**
   * Creates an empty profile store over this catalog's fields.
   */
  createStore(): ProfileStore {
    return new ProfileStore({ fields: this.fields, priorityOrder: this.priorityOrder });
  }
}

function validateFields(fields: readonly FieldDefinition[]): Map<FieldName, FieldDefinition> {
  const byName = new Map<FieldName, FieldDefinition>();

  fields.forEach((field, index) => {
    const path = `fields[${String(index)}]`;
    if (field.name.trim() === '') {
      throw new CatalogParseError('field name must not be empty', `${path}.name`);
    }
    if (byName.has(field.name)) {
      throw new CatalogParseError(`duplicate field '${field.name}'`, `${path}.name`);
    }
    if (field.shape.kind === 'enum' && field.shape.choices.length === 0) {
      throw new CatalogParseError('enum field needs at least one choice', `${path}.choices`);
    }
    byName.set(field.name, field);
  });

  return byName;
}

function validateQuestions(
  questions: readonly Question[],
  fields: ReadonlyMap<FieldName, FieldDefinition>
): Map<string, Question> {
  const byId = new Map<string, Question>();

  questions.forEach((question, index) => {
    const path = `questions[${String(index)}]`;

    if (question.id.trim() === '') {
      throw new CatalogParseError('question id must not be empty', `${path}.id`);
    }
    if (byId.has(question.id)) {
      throw new CatalogParseError(`duplicate question id '${question.id}'`, `${path}.id`);
    }
    if (question.fields.length === 0) {
      throw new CatalogParseError('question must target at least one field', `${path}.fields`);
    }
    question.fields.forEach((field, fieldIndex) => {
      if (!fields.has(field)) {
        throw new CatalogParseError(
          `unknown field '${field}'`,
          `${path}.fields[${String(fieldIndex)}]`
        );
      }
    });
    if (!Number.isFinite(question.priority)) {
      throw new CatalogParseError(
        `priority must be a finite number, got ${String(question.priority)}`,
        `${path}.priority`
      );
    }
    if (question.prerequisite !== undefined) {
      for (const field of prerequisiteFields(question.prerequisite)) {
        if (!fields.has(field)) {
          throw new CatalogParseError(`unknown field '${field}'`, `${path}.prerequisite`);
        }
      }
    }
    for (const field of templateFields(question.prompt)) {
      if (!fields.has(field)) {
        throw new CatalogParseError(`unknown placeholder field '${field}'`, `${path}.prompt`);
      }
    }

    byId.set(question.id, question);
  });

  return byId;
}

function computeFieldPriorityOrder(
  fields: readonly FieldDefinition[],
  questions: readonly Question[]
): readonly FieldName[] {
  const best = new Map<FieldName, number>();
  for (const question of questions) {
    for (const field of question.fields) {
      const current = best.get(field);
      if (current === undefined || question.priority > current) {
        best.set(field, question.priority);
      }
    }
  }

  const targeted = fields
    .map((field, index) => ({ name: field.name, index, priority: best.get(field.name) }))
    .filter(
      (entry): entry is { name: FieldName; index: number; priority: number } =>
        entry.priority !== undefined
    )
    .sort((a, b) => (a.priority !== b.priority ? b.priority - a.priority : a.index - b.index))
    .map((entry) => entry.name);

  const untargeted = fields.map((field) => field.name).filter((name) => !best.has(name));

  return Object.freeze([...targeted, ...untargeted]);
}
