/**
 * Profile field definitions and answer values.
 *
 * A field is a named preference slot (e.g. `primary_languages`). Answers are
 * free-form text from the user, coerced into a tagged union according to the
 * field's declared shape. Coercion never fails: text that does not fit the
 * shape is kept as a `raw` answer.
 *
 * @packageDocumentation
 */

/**
 * Name of a profile field.
 */
export type FieldName = string;

/**
 * Declared shape of a field's value.
 */
export type FieldShape =
  | { readonly kind: 'text' }
  | { readonly kind: 'enum'; readonly choices: readonly string[] }
  | { readonly kind: 'list' };

/**
 * Static definition of a profile field.
 */
export interface FieldDefinition {
  /** Unique key of the field. */
  readonly name: FieldName;
  /** Human-readable label. */
  readonly label: string;
  /** Whether the interview should try to fill this field. */
  readonly required: boolean;
  /** Expected value shape. */
  readonly shape: FieldShape;
  /**
   * Industry-standard assumption used by renderers when the field is never
   * answered.
   */
  readonly defaultAssumption: string;
}

/** Free text answer. */
export interface TextAnswer {
  readonly kind: 'text';
  readonly text: string;
}

/** Answer matched to one of an enum field's choices. */
export interface ChoiceAnswer {
  readonly kind: 'choice';
  readonly choice: string;
  /** The text the user actually typed. */
  readonly raw: string;
}

/** Answer split into a list of items. */
export interface ListAnswer {
  readonly kind: 'list';
  readonly items: readonly string[];
}

/** Answer kept verbatim because it did not fit the field's shape. */
export interface RawAnswer {
  readonly kind: 'raw';
  readonly text: string;
}

/**
 * Tagged union of all answer values.
 */
export type AnswerValue = TextAnswer | ChoiceAnswer | ListAnswer | RawAnswer;

const LIST_SEPARATOR = /\s*(?:,|;|\n|&|\band\b)\s*/i;

/**
 * Matches an answer against enum choices.
 *
 * Accepts the choice itself (case-insensitive), its 1-based index, or text
 * that mentions exactly one choice as a whole word.
 */
function matchChoice(raw: string, choices: readonly string[]): string | undefined {
  const normalized = raw.toLowerCase();

  const exact = choices.find((choice) => choice.toLowerCase() === normalized);
  if (exact !== undefined) {
    return exact;
  }

  if (/^\d+$/.test(normalized)) {
    return choices[Number.parseInt(normalized, 10) - 1];
  }

  const mentioned = choices.filter((choice) =>
    new RegExp(`\\b${escapeRegExp(choice.toLowerCase())}\\b`).test(normalized)
  );
  return mentioned.length === 1 ? mentioned[0] : undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Coerces a free-text answer into an AnswerValue for the given shape.
 *
 * @param shape - The field's declared shape.
 * @param input - The user's answer.
 * @returns The coerced answer; `raw` when the text does not fit the shape.
 *
 * @example
 * ```typescript
 * coerceAnswer({ kind: 'list' }, 'TypeScript, Go and Rust');
 * // { kind: 'list', items: ['TypeScript', 'Go', 'Rust'] }
 * ```
 */
export function coerceAnswer(shape: FieldShape, input: string): AnswerValue {
  const text = input.trim();

  switch (shape.kind) {
    case 'text':
      return { kind: 'text', text };
    case 'list': {
      const items = text
        .split(LIST_SEPARATOR)
        .map((item) => item.trim())
        .filter((item) => item !== '');
      return items.length > 0 ? { kind: 'list', items } : { kind: 'raw', text };
    }
    case 'enum': {
      const choice = text === '' ? undefined : matchChoice(text, shape.choices);
      return choice !== undefined ? { kind: 'choice', choice, raw: text } : { kind: 'raw', text };
    }
  }
}

/**
 * Checks whether an answer carries no information.
 */
export function isEmptyAnswer(value: AnswerValue): boolean {
  switch (value.kind) {
    case 'text':
    case 'raw':
      return value.text.trim() === '';
    case 'choice':
      return value.choice.trim() === '';
    case 'list':
      return value.items.length === 0;
  }
}

/**
 * Formats an answer for display and prompt rendering.
 */
export function formatAnswer(value: AnswerValue): string {
  switch (value.kind) {
    case 'text':
    case 'raw':
      return value.text;
    case 'choice':
      return value.choice;
    case 'list':
      return value.items.join(', ');
  }
}

/**
 * Returns the text the user originally gave for an answer, which for a
 * choice answer may carry more detail than the matched choice.
 */
export function describeAnswer(value: AnswerValue): string {
  if (value.kind === 'choice' && value.raw.toLowerCase() !== value.choice.toLowerCase()) {
    return `${value.choice} (${value.raw})`;
  }
  return formatAnswer(value);
}

/**
 * Converts a field name to a display label (`primary_languages` → `primary languages`).
 */
export function humanizeFieldName(name: FieldName): string {
  return name.replace(/_/g, ' ');
}

/**
 * Fields collected by the default interview.
 *
 * The first three are essential; the rest refine the generated rules and
 * fall back to their default assumptions when left unanswered.
 */
export const DEFAULT_FIELDS: readonly FieldDefinition[] = [
  {
    name: 'intended_use',
    label: 'Intended Use',
    required: true,
    shape: { kind: 'text' },
    defaultAssumption: 'General day-to-day coding assistance',
  },
  {
    name: 'primary_languages',
    label: 'Primary Languages',
    required: true,
    shape: { kind: 'list' },
    defaultAssumption: 'Follow the conventions of whatever language the current file uses',
  },
  {
    name: 'experience_level',
    label: 'Experience Level',
    required: true,
    shape: { kind: 'enum', choices: ['beginner', 'intermediate', 'advanced'] },
    defaultAssumption: 'Intermediate: explain non-obvious decisions briefly',
  },
  {
    name: 'current_project',
    label: 'Current Project',
    required: false,
    shape: { kind: 'text' },
    defaultAssumption: 'No specific project context',
  },
  {
    name: 'coding_style',
    label: 'Coding Style',
    required: false,
    shape: { kind: 'text' },
    defaultAssumption:
      'Standard formatters and linters for each language (Prettier/ESLint, Black/flake8, gofmt/golangci-lint)',
  },
  {
    name: 'testing_approach',
    label: 'Testing Approach',
    required: false,
    shape: { kind: 'text' },
    defaultAssumption: 'Unit tests with the standard framework of each language for new behavior',
  },
  {
    name: 'tooling_preferences',
    label: 'Tooling Preferences',
    required: false,
    shape: { kind: 'list' },
    defaultAssumption: 'Git with the ecosystem-standard package manager and build tooling',
  },
  {
    name: 'workflow_process',
    label: 'Workflow Process',
    required: false,
    shape: { kind: 'text' },
    defaultAssumption: 'Feature branches with small, focused commits and pull request review',
  },
] as const;
