/**
 * Loads question catalogs from TOML.
 *
 * @example
 * ```toml
 * [[fields]]
 * name = "primary_languages"
 * label = "Primary Languages"
 * required = true
 * shape = "list"
 * default = "Follow the conventions of the current file"
 *
 * [[questions]]
 * id = "languages"
 * fields = ["primary_languages"]
 * priority = 90
 * prompt = "Which languages do you use?"
 *
 * [questions.prerequisite]
 * answered = "intended_use"
 * ```
 *
 * A prerequisite table holds exactly one of `answered = "<field>"`,
 * `matches = { field = "<field>", any_of = [...] }`, `all = [...]` or
 * `any = [...]`. When no `[[fields]]` are given the default fields are used.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_FIELDS, type FieldDefinition, type FieldShape } from '../profile/fields.js';
import { safeReadFile } from '../utils/safe-fs.js';
import { CatalogParseError, QuestionCatalog } from './catalog.js';
import type { Prerequisite, Question } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new CatalogParseError(`expected string, got ${typeof value}`, path);
  }
  return value;
}

function expectStringArray(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new CatalogParseError(`expected array of strings, got ${typeof value}`, path);
  }
  return value.map((item, index) => expectString(item, `${path}[${String(index)}]`));
}

function expectTableArray(value: unknown, path: string): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    throw new CatalogParseError(`expected array of tables, got ${typeof value}`, path);
  }
  return value.map((item, index) => {
    if (!isRecord(item)) {
      throw new CatalogParseError(`expected table, got ${typeof item}`, `${path}[${String(index)}]`);
    }
    return item;
  });
}

function parseShape(raw: Record<string, unknown>, path: string): FieldShape {
  const kind = raw.shape === undefined ? 'text' : expectString(raw.shape, `${path}.shape`);
  switch (kind) {
    case 'text':
      return { kind: 'text' };
    case 'list':
      return { kind: 'list' };
    case 'enum':
      return { kind: 'enum', choices: expectStringArray(raw.choices, `${path}.choices`) };
    default:
      throw new CatalogParseError(
        `unknown shape '${kind}', expected one of: text, enum, list`,
        `${path}.shape`
      );
  }
}

function parseField(raw: Record<string, unknown>, path: string): FieldDefinition {
  const name = expectString(raw.name, `${path}.name`);
  let required = false;
  if (raw.required !== undefined) {
    if (typeof raw.required !== 'boolean') {
      throw new CatalogParseError(`expected boolean, got ${typeof raw.required}`, `${path}.required`);
    }
    required = raw.required;
  }

  return {
    name,
    label: raw.label === undefined ? name : expectString(raw.label, `${path}.label`),
    required,
    shape: parseShape(raw, path),
    defaultAssumption:
      raw.default === undefined ? 'Not specified' : expectString(raw.default, `${path}.default`),
  };
}

function parsePrerequisite(raw: unknown, path: string): Prerequisite {
  if (!isRecord(raw)) {
    throw new CatalogParseError(`expected table, got ${typeof raw}`, path);
  }
  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    throw new CatalogParseError(
      `expected exactly one of answered, matches, all, any; got ${keys.length === 0 ? 'none' : keys.join(', ')}`,
      path
    );
  }

  if ('answered' in raw) {
    return { kind: 'answered', field: expectString(raw.answered, `${path}.answered`) };
  }
  if ('matches' in raw) {
    const matches = raw.matches;
    if (!isRecord(matches)) {
      throw new CatalogParseError(`expected table, got ${typeof matches}`, `${path}.matches`);
    }
    return {
      kind: 'matches',
      field: expectString(matches.field, `${path}.matches.field`),
      anyOf: expectStringArray(matches.any_of, `${path}.matches.any_of`),
    };
  }
  if ('all' in raw || 'any' in raw) {
    const kind = 'all' in raw ? 'all' : 'any';
    const nested = expectTableArray(raw[kind], `${path}.${kind}`);
    if (nested.length === 0) {
      throw new CatalogParseError('expected at least one nested prerequisite', `${path}.${kind}`);
    }
    return {
      kind,
      of: nested.map((item, index) => parsePrerequisite(item, `${path}.${kind}[${String(index)}]`)),
    };
  }

  throw new CatalogParseError(`unknown prerequisite '${keys.join(', ')}'`, path);
}

function parseQuestion(raw: Record<string, unknown>, path: string): Question {
  if (typeof raw.priority !== 'number') {
    throw new CatalogParseError(`expected number, got ${typeof raw.priority}`, `${path}.priority`);
  }

  const question: Question = {
    id: expectString(raw.id, `${path}.id`),
    fields: expectStringArray(raw.fields, `${path}.fields`),
    priority: raw.priority,
    prompt: expectString(raw.prompt, `${path}.prompt`),
  };

  return {
    ...question,
    ...(raw.prerequisite !== undefined && {
      prerequisite: parsePrerequisite(raw.prerequisite, `${path}.prerequisite`),
    }),
    ...(raw.hint !== undefined && { hint: expectString(raw.hint, `${path}.hint`) }),
  };
}

/**
 * Parses a TOML catalog into a validated QuestionCatalog.
 *
 * @param tomlContent - TOML source.
 * @throws CatalogParseError for invalid syntax, wrong value types or a catalog
 * that fails validation.
 */
export function parseCatalogToml(tomlContent: string): QuestionCatalog {
  let parsed: unknown;
  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new CatalogParseError(`Invalid TOML syntax: ${cause.message}`, '<root>', cause);
  }
  if (!isRecord(parsed)) {
    throw new CatalogParseError('expected a table', '<root>');
  }

  const fields =
    parsed.fields === undefined
      ? DEFAULT_FIELDS
      : expectTableArray(parsed.fields, 'fields').map((raw, index) =>
          parseField(raw, `fields[${String(index)}]`)
        );

  if (parsed.questions === undefined) {
    throw new CatalogParseError('catalog defines no questions', 'questions');
  }
  const questions = expectTableArray(parsed.questions, 'questions').map((raw, index) =>
    parseQuestion(raw, `questions[${String(index)}]`)
  );

  return new QuestionCatalog({ fields, questions });
}

/**
 * Reads and parses a TOML catalog file.
 *
 * @param filePath - Path to the catalog file.
 * @throws CatalogParseError when the file cannot be read or parsed.
 */
export async function loadCatalogFile(filePath: string): Promise<QuestionCatalog> {
  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new CatalogParseError(`Cannot read catalog file: ${cause.message}`, filePath, cause);
  }
  return parseCatalogToml(content);
}
