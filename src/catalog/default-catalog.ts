/**
 * Built-in interview questions.
 *
 * @packageDocumentation
 */

import { DEFAULT_FIELDS } from '../profile/fields.js';
import { QuestionCatalog } from './catalog.js';
import type { Question } from './types.js';

/**
 * Default question set. Essentials first, then refinements gated on what the
 * user has already told us.
 */
export const DEFAULT_QUESTIONS: readonly Question[] = [
  {
    id: 'intended_use',
    fields: ['intended_use'],
    priority: 100,
    prompt:
      'What will you mainly use your coding assistant for? (e.g. web apps, data analysis, homework, infrastructure)',
  },
  {
    id: 'primary_languages',
    fields: ['primary_languages'],
    priority: 95,
    prompt: 'Which programming languages do you work with most?',
    hint: 'Separate several languages with commas.',
  },
  {
    id: 'experience_level',
    fields: ['experience_level'],
    priority: 90,
    prompt: 'How would you describe your experience level: beginner, intermediate or advanced?',
    hint: 'You can also answer 1, 2 or 3.',
  },
  {
    id: 'current_project',
    fields: ['current_project'],
    priority: 80,
    prerequisite: { kind: 'answered', field: 'intended_use' },
    prompt: 'What are you working on right now for {{intended_use|your work}}?',
  },
  {
    id: 'testing_basics',
    fields: ['testing_approach'],
    priority: 65,
    prerequisite: { kind: 'matches', field: 'experience_level', anyOf: ['beginner'] },
    prompt:
      'Do you write tests yet, or would you like help getting started with testing in {{primary_languages|your code}}?',
  },
  {
    id: 'testing_approach',
    fields: ['testing_approach'],
    priority: 60,
    prerequisite: { kind: 'answered', field: 'primary_languages' },
    prompt: 'How do you approach testing in {{primary_languages}}? (frameworks, TDD, coverage goals)',
  },
  {
    id: 'coding_style',
    fields: ['coding_style'],
    priority: 55,
    prompt:
      'Any coding style preferences? (formatting, naming, functional vs object-oriented, comments)',
  },
  {
    id: 'tooling_preferences',
    fields: ['tooling_preferences'],
    priority: 50,
    prompt: 'Which tools are part of your daily setup? (editor, package manager, linters, CI)',
    hint: 'Separate several tools with commas.',
  },
  {
    id: 'workflow_process',
    fields: ['workflow_process'],
    priority: 45,
    prerequisite: {
      kind: 'any',
      of: [
        { kind: 'matches', field: 'experience_level', anyOf: ['intermediate', 'advanced'] },
        { kind: 'answered', field: 'current_project' },
      ],
    },
    prompt: 'How do you usually work day to day: branching, code review, commit style?',
  },
  {
    id: 'stack_overview',
    fields: ['tooling_preferences', 'workflow_process'],
    priority: 20,
    prompt: 'Briefly describe your toolchain and how a change goes from idea to merged.',
  },
];

/**
 * Creates the built-in catalog.
 */
export function createDefaultCatalog(): QuestionCatalog {
  return new QuestionCatalog({ fields: DEFAULT_FIELDS, questions: DEFAULT_QUESTIONS });
}
