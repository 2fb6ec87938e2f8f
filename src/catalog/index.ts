/**
 * Question catalog module.
 *
 * @packageDocumentation
 */

export { CatalogParseError, QuestionCatalog, compareQuestions } from './catalog.js';
export { DEFAULT_QUESTIONS, createDefaultCatalog } from './default-catalog.js';
export {
  evaluatePrerequisite,
  prerequisiteFields,
  renderTemplate,
  templateFields,
} from './prerequisites.js';
export { loadCatalogFile, parseCatalogToml } from './toml.js';
export type { CatalogDefinition, Prerequisite, Question } from './types.js';
