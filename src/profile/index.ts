/**
 * Profile module: field definitions, answer values and the profile store.
 *
 * @packageDocumentation
 */

export {
  coerceAnswer,
  describeAnswer,
  formatAnswer,
  humanizeFieldName,
  isEmptyAnswer,
  DEFAULT_FIELDS,
} from './fields.js';
export type {
  AnswerValue,
  ChoiceAnswer,
  FieldDefinition,
  FieldName,
  FieldShape,
  ListAnswer,
  RawAnswer,
  TextAnswer,
} from './fields.js';

export { ProfileSnapshot, ProfileStore } from './store.js';
export type { ProfileStoreOptions, ProfileView } from './store.js';
