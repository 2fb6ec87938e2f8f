/**
 * Project context detection module.
 *
 * @packageDocumentation
 */

export {
  EMPTY_PROJECT_CONTEXT,
  analyzeProjectContext,
  getProjectSummary,
  requirementName,
  shouldEnhanceQuestions,
} from './analyzer.js';
export type { AnalyzeOptions, ProjectContext } from './analyzer.js';
