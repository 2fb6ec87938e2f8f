/**
 * Planner module.
 *
 * @packageDocumentation
 */

export { Planner, DEFAULT_ADAPTIVE_TIMEOUT_MS } from './planner.js';
export type { PlannerOptions } from './planner.js';
export { ModelRouterSelector, UnavailableSelector, parseSelectionResponse } from './selectors.js';
export type { ModelRouterSelectorOptions } from './selectors.js';
export { extractJsonObject } from './json.js';
export { openFields, renderPlannerPrompts } from './prompts.js';
export type { PlannerPrompts } from './prompts.js';
export { selectionFailure } from './types.js';
export type {
  AdaptiveSelectionFailure,
  AdaptiveSelectionFailureKind,
  AdaptiveSelector,
  DecisionSource,
  PlannerDecision,
  SelectionRequest,
  SelectionResult,
} from './types.js';
