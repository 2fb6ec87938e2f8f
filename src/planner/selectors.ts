/**
 * Adaptive selector implementations.
 *
 * @packageDocumentation
 */

import type { ProjectContext } from '../project-context/analyzer.js';
import type { ModelRouter } from '../router/types.js';
import { extractJsonObject } from './json.js';
import { renderPlannerPrompts } from './prompts.js';
import {
  selectionFailure,
  type AdaptiveSelector,
  type SelectionRequest,
  type SelectionResult,
} from './types.js';

/**
 * Selector used in offline mode. Every attempt fails with `unavailable`, so
 * the planner always takes the fallback ordering.
 */
export class UnavailableSelector implements AdaptiveSelector {
  attemptSelect(): Promise<SelectionResult> {
    return Promise.resolve(selectionFailure('unavailable', 'adaptive selection is disabled'));
  }
}

/**
 * Options for ModelRouterSelector.
 */
export interface ModelRouterSelectorOptions {
  /** Router used with the `planner` alias. */
  readonly router: ModelRouter;
  /** Detected project setup, included in the system prompt. */
  readonly projectContext?: ProjectContext;
}

/**
 * Parses a planner response of the form `{"question_id": "...", "question": "..."}`.
 */
export function parseSelectionResponse(content: string): SelectionResult {
  const data = extractJsonObject(content);
  if (data === undefined) {
    return selectionFailure('malformed_response', 'response contains no JSON object');
  }

  const questionId = data['question_id'];
  if (typeof questionId !== 'string' || questionId.trim() === '') {
    return selectionFailure('malformed_response', "response has no string 'question_id'");
  }

  const phrasing = data['question'];
  if (typeof phrasing === 'string' && phrasing.trim() !== '') {
    return { ok: true, questionId: questionId.trim(), phrasing: phrasing.trim() };
  }
  return { ok: true, questionId: questionId.trim() };
}

/**
 * Selector that asks the planner model to pick among the candidates.
 *
 * @example
 * ```typescript
 * const selector = new ModelRouterSelector({ router: client, projectContext });
 * const planner = new Planner({ catalog, selector, timeoutMs: 20000 });
 * ```
 */
export class ModelRouterSelector implements AdaptiveSelector {
  private readonly router: ModelRouter;
  private readonly projectContext: ProjectContext | undefined;

  constructor(options: ModelRouterSelectorOptions) {
    this.router = options.router;
    this.projectContext = options.projectContext;
  }

  async attemptSelect(request: SelectionRequest, signal: AbortSignal): Promise<SelectionResult> {
    const prompts = renderPlannerPrompts(request, this.projectContext);

    const result = await this.router.complete({
      modelAlias: 'planner',
      prompt: prompts.user,
      parameters: { systemPrompt: prompts.system },
      signal,
    });

    if (!result.success) {
      const kind = result.error.kind === 'TimeoutError' ? 'timeout' : 'call_error';
      return selectionFailure(kind, `${result.error.kind}: ${result.error.message}`);
    }

    return parseSelectionResponse(result.response.content);
  }
}
