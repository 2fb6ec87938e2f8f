/**
 * Planner types.
 *
 * @packageDocumentation
 */

import type { Question } from '../catalog/types.js';
import type { ProfileSnapshot } from '../profile/store.js';

/**
 * Why an adaptive selection attempt did not produce a usable question.
 *
 * - `unavailable`: no selector is configured (offline mode)
 * - `call_error`: the model call failed
 * - `timeout`: the call did not finish within the planner timeout
 * - `malformed_response`: the response had no usable JSON selection
 * - `unknown_candidate`: the chosen id is not among the candidates
 */
export type AdaptiveSelectionFailureKind =
  | 'unavailable'
  | 'call_error'
  | 'timeout'
  | 'malformed_response'
  | 'unknown_candidate';

/**
 * An absorbed adaptive selection failure. Never shown to the user.
 */
export interface AdaptiveSelectionFailure {
  readonly kind: AdaptiveSelectionFailureKind;
  readonly message: string;
  /** The id returned by the selector, for `unknown_candidate`. */
  readonly questionId?: string;
}

/**
 * Input to an adaptive selection attempt.
 */
export interface SelectionRequest {
  /** Frozen copy of the profile at the time of the call. */
  readonly snapshot: ProfileSnapshot;
  /** Eligible questions, in fallback order. */
  readonly candidates: readonly Question[];
  /** Ids already asked this session. */
  readonly askedIds: readonly string[];
}

/**
 * Outcome of an adaptive selection attempt.
 */
export type SelectionResult =
  | {
      readonly ok: true;
      readonly questionId: string;
      /** Model-written question text replacing the catalog prompt. */
      readonly phrasing?: string;
    }
  | { readonly ok: false; readonly failure: AdaptiveSelectionFailure };

/**
 * A source of adaptive question choices.
 *
 * Implementations should stop work when `signal` aborts; the planner stops
 * waiting for them either way.
 */
export interface AdaptiveSelector {
  attemptSelect(request: SelectionRequest, signal: AbortSignal): Promise<SelectionResult>;
}

/**
 * Where a selected question came from.
 */
export type DecisionSource = 'adaptive' | 'fallback';

/**
 * The planner's answer to "what next?".
 */
export type PlannerDecision =
  | { readonly kind: 'terminal' }
  | {
      readonly kind: 'question';
      readonly question: Question;
      readonly source: DecisionSource;
      readonly phrasing?: string;
      /** The absorbed failure when `source` is `fallback`. */
      readonly failure?: AdaptiveSelectionFailure;
    };

export function selectionFailure(
  kind: AdaptiveSelectionFailureKind,
  message: string,
  questionId?: string
): Extract<SelectionResult, { ok: false }> {
  const failure: AdaptiveSelectionFailure =
    questionId !== undefined ? { kind, message, questionId } : { kind, message };
  return { ok: false, failure };
}
