/**
 * Planner: picks the next interview question.
 *
 * Adaptive selection is tried first under a hard timeout; any failure is
 * logged and absorbed, and the deterministic fallback ordering of the
 * catalog takes over.
 *
 * @packageDocumentation
 */

import type { QuestionCatalog } from '../catalog/catalog.js';
import { ProfileSnapshot, type ProfileStore } from '../profile/store.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { UnavailableSelector } from './selectors.js';
import {
  selectionFailure,
  type AdaptiveSelectionFailure,
  type AdaptiveSelector,
  type PlannerDecision,
  type SelectionRequest,
  type SelectionResult,
} from './types.js';

/** Default time allowed for an adaptive selection attempt. */
export const DEFAULT_ADAPTIVE_TIMEOUT_MS = 20000;

/**
 * Options for creating a Planner.
 */
export interface PlannerOptions {
  readonly catalog: QuestionCatalog;
  /** Adaptive selector (default: {@link UnavailableSelector}). */
  readonly selector?: AdaptiveSelector;
  /** Timeout for each adaptive attempt in milliseconds. */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

/**
 * Chooses the next question from the catalog.
 *
 * @example
 * ```typescript
 * const planner = new Planner({ catalog, selector, timeoutMs: 5000 });
 * const decision = await planner.selectNext(store, askedIds);
 * if (decision.kind === 'question') {
 *   console.log(decision.question.id, decision.source);
 * }
 * ```
 */
export class Planner {
  private readonly catalog: QuestionCatalog;
  private readonly selector: AdaptiveSelector;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: PlannerOptions) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_ADAPTIVE_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`timeoutMs must be a positive number, got: ${String(timeoutMs)}`);
    }
    this.catalog = options.catalog;
    this.selector = options.selector ?? new UnavailableSelector();
    this.timeoutMs = timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Decides the next question, or `terminal` when no candidate remains.
   *
   * Never rejects because of the selector: its errors, timeouts and invalid
   * choices all lead to the fallback question.
   *
   * @param profile - Current answers. A store is snapshotted before use.
   * @param askedIds - Ids already asked this session; never selected again.
   */
  async selectNext(
    profile: ProfileStore | ProfileSnapshot,
    askedIds: readonly string[]
  ): Promise<PlannerDecision> {
    const snapshot = profile instanceof ProfileSnapshot ? profile : profile.snapshot();
    const asked = new Set(askedIds);
    const candidates = this.catalog.fallbackOrder(snapshot).filter((q) => !asked.has(q.id));

    const fallback = candidates[0];
    if (fallback === undefined) {
      this.logger.debug('no_candidates', { asked: askedIds.length });
      return { kind: 'terminal' };
    }

    const result = await this.attemptAdaptive({ snapshot, candidates, askedIds: [...askedIds] });

    if (result.ok) {
      const chosen = candidates.find((question) => question.id === result.questionId);
      if (chosen !== undefined) {
        this.logger.debug('question_selected', { questionId: chosen.id, source: 'adaptive' });
        return result.phrasing !== undefined
          ? { kind: 'question', question: chosen, source: 'adaptive', phrasing: result.phrasing }
          : { kind: 'question', question: chosen, source: 'adaptive' };
      }
    }

    const failure: AdaptiveSelectionFailure = result.ok
      ? {
          kind: 'unknown_candidate',
          message: `selector chose '${result.questionId}', which is not a candidate`,
          questionId: result.questionId,
        }
      : result.failure;

    this.logFailure(failure);
    this.logger.debug('question_selected', { questionId: fallback.id, source: 'fallback' });
    return { kind: 'question', question: fallback, source: 'fallback', failure };
  }

  private logFailure(failure: AdaptiveSelectionFailure): void {
    const data = { kind: failure.kind, message: failure.message };
    // Offline mode fails every attempt
    if (failure.kind === 'unavailable') {
      this.logger.debug('adaptive_selection_skipped', data);
    } else {
      this.logger.warn('adaptive_selection_failed', data);
    }
  }

  private async attemptAdaptive(request: SelectionRequest): Promise<SelectionResult> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<SelectionResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(
          selectionFailure('timeout', `adaptive selection exceeded ${String(this.timeoutMs)}ms`)
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.invokeSelector(request, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async invokeSelector(
    request: SelectionRequest,
    signal: AbortSignal
  ): Promise<SelectionResult> {
    try {
      return await this.selector.attemptSelect(request, signal);
    } catch (error) {
      return selectionFailure(
        'call_error',
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
