/**
 * Interview loop.
 *
 * Drives the planner and an answer channel until the catalog runs out, the
 * question budget is spent, the stopping policy is satisfied, or the user
 * stops. The session is the only mutator of its profile store.
 *
 * @packageDocumentation
 */

import type { QuestionCatalog } from '../catalog/catalog.js';
import type { Question } from '../catalog/types.js';
import type { Planner } from '../planner/planner.js';
import type { FieldName } from '../profile/fields.js';
import type { ProfileStore } from '../profile/store.js';
import { Logger, silentLogger } from '../utils/logger.js';
import type { StoppingPolicy } from './stopping.js';
import type {
  AnswerChannel,
  AnswerInput,
  InterviewHooks,
  InterviewOutcome,
  InterviewStatus,
  PosedQuestion,
  TerminationReason,
  TranscriptEntry,
} from './types.js';

/**
 * Error thrown when a session is misused (bad budget, run twice).
 */
export class InterviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterviewError';
  }
}

/**
 * Options for creating an InterviewSession.
 */
export interface InterviewOptions {
  readonly catalog: QuestionCatalog;
  readonly planner: Planner;
  readonly channel: AnswerChannel;
  /** Question budget; a positive integer. */
  readonly maxQuestions: number;
  /** Enables early stopping and lowered budgets. */
  readonly stoppingPolicy?: StoppingPolicy;
  /** Pre-filled answers (default: an empty store from the catalog). */
  readonly store?: ProfileStore;
  readonly hooks?: InterviewHooks;
  readonly logger?: Logger;
}

/**
 * Fields an answer to `question` is merged into: the targets still open, or
 * every target when all of them were answered before.
 */
export function mergeTargets(question: Question, store: ProfileStore): readonly FieldName[] {
  const open = question.fields.filter((field) => !store.isAnswered(field));
  return open.length > 0 ? open : question.fields;
}

/**
 * One interview run.
 *
 * @example
 * ```typescript
 * const session = new InterviewSession({ catalog, planner, channel, maxQuestions: 8 });
 * const outcome = await session.run();
 * if (outcome.status === 'COMPLETE') {
 *   console.log(outcome.snapshot.toRecord());
 * }
 * ```
 */
export class InterviewSession {
  private readonly catalog: QuestionCatalog;
  private readonly planner: Planner;
  private readonly channel: AnswerChannel;
  private readonly maxQuestions: number;
  private readonly stoppingPolicy: StoppingPolicy | undefined;
  private readonly store: ProfileStore;
  private readonly hooks: InterviewHooks;
  private readonly logger: Logger;

  private state: InterviewStatus = 'RUNNING';
  private started = false;
  private readonly askedIds: string[] = [];
  private readonly transcript: TranscriptEntry[] = [];
  private questionCount = 0;

  constructor(options: InterviewOptions) {
    if (!Number.isInteger(options.maxQuestions) || options.maxQuestions < 1) {
      throw new InterviewError(
        `maxQuestions must be a positive integer, got: ${String(options.maxQuestions)}`
      );
    }
    this.catalog = options.catalog;
    this.planner = options.planner;
    this.channel = options.channel;
    this.maxQuestions = options.maxQuestions;
    this.stoppingPolicy = options.stoppingPolicy;
    this.store = options.store ?? options.catalog.createStore();
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  get status(): InterviewStatus {
    return this.state;
  }

  /**
   * Runs the session to its end. A session runs once.
   *
   * @throws InterviewError when called a second time.
   */
  async run(): Promise<InterviewOutcome> {
    if (this.started) {
      throw new InterviewError('interview session has already been run');
    }
    this.started = true;

    for (;;) {
      const decision = await this.planner.selectNext(this.store, this.askedIds);
      if (decision.kind === 'terminal') {
        return this.finish('COMPLETE', 'no_candidates');
      }

      const { question, source } = decision;
      const posed: PosedQuestion = {
        question,
        text: decision.phrasing ?? this.catalog.renderPrompt(question, this.store),
        ...(question.hint !== undefined && { hint: question.hint }),
        number: this.questionCount + 1,
        maxQuestions: this.effectiveMax(),
        source,
      };
      this.hooks.onQuestion?.(posed);

      let input: AnswerInput;
      try {
        input = await this.channel.ask(posed);
      } catch (error) {
        this.logger.warn('answer_channel_failed', {
          questionId: question.id,
          error: error instanceof Error ? error.message : String(error),
        });
        return this.finish('ABORTED', 'input_closed');
      }

      if (input.kind === 'stop') {
        this.record({
          questionId: question.id,
          text: posed.text,
          answer: 'stop',
          source,
          mergedFields: [],
        });
        return this.finish('ABORTED', 'user_abort');
      }

      let mergedFields: readonly FieldName[] = [];
      if (input.kind === 'answer') {
        mergedFields = mergeTargets(question, this.store);
        for (const field of mergedFields) {
          this.store.merge(field, input.text);
        }
        this.record({
          questionId: question.id,
          text: posed.text,
          answer: 'answer',
          answerText: input.text,
          source,
          mergedFields,
        });
      } else {
        this.record({
          questionId: question.id,
          text: posed.text,
          answer: 'skip',
          source,
          mergedFields,
        });
      }

      this.askedIds.push(question.id);
      this.questionCount++;

      if (this.questionCount >= this.effectiveMax()) {
        return this.finish('COMPLETE', 'max_questions');
      }
      if (this.stoppingPolicy?.isSufficient(this.store, this.unansweredFields()) === true) {
        return this.finish('COMPLETE', 'sufficient_context');
      }
    }
  }

  private effectiveMax(): number {
    if (this.stoppingPolicy === undefined) {
      return this.maxQuestions;
    }
    return Math.min(
      this.maxQuestions,
      this.stoppingPolicy.maxQuestions(this.store, this.maxQuestions)
    );
  }

  private unansweredFields(): FieldName[] {
    return this.catalog.fields
      .map((field) => field.name)
      .filter((name) => !this.store.isAnswered(name));
  }

  private record(entry: TranscriptEntry): void {
    this.transcript.push(entry);
    this.hooks.onAnswer?.(entry);
  }

  private finish(
    status: InterviewOutcome['status'],
    reason: TerminationReason
  ): InterviewOutcome {
    this.state = status;
    const outcome: InterviewOutcome = {
      status,
      reason,
      snapshot: this.store.snapshot({ partial: status === 'ABORTED' }),
      askedIds: [...this.askedIds],
      questionCount: this.questionCount,
      transcript: [...this.transcript],
    };
    this.logger.info('interview_finished', {
      status,
      reason,
      questionCount: this.questionCount,
      answered: this.store.answeredFields().length,
    });
    this.hooks.onComplete?.(outcome);
    return outcome;
  }
}

/**
 * Creates a session and runs it.
 */
export async function runInterview(options: InterviewOptions): Promise<InterviewOutcome> {
  return new InterviewSession(options).run();
}
