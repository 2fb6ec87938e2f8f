/**
 * Interview loop types.
 *
 * @packageDocumentation
 */

import type { Question } from '../catalog/types.js';
import type { DecisionSource } from '../planner/types.js';
import type { ProfileSnapshot } from '../profile/store.js';

/**
 * States of an interview session.
 */
export type InterviewStatus = 'RUNNING' | 'COMPLETE' | 'ABORTED';

/**
 * Why a session ended.
 *
 * - `no_candidates`: every eligible question was asked or answered
 * - `max_questions`: the question budget was used up
 * - `sufficient_context`: the stopping policy judged the profile complete enough
 * - `user_abort`: the user asked to stop
 * - `input_closed`: the answer channel failed (e.g. closed input stream)
 */
export type TerminationReason =
  | 'no_candidates'
  | 'max_questions'
  | 'sufficient_context'
  | 'user_abort'
  | 'input_closed';

/**
 * A question as presented to the user.
 */
export interface PosedQuestion {
  readonly question: Question;
  /** Text to display: model phrasing, or the rendered catalog prompt. */
  readonly text: string;
  readonly hint?: string;
  /** 1-based position of this question in the session. */
  readonly number: number;
  /** Effective maximum number of questions at the time of asking. */
  readonly maxQuestions: number;
  readonly source: DecisionSource;
}

/**
 * What the user did with a posed question.
 */
export type AnswerInput =
  | { readonly kind: 'answer'; readonly text: string }
  | { readonly kind: 'skip' }
  | { readonly kind: 'stop' };

/**
 * Source of user answers. The terminal implementation lives in `cli.ts`;
 * tests use scripted channels.
 */
export interface AnswerChannel {
  ask(posed: PosedQuestion): Promise<AnswerInput>;
}

/**
 * One asked question and what came back.
 */
export interface TranscriptEntry {
  readonly questionId: string;
  readonly text: string;
  readonly answer: AnswerInput['kind'];
  /** The answer text, for `answer` entries. */
  readonly answerText?: string;
  readonly source: DecisionSource;
  /** Fields the answer was merged into. */
  readonly mergedFields: readonly string[];
}

/**
 * Result of a finished session.
 */
export interface InterviewOutcome {
  readonly status: Exclude<InterviewStatus, 'RUNNING'>;
  readonly reason: TerminationReason;
  /** Final profile; `partial` is set iff the session was aborted. */
  readonly snapshot: ProfileSnapshot;
  readonly askedIds: readonly string[];
  readonly questionCount: number;
  readonly transcript: readonly TranscriptEntry[];
}

/**
 * Optional observers of a session. Errors thrown by hooks propagate.
 */
export interface InterviewHooks {
  onQuestion?(posed: PosedQuestion): void;
  onAnswer?(entry: TranscriptEntry): void;
  onComplete?(outcome: InterviewOutcome): void;
}
