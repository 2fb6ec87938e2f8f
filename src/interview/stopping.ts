/**
 * Experience-aware stopping policy.
 *
 * Beginners and hobby projects get shorter interviews: the question budget
 * is lowered for them, and the interview may end early once the essentials
 * are known and few refinement fields remain open.
 *
 * @packageDocumentation
 */

import { describeAnswer, type FieldDefinition, type FieldName } from '../profile/fields.js';
import type { ProfileView } from '../profile/store.js';

/**
 * Decides when an interview has gathered enough.
 */
export interface StoppingPolicy {
  /** Effective question budget for this profile; never above `configuredMax`. */
  maxQuestions(profile: ProfileView, configuredMax: number): number;
  /** True when the interview can end with the fields still unanswered. */
  isSufficient(profile: ProfileView, unanswered: readonly FieldName[]): boolean;
}

const EXPERIENCE_FIELD = 'experience_level';
const INTENDED_USE_FIELD = 'intended_use';

const BEGINNER_WORDS = [
  'beginner',
  'junior',
  'student',
  'learning',
  'new',
  'starter',
  'novice',
  'self-taught',
  'hobby',
  'weekend',
];
// Years of experience are read only through YEARS
const INTERMEDIATE_WORDS = ['mid', 'intermediate'];
const ADVANCED_WORDS = ['advanced', 'senior', 'expert', 'lead', 'architect', 'cto'];
const SIMPLE_USE_WORDS = [
  'homework',
  'assignment',
  'learning',
  'tutorial',
  'practice',
  'hobby',
  'personal',
  'weekend',
  'spare time',
  'family',
];
const BUSY_WORDS = ['hobby', 'weekend', 'spare time', 'busy', 'limited time', 'family'];

// Budget caps use narrower word lists than the sufficiency check
const BEGINNER_CAP_WORDS = ['beginner', 'student', 'learning', 'hobby'];
const SIMPLE_USE_CAP_WORDS = ['homework', 'learning', 'hobby', 'personal', 'spare time'];

export const BEGINNER_MAX_QUESTIONS = 5;
export const SIMPLE_USE_MAX_QUESTIONS = 6;

const YEARS = /(\d+)\s*(?:years?|yrs?)/;

/**
 * How a profile reads in terms of experience and available time.
 */
export interface ExperienceSignals {
  readonly beginner: boolean;
  readonly intermediate: boolean;
  readonly advanced: boolean;
  readonly simpleUse: boolean;
  readonly busy: boolean;
  /** Years of experience, when the answer mentions them. */
  readonly years: number | undefined;
}

function answerText(profile: ProfileView, field: FieldName): string {
  const value = profile.get(field);
  return value !== undefined ? describeAnswer(value).toLowerCase() : '';
}

function mentionsAny(text: string, words: readonly string[]): boolean {
  return words.some((word) => text.includes(word));
}

/**
 * Reads experience signals from the `experience_level` and `intended_use`
 * answers.
 */
export function classifyExperience(profile: ProfileView): ExperienceSignals {
  const experience = answerText(profile, EXPERIENCE_FIELD);
  const intendedUse = answerText(profile, INTENDED_USE_FIELD);

  const yearsMatch = YEARS.exec(experience)?.[1];
  const years = yearsMatch !== undefined ? Number.parseInt(yearsMatch, 10) : undefined;

  return {
    beginner: mentionsAny(experience, BEGINNER_WORDS) || (years !== undefined && years <= 2),
    intermediate:
      mentionsAny(experience, INTERMEDIATE_WORDS) ||
      (years !== undefined && years >= 3 && years <= 5),
    advanced: mentionsAny(experience, ADVANCED_WORDS) || (years !== undefined && years >= 6),
    simpleUse: mentionsAny(intendedUse, SIMPLE_USE_WORDS),
    busy: mentionsAny(intendedUse + experience, BUSY_WORDS),
    years,
  };
}

/**
 * Stopping policy keyed on experience level and intended use.
 *
 * Required fields are essential: the interview never stops early while one
 * is open. The remaining fields are refinements.
 */
export class ExperienceAwareStoppingPolicy implements StoppingPolicy {
  private readonly essential: ReadonlySet<FieldName>;
  private readonly refinements: ReadonlySet<FieldName>;

  constructor(fields: readonly FieldDefinition[]) {
    this.essential = new Set(fields.filter((f) => f.required).map((f) => f.name));
    this.refinements = new Set(fields.filter((f) => !f.required).map((f) => f.name));
  }

  maxQuestions(profile: ProfileView, configuredMax: number): number {
    const experience = answerText(profile, EXPERIENCE_FIELD);
    const intendedUse = answerText(profile, INTENDED_USE_FIELD);

    if (mentionsAny(experience, BEGINNER_CAP_WORDS)) {
      return Math.min(configuredMax, BEGINNER_MAX_QUESTIONS);
    }
    if (mentionsAny(intendedUse, SIMPLE_USE_CAP_WORDS)) {
      return Math.min(configuredMax, SIMPLE_USE_MAX_QUESTIONS);
    }
    return configuredMax;
  }

  isSufficient(profile: ProfileView, unanswered: readonly FieldName[]): boolean {
    if (unanswered.some((field) => this.essential.has(field))) {
      return false;
    }

    const openRefinements = unanswered.filter((field) => this.refinements.has(field)).length;
    const signals = classifyExperience(profile);
    const student = answerText(profile, EXPERIENCE_FIELD).includes('student');

    if (signals.beginner && openRefinements <= 3 && (signals.simpleUse || student)) {
      return true;
    }
    if (signals.simpleUse && openRefinements <= 3) {
      return true;
    }
    if (signals.busy && openRefinements <= 2) {
      return true;
    }
    if (signals.advanced && openRefinements > 0) {
      return false;
    }
    return openRefinements <= 1;
  }
}

/**
 * Closing line shown when the interview ends early.
 */
export function stoppingMessage(profile: ProfileView): string {
  const experience = answerText(profile, EXPERIENCE_FIELD);
  const intendedUse = answerText(profile, INTENDED_USE_FIELD);
  const focused =
    mentionsAny(experience, ['beginner', 'junior', 'student', 'learning', 'new']) ||
    mentionsAny(intendedUse, ['homework', 'assignment', 'learning', 'hobby', 'personal']);

  return focused
    ? 'Perfect! I have enough information to create a helpful, focused prompt for your needs.'
    : 'Great! I have sufficient information to generate your personalized coding assistant prompt.';
}
