/**
 * Interview loop: session state machine, stopping policy and the terminal
 * answer channel.
 *
 * @packageDocumentation
 */

export { InterviewError, InterviewSession, mergeTargets, runInterview } from './engine.js';
export type { InterviewOptions } from './engine.js';
export {
  BEGINNER_MAX_QUESTIONS,
  ExperienceAwareStoppingPolicy,
  SIMPLE_USE_MAX_QUESTIONS,
  classifyExperience,
  stoppingMessage,
} from './stopping.js';
export type { ExperienceSignals, StoppingPolicy } from './stopping.js';
export {
  CLI_STYLES,
  InputClosedError,
  TerminalAnswerChannel,
  createReadlineReader,
  defaultOutputWriter,
  formatEmptyInputError,
  formatError,
  formatInfo,
  formatInterviewHelp,
  formatPrompt,
  formatQuestionProgress,
  formatSectionHeader,
  formatSuccess,
  formatWarning,
  isHelpCommand,
  isQuitCommand,
  isSkipCommand,
  plainOutputWriter,
  stripStyles,
} from './cli.js';
export type { InputReader, OutputWriter, TerminalChannelOptions } from './cli.js';
export type {
  AnswerChannel,
  AnswerInput,
  InterviewHooks,
  InterviewOutcome,
  InterviewStatus,
  PosedQuestion,
  TerminationReason,
  TranscriptEntry,
} from './types.js';
