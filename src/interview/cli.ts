/**
 * Terminal answer channel for the interview.
 *
 * Reads answers line by line, recognizes the quit, skip and help commands,
 * and re-prompts on empty input.
 *
 * @packageDocumentation
 */

import type { AnswerChannel, AnswerInput, PosedQuestion } from './types.js';

/**
 * Formatted text styles for CLI output.
 */
export const CLI_STYLES = {
  /** Bold text marker. */
  BOLD: '\x1b[1m',
  /** Reset formatting. */
  RESET: '\x1b[0m',
  /** Dim/gray text. */
  DIM: '\x1b[2m',
  /** Green text for success. */
  GREEN: '\x1b[32m',
  /** Yellow text for warnings. */
  YELLOW: '\x1b[33m',
  /** Cyan text for info. */
  CYAN: '\x1b[36m',
  /** Red text for errors. */
  RED: '\x1b[31m',
} as const;

const ANSI_STYLE = /\x1b\[[0-9;]*m/g;

/**
 * Removes the escape sequences of {@link CLI_STYLES} from text.
 */
export function stripStyles(text: string): string {
  return text.replace(ANSI_STYLE, '');
}

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /**
   * Read a line of input.
   *
   * @throws InputClosedError when the input ends before a line is read.
   */
  readLine(prompt: string): Promise<string>;
  /** Close the reader. */
  close(): void;
}

/**
 * Interface for writing output.
 * Abstracted for testability.
 */
export interface OutputWriter {
  /** Write a line of text. */
  writeLine(text: string): void;
  /** Write text without newline. */
  write(text: string): void;
}

/**
 * Default output writer using process.stdout.
 */
export const defaultOutputWriter: OutputWriter = {
  writeLine(text: string): void {
    process.stdout.write(text + '\n');
  },
  write(text: string): void {
    process.stdout.write(text);
  },
};

/**
 * Wraps a writer so that styles are stripped before writing.
 */
export function plainOutputWriter(inner: OutputWriter): OutputWriter {
  return {
    writeLine: (text) => {
      inner.writeLine(stripStyles(text));
    },
    write: (text) => {
      inner.write(stripStyles(text));
    },
  };
}

/**
 * Error raised by an InputReader when input ends (EOF or Ctrl+C).
 */
export class InputClosedError extends Error {
  constructor(message = 'Input closed') {
    super(message);
    this.name = 'InputClosedError';
  }
}

/**
 * Formats a section header for CLI display.
 */
export function formatSectionHeader(title: string): string {
  const line = '═'.repeat(Math.max(title.length, 40));
  return `\n${CLI_STYLES.BOLD}${CLI_STYLES.CYAN}${line}${CLI_STYLES.RESET}\n${CLI_STYLES.BOLD}${title}${CLI_STYLES.RESET}\n${CLI_STYLES.CYAN}${line}${CLI_STYLES.RESET}\n`;
}

/**
 * Formats a prompt message with optional hint.
 *
 * @param message - The prompt message.
 * @param hint - Optional hint text.
 * @returns Formatted prompt string ending in `> `.
 */
export function formatPrompt(message: string, hint?: string): string {
  let result = `\n${CLI_STYLES.BOLD}${message}${CLI_STYLES.RESET}`;
  if (hint !== undefined) {
    result += `\n${CLI_STYLES.DIM}${hint}${CLI_STYLES.RESET}`;
  }
  result += '\n> ';
  return result;
}

/**
 * Formats the progress line shown above each question.
 */
export function formatQuestionProgress(number: number, maxQuestions: number): string {
  return `${CLI_STYLES.DIM}Question ${String(number)} of up to ${String(maxQuestions)}${CLI_STYLES.RESET}`;
}

export function formatError(message: string): string {
  return `${CLI_STYLES.RED}Error: ${message}${CLI_STYLES.RESET}`;
}

export function formatSuccess(message: string): string {
  return `${CLI_STYLES.GREEN}✓ ${message}${CLI_STYLES.RESET}`;
}

export function formatWarning(message: string): string {
  return `${CLI_STYLES.YELLOW}⚠ ${message}${CLI_STYLES.RESET}`;
}

export function formatInfo(message: string): string {
  return `${CLI_STYLES.CYAN}ℹ ${message}${CLI_STYLES.RESET}`;
}

/**
 * Formats the empty input error message.
 */
export function formatEmptyInputError(): string {
  return [
    formatError('Empty input received.'),
    `Type your answer and press Enter, ${CLI_STYLES.BOLD}'skip'${CLI_STYLES.RESET} to move on, or ${CLI_STYLES.BOLD}'help'${CLI_STYLES.RESET} for options.`,
  ].join('\n');
}

/**
 * Formats the in-interview help text.
 */
export function formatInterviewHelp(): string {
  const item = (command: string, description: string): string =>
    `  ${CLI_STYLES.CYAN}•${CLI_STYLES.RESET} ${CLI_STYLES.BOLD}${command}${CLI_STYLES.RESET}  ${description}`;
  return [
    '',
    `${CLI_STYLES.BOLD}Commands:${CLI_STYLES.RESET}`,
    item('skip, s', 'skip this question'),
    item('quit, q, exit', 'stop the interview without writing anything'),
    item('help, ?', 'show this help'),
  ].join('\n');
}

/**
 * Parses a user input for quit command.
 */
export function isQuitCommand(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return normalized === 'quit' || normalized === 'q' || normalized === 'exit';
}

/**
 * Parses a user input for skip command.
 */
export function isSkipCommand(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return normalized === 'skip' || normalized === 's';
}

/**
 * Parses a user input for help command.
 */
export function isHelpCommand(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return normalized === 'help' || normalized === '?';
}

/**
 * Options for TerminalAnswerChannel.
 */
export interface TerminalChannelOptions {
  /** Whether to keep ANSI styles (default: true). */
  readonly colors?: boolean;
}

/**
 * Answer channel over an InputReader/OutputWriter pair.
 *
 * @example
 * ```typescript
 * const reader = await createReadlineReader();
 * const channel = new TerminalAnswerChannel(reader, defaultOutputWriter);
 * try {
 *   await runInterview({ catalog, planner, channel, maxQuestions: 8 });
 * } finally {
 *   reader.close();
 * }
 * ```
 */
export class TerminalAnswerChannel implements AnswerChannel {
  private readonly writer: OutputWriter;
  private readonly colors: boolean;

  constructor(
    private readonly reader: InputReader,
    writer: OutputWriter = defaultOutputWriter,
    options: TerminalChannelOptions = {}
  ) {
    this.colors = options.colors ?? true;
    this.writer = this.colors ? writer : plainOutputWriter(writer);
  }

  async ask(posed: PosedQuestion): Promise<AnswerInput> {
    this.writer.writeLine(formatQuestionProgress(posed.number, posed.maxQuestions));
    let prompt = formatPrompt(posed.text, posed.hint);

    for (;;) {
      let line: string;
      try {
        line = await this.reader.readLine(this.colors ? prompt : stripStyles(prompt));
      } catch (error) {
        if (error instanceof InputClosedError) {
          return { kind: 'stop' };
        }
        throw error;
      }

      const trimmed = line.trim();
      if (isQuitCommand(trimmed)) {
        return { kind: 'stop' };
      }
      if (isSkipCommand(trimmed)) {
        return { kind: 'skip' };
      }
      if (isHelpCommand(trimmed)) {
        this.writer.writeLine(formatInterviewHelp());
      } else if (trimmed === '') {
        this.writer.writeLine(formatEmptyInputError());
      } else {
        return { kind: 'answer', text: trimmed };
      }
      prompt = '> ';
    }
  }
}

/**
 * Creates a readline-based input reader.
 *
 * Ctrl+C and end of input close the reader; a pending or later `readLine`
 * then rejects with {@link InputClosedError}.
 */
export async function createReadlineReader(): Promise<InputReader> {
  // Use dynamic import to avoid issues in test environments
  const readline = await import('node:readline');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let closed = false;
  let rejectPending: ((error: InputClosedError) => void) | undefined;

  rl.on('SIGINT', () => {
    rl.close();
  });
  rl.on('close', () => {
    closed = true;
    rejectPending?.(new InputClosedError());
    rejectPending = undefined;
  });

  return {
    readLine(prompt: string): Promise<string> {
      if (closed) {
        return Promise.reject(new InputClosedError());
      }
      return new Promise((resolve, reject) => {
        rejectPending = reject;
        rl.question(prompt, (answer) => {
          rejectPending = undefined;
          resolve(answer);
        });
      });
    },
    close(): void {
      rl.close();
    },
  };
}
