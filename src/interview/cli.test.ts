/**
 * Tests for the terminal answer channel.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createDefaultCatalog } from '../catalog/default-catalog.js';
import {
  CLI_STYLES,
  InputClosedError,
  TerminalAnswerChannel,
  formatEmptyInputError,
  formatPrompt,
  formatQuestionProgress,
  formatSectionHeader,
  isHelpCommand,
  isQuitCommand,
  isSkipCommand,
  stripStyles,
  type InputReader,
  type OutputWriter,
} from './cli.js';
import type { PosedQuestion } from './types.js';

const catalog = createDefaultCatalog();

function posed(id: string, hint?: string): PosedQuestion {
  const question = catalog.get(id);
  if (question === undefined) {
    throw new Error(`unknown question ${id}`);
  }
  return {
    question,
    text: question.prompt,
    ...(hint !== undefined && { hint }),
    number: 2,
    maxQuestions: 8,
    source: 'fallback',
  };
}

describe('formatting helpers', () => {
  it('uses a minimum header width of 40 characters', () => {
    expect(formatSectionHeader('Hi')).toContain('═'.repeat(40));
  });

  it('formats a prompt with a hint', () => {
    expect(formatPrompt('Which languages?', 'Use commas.')).toBe(
      `\n${CLI_STYLES.BOLD}Which languages?${CLI_STYLES.RESET}\n${CLI_STYLES.DIM}Use commas.${CLI_STYLES.RESET}\n> `
    );
  });

  it('strips styles', () => {
    expect(stripStyles(formatPrompt('Which languages?'))).toBe('\nWhich languages?\n> ');
    expect(stripStyles(formatQuestionProgress(3, 8))).toBe('Question 3 of up to 8');
  });

  it('mentions skip and help in the empty input message', () => {
    const plain = stripStyles(formatEmptyInputError());

    expect(plain).toBe(
      "Error: Empty input received.\nType your answer and press Enter, 'skip' to move on, or 'help' for options."
    );
  });
});

describe('command recognition', () => {
  it.each(['quit', 'q', 'EXIT', '  Quit  '])('treats %j as quit', (input) => {
    expect(isQuitCommand(input)).toBe(true);
  });

  it.each(['skip', 'S'])('treats %j as skip', (input) => {
    expect(isSkipCommand(input)).toBe(true);
  });

  it.each(['help', '?'])('treats %j as help', (input) => {
    expect(isHelpCommand(input)).toBe(true);
  });

  it('does not treat answers that contain commands as commands', () => {
    expect(isQuitCommand('quite a lot')).toBe(false);
    expect(isSkipCommand('skipping tests')).toBe(false);
  });
});

describe('TerminalAnswerChannel', () => {
  let inputQueue: (string | Error)[];
  let prompts: string[];
  let outputLines: string[];
  let mockReader: InputReader;
  let mockWriter: OutputWriter;

  beforeEach(() => {
    inputQueue = [];
    prompts = [];
    outputLines = [];

    mockWriter = {
      writeLine: (text: string): void => {
        outputLines.push(text);
      },
      write: (text: string): void => {
        outputLines.push(text);
      },
    };

    mockReader = {
      readLine: vi.fn().mockImplementation((prompt: string): Promise<string> => {
        prompts.push(prompt);
        const next = inputQueue.shift();
        if (next === undefined) {
          return Promise.reject(new InputClosedError());
        }
        return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
      }),
      close: vi.fn(),
    };
  });

  it('returns a trimmed answer', async () => {
    inputQueue = ['  TypeScript, Go  '];
    const channel = new TerminalAnswerChannel(mockReader, mockWriter);

    await expect(channel.ask(posed('primary_languages'))).resolves.toEqual({
      kind: 'answer',
      text: 'TypeScript, Go',
    });
    expect(outputLines[0]).toBe(formatQuestionProgress(2, 8));
    expect(prompts[0]).toBe(
      formatPrompt('Which programming languages do you work with most?')
    );
  });

  it('maps quit and skip commands', async () => {
    inputQueue = ['skip', 'q'];
    const channel = new TerminalAnswerChannel(mockReader, mockWriter);

    await expect(channel.ask(posed('coding_style'))).resolves.toEqual({ kind: 'skip' });
    await expect(channel.ask(posed('coding_style'))).resolves.toEqual({ kind: 'stop' });
  });

  it('re-prompts after empty input and help', async () => {
    inputQueue = ['', 'help', 'tabs'];
    const channel = new TerminalAnswerChannel(mockReader, mockWriter);

    await expect(channel.ask(posed('coding_style'))).resolves.toEqual({
      kind: 'answer',
      text: 'tabs',
    });
    expect(prompts.slice(1)).toEqual(['> ', '> ']);
    expect(outputLines[1]).toBe(formatEmptyInputError());
    expect(stripStyles(outputLines[2] ?? '')).toContain('quit, q, exit');
  });

  it('stops when the input closes', async () => {
    const channel = new TerminalAnswerChannel(mockReader, mockWriter);

    await expect(channel.ask(posed('coding_style'))).resolves.toEqual({ kind: 'stop' });
  });

  it('propagates other reader errors', async () => {
    inputQueue = [new Error('terminal went away')];
    const channel = new TerminalAnswerChannel(mockReader, mockWriter);

    await expect(channel.ask(posed('coding_style'))).rejects.toThrow('terminal went away');
  });

  it('writes plain text when colors are disabled', async () => {
    inputQueue = ['1'];
    const channel = new TerminalAnswerChannel(mockReader, mockWriter, { colors: false });

    await channel.ask(posed('experience_level', 'You can also answer 1, 2 or 3.'));

    expect(outputLines[0]).toBe('Question 2 of up to 8');
    expect(prompts[0]).toBe(
      '\nHow would you describe your experience level: beginner, intermediate or advanced?\nYou can also answer 1, 2 or 3.\n> '
    );
  });
});
