/**
 * Claude Code CLI client.
 *
 * Implements the ModelRouter interface by spawning `claude -p` with JSON
 * output and parsing the messages it prints.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { ModelAssignments } from '../config/types.js';
import type {
  ModelAlias,
  ModelRouter,
  ModelRouterRequest,
  ModelRouterResult,
  ModelRouterResponse,
  ModelUsage,
} from './types.js';
import {
  createAuthenticationError,
  createFailureResult,
  createModelError,
  createNetworkError,
  createSuccessResult,
  createTimeoutError,
  createValidationError,
} from './types.js';

/**
 * Options for creating a ClaudeCodeClient.
 */
export interface ClaudeCodeClientOptions {
  /** Model identifiers for each alias. */
  models: ModelAssignments;
  /** Path to the claude executable (default: 'claude'). */
  executablePath?: string;
  /** Additional CLI flags to pass to every invocation. */
  additionalFlags?: readonly string[];
  /** Timeout in milliseconds for requests (default: 120000). */
  timeoutMs?: number;
  /** Working directory for subprocess execution. */
  cwd?: string;
}

interface ClaudeCodeUsage {
  input_tokens?: number;
  output_tokens?: number;
  cache_read_input_tokens?: number;
  cache_creation_input_tokens?: number;
}

/**
 * One line of Claude Code JSON output.
 */
interface ClaudeCodeJsonMessage {
  type: 'system' | 'assistant' | 'result';
  subtype?: string;
  message?: {
    content: { type: string; text?: string }[];
    usage?: ClaudeCodeUsage;
    model?: string;
  };
  result?: string;
  usage?: ClaudeCodeUsage;
  duration_ms?: number;
  is_error?: boolean;
}

/**
 * Error thrown when Claude Code CLI is not installed or not accessible.
 */
export class ClaudeCodeNotInstalledError extends Error {
  readonly code = 'CLAUDE_CODE_NOT_INSTALLED';

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ClaudeCodeNotInstalledError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isTimedOut(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'timedOut' in error && error.timedOut === true;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Checks if Claude Code CLI is installed and accessible.
 *
 * @param executablePath - Path to the claude executable.
 * @returns True if Claude Code is available.
 * @throws ClaudeCodeNotInstalledError if not installed.
 */
export async function checkClaudeCodeInstalled(executablePath = 'claude'): Promise<boolean> {
  try {
    const result = await execa(executablePath, ['--version'], { timeout: 10000, reject: false });

    if (result.exitCode !== 0) {
      throw new ClaudeCodeNotInstalledError(
        `Claude Code CLI returned non-zero exit code: ${String(result.exitCode)}. ` +
          `Stderr: ${result.stderr || '(empty)'}`
      );
    }

    return true;
  } catch (error) {
    if (error instanceof ClaudeCodeNotInstalledError) {
      throw error;
    }

    const cause = error instanceof Error ? error : undefined;
    if (isMissingExecutable(error)) {
      throw new ClaudeCodeNotInstalledError(
        `Claude Code CLI not found at '${executablePath}'. Install it or run with --offline.`,
        cause
      );
    }
    throw new ClaudeCodeNotInstalledError(
      `Failed to check Claude Code installation: ${errorMessage(error)}`,
      cause
    );
  }
}

/**
 * Resolves a model alias to the configured model identifier.
 */
function resolveModelAlias(alias: ModelAlias, models: ModelAssignments): string {
  switch (alias) {
    case 'planner':
      return models.planner_model;
    case 'generator':
      return models.generator_model;
  }
}

function toModelUsage(usage: ClaudeCodeUsage): ModelUsage {
  const promptTokens =
    (usage.input_tokens ?? 0) +
    (usage.cache_read_input_tokens ?? 0) +
    (usage.cache_creation_input_tokens ?? 0);
  const completionTokens = usage.output_tokens ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

/**
 * Parses Claude Code JSON output.
 *
 * Accepts both a single JSON document and JSON lines. Assistant text blocks
 * are concatenated; the `result` message is used when no text was seen.
 */
export function parseClaudeCodeOutput(output: string): {
  content: string;
  usage: ModelUsage;
  modelId: string;
  latencyMs: number | undefined;
  isError: boolean;
} {
  let content = '';
  let usage: ModelUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  let modelId = 'unknown';
  let latencyMs: number | undefined;
  let isError = false;

  for (const line of output.trim().split('\n')) {
    if (!line.trim()) {
      continue;
    }

    let parsed: ClaudeCodeJsonMessage;
    try {
      parsed = JSON.parse(line) as ClaudeCodeJsonMessage;
    } catch {
      // Non-JSON lines (progress output) are skipped
      continue;
    }

    if (parsed.type === 'assistant' && parsed.message !== undefined) {
      for (const block of parsed.message.content) {
        if (block.type === 'text' && block.text !== undefined) {
          content += block.text;
        }
      }
      if (parsed.message.model !== undefined && parsed.message.model !== '') {
        modelId = parsed.message.model;
      }
      if (parsed.message.usage !== undefined) {
        usage = toModelUsage(parsed.message.usage);
      }
    }

    if (parsed.type === 'result') {
      if (parsed.result !== undefined && content === '') {
        content = parsed.result;
      }
      if (parsed.duration_ms !== undefined) {
        latencyMs = parsed.duration_ms;
      }
      if (parsed.usage !== undefined) {
        usage = toModelUsage(parsed.usage);
      }
      isError = parsed.is_error === true;
    }
  }

  return { content, usage, modelId, latencyMs, isError };
}

const AUTH_FAILURE = /not logged in|authentication|invalid api key|\/login/i;

/**
 * Fields of a finished subprocess the client reads.
 */
interface SubprocessOutcome {
  readonly exitCode?: number | undefined;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

/**
 * Claude Code CLI client implementing the ModelRouter interface.
 *
 * @example
 * ```typescript
 * const client = new ClaudeCodeClient({ models: config.models });
 * const result = await client.complete({ modelAlias: 'planner', prompt: 'Pick the next question...' });
 * if (result.success) {
 *   console.log(result.response.content);
 * }
 * ```
 */
export class ClaudeCodeClient implements ModelRouter {
  private readonly models: ModelAssignments;
  private readonly executablePath: string;
  private readonly additionalFlags: readonly string[];
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;

  constructor(options: ClaudeCodeClientOptions) {
    this.models = options.models;
    this.executablePath = options.executablePath ?? 'claude';
    this.additionalFlags = options.additionalFlags ?? [];
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.cwd = options.cwd;
  }

  /**
   * Builds CLI arguments for a request.
   */
  buildArgs(request: ModelRouterRequest): string[] {
    const args: string[] = [
      '-p', // Print mode (non-interactive)
      '--output-format',
      'json',
      '--model',
      resolveModelAlias(request.modelAlias, this.models),
      '--no-session-persistence',
      ...this.additionalFlags,
    ];

    if (request.parameters?.systemPrompt !== undefined && request.parameters.systemPrompt !== '') {
      args.push('--system-prompt', request.parameters.systemPrompt);
    }

    // Positional prompt last
    args.push(request.prompt);

    return args;
  }

  private async executeSubprocess(request: ModelRouterRequest): Promise<ModelRouterResult> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const startTime = Date.now();

    if (request.prompt.trim() === '') {
      return createFailureResult(
        createValidationError('Prompt must not be empty', { invalidFields: ['prompt'], request })
      );
    }

    if (request.signal?.aborted === true) {
      return createFailureResult(
        createModelError('Request cancelled before start', false, {
          errorCode: 'CANCELLED',
          request,
        })
      );
    }

    const subprocess = execa(this.executablePath, this.buildArgs(request), {
      timeout: timeoutMs,
      reject: false,
      cwd: this.cwd ?? process.cwd(),
    });
    const onAbort = (): void => {
      subprocess.kill();
    };
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await subprocess;
      return this.toResult(result, request, timeoutMs, startTime);
    } catch (error) {
      if (isTimedOut(error)) {
        return createFailureResult(
          createTimeoutError(`Request timed out after ${String(timeoutMs)}ms`, timeoutMs, {
            request,
          })
        );
      }
      if (isMissingExecutable(error)) {
        return createFailureResult(
          createNetworkError(
            `Claude Code CLI not found at '${this.executablePath}'. Please install Claude Code.`,
            { endpoint: this.executablePath, request }
          )
        );
      }
      return createFailureResult(
        createModelError(`Subprocess execution failed: ${errorMessage(error)}`, true, { request })
      );
    } finally {
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  private toResult(
    result: SubprocessOutcome,
    request: ModelRouterRequest,
    timeoutMs: number,
    startTime: number
  ): ModelRouterResult {
    if (request.signal?.aborted === true) {
      return createFailureResult(
        createModelError('Request cancelled', false, { errorCode: 'CANCELLED', request })
      );
    }

    if (result.timedOut) {
      return createFailureResult(
        createTimeoutError(`Request timed out after ${String(timeoutMs)}ms`, timeoutMs, {
          request,
        })
      );
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr;
      if (stderr.includes('command not found') || stderr.includes('ENOENT')) {
        return createFailureResult(
          createNetworkError(`Claude Code CLI not found: ${stderr}`, {
            endpoint: this.executablePath,
            request,
          })
        );
      }
      if (AUTH_FAILURE.test(stderr)) {
        return createFailureResult(
          createAuthenticationError(`Claude Code is not authenticated: ${stderr}`, 'claude-code', {
            request,
          })
        );
      }
      return createFailureResult(
        createModelError(
          `Claude Code execution failed with exit code ${String(result.exitCode)}`,
          true,
          { errorCode: `EXIT_${String(result.exitCode)}`, request }
        )
      );
    }

    const parsed = parseClaudeCodeOutput(result.stdout);
    if (parsed.isError) {
      return createFailureResult(
        createModelError(`Claude Code reported an error: ${parsed.content}`, true, {
          errorCode: 'RESULT_ERROR',
          modelId: parsed.modelId,
          request,
        })
      );
    }

    const response: ModelRouterResponse = {
      content: parsed.content,
      usage: parsed.usage,
      metadata: {
        modelId: parsed.modelId,
        provider: 'claude-code',
        latencyMs: parsed.latencyMs ?? Date.now() - startTime,
      },
    };

    return createSuccessResult(response);
  }

  async complete(request: ModelRouterRequest): Promise<ModelRouterResult> {
    return this.executeSubprocess(request);
  }
}

/**
 * Creates a Claude Code client after checking the CLI is installed.
 *
 * @throws ClaudeCodeNotInstalledError if Claude Code is not installed.
 */
export async function createClaudeCodeClient(
  options: ClaudeCodeClientOptions
): Promise<ClaudeCodeClient> {
  await checkClaudeCodeInstalled(options.executablePath);
  return new ClaudeCodeClient(options);
}
