/**
 * Retry with exponential backoff for model router calls.
 *
 * @packageDocumentation
 */

import type { ModelRouterError, ModelRouterRequest, ModelRouterResult } from './types.js';
import { isRetryableError, createModelError, createFailureResult } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 2). */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000). */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000). */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomizing delays (default: 0.2). */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterFactor: 0.2,
} as const;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
    throw new Error(`maxRetries must be a non-negative integer, got: ${String(maxRetries)}`);
  }
  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }
  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }
  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxRetries, baseDelayMs, maxDelayMs, jitterFactor };
}

/**
 * Delay before a retry: `min(maxDelayMs, baseDelayMs * 2^attempt) * (1 ± jitter)`.
 *
 * @param attempt - The retry attempt number (0-indexed).
 * @param config - Retry configuration.
 * @param random - Random function for jitter (injectable for testing).
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const cappedDelay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;
  return Math.round(cappedDelay * jitterMultiplier);
}

/**
 * Information about a retry attempt.
 */
export interface RetryAttemptInfo {
  /** The attempt number (1-indexed). */
  attempt: number;
  /** Total attempts that will be made (initial + retries). */
  totalAttempts: number;
  /** Delay before this attempt in milliseconds. */
  delayMs: number;
  /** The error from the previous attempt. */
  previousError: ModelRouterError;
}

/**
 * Options for the withRetry function.
 */
export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  /** Callback invoked before each retry attempt. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
  /** Random function for jitter (injectable for testing). */
  random?: () => number;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an operation, retrying retryable failures with exponential backoff.
 *
 * Non-retryable failures are returned immediately. When every attempt fails
 * the result is a non-retryable `RETRIES_EXHAUSTED` model error.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => client.complete(request), {
 *   config: { maxRetries: 3 },
 *   onRetry: (info) => logger.warn('model_retry', { attempt: info.attempt }),
 * });
 * ```
 */
export async function withRetry(
  operation: () => Promise<ModelRouterResult>,
  options: WithRetryOptions = {}
): Promise<ModelRouterResult> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const totalAttempts = config.maxRetries + 1;

  let lastError: ModelRouterError | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (lastError !== undefined) {
      const delayMs = calculateBackoffDelay(attempt - 1, config, random);
      options.onRetry?.({ attempt: attempt + 1, totalAttempts, delayMs, previousError: lastError });
      await sleep(delayMs);
    }

    const result = await operation();
    if (result.success || !isRetryableError(result.error)) {
      return result;
    }
    lastError = result.error;
  }

  const errorOptions: { errorCode: string; cause?: Error; request?: ModelRouterRequest } = {
    errorCode: 'RETRIES_EXHAUSTED',
  };
  if (lastError?.cause !== undefined) {
    errorOptions.cause = lastError.cause;
  }
  if (lastError?.request !== undefined) {
    errorOptions.request = lastError.request;
  }

  return createFailureResult(
    createModelError(
      `All ${String(totalAttempts)} attempts failed. Last error: ${lastError?.message ?? 'unknown'}`,
      false,
      errorOptions
    )
  );
}
