/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  validateRetryConfig,
  withRetry,
} from './retry.js';
import type { RetryAttemptInfo } from './retry.js';
import type { ModelRouterResult } from './types.js';
import {
  createAuthenticationError,
  createFailureResult,
  createNetworkError,
  createSuccessResult,
  createTimeoutError,
} from './types.js';

const success = createSuccessResult({
  content: 'ok',
  usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
  metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
});

const networkFailure = createFailureResult(createNetworkError('connection reset'));

function sequence(...results: ModelRouterResult[]): () => Promise<ModelRouterResult> {
  let index = 0;
  return () => {
    const result = results[Math.min(index, results.length - 1)];
    index++;
    if (result === undefined) {
      throw new Error('sequence needs at least one result');
    }
    return Promise.resolve(result);
  };
}

const noSleep = (): Promise<void> => Promise.resolve();

describe('validateRetryConfig', () => {
  it('applies defaults', () => {
    expect(validateRetryConfig()).toEqual(DEFAULT_RETRY_CONFIG);
  });

  it('rejects invalid values', () => {
    expect(() => validateRetryConfig({ maxRetries: -1 })).toThrow(/maxRetries/);
    expect(() => validateRetryConfig({ maxRetries: 1.5 })).toThrow(/maxRetries/);
    expect(() => validateRetryConfig({ baseDelayMs: -5 })).toThrow(/baseDelayMs/);
    expect(() => validateRetryConfig({ baseDelayMs: 500, maxDelayMs: 100 })).toThrow(
      'maxDelayMs (100) must be >= baseDelayMs (500)'
    );
    expect(() => validateRetryConfig({ jitterFactor: 2 })).toThrow(/jitterFactor/);
  });
});

describe('calculateBackoffDelay', () => {
  const config = validateRetryConfig({ baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2 });

  it('doubles per attempt without jitter at the midpoint', () => {
    expect(calculateBackoffDelay(0, config, () => 0.5)).toBe(100);
    expect(calculateBackoffDelay(1, config, () => 0.5)).toBe(200);
    expect(calculateBackoffDelay(2, config, () => 0.5)).toBe(400);
  });

  it('caps at maxDelayMs before jitter', () => {
    expect(calculateBackoffDelay(10, config, () => 0.5)).toBe(1000);
    expect(calculateBackoffDelay(10, config, () => 0)).toBe(800);
  });

  it('stays within the jitter bounds', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 12 }), fc.double({ min: 0, max: 1, noNaN: true }), (attempt, r) => {
        const base = Math.min(100 * 2 ** attempt, 1000);
        const delay = calculateBackoffDelay(attempt, config, () => r);
        return delay >= Math.floor(base * 0.8) && delay <= Math.ceil(base * 1.2);
      })
    );
  });
});

describe('withRetry', () => {
  it('returns the first success without retrying', async () => {
    const operation = vi.fn(sequence(success));

    const result = await withRetry(operation, { sleep: noSleep });

    expect(result).toBe(success);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries retryable failures until one succeeds', async () => {
    const operation = vi.fn(sequence(networkFailure, success));
    const retries: RetryAttemptInfo[] = [];

    const result = await withRetry(operation, {
      sleep: noSleep,
      random: () => 0.5,
      onRetry: (info) => retries.push(info),
    });

    expect(result.success).toBe(true);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(retries).toEqual([
      { attempt: 2, totalAttempts: 3, delayMs: 1000, previousError: networkFailure.error },
    ]);
  });

  it('returns non-retryable failures immediately', async () => {
    const authFailure = createFailureResult(createAuthenticationError('no login', 'test'));
    const operation = vi.fn(sequence(authFailure, success));

    const result = await withRetry(operation, { sleep: noSleep });

    expect(result).toBe(authFailure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports exhaustion as a non-retryable model error', async () => {
    const timeout = createFailureResult(createTimeoutError('too slow', 50));
    const operation = vi.fn(sequence(timeout));
    const sleep = vi.fn(noSleep);

    const result = await withRetry(operation, { sleep, config: { maxRetries: 1 } });

    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    if (!result.success && result.error.kind === 'ModelError') {
      expect(result.error.message).toBe('All 2 attempts failed. Last error: too slow');
      expect(result.error.errorCode).toBe('RETRIES_EXHAUSTED');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('never calls the operation more than maxRetries + 1 times', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 5 }), async (maxRetries) => {
        const operation = vi.fn(sequence(networkFailure));
        await withRetry(operation, { sleep: noSleep, config: { maxRetries } });
        return operation.mock.calls.length === maxRetries + 1;
      })
    );
  });
});
