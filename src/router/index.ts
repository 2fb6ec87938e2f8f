/**
 * Model Router module.
 *
 * @packageDocumentation
 */

export type {
  AuthenticationError,
  ErrorContext,
  ModelAlias,
  ModelError,
  ModelMetadata,
  ModelParameters,
  ModelRouter,
  ModelRouterError,
  ModelRouterErrorBase,
  ModelRouterErrorKind,
  ModelRouterRequest,
  ModelRouterResponse,
  ModelRouterResult,
  ModelUsage,
  NetworkError,
  TimeoutError,
  ValidationError,
} from './types.js';
export {
  createAuthenticationError,
  createFailureResult,
  createModelError,
  createNetworkError,
  createSuccessResult,
  createTimeoutError,
  createValidationError,
  isRetryableError,
} from './types.js';

export {
  ClaudeCodeClient,
  ClaudeCodeNotInstalledError,
  checkClaudeCodeInstalled,
  createClaudeCodeClient,
  parseClaudeCodeOutput,
} from './claude-code-client.js';
export type { ClaudeCodeClientOptions } from './claude-code-client.js';

export {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  defaultSleep,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type { RetryAttemptInfo, RetryConfig, WithRetryOptions } from './retry.js';
