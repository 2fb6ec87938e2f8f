/**
 * Model Router types.
 *
 * Defines the abstract interface for model calls so that the planner and the
 * prompt generator never depend on a concrete backend.
 *
 * @packageDocumentation
 */

/**
 * Model alias used for routing requests.
 * These correspond to the role-based model assignments in configuration.
 */
export type ModelAlias = 'planner' | 'generator';

/**
 * Parameters for model completion requests.
 */
export interface ModelParameters {
  /** System prompt to prepend to the request. */
  systemPrompt?: string;
}

/**
 * Request to the model router for completion.
 */
export interface ModelRouterRequest {
  /** Model alias to route the request to. */
  modelAlias: ModelAlias;
  /** The prompt to send to the model. */
  prompt: string;
  /** Optional parameters for the completion. */
  parameters?: ModelParameters;
  /** Per-request timeout in milliseconds, overriding the client default. */
  timeoutMs?: number;
  /** Cancels the request when aborted. */
  signal?: AbortSignal;
}

/**
 * Usage statistics from a model response.
 */
export interface ModelUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Metadata about the model that processed the request.
 */
export interface ModelMetadata {
  /** The actual model identifier used. */
  modelId: string;
  /** Provider name (e.g. 'claude-code'). */
  provider: string;
  /** Request latency in milliseconds. */
  latencyMs: number;
}

/**
 * Successful response from the model router.
 */
export interface ModelRouterResponse {
  /** The generated text content. */
  content: string;
  usage: ModelUsage;
  metadata: ModelMetadata;
}

/**
 * Discriminator for model router errors.
 */
export type ModelRouterErrorKind =
  | 'AuthenticationError'
  | 'ModelError'
  | 'TimeoutError'
  | 'NetworkError'
  | 'ValidationError';

/**
 * Fields shared by all router errors.
 */
export interface ModelRouterErrorBase {
  readonly kind: ModelRouterErrorKind;
  readonly message: string;
  readonly cause?: Error;
  readonly request?: ModelRouterRequest;
}

/** The backend refused the credentials (e.g. not logged in). */
export interface AuthenticationError extends ModelRouterErrorBase {
  readonly kind: 'AuthenticationError';
  readonly provider: string;
  readonly retryable: false;
}

/** The model or its CLI failed. */
export interface ModelError extends ModelRouterErrorBase {
  readonly kind: 'ModelError';
  readonly errorCode?: string;
  readonly modelId?: string;
  readonly retryable: boolean;
}

/** The request did not finish in time. */
export interface TimeoutError extends ModelRouterErrorBase {
  readonly kind: 'TimeoutError';
  readonly timeoutMs: number;
  readonly retryable: true;
}

/** The backend could not be reached (including a missing executable). */
export interface NetworkError extends ModelRouterErrorBase {
  readonly kind: 'NetworkError';
  readonly endpoint?: string;
  readonly retryable: true;
}

/** The request was rejected before it was sent. */
export interface ValidationError extends ModelRouterErrorBase {
  readonly kind: 'ValidationError';
  readonly invalidFields?: readonly string[];
  readonly retryable: false;
}

/**
 * Union of all router errors.
 */
export type ModelRouterError =
  | AuthenticationError
  | ModelError
  | TimeoutError
  | NetworkError
  | ValidationError;

/**
 * Checks whether an error may succeed on retry.
 */
export function isRetryableError(error: ModelRouterError): boolean {
  return error.retryable;
}

/**
 * Options common to all error factories.
 */
export interface ErrorContext {
  cause?: Error;
  request?: ModelRouterRequest;
}

// Copies only the defined context fields, for exactOptionalPropertyTypes
function context(options: ErrorContext | undefined): ErrorContext {
  const result: ErrorContext = {};
  if (options?.cause !== undefined) {
    result.cause = options.cause;
  }
  if (options?.request !== undefined) {
    result.request = options.request;
  }
  return result;
}

export function createAuthenticationError(
  message: string,
  provider: string,
  options?: ErrorContext
): AuthenticationError {
  return {
    kind: 'AuthenticationError',
    message,
    provider,
    retryable: false,
    ...context(options),
  };
}

export function createModelError(
  message: string,
  retryable: boolean,
  options?: ErrorContext & { errorCode?: string; modelId?: string }
): ModelError {
  return {
    kind: 'ModelError',
    message,
    retryable,
    ...context(options),
    ...(options?.errorCode !== undefined && { errorCode: options.errorCode }),
    ...(options?.modelId !== undefined && { modelId: options.modelId }),
  };
}

export function createTimeoutError(
  message: string,
  timeoutMs: number,
  options?: ErrorContext
): TimeoutError {
  return {
    kind: 'TimeoutError',
    message,
    timeoutMs,
    retryable: true,
    ...context(options),
  };
}

export function createNetworkError(
  message: string,
  options?: ErrorContext & { endpoint?: string }
): NetworkError {
  return {
    kind: 'NetworkError',
    message,
    retryable: true,
    ...context(options),
    ...(options?.endpoint !== undefined && { endpoint: options.endpoint }),
  };
}

export function createValidationError(
  message: string,
  options?: ErrorContext & { invalidFields?: readonly string[] }
): ValidationError {
  return {
    kind: 'ValidationError',
    message,
    retryable: false,
    ...context(options),
    ...(options?.invalidFields !== undefined && { invalidFields: options.invalidFields }),
  };
}

/**
 * Result type for model router operations.
 * Either a successful response or an error.
 */
export type ModelRouterResult =
  | { readonly success: true; readonly response: ModelRouterResponse }
  | { readonly success: false; readonly error: ModelRouterError };

export function createSuccessResult(
  response: ModelRouterResponse
): Extract<ModelRouterResult, { success: true }> {
  return { success: true, response };
}

export function createFailureResult(
  error: ModelRouterError
): Extract<ModelRouterResult, { success: false }> {
  return { success: false, error };
}

/**
 * Abstract interface for model routing.
 *
 * Implementations never throw for model failures; they return a failure
 * result instead.
 */
export interface ModelRouter {
  /**
   * Sends a request to the model behind `request.modelAlias`.
   */
  complete(request: ModelRouterRequest): Promise<ModelRouterResult>;
}
