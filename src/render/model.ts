/**
 * Model-backed prompt generation with a template fallback.
 *
 * @packageDocumentation
 */

import type { FieldDefinition } from '../profile/fields.js';
import type { ProfileSnapshot } from '../profile/store.js';
import { withRetry, type WithRetryOptions } from '../router/retry.js';
import type { ModelRouter } from '../router/types.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { renderGeneratorPrompts } from './prompts.js';
import { TemplateRenderer } from './template.js';
import { PARTIAL_PROFILE_NOTICE, type Renderer } from './types.js';

/**
 * Options for creating a ModelRenderer.
 */
export interface ModelRendererOptions {
  readonly router: ModelRouter;
  readonly fields: readonly FieldDefinition[];
  /** Used when generation fails (default: a TemplateRenderer over `fields`). */
  readonly fallback?: Renderer;
  readonly retry?: WithRetryOptions;
  readonly logger?: Logger;
}

/**
 * Sends tiered generator prompts through the `generator` model alias.
 *
 * Retryable router errors are retried with backoff. When every attempt
 * fails, or the model returns nothing, the fallback renderer's output is
 * returned instead; `render` never rejects because of the model.
 */
export class ModelRenderer implements Renderer {
  private readonly router: ModelRouter;
  private readonly fields: readonly FieldDefinition[];
  private readonly fallback: Renderer;
  private readonly retry: WithRetryOptions;
  private readonly logger: Logger;

  constructor(options: ModelRendererOptions) {
    this.router = options.router;
    this.fields = options.fields;
    this.fallback = options.fallback ?? new TemplateRenderer(options.fields);
    this.logger = options.logger ?? silentLogger;
    this.retry = {
      ...options.retry,
      onRetry: (info) => {
        this.logger.warn('generation_retry', {
          attempt: info.attempt,
          totalAttempts: info.totalAttempts,
          delayMs: info.delayMs,
          error: info.previousError.message,
        });
        options.retry?.onRetry?.(info);
      },
    };
  }

  async render(snapshot: ProfileSnapshot): Promise<string> {
    const prompts = renderGeneratorPrompts(snapshot, this.fields);
    this.logger.debug('generation_started', { tier: prompts.tier });

    const result = await withRetry(
      () =>
        this.router.complete({
          modelAlias: 'generator',
          prompt: prompts.user,
          parameters: { systemPrompt: prompts.system },
        }),
      this.retry
    );

    if (!result.success) {
      this.logger.warn('generation_failed', {
        kind: result.error.kind,
        message: result.error.message,
      });
      return this.fallback.render(snapshot);
    }

    const content = result.response.content.trim();
    if (content === '') {
      this.logger.warn('generation_empty', { modelId: result.response.metadata.modelId });
      return this.fallback.render(snapshot);
    }

    this.logger.info('generation_succeeded', {
      tier: prompts.tier,
      modelId: result.response.metadata.modelId,
      totalTokens: result.response.usage.totalTokens,
    });
    return snapshot.partial ? `${PARTIAL_PROFILE_NOTICE}\n\n${content}\n` : `${content}\n`;
  }
}
