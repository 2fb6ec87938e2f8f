import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_FIELDS } from '../profile/fields.js';
import { ProfileStore } from '../profile/store.js';
import {
  createFailureResult,
  createModelError,
  createNetworkError,
  createSuccessResult,
  createValidationError,
  type ModelRouter,
  type ModelRouterResult,
} from '../router/types.js';
import { Logger } from '../utils/logger.js';
import { ModelRenderer } from './model.js';
import { renderGeneratorPrompts } from './prompts.js';
import { renderRulesTemplate } from './template.js';
import { PARTIAL_PROFILE_NOTICE } from './types.js';

function success(content: string): ModelRouterResult {
  return createSuccessResult({
    content,
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    metadata: { modelId: 'sonnet', provider: 'claude-code', latencyMs: 12 },
  });
}

function routerReturning(...results: ModelRouterResult[]): ModelRouter {
  const queue = [...results];
  return {
    complete: vi.fn(() => {
      const next = queue.shift();
      return Promise.resolve(next ?? success(''));
    }),
  };
}

function snapshot(partial = false) {
  const store = new ProfileStore({ fields: DEFAULT_FIELDS });
  store.merge('primary_languages', 'Rust');
  return store.snapshot({ partial });
}

function captureLogger(): { logger: Logger; events: { level: string; event: string }[] } {
  const events: { level: string; event: string }[] = [];
  const logger = new Logger({
    component: 'Renderer',
    sink: (line) => events.push(JSON.parse(line) as { level: string; event: string }),
  });
  return { logger, events };
}

const noSleep = { sleep: () => Promise.resolve(), random: () => 0.5 };

describe('ModelRenderer', () => {
  it('sends the generator prompts and trims the response', async () => {
    const router = routerReturning(success('  Use cargo clippy.  '));
    const renderer = new ModelRenderer({ router, fields: DEFAULT_FIELDS });

    await expect(renderer.render(snapshot())).resolves.toBe('Use cargo clippy.\n');

    const prompts = renderGeneratorPrompts(snapshot(), DEFAULT_FIELDS);
    expect(router.complete).toHaveBeenCalledWith({
      modelAlias: 'generator',
      prompt: prompts.user,
      parameters: { systemPrompt: prompts.system },
    });
  });

  it('prepends the partial notice', async () => {
    const renderer = new ModelRenderer({
      router: routerReturning(success('Use cargo clippy.')),
      fields: DEFAULT_FIELDS,
    });

    await expect(renderer.render(snapshot(true))).resolves.toBe(
      `${PARTIAL_PROFILE_NOTICE}\n\nUse cargo clippy.\n`
    );
  });

  it('falls back to the template on a non-retryable error', async () => {
    const { logger, events } = captureLogger();
    const router = routerReturning(createFailureResult(createValidationError('bad prompt')));
    const renderer = new ModelRenderer({ router, fields: DEFAULT_FIELDS, logger });

    await expect(renderer.render(snapshot())).resolves.toBe(
      renderRulesTemplate(snapshot(), DEFAULT_FIELDS)
    );
    expect(router.complete).toHaveBeenCalledTimes(1);
    expect(events).toContainEqual(expect.objectContaining({ level: 'warn', event: 'generation_failed' }));
  });

  it('retries retryable errors', async () => {
    const { logger, events } = captureLogger();
    const onRetry = vi.fn();
    const router = routerReturning(
      createFailureResult(createNetworkError('connection reset')),
      createFailureResult(createModelError('overloaded', true)),
      success('Prefer small modules.')
    );
    const renderer = new ModelRenderer({
      router,
      fields: DEFAULT_FIELDS,
      logger,
      retry: { config: { maxRetries: 2 }, onRetry, ...noSleep },
    });

    await expect(renderer.render(snapshot())).resolves.toBe('Prefer small modules.\n');
    expect(router.complete).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(events.filter((e) => e.event === 'generation_retry')).toHaveLength(2);
  });

  it('falls back when retries are exhausted', async () => {
    const router = routerReturning(
      createFailureResult(createNetworkError('down')),
      createFailureResult(createNetworkError('down'))
    );
    const renderer = new ModelRenderer({
      router,
      fields: DEFAULT_FIELDS,
      retry: { config: { maxRetries: 1 }, ...noSleep },
    });

    await expect(renderer.render(snapshot(true))).resolves.toBe(
      renderRulesTemplate(snapshot(true), DEFAULT_FIELDS)
    );
  });

  it('falls back on empty content', async () => {
    const { logger, events } = captureLogger();
    const renderer = new ModelRenderer({
      router: routerReturning(success('   ')),
      fields: DEFAULT_FIELDS,
      logger,
    });

    await expect(renderer.render(snapshot())).resolves.toBe(
      renderRulesTemplate(snapshot(), DEFAULT_FIELDS)
    );
    expect(events).toContainEqual(expect.objectContaining({ level: 'warn', event: 'generation_empty' }));
  });

  it('uses a custom fallback renderer', async () => {
    const renderer = new ModelRenderer({
      router: routerReturning(createFailureResult(createValidationError('bad prompt'))),
      fields: DEFAULT_FIELDS,
      fallback: { render: () => Promise.resolve('fallback text') },
    });

    await expect(renderer.render(snapshot())).resolves.toBe('fallback text');
  });
});
