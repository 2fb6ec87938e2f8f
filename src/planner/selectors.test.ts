import { describe, it, expect, vi } from 'vitest';
import { createDefaultCatalog } from '../catalog/default-catalog.js';
import { EMPTY_PROJECT_CONTEXT } from '../project-context/analyzer.js';
import {
  createFailureResult,
  createModelError,
  createSuccessResult,
  createTimeoutError,
  type ModelRouter,
  type ModelRouterRequest,
  type ModelRouterResult,
} from '../router/types.js';
import { ModelRouterSelector, UnavailableSelector, parseSelectionResponse } from './selectors.js';
import type { SelectionRequest } from './types.js';

const catalog = createDefaultCatalog();

function request(): SelectionRequest {
  const snapshot = catalog.createStore().snapshot();
  return { snapshot, candidates: catalog.fallbackOrder(snapshot), askedIds: [] };
}

function fakeRouter(result: ModelRouterResult): { router: ModelRouter; requests: ModelRouterRequest[] } {
  const requests: ModelRouterRequest[] = [];
  const router: ModelRouter = {
    complete: vi.fn((req: ModelRouterRequest) => {
      requests.push(req);
      return Promise.resolve(result);
    }),
  };
  return { router, requests };
}

function reply(content: string): ModelRouterResult {
  return createSuccessResult({
    content,
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    metadata: { modelId: 'test-model', provider: 'test', latencyMs: 0 },
  });
}

describe('parseSelectionResponse', () => {
  it('reads the id and optional phrasing', () => {
    expect(parseSelectionResponse('{"question_id": " coding_style ", "question": " Tabs? "}')).toEqual({
      ok: true,
      questionId: 'coding_style',
      phrasing: 'Tabs?',
    });
    expect(parseSelectionResponse('{"question_id": "coding_style", "question": ""}')).toEqual({
      ok: true,
      questionId: 'coding_style',
    });
  });

  it('reports malformed responses', () => {
    expect(parseSelectionResponse('I would ask about testing.')).toEqual({
      ok: false,
      failure: { kind: 'malformed_response', message: 'response contains no JSON object' },
    });
    expect(parseSelectionResponse('{"field": "testing_approach"}')).toEqual({
      ok: false,
      failure: { kind: 'malformed_response', message: "response has no string 'question_id'" },
    });
  });
});

describe('UnavailableSelector', () => {
  it('always fails as unavailable', async () => {
    const result = await new UnavailableSelector().attemptSelect();

    expect(result.ok === false && result.failure.kind).toBe('unavailable');
  });
});

describe('ModelRouterSelector', () => {
  it('sends planner prompts with the signal and parses a fenced reply', async () => {
    const { router, requests } = fakeRouter(
      reply('Sure!\n```json\n{"question_id": "primary_languages"}\n```')
    );
    const controller = new AbortController();

    const result = await new ModelRouterSelector({ router }).attemptSelect(request(), controller.signal);

    expect(result).toEqual({ ok: true, questionId: 'primary_languages' });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.modelAlias).toBe('planner');
    expect(requests[0]?.signal).toBe(controller.signal);
    expect(Object.keys(requests[0]?.parameters ?? {})).toEqual(['systemPrompt']);
    expect(requests[0]?.parameters?.systemPrompt).toContain('"question_id"');
    expect(requests[0]?.prompt).toContain('- intended_use [intended_use]: What will you mainly use');
  });

  it('includes detected languages in the system prompt', async () => {
    const { router, requests } = fakeRouter(reply('{"question_id": "intended_use"}'));
    const selector = new ModelRouterSelector({
      router,
      projectContext: { ...EMPTY_PROJECT_CONTEXT, languages: ['Rust'], hasGit: true },
    });

    await selector.attemptSelect(request(), new AbortController().signal);

    expect(requests[0]?.parameters?.systemPrompt).toContain('- Languages: Rust\n- Uses Git');
  });

  it('maps router timeouts to timeout failures', async () => {
    const { router } = fakeRouter(createFailureResult(createTimeoutError('slow', 100)));

    const result = await new ModelRouterSelector({ router }).attemptSelect(
      request(),
      new AbortController().signal
    );

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'timeout', message: 'TimeoutError: slow' },
    });
  });

  it('maps other router failures to call errors', async () => {
    const { router } = fakeRouter(createFailureResult(createModelError('exit 1', true)));

    const result = await new ModelRouterSelector({ router }).attemptSelect(
      request(),
      new AbortController().signal
    );

    expect(result.ok === false && result.failure.kind).toBe('call_error');
  });
});
