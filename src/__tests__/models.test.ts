import { AxiosError } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { MODELS_DEV_URL } from '../constants';
import { ApiError, NetworkError, ProtocolError } from '../errors';
import { describeFailure, MANIFEST_USER_AGENT, ModelCatalog, PROBE_PROMPT } from '../models';
import type { AuthorizedCaller, ModelEntry } from '../types';
import { createFakeHttp, type FakeReply } from './support/fake-http';

const manifest = {
  'openai': { models: { 'gpt-4o': { name: 'GPT-4o' } } },
  'github-copilot': {
    id: 'github-copilot',
    name: 'GitHub Copilot',
    models: {
      'gpt-4.1': { name: 'GPT-4.1' },
      'claude-preview': { name: 'Claude Preview', experimental: true },
      'o3-mini': { name: 'o3-mini', experimental: false },
      'gemini-lab': { name: 'Gemini Lab', experimental: true },
      'grok-code-fast-1': {},
    },
  },
};

function catalog(reply: FakeReply) {
  const http = createFakeHttp(() => reply);
  return { catalog: new ModelCatalog({ client: http.client }), requests: http.requests };
}

function model(id: string): ModelEntry {
  return { id, displayName: id, experimental: false, provider: 'github-copilot' };
}

describe('ModelCatalog.listModels', () => {
  it('drops experimental models and keeps manifest order', async () => {
    const { catalog: subject, requests } = catalog({ status: 200, data: manifest });

    const models = await subject.listModels(false);

    expect(models).toEqual([
      { id: 'gpt-4.1', displayName: 'GPT-4.1', experimental: false, provider: 'github-copilot' },
      { id: 'o3-mini', displayName: 'o3-mini', experimental: false, provider: 'github-copilot' },
      { id: 'grok-code-fast-1', displayName: 'grok-code-fast-1', experimental: false, provider: 'github-copilot' },
    ]);
    expect(requests[0].method).toBe('GET');
    expect(requests[0].url).toBe(MODELS_DEV_URL);
    expect(requests[0].headers['user-agent']).toBe(MANIFEST_USER_AGENT);
  });

  it('returns every model when experimental ones are requested', async () => {
    const { catalog: subject } = catalog({ status: 200, data: manifest });

    const models = await subject.listModels(true);

    expect(models.map((m) => m.id)).toEqual(['gpt-4.1', 'claude-preview', 'o3-mini', 'gemini-lab', 'grok-code-fast-1']);
    expect(models.map((m) => m.experimental)).toEqual([false, true, false, true, false]);
  });

  it('returns an empty list when the provider is absent', async () => {
    const { catalog: subject } = catalog({ status: 200, data: { openai: manifest.openai } });

    await expect(subject.listModels(true)).resolves.toEqual([]);
  });

  it('uses the configured provider id', async () => {
    const http = createFakeHttp(() => ({ status: 200, data: manifest }));
    const subject = new ModelCatalog({ client: http.client, providerId: 'openai' });

    const models = await subject.listModels(false);

    expect(models).toEqual([{ id: 'gpt-4o', displayName: 'GPT-4o', experimental: false, provider: 'openai' }]);
  });

  it('fails with ProtocolError on a malformed manifest', async () => {
    const { catalog: subject } = catalog({ status: 200, data: 'not json' });

    await expect(subject.listModels(false)).rejects.toBeInstanceOf(ProtocolError);
  });

  it('fails with ProtocolError on a non-success status', async () => {
    const { catalog: subject } = catalog({ status: 503, data: 'unavailable' });

    await expect(subject.listModels(false)).rejects.toThrow('Models.dev manifest request returned 503: unavailable');
  });

  it('fails with NetworkError on transport failure', async () => {
    const { catalog: subject } = catalog(new AxiosError('getaddrinfo ENOTFOUND models.dev', 'ENOTFOUND'));

    await expect(subject.listModels(false)).rejects.toBeInstanceOf(NetworkError);
  });
});

describe('ModelCatalog.verify', () => {
  const ok = { choices: [{ message: { role: 'assistant', content: 'ok' } }] };

  function probingCaller(failures: Record<string, unknown>): AuthorizedCaller {
    return {
      call: vi.fn(async (_method: string, _path: string, body?: unknown) => {
        const id = typeof body === 'object' && body !== null && 'model' in body ? String(body.model) : '';
        if (id in failures) throw failures[id];
        return ok;
      }),
    };
  }

  it('records a failing model and keeps probing the rest', async () => {
    const caller = probingCaller({ b: new ApiError(403, '{"message":"no access"}') });
    const subject = new ModelCatalog();

    const results = await subject.verify(caller, [model('a'), model('b'), model('c')]);

    expect(results).toEqual([
      { modelId: 'a', accessible: true, statusDetail: 'ok' },
      { modelId: 'b', accessible: false, statusDetail: '403 {"message":"no access"}' },
      { modelId: 'c', accessible: true, statusDetail: 'ok' },
    ]);
    expect(caller.call).toHaveBeenCalledTimes(3);
  });

  it('sends a minimal probe request', async () => {
    const caller = probingCaller({});

    await new ModelCatalog().verify(caller, [model('gpt-4.1')]);

    expect(caller.call).toHaveBeenCalledWith('POST', '/chat/completions', {
      model: 'gpt-4.1',
      messages: [{ role: 'user', content: PROBE_PROMPT }],
      max_tokens: 5,
      temperature: 0,
    });
  });

  it('stops at the limit and keeps input order', async () => {
    const caller = probingCaller({});

    const results = await new ModelCatalog().verify(caller, [model('a'), model('b'), model('c')], 2);

    expect(results.map((r) => r.modelId)).toEqual(['a', 'b']);
    expect(caller.call).toHaveBeenCalledTimes(2);
  });

  it('records transport failures as request errors', async () => {
    const caller = probingCaller({ a: new NetworkError('POST https://api.example.test/chat/completions failed: ECONNRESET') });

    const [result] = await new ModelCatalog().verify(caller, [model('a')]);

    expect(result).toEqual({
      modelId: 'a',
      accessible: false,
      statusDetail: 'request-error: POST https://api.example.test/chat/completions failed: ECONNRESET',
    });
  });
});

describe('describeFailure', () => {
  it('truncates long API bodies to 200 characters', () => {
    expect(describeFailure(new ApiError(400, 'x'.repeat(300)))).toBe(`400 ${'x'.repeat(200)}`);
  });

  it('labels malformed replies', () => {
    expect(describeFailure(new ProtocolError('no choices'))).toBe('unknown-shape: no choices');
  });

  it('falls back to the error message', () => {
    expect(describeFailure(new Error('boom'))).toBe('boom');
    expect(describeFailure('weird')).toBe('weird');
  });
});
