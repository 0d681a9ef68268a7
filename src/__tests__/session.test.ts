import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { INTEGRATION_ID, USER_AGENT } from '../constants';
import { ApiError, NetworkError } from '../errors';
import { Secret } from '../secret';
import { AuthenticatedSession } from '../session';
import { createFakeHttp, type FakeHandler } from './support/fake-http';

function session(handler: FakeHandler, apiBase = 'https://api.example.test') {
  const http = createFakeHttp(handler);
  const subject = new AuthenticatedSession(
    { apiToken: new Secret('test-copilot-token'), apiBase },
    { client: http.client },
  );
  return { session: subject, requests: http.requests };
}

describe('AuthenticatedSession', () => {
  it('attaches the bearer token and shared headers to every call', async () => {
    const { session: subject, requests } = session(() => ({ status: 200, data: { ok: true } }));

    await subject.call('POST', '/chat/completions', { model: 'gpt-4.1' });
    await subject.call('GET', '/models');

    expect(requests).toHaveLength(2);
    for (const request of requests) {
      expect(request.headers['authorization']).toBe('Bearer test-copilot-token');
      expect(request.headers['user-agent']).toBe(USER_AGENT);
      expect(request.headers['copilot-integration-id']).toBe(INTEGRATION_ID);
    }
    expect(requests[0].headers['content-type']).toBe('application/json');
  });

  it('resolves paths against the API base and returns the parsed body', async () => {
    const { session: subject, requests } = session(
      () => ({ status: 200, data: { data: [{ id: 'gpt-4.1' }] } }),
      'https://api.example.test/',
    );

    const result = await subject.call('GET', 'models');

    expect(result).toEqual({ data: [{ id: 'gpt-4.1' }] });
    expect(requests[0].url).toBe('https://api.example.test/models');
  });

  it('sends the body as JSON', async () => {
    const { session: subject, requests } = session(() => ({ status: 200, data: {} }));

    await subject.call('POST', '/chat/completions', { model: 'gpt-4.1', messages: [] });

    expect(requests[0].method).toBe('POST');
    expect(requests[0].url).toBe('https://api.example.test/chat/completions');
    expect(requests[0].body).toEqual({ model: 'gpt-4.1', messages: [] });
  });

  it('fails with ApiError carrying status and body on non-2xx', async () => {
    const { session: subject } = session(() => ({ status: 500, data: { error: 'boom' } }));

    const error = await subject.call('GET', '/models').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toHaveProperty('status', 500);
    expect(error).toHaveProperty('body', '{"error":"boom"}');
    expect(error).toHaveProperty('url', 'https://api.example.test/models');
  });

  it('fails with NetworkError on transport failure', async () => {
    const { session: subject } = session(() => new AxiosError('socket hang up', 'ECONNRESET'));

    await expect(subject.call('GET', '/models')).rejects.toBeInstanceOf(NetworkError);
  });

  it('exposes the session metadata', () => {
    const http = createFakeHttp(() => ({ status: 200 }));
    const subject = new AuthenticatedSession(
      { apiToken: new Secret('test-copilot-token'), apiBase: 'https://api.example.test', expiresAt: 1700000000000 },
      { client: http.client },
    );

    expect(subject.apiBase).toBe('https://api.example.test');
    expect(subject.expiresAt).toBe(1700000000000);
    expect(subject.resolve('/v1/chat/completions')).toBe('https://api.example.test/v1/chat/completions');
  });
});
