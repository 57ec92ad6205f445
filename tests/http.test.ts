import { describe, it, expect } from 'vitest';
import { createFetchTransport } from '../src/utils/http.js';

interface Call {
  url: string;
  init?: RequestInit;
}

function makeFetch(response: () => Response) {
  const calls: Call[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
  return { calls, fakeFetch };
}

describe('createFetchTransport', () => {
  it('should send bearer-authenticated requests to the properties API', async () => {
    const { calls, fakeFetch } = makeFetch(() => new Response(JSON.stringify({ results: [] }), { status: 200 }));
    const transport = createFetchTransport({ accessToken: 'test-token', fetch: fakeFetch });

    const response = await transport({ method: 'GET', path: '/contacts/groups' });

    expect(calls[0]?.url).toBe('https://api.hubapi.com/crm/v3/properties/contacts/groups');
    expect(calls[0]?.init?.method).toBe('GET');
    expect(calls[0]?.init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
    expect(calls[0]?.init?.body).toBeUndefined();
    expect(response).toEqual({ status: 200, body: { results: [] }, text: '{"results":[]}' });
  });

  it('should serialize POST bodies as JSON', async () => {
    const { calls, fakeFetch } = makeFetch(() => new Response('{}', { status: 201 }));
    const transport = createFetchTransport({ accessToken: 'test-token', baseUrl: 'http://crm.test/', fetch: fakeFetch });

    await transport({ method: 'POST', path: '/deals', body: { name: 'deal_notes' } });

    expect(calls[0]?.url).toBe('http://crm.test/deals');
    expect(calls[0]?.init?.body).toBe('{"name":"deal_notes"}');
  });

  it('should resolve error statuses with the raw text', async () => {
    const { fakeFetch } = makeFetch(() => new Response('Bad Gateway', { status: 502 }));
    const transport = createFetchTransport({ accessToken: 'test-token', fetch: fakeFetch });

    expect(await transport({ method: 'GET', path: '/contacts/x' })).toEqual({
      status: 502,
      body: 'Bad Gateway',
      text: 'Bad Gateway',
    });
  });

  it('should return a null body for an empty response', async () => {
    const { fakeFetch } = makeFetch(() => new Response(null, { status: 204 }));
    const transport = createFetchTransport({ accessToken: 'test-token', fetch: fakeFetch });

    expect(await transport({ method: 'GET', path: '/contacts/x' })).toEqual({ status: 204, body: null, text: '' });
  });
});
