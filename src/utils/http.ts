import { BASE_URL, REQUEST_TIMEOUT_MS } from '../constants.js';
import type { HttpResponse, HttpTransport } from '../types/crm.js';

export interface FetchTransportOptions {
  accessToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * JSON-over-HTTP transport with bearer auth. Non-2xx statuses resolve
 * normally; only network faults and timeouts reject.
 */
export function createFetchTransport(options: FetchTransportOptions): HttpTransport {
  const baseUrl = (options.baseUrl ?? BASE_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;
  const headers = {
    Authorization: `Bearer ${options.accessToken}`,
    'Content-Type': 'application/json',
  };

  return async (request): Promise<HttpResponse> => {
    const response = await doFetch(`${baseUrl}${request.path}`, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    const text = await response.text();
    return { status: response.status, body: parseBody(text), text };
  };
}
