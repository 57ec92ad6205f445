export interface HttpRequest {
  method: 'GET' | 'POST';
  path: string;
  body?: unknown;
}

export interface HttpResponse {
  status: number;
  body: unknown;
  text: string;
}

/** Sends one request; resolves for every HTTP status, rejects only on transport faults. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export interface PropertyGroup {
  name: string;
  label?: string;
  displayOrder?: number;
}

export type ExistenceCheck =
  | { state: 'exists' }
  | { state: 'absent' }
  | { state: 'unknown'; status?: number; detail: string };

export type CreateOutcome =
  | { kind: 'created' }
  | { kind: 'duplicate-label'; detail: string }
  | { kind: 'failed'; status?: number; detail: string };
