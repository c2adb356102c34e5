import type { HttpHeaders, HttpMethod } from '../http/types';
import type { MockRequestInput, MockResponseInput } from '../store/types';

export const JSON_HEADERS = JSON.stringify({ 'Content-Type': 'application/json' });

const request = (method: HttpMethod, pathPattern: string): MockRequestInput => ({
  method,
  pathPattern,
});

export const MockRequests = {
  get: (path: string) => request('GET', path),
  post: (path: string) => request('POST', path),
  put: (path: string) => request('PUT', path),
  patch: (path: string) => request('PATCH', path),
  delete: (path: string) => request('DELETE', path),
};

export const withBodyPattern = (input: MockRequestInput, pattern: string): MockRequestInput => ({
  ...input,
  bodyPattern: pattern,
});

export const withHeadersPattern = (
  input: MockRequestInput,
  headers: HttpHeaders | string
): MockRequestInput => ({
  ...input,
  headersPattern: typeof headers === 'string' ? headers : JSON.stringify(headers),
});

export const withSequence = (input: MockRequestInput, sequenceOrder: number): MockRequestInput => ({
  ...input,
  sequenceOrder,
});

const response = (statusCode: number, body: string): MockResponseInput => ({ statusCode, body });

export const MockResponses = {
  ok: (body: string) => response(200, body),
  created: (body: string) => response(201, body),
  noContent: () => response(204, ''),
  badRequest: (body: string) => response(400, body),
  unauthorized: (body: string) => response(401, body),
  notFound: (body: string) => response(404, body),
  internalError: (body: string) => response(500, body),
  rateLimited: () =>
    response(429, JSON.stringify({ error: 'rate_limited', message: 'Too many requests' })),
  json: (data: unknown, statusCode = 200): MockResponseInput => ({
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(data),
  }),
};

export const withStatus = (input: MockResponseInput, statusCode: number): MockResponseInput => ({
  ...input,
  statusCode,
});

export const withResponseHeaders = (
  input: MockResponseInput,
  headers: HttpHeaders | string
): MockResponseInput => ({
  ...input,
  headers: typeof headers === 'string' ? headers : JSON.stringify(headers),
});

export const withDelay = (input: MockResponseInput, delayMs: number): MockResponseInput => ({
  ...input,
  delayMs,
});
