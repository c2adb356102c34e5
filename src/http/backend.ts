import type { HttpHeaders, HttpMethod, HttpRequest, HttpResponse } from './types';

/**
 * The transport contract provider clients are written against. Real clients get a
 * network-backed implementation; tests get {@link MockBackend}.
 */
export interface Backend {
  execute(request: HttpRequest): Promise<HttpResponse>;
}

const send = (
  backend: Backend,
  method: HttpMethod,
  url: string,
  headers: HttpHeaders = {},
  body?: string
): Promise<HttpResponse> => backend.execute({ method, url, headers, body });

/**
 * Verb helpers layered on any {@link Backend}. Bodies passed to post/put/patch are
 * JSON-encoded before dispatch.
 */
export abstract class BaseBackend implements Backend {
  abstract execute(request: HttpRequest): Promise<HttpResponse>;

  get(url: string, headers?: HttpHeaders): Promise<HttpResponse> {
    return send(this, 'GET', url, headers);
  }

  post(url: string, body: unknown, headers?: HttpHeaders): Promise<HttpResponse> {
    return send(this, 'POST', url, headers, JSON.stringify(body));
  }

  put(url: string, body: unknown, headers?: HttpHeaders): Promise<HttpResponse> {
    return send(this, 'PUT', url, headers, JSON.stringify(body));
  }

  patch(url: string, body: unknown, headers?: HttpHeaders): Promise<HttpResponse> {
    return send(this, 'PATCH', url, headers, JSON.stringify(body));
  }

  delete(url: string, headers?: HttpHeaders): Promise<HttpResponse> {
    return send(this, 'DELETE', url, headers);
  }
}
