export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export type HttpHeaders = Record<string, string>;

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
};

export type HttpResponse = {
  status: number;
  headers: HttpHeaders;
  body: string;
};

export const parseHttpMethod = (value: string): HttpMethod | undefined => {
  const upper = value.toUpperCase();
  return HTTP_METHODS.find((method) => method === upper);
};

export const isSuccess = (response: HttpResponse): boolean =>
  response.status >= 200 && response.status < 300;

export const parseJsonBody = <T = unknown>(response: HttpResponse): T => JSON.parse(response.body);
