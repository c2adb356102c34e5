import { ConfigurationError } from '../errors';
import type { HttpHeaders, HttpRequest } from '../http/types';
import type { MockRequestInput, MockRequestRecord } from '../store/types';
import { extractPath } from '../utils/path';
import { jsonSubsetMatches, tryParseJson, WILDCARD } from './json-subset';

export type MockEvaluation = {
  matched: boolean;
  reason?: string;
};

export type MockPatterns = Pick<MockRequestRecord, 'pathPattern' | 'bodyPattern' | 'headersPattern'>;

const PLACEHOLDER = /\{(\*|[A-Za-z_][A-Za-z0-9_-]*)\}/g;

const normalizeHeaderKey = (key: string): string => key.toLowerCase();

const pathCache = new Map<string, RegExp>();

/**
 * `{name}` matches one path segment, `{*}` matches anything including slashes.
 * Everything else is taken as regular expression source.
 */
export const compilePathPattern = (pattern: string): RegExp => {
  const cached = pathCache.get(pattern);
  if (cached) return cached;

  const source = pattern.replace(PLACEHOLDER, (_token, name: string) =>
    name === '*' ? '.*' : '[^/]+'
  );

  let compiled: RegExp;
  try {
    compiled = new RegExp(`^${source}$`);
  } catch (error) {
    throw new ConfigurationError(`Invalid path pattern "${pattern}"`, 'pathPattern', { cause: error });
  }

  pathCache.set(pattern, compiled);
  return compiled;
};

const compileBodyRegex = (pattern: string): RegExp => {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid body pattern "${pattern}"`, 'bodyPattern', { cause: error });
  }
};

/**
 * Parses a JSON object of string values, as stored for header patterns and
 * canned response headers.
 */
export const parseHeaderMap = (text: string, field: string): HttpHeaders => {
  const parsed = tryParseJson(text);
  if (!parsed.ok) {
    throw new ConfigurationError(`Invalid ${field}: ${text}`, field);
  }

  const { value } = parsed;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be a JSON object`, field);
  }

  const headers: HttpHeaders = {};
  for (const [key, expected] of Object.entries(value)) {
    if (typeof expected !== 'string') {
      throw new ConfigurationError(`${field} value for "${key}" must be a string`, field);
    }
    headers[key] = expected;
  }
  return headers;
};

export const parseHeadersPattern = (pattern: string): HttpHeaders =>
  parseHeaderMap(pattern, 'headersPattern');

export const matchesPath = (pattern: string, url: string): boolean =>
  compilePathPattern(pattern).test(extractPath(url));

export const matchesBody = (pattern: string | null | undefined, body: string | undefined): boolean => {
  if (pattern === null || pattern === undefined || pattern === WILDCARD) return true;
  if (body === undefined) return false;

  const parsedPattern = tryParseJson(pattern);
  const parsedBody = tryParseJson(body);
  if (parsedPattern.ok && parsedBody.ok) {
    return jsonSubsetMatches(parsedPattern.value, parsedBody.value);
  }

  return compileBodyRegex(pattern).test(body);
};

const headerMismatchReason = (pattern: string, headers: HttpHeaders): string | undefined => {
  const expectedHeaders = parseHeadersPattern(pattern);
  const normalizedHeaders = new Map<string, string[]>();
  for (const [key, value] of Object.entries(headers)) {
    const name = normalizeHeaderKey(key);
    normalizedHeaders.set(name, [...(normalizedHeaders.get(name) ?? []), value]);
  }

  for (const [key, expected] of Object.entries(expectedHeaders)) {
    const values = normalizedHeaders.get(normalizeHeaderKey(key)) ?? [];
    if (values.length === 0) {
      return `header ${key} missing`;
    }
    if (expected !== WILDCARD && !values.includes(expected)) {
      return `header ${key} mismatch`;
    }
  }

  return undefined;
};

/**
 * Every header in the pattern must be present with an equal value, or any value
 * for `*`. Names compare case-insensitively rather than as exact map keys; when
 * the request carries one name in several cases, any of its values may match.
 * Extra request headers are ignored.
 */
export const matchesHeaders = (pattern: string | null | undefined, headers: HttpHeaders): boolean => {
  if (pattern === null || pattern === undefined) return true;
  return headerMismatchReason(pattern, headers) === undefined;
};

/**
 * Path, body and headers must all hold. The method is not checked here: candidates
 * are already filtered by method when loaded from the store.
 */
export const evaluateMock = (mock: MockPatterns, request: HttpRequest): MockEvaluation => {
  if (!matchesPath(mock.pathPattern, request.url)) {
    return { matched: false, reason: 'path mismatch' };
  }

  if (!matchesBody(mock.bodyPattern, request.body)) {
    return { matched: false, reason: 'body mismatch' };
  }

  if (mock.headersPattern !== null && mock.headersPattern !== undefined) {
    const reason = headerMismatchReason(mock.headersPattern, request.headers);
    if (reason) {
      return { matched: false, reason };
    }
  }

  return { matched: true };
};

/**
 * Registration-time check so a broken mock fails when it is added, not when a
 * request first reaches it.
 */
export const validateMockPatterns = (request: MockRequestInput): void => {
  compilePathPattern(request.pathPattern);

  if (request.bodyPattern !== undefined && request.bodyPattern !== WILDCARD) {
    if (!tryParseJson(request.bodyPattern).ok) {
      compileBodyRegex(request.bodyPattern);
    }
  }

  if (request.headersPattern !== undefined) {
    parseHeadersPattern(request.headersPattern);
  }
};
