import fs from 'node:fs/promises';
import * as YAML from 'yaml';
import { ConfigurationError } from '../errors';
import { HTTP_METHODS } from '../http/types';
import { validateMockPatterns } from '../matching/matcher';
import { WILDCARD } from '../matching/json-subset';
import { MAX_DELAY_MS } from '../utils/sleep';
import type { ScenarioFile } from './types';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationError = {
  file: string;
  path: string;
  mockId?: string;
  message: string;
  severity: ValidationSeverity;
  line?: number;
  column?: number;
};

export type ValidationResult = {
  scenario?: ScenarioFile;
  errors: ValidationError[];
};

const ROOT_KEYS = new Set(['scenario', 'provider', 'description', 'version', 'mocks']);
const MOCK_KEYS = new Set(['id', 'request', 'respond']);
const REQUEST_KEYS = new Set(['method', 'path', 'body', 'headers', 'sequence']);
const RESPOND_KEYS = new Set(['status', 'body', 'bodyFile', 'headers', 'delayMs']);

const VALID_METHODS = new Set<string>(HTTP_METHODS);

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

const extractLineInfo = (error: YAML.YAMLError): { line?: number; column?: number } => {
  const linePos = error.linePos;
  if (!linePos || linePos.length === 0) return {};
  return { line: linePos[0].line, column: linePos[0].col };
};

const parseYamlStrict = (filePath: string, content: string): { data?: unknown; errors: ValidationError[] } => {
  const doc = YAML.parseDocument(content, {
    prettyErrors: true,
    uniqueKeys: true,
  });

  const errors: ValidationError[] = [];

  for (const err of doc.errors) {
    errors.push({ file: filePath, path: '', message: err.message, severity: 'error', ...extractLineInfo(err) });
  }

  for (const warn of doc.warnings) {
    errors.push({ file: filePath, path: '', message: warn.message, severity: 'warning', ...extractLineInfo(warn) });
  }

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  const data: unknown = doc.toJS({ maxAliasCount: 0 });
  return { data, errors };
};

const checkKeys = (
  value: Record<string, unknown>,
  allowed: Set<string>,
  basePath: string,
  label: string,
  fail: (pathKey: string, message: string) => void
): void => {
  for (const key of Object.keys(value)) {
    if (!allowed.has(key)) {
      fail(basePath ? `${basePath}.${key}` : key, `Unknown ${label} key "${key}"`);
    }
  }
};

const checkStringMap = (
  value: unknown,
  pathKey: string,
  fail: (pathKey: string, message: string) => void
): void => {
  if (!isPlainObject(value)) {
    fail(pathKey, 'headers must be an object');
    return;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      fail(`${pathKey}.${key}`, 'header values must be strings');
    }
  }
};

const validateRootObject = (value: unknown, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];
  const fail = (pathKey: string, message: string) =>
    errors.push({ file: filePath, path: pathKey, message, severity: 'error' });

  if (!isPlainObject(value)) {
    fail('', 'Root document must be an object');
    return errors;
  }

  checkKeys(value, ROOT_KEYS, '', 'root', fail);

  if (!isNonEmptyString(value.scenario)) {
    fail('scenario', 'Scenario name must be a non-empty string');
  }

  if (!isNonEmptyString(value.provider)) {
    fail('provider', 'Provider must be a non-empty string');
  }

  if (value.description !== undefined && typeof value.description !== 'string') {
    fail('description', 'Description must be a string');
  }

  if (value.version !== undefined) {
    if (typeof value.version !== 'string') {
      fail('version', 'Version must be a string in x.y.z format');
    } else if (!/^\d+\.\d+\.\d+$/.test(value.version)) {
      fail('version', `Version "${value.version}" must match x.y.z`);
    }
  }

  if (!Array.isArray(value.mocks) || value.mocks.length === 0) {
    fail('mocks', 'Mocks must be a non-empty array');
  }

  return errors;
};

const checkPatterns = (
  request: Record<string, unknown>,
  basePath: string,
  fail: (pathKey: string, message: string) => void
): void => {
  if (typeof request.method !== 'string' || !isNonEmptyString(request.path)) {
    return;
  }

  const body = request.body;
  const bodyPattern =
    body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body);

  try {
    validateMockPatterns({
      method: 'GET',
      pathPattern: request.path,
      bodyPattern: bodyPattern === WILDCARD ? undefined : bodyPattern,
    });
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    const field = error.field === 'bodyPattern' ? 'body' : 'path';
    fail(`${basePath}.${field}`, error.message);
  }
};

const validateMock = (mock: unknown, filePath: string, index: number): ValidationError[] => {
  const errors: ValidationError[] = [];
  const basePath = `mocks[${index}]`;
  const mockId = isPlainObject(mock) && typeof mock.id === 'string' ? mock.id : undefined;
  const fail = (pathKey: string, message: string) =>
    errors.push({ file: filePath, path: pathKey, message, severity: 'error', mockId });

  if (!isPlainObject(mock)) {
    fail(basePath, 'Mock must be an object');
    return errors;
  }

  checkKeys(mock, MOCK_KEYS, basePath, 'mock', fail);

  if (mock.id !== undefined && !isNonEmptyString(mock.id)) {
    fail(`${basePath}.id`, 'Mock id must be a non-empty string');
  }

  const { request, respond } = mock;

  if (!isPlainObject(request)) {
    fail(`${basePath}.request`, 'request must be an object');
  } else {
    const requestPath = `${basePath}.request`;
    checkKeys(request, REQUEST_KEYS, requestPath, 'request', fail);

    if (typeof request.method !== 'string') {
      fail(`${requestPath}.method`, 'method is required');
    } else if (!VALID_METHODS.has(request.method)) {
      fail(`${requestPath}.method`, `"${request.method}" is not a valid HTTP method`);
    }

    if (!isNonEmptyString(request.path)) {
      fail(`${requestPath}.path`, 'path must be a non-empty string');
    } else if (!request.path.startsWith('/') && !request.path.startsWith('{*}')) {
      fail(`${requestPath}.path`, 'path must start with /');
    }

    if (request.headers !== undefined) {
      checkStringMap(request.headers, `${requestPath}.headers`, fail);
    }

    if (request.sequence !== undefined && !Number.isInteger(request.sequence)) {
      fail(`${requestPath}.sequence`, 'sequence must be an integer');
    }

    checkPatterns(request, requestPath, fail);
  }

  if (!isPlainObject(respond)) {
    fail(`${basePath}.respond`, 'respond must be an object');
  } else {
    const respondPath = `${basePath}.respond`;
    checkKeys(respond, RESPOND_KEYS, respondPath, 'respond', fail);

    if (respond.status === undefined) {
      fail(`${respondPath}.status`, 'status is required');
    } else if (typeof respond.status !== 'number' || !Number.isInteger(respond.status)) {
      fail(`${respondPath}.status`, 'status must be an integer');
    } else if (respond.status < 100 || respond.status > 599) {
      fail(`${respondPath}.status`, 'status must be between 100 and 599');
    }

    if (respond.body !== undefined && respond.bodyFile !== undefined) {
      fail(respondPath, 'Only one of body or bodyFile may be provided');
    }

    if (respond.bodyFile !== undefined && !isNonEmptyString(respond.bodyFile)) {
      fail(`${respondPath}.bodyFile`, 'bodyFile must be a string');
    }

    if (respond.headers !== undefined) {
      checkStringMap(respond.headers, `${respondPath}.headers`, fail);
    }

    if (respond.delayMs !== undefined) {
      if (typeof respond.delayMs !== 'number' || respond.delayMs < 0) {
        fail(`${respondPath}.delayMs`, 'delayMs must be >= 0');
      } else if (respond.delayMs > MAX_DELAY_MS) {
        fail(`${respondPath}.delayMs`, `delayMs must be <= ${MAX_DELAY_MS}`);
      }
    }
  }

  return errors;
};

const validateMockIds = (mocks: unknown[], filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];
  const seen = new Set<string>();

  mocks.forEach((mock, index) => {
    if (!isPlainObject(mock) || typeof mock.id !== 'string') return;
    if (seen.has(mock.id)) {
      errors.push({
        file: filePath,
        path: `mocks[${index}].id`,
        message: `Duplicate mock id "${mock.id}"`,
        severity: 'error',
        mockId: mock.id,
      });
    }
    seen.add(mock.id);
  });

  return errors;
};

export const validateScenarioContent = (filePath: string, content: string): ValidationResult => {
  const parseResult = parseYamlStrict(filePath, content);

  if (parseResult.data === undefined) {
    return { errors: parseResult.errors };
  }

  const data = parseResult.data;
  const rootErrors = validateRootObject(data, filePath);
  const errors = [...parseResult.errors, ...rootErrors];

  if (rootErrors.length > 0 || !isPlainObject(data) || !Array.isArray(data.mocks)) {
    return { errors };
  }

  const mocks: unknown[] = data.mocks;
  errors.push(
    ...mocks.flatMap((mock, index) => validateMock(mock, filePath, index)),
    ...validateMockIds(mocks, filePath)
  );

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  // Shape fully checked above.
  return { scenario: data as ScenarioFile, errors };
};

export const validateScenarioFile = async (filePath: string): Promise<ValidationResult> => {
  const content = await fs.readFile(filePath, 'utf-8');
  return validateScenarioContent(filePath, content);
};

export const validateScenarioSet = (
  scenarios: Array<ScenarioFile & { sourcePath: string }>
): ValidationError[] => {
  const errors: ValidationError[] = [];
  const seen = new Map<string, string>();

  for (const scenario of scenarios) {
    const name = scenario.scenario;
    const current = seen.get(name);
    if (current) {
      errors.push({
        file: scenario.sourcePath,
        path: 'scenario',
        message: `Duplicate scenario name "${name}" found in ${current}`,
        severity: 'error',
      });
    } else {
      seen.set(name, scenario.sourcePath);
    }
  }

  return errors;
};

export const formatValidationErrors = (errors: ValidationError[]): string => {
  return errors
    .map((error) => {
      const location = error.line !== undefined ? `:${error.line}:${error.column ?? 0}` : '';
      const pathLabel = error.mockId ? `${error.mockId}: ${error.path}` : error.path;
      return `${error.severity.toUpperCase()} ${error.file}${location}\n ○ ${pathLabel}\n   → ${error.message}`;
    })
    .join('\n\n');
};
