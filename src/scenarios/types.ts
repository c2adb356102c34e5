import type { HttpMethod } from '../http/types';

export type ScenarioMockRequest = {
  method: HttpMethod;
  path: string;
  /** String pattern as-is; mappings and lists are stored as JSON. */
  body?: unknown;
  headers?: Record<string, string>;
  sequence?: number;
};

export type ScenarioMockRespond = {
  status: number;
  body?: unknown;
  bodyFile?: string;
  headers?: Record<string, string>;
  delayMs?: number;
};

export type ScenarioMock = {
  id?: string;
  request: ScenarioMockRequest;
  respond: ScenarioMockRespond;
};

export type ScenarioFile = {
  scenario: string;
  provider: string;
  description?: string;
  version?: string;
  mocks: ScenarioMock[];
};

export type LoadedScenario = ScenarioFile & {
  sourcePath: string;
  sourceDir: string;
};
