import type { HttpMethod } from '../http/types';
import type { MockRequestRecord, MockResponseRecord, ScenarioRecord } from './schema';

export type { MockRequestRecord, MockResponseRecord, ScenarioRecord } from './schema';

export type CreateScenarioInput = {
  name: string;
  provider: string;
  description?: string;
};

export type MockRequestInput = {
  method: HttpMethod;
  pathPattern: string;
  bodyPattern?: string;
  headersPattern?: string;
  sequenceOrder?: number;
};

export type MockResponseInput = {
  statusCode: number;
  headers?: string;
  body: string;
  delayMs?: number;
};

export type MockPair = {
  request: MockRequestRecord;
  response: MockResponseRecord;
};

/**
 * Persistence for scenarios and their mocks. Every operation may reject with a
 * StorageError; lookups by name reject with a ConfigurationError when the scenario
 * does not exist, except the find* methods which resolve to undefined.
 */
export interface RecordStore {
  init(): Promise<void>;

  createScenario(input: CreateScenarioInput): Promise<ScenarioRecord>;
  findScenarioById(id: number): Promise<ScenarioRecord | undefined>;
  findScenarioByName(name: string): Promise<ScenarioRecord | undefined>;
  listScenarios(): Promise<ScenarioRecord[]>;
  /** Removes the scenario with its requests and responses in one transaction. */
  deleteScenario(name: string): Promise<void>;
  /** Informational flag only; activation through the registry is authoritative. */
  markActive(name: string | undefined): Promise<void>;

  createMock(
    scenarioName: string,
    request: MockRequestInput,
    response: MockResponseInput
  ): Promise<MockPair>;
  listMockRequests(scenarioId: number, method: HttpMethod): Promise<MockRequestRecord[]>;
  listScenarioMocks(scenarioName: string): Promise<MockPair[]>;
  findMockResponse(requestId: number): Promise<MockResponseRecord | undefined>;
  incrementTimesMatched(requestId: number): Promise<void>;

  reset(): Promise<void>;
  close(): Promise<void>;
}
