export { MockBackend } from './backend/mock-backend';
export type { MockBackendOptions } from './backend/mock-backend';
export { MockBuilder, MockRequestBuilder } from './builder/mock-builder';
export {
  MockRequests,
  MockResponses,
  withBodyPattern,
  withDelay,
  withHeadersPattern,
  withResponseHeaders,
  withSequence,
  withStatus,
} from './builder/definitions';
export { MatchingEngine } from './engine/matching-engine';
export {
  ConfigurationError,
  MockBackendError,
  NoMatchError,
  StorageError,
  isMockBackendError,
} from './errors';
export type { MockErrorKind } from './errors';
export {
  PROVIDERS,
  createAllProvidersBackend,
  createProviderHappyPath,
  happyPathScenario,
  loadProviderScenarios,
} from './fixtures/providers';
export type { Provider, ProviderFixtureOptions } from './fixtures/providers';
export { BaseBackend } from './http/backend';
export type { Backend } from './http/backend';
export { isSuccess, parseHttpMethod, parseJsonBody } from './http/types';
export type { HttpHeaders, HttpMethod, HttpRequest, HttpResponse } from './http/types';
export { createEventLogger, createNullEventLogger, createRecordingEventLogger } from './logging/event-logger';
export type { EventLogger, LogEvent, LogMode } from './logging/event-logger';
export { jsonSubsetMatches } from './matching/json-subset';
export type { JsonValue } from './matching/json-subset';
export {
  compilePathPattern,
  evaluateMock,
  matchesBody,
  matchesHeaders,
  matchesPath,
  validateMockPatterns,
} from './matching/matcher';
export { loadScenarios, loadScenarioFiles, ScenarioValidationError } from './scenarios/loader';
export { seedScenarios } from './scenarios/seed';
export type { LoadedScenario, ScenarioFile, ScenarioMock } from './scenarios/types';
export { createServer, startServer } from './server/server';
export { ScenarioRegistry } from './state/scenario-registry';
export { SqliteRecordStore } from './store/sqlite-store';
export type {
  CreateScenarioInput,
  MockPair,
  MockRequestInput,
  MockRequestRecord,
  MockResponseInput,
  MockResponseRecord,
  RecordStore,
  ScenarioRecord,
} from './store/types';
