import { ConfigurationError, NoMatchError } from '../errors';
import { BaseBackend } from '../http/backend';
import type { HttpHeaders, HttpRequest, HttpResponse } from '../http/types';
import { MatchingEngine } from '../engine/matching-engine';
import { createNullEventLogger, type EventLogger } from '../logging/event-logger';
import { parseHeaderMap, validateMockPatterns } from '../matching/matcher';
import { ScenarioRegistry } from '../state/scenario-registry';
import { SqliteRecordStore } from '../store/sqlite-store';
import type {
  CreateScenarioInput,
  MockPair,
  MockRequestInput,
  MockResponseInput,
  RecordStore,
  ScenarioRecord,
} from '../store/types';
import { createLogger, type Logger } from '../utils/logger';
import { MAX_DELAY_MS, sleep } from '../utils/sleep';

export type MockBackendOptions = {
  /** Any RecordStore; defaults to an in-memory SQLite store. */
  store?: RecordStore;
  /** SQLite file for the default store. Ignored when `store` is given. */
  database?: string;
  /** Builds the registry over the backend's store; one fresh registry per backend by default. */
  registry?: (store: RecordStore) => ScenarioRegistry;
  eventLogger?: EventLogger;
  logger?: Logger;
};

const validateResponse = (response: MockResponseInput): void => {
  if (!Number.isInteger(response.statusCode) || response.statusCode < 100 || response.statusCode > 599) {
    throw new ConfigurationError(
      `Status code ${response.statusCode} must be an integer between 100 and 599`,
      'statusCode'
    );
  }
  if (response.headers !== undefined) {
    parseHeaderMap(response.headers, 'headers');
  }
  if (response.delayMs !== undefined && (!Number.isFinite(response.delayMs) || response.delayMs < 0)) {
    throw new ConfigurationError('delayMs must be >= 0', 'delayMs');
  }
  if (response.delayMs !== undefined && response.delayMs > MAX_DELAY_MS) {
    throw new ConfigurationError(`delayMs must be <= ${MAX_DELAY_MS}`, 'delayMs');
  }
};

/**
 * Answers provider-client requests from the active scenario's mocks.
 *
 * Unmatched requests are rejected with {@link NoMatchError}; there is no fallback
 * response.
 */
export class MockBackend extends BaseBackend {
  private readonly engine: MatchingEngine;
  private switching: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly store: RecordStore,
    private readonly registry: ScenarioRegistry,
    private readonly eventLogger: EventLogger,
    private readonly logger: Logger
  ) {
    super();
    this.engine = new MatchingEngine(store);
  }

  static async create(options: MockBackendOptions = {}): Promise<MockBackend> {
    const logger = options.logger ?? createLogger('mock-backend');
    const store = options.store ?? new SqliteRecordStore({ filename: options.database });
    await store.init();
    const registry = options.registry ? options.registry(store) : new ScenarioRegistry(store);
    return new MockBackend(store, registry, options.eventLogger ?? createNullEventLogger(), logger);
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    const snapshot = this.registry.snapshot();
    const headerKeys = Object.keys(request.headers).map((key) => key.toLowerCase()).sort();

    let match: MockPair | undefined;
    try {
      match = await this.engine.findMatch(request, snapshot.name, ({ scenario, mock, result }) => {
        this.eventLogger.emitEvent({
          event: 'mock-evaluated',
          scenario,
          requestId: mock.id,
          sequenceOrder: mock.sequenceOrder,
          request: { method: request.method, url: request.url, headers: headerKeys },
          result: result.matched ? 'matched' : 'not-matched',
          reason: result.reason,
        });
      });
    } catch (error) {
      this.eventLogger.emitEvent({ event: 'execution-complete', source: 'error' });
      throw error;
    }

    if (!match) {
      this.logger.debug('no mock for %s %s (scenario %s)', request.method, request.url, snapshot.name);
      this.eventLogger.emitEvent({
        event: 'no-match',
        method: request.method,
        url: request.url,
        activeScenario: snapshot.name,
      });
      this.eventLogger.emitEvent({ event: 'execution-complete', source: 'no-match' });
      throw new NoMatchError(request.method, request.url);
    }

    const { request: mock, response } = match;
    this.eventLogger.emitEvent({
      event: 'mock-matched',
      scenario: snapshot.name ?? '',
      requestId: mock.id,
      delayMs: response.delayMs ?? undefined,
    });

    if (response.delayMs) {
      await sleep(response.delayMs);
    }

    const headers: HttpHeaders = response.headers ? parseHeaderMap(response.headers, 'headers') : {};

    this.registry.recordMatch(mock.id, snapshot.epoch);
    await this.store.incrementTimesMatched(mock.id);

    this.eventLogger.emitEvent({
      event: 'execution-complete',
      source: 'mock',
      status: response.statusCode,
    });

    return {
      status: response.statusCode,
      headers,
      body: response.body,
    };
  }

  async createScenario(input: CreateScenarioInput): Promise<ScenarioRecord> {
    const scenario = await this.store.createScenario(input);
    this.eventLogger.emitEvent({
      event: 'scenario-created',
      scenario: scenario.name,
      provider: scenario.provider,
    });
    return scenario;
  }

  async addMock(
    scenarioName: string,
    request: MockRequestInput,
    response: MockResponseInput
  ): Promise<MockPair> {
    validateMockPatterns(request);
    validateResponse(response);

    const pair = await this.store.createMock(scenarioName, request, response);
    this.eventLogger.emitEvent({
      event: 'mock-registered',
      scenario: scenarioName,
      requestId: pair.request.id,
      method: pair.request.method,
      path: pair.request.pathPattern,
      sequenceOrder: pair.request.sequenceOrder,
    });
    return pair;
  }

  /** Switches apply in call order, together with the store's active flag. */
  activateScenario(name: string): Promise<void> {
    return this.serialize(async () => {
      await this.registry.activate(name);
      await this.store.markActive(name);
      this.eventLogger.emitEvent({ event: 'scenario-activated', scenario: name });
    });
  }

  deactivateScenario(): Promise<void> {
    return this.serialize(() => this.deactivate());
  }

  activeScenario(): string | undefined {
    return this.registry.active();
  }

  onScenarioChange(handler: (scenario: string | undefined) => void): void {
    this.registry.on('change', handler);
  }

  listScenarios(): Promise<ScenarioRecord[]> {
    return this.store.listScenarios();
  }

  getScenario(name: string): Promise<ScenarioRecord | undefined> {
    return this.store.findScenarioByName(name);
  }

  deleteScenario(name: string): Promise<void> {
    return this.serialize(async () => {
      await this.store.deleteScenario(name);
      if (this.registry.active() === name) {
        await this.registry.deactivate();
      }
      this.eventLogger.emitEvent({ event: 'scenario-deleted', scenario: name });
    });
  }

  listMocks(scenarioName: string): Promise<MockPair[]> {
    return this.store.listScenarioMocks(scenarioName);
  }

  /** Matches since the current scenario was activated. */
  matchCount(requestId: number): number {
    return this.registry.matchCount(requestId);
  }

  matchCounts(): Map<number, number> {
    return this.registry.matchCounts();
  }

  reset(): Promise<void> {
    return this.serialize(async () => {
      await this.store.reset();
      await this.registry.deactivate();
      this.eventLogger.emitEvent({ event: 'store-reset' });
    });
  }

  close(): Promise<void> {
    return this.store.close();
  }

  private async deactivate(): Promise<void> {
    const previous = this.registry.active();
    await this.registry.deactivate();
    await this.store.markActive(undefined);
    this.eventLogger.emitEvent({ event: 'scenario-deactivated', previous });
  }

  private serialize<T>(step: () => Promise<T>): Promise<T> {
    const next = this.switching.then(step);
    this.switching = next.catch(() => undefined);
    return next;
  }
}
