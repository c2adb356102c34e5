import Database from 'better-sqlite3';
import { and, asc, eq, inArray, max, sql } from 'drizzle-orm';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { ConfigurationError, MockBackendError, StorageError } from '../errors';
import type { HttpMethod } from '../http/types';
import { createLogger, type Logger } from '../utils/logger';
import * as schema from './schema';
import { CREATE_TABLES, mockRequests, mockResponses, scenarios } from './schema';
import type {
  CreateScenarioInput,
  MockPair,
  MockRequestInput,
  MockRequestRecord,
  MockResponseInput,
  MockResponseRecord,
  RecordStore,
  ScenarioRecord,
} from './types';

export type SqliteStoreOptions = {
  /** File path or `:memory:`. */
  filename?: string;
  logger?: Logger;
};

type Db = BetterSQLite3Database<typeof schema>;

const guard = <T>(operation: string, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof MockBackendError) {
      throw error;
    }
    throw new StorageError(operation, error);
  }
};

export class SqliteRecordStore implements RecordStore {
  private readonly sqlite: Database.Database;
  private readonly db: Db;
  private readonly logger: Logger;

  constructor(options: SqliteStoreOptions = {}) {
    const filename = options.filename ?? ':memory:';
    this.logger = options.logger ?? createLogger('mock-backend:store');
    this.sqlite = guard('open database', () => new Database(filename));
    this.sqlite.pragma('foreign_keys = ON');
    this.db = drizzle(this.sqlite, { schema });
    this.logger.debug('opened %s', filename);
  }

  async init(): Promise<void> {
    guard('create tables', () => {
      for (const statement of CREATE_TABLES) {
        this.db.run(statement);
      }
    });
  }

  async createScenario(input: CreateScenarioInput): Promise<ScenarioRecord> {
    const now = new Date();
    const [created] = guard('create scenario', () =>
      this.db
        .insert(scenarios)
        .values({
          name: input.name,
          provider: input.provider,
          description: input.description ?? null,
          isActive: false,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .all()
    );
    this.logger.debug('created scenario %s (%d)', created.name, created.id);
    return created;
  }

  async findScenarioById(id: number): Promise<ScenarioRecord | undefined> {
    return guard('find scenario', () =>
      this.db.select().from(scenarios).where(eq(scenarios.id, id)).get()
    );
  }

  async findScenarioByName(name: string): Promise<ScenarioRecord | undefined> {
    return guard('find scenario', () => this.getScenario(this.db, name));
  }

  async listScenarios(): Promise<ScenarioRecord[]> {
    return guard('list scenarios', () =>
      this.db.select().from(scenarios).orderBy(asc(scenarios.name)).all()
    );
  }

  async deleteScenario(name: string): Promise<void> {
    guard('delete scenario', () =>
      this.db.transaction((tx) => {
        const scenario = this.requireScenario(tx, name);
        const requestIds = tx
          .select({ id: mockRequests.id })
          .from(mockRequests)
          .where(eq(mockRequests.scenarioId, scenario.id));

        tx.delete(mockResponses).where(inArray(mockResponses.requestId, requestIds)).run();
        tx.delete(mockRequests).where(eq(mockRequests.scenarioId, scenario.id)).run();
        tx.delete(scenarios).where(eq(scenarios.id, scenario.id)).run();
      })
    );
    this.logger.debug('deleted scenario %s', name);
  }

  async markActive(name: string | undefined): Promise<void> {
    const now = new Date();
    guard('update scenario flags', () =>
      this.db.transaction((tx) => {
        tx.update(scenarios)
          .set({ isActive: false, updatedAt: now })
          .where(eq(scenarios.isActive, true))
          .run();
        if (name) {
          tx.update(scenarios)
            .set({ isActive: true, updatedAt: now })
            .where(eq(scenarios.name, name))
            .run();
        }
      })
    );
  }

  async createMock(
    scenarioName: string,
    request: MockRequestInput,
    response: MockResponseInput
  ): Promise<MockPair> {
    const pair = guard('create mock', () =>
      this.db.transaction((tx) => {
        const scenario = this.requireScenario(tx, scenarioName);
        const now = new Date();
        const sequenceOrder = request.sequenceOrder ?? this.nextSequenceOrder(tx, scenario.id);

        const [createdRequest] = tx
          .insert(mockRequests)
          .values({
            scenarioId: scenario.id,
            method: request.method,
            pathPattern: request.pathPattern,
            bodyPattern: request.bodyPattern ?? null,
            headersPattern: request.headersPattern ?? null,
            sequenceOrder,
            timesMatched: 0,
            createdAt: now,
          })
          .returning()
          .all();

        const [createdResponse] = tx
          .insert(mockResponses)
          .values({
            requestId: createdRequest.id,
            statusCode: response.statusCode,
            headers: response.headers ?? null,
            body: response.body,
            delayMs: response.delayMs ?? null,
            createdAt: now,
          })
          .returning()
          .all();

        return { request: createdRequest, response: createdResponse };
      })
    );
    this.logger.debug(
      'added mock %d to %s: %s %s (order %d)',
      pair.request.id,
      scenarioName,
      pair.request.method,
      pair.request.pathPattern,
      pair.request.sequenceOrder
    );
    return pair;
  }

  async listMockRequests(scenarioId: number, method: HttpMethod): Promise<MockRequestRecord[]> {
    return guard('query mock requests', () =>
      this.db
        .select()
        .from(mockRequests)
        .where(and(eq(mockRequests.scenarioId, scenarioId), eq(mockRequests.method, method)))
        .orderBy(asc(mockRequests.sequenceOrder), asc(mockRequests.id))
        .all()
    );
  }

  async listScenarioMocks(scenarioName: string): Promise<MockPair[]> {
    return guard('list mocks', () => {
      const scenario = this.requireScenario(this.db, scenarioName);
      return this.db
        .select({ request: mockRequests, response: mockResponses })
        .from(mockRequests)
        .innerJoin(mockResponses, eq(mockResponses.requestId, mockRequests.id))
        .where(eq(mockRequests.scenarioId, scenario.id))
        .orderBy(asc(mockRequests.sequenceOrder), asc(mockRequests.id))
        .all();
    });
  }

  async findMockResponse(requestId: number): Promise<MockResponseRecord | undefined> {
    return guard('query mock response', () =>
      this.db.select().from(mockResponses).where(eq(mockResponses.requestId, requestId)).get()
    );
  }

  async incrementTimesMatched(requestId: number): Promise<void> {
    guard('update match count', () =>
      this.db
        .update(mockRequests)
        .set({ timesMatched: sql`${mockRequests.timesMatched} + 1` })
        .where(eq(mockRequests.id, requestId))
        .run()
    );
  }

  async reset(): Promise<void> {
    guard('reset store', () =>
      this.db.transaction((tx) => {
        tx.delete(mockResponses).run();
        tx.delete(mockRequests).run();
        tx.delete(scenarios).run();
      })
    );
    this.logger.debug('store reset');
  }

  async close(): Promise<void> {
    guard('close database', () => this.sqlite.close());
  }

  private getScenario(db: Pick<Db, 'select'>, name: string): ScenarioRecord | undefined {
    return db.select().from(scenarios).where(eq(scenarios.name, name)).get();
  }

  private requireScenario(db: Pick<Db, 'select'>, name: string): ScenarioRecord {
    const scenario = this.getScenario(db, name);
    if (!scenario) {
      throw new ConfigurationError(`Scenario not found: ${name}`, 'scenario');
    }
    return scenario;
  }

  private nextSequenceOrder(db: Pick<Db, 'select'>, scenarioId: number): number {
    const row = db
      .select({ value: max(mockRequests.sequenceOrder) })
      .from(mockRequests)
      .where(eq(mockRequests.scenarioId, scenarioId))
      .get();
    return (row?.value ?? 0) + 1;
  }
}
