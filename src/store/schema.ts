import { sql } from 'drizzle-orm';
import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const scenarios = sqliteTable('scenarios', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  provider: text('provider').notNull(),
  description: text('description'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const mockRequests = sqliteTable(
  'mock_requests',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    scenarioId: integer('scenario_id')
      .notNull()
      .references(() => scenarios.id, { onDelete: 'cascade' }),
    method: text('method').notNull(),
    pathPattern: text('path_pattern').notNull(),
    bodyPattern: text('body_pattern'),
    headersPattern: text('headers_pattern'),
    sequenceOrder: integer('sequence_order').notNull(),
    timesMatched: integer('times_matched').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    scenarioMethodIdx: index('mock_requests_scenario_method_idx').on(
      table.scenarioId,
      table.method,
      table.sequenceOrder
    ),
  })
);

export const mockResponses = sqliteTable('mock_responses', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  requestId: integer('request_id')
    .notNull()
    .unique()
    .references(() => mockRequests.id, { onDelete: 'cascade' }),
  statusCode: integer('status_code').notNull(),
  headers: text('headers'),
  body: text('body').notNull(),
  delayMs: integer('delay_ms'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

export type ScenarioRecord = typeof scenarios.$inferSelect;
export type MockRequestRecord = typeof mockRequests.$inferSelect;
export type MockResponseRecord = typeof mockResponses.$inferSelect;

/**
 * DDL matching the table definitions above. Applied on store init; there is no
 * migration history because every store starts empty.
 */
export const CREATE_TABLES = [
  sql`CREATE TABLE IF NOT EXISTS scenarios (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    provider TEXT NOT NULL,
    description TEXT,
    is_active INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  sql`CREATE TABLE IF NOT EXISTS mock_requests (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    scenario_id INTEGER NOT NULL REFERENCES scenarios(id) ON DELETE CASCADE,
    method TEXT NOT NULL,
    path_pattern TEXT NOT NULL,
    body_pattern TEXT,
    headers_pattern TEXT,
    sequence_order INTEGER NOT NULL,
    times_matched INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL
  )`,
  sql`CREATE INDEX IF NOT EXISTS mock_requests_scenario_method_idx
    ON mock_requests (scenario_id, method, sequence_order)`,
  sql`CREATE TABLE IF NOT EXISTS mock_responses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_id INTEGER NOT NULL UNIQUE REFERENCES mock_requests(id) ON DELETE CASCADE,
    status_code INTEGER NOT NULL,
    headers TEXT,
    body TEXT NOT NULL,
    delay_ms INTEGER,
    created_at INTEGER NOT NULL
  )`,
];
