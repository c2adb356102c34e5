import { ConfigurationError } from './errors';
import { isProvider, PROVIDERS, type Provider } from './fixtures/providers';
import type { LogMode } from './logging/event-logger';

export type ServeFlags = {
  source?: string;
  providers?: string;
  scenario?: string;
  port?: string;
  db?: string;
  ui?: boolean;
  logging?: boolean;
};

export type ServeConfig = {
  port: number;
  database: string;
  sourceDir?: string;
  providers: Provider[];
  scenario?: string;
  ui: boolean;
  logging: boolean;
  mode: LogMode;
};

export const DEFAULT_PORT = 4010;
export const DEFAULT_DATABASE = ':memory:';

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port "${value}"`, 'port');
  }
  return port;
};

const parseProviders = (value: string | undefined): Provider[] => {
  if (!value) return [];
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  if (names.includes('all')) return [...PROVIDERS];

  return names.map((name) => {
    if (!isProvider(name)) {
      throw new ConfigurationError(
        `Unknown provider "${name}" (expected one of ${PROVIDERS.join(', ')}, or all)`,
        'providers'
      );
    }
    return name;
  });
};

/**
 * Flags win over environment: `MOCK_BACKEND_PORT`, `MOCK_BACKEND_DB`. `CI` switches
 * the event log to JSONL.
 */
export const resolveServeConfig = (
  flags: ServeFlags,
  env: NodeJS.ProcessEnv = process.env
): ServeConfig => {
  const ui = Boolean(flags.ui);
  const portValue = flags.port ?? env.MOCK_BACKEND_PORT;

  return {
    port: portValue ? parsePort(portValue) : DEFAULT_PORT,
    database: flags.db?.trim() || env.MOCK_BACKEND_DB?.trim() || DEFAULT_DATABASE,
    sourceDir: flags.source?.trim() || undefined,
    providers: parseProviders(flags.providers),
    scenario: flags.scenario?.trim() || undefined,
    ui,
    logging: Boolean(flags.logging),
    mode: ui ? 'ui' : env.CI ? 'ci' : 'cli',
  };
};
