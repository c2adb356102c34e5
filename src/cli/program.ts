import { Command } from 'commander';
import { MockBackend } from '../backend/mock-backend';
import { resolveServeConfig, type ServeFlags } from '../config';
import { errorMessage } from '../errors';
import { loadProviderScenarios } from '../fixtures/providers';
import {
  createEventLogger,
  createNullEventLogger,
  type EventLogger,
  type LogMode,
} from '../logging/event-logger';
import { loadScenarios, ScenarioValidationError } from '../scenarios/loader';
import { seedScenarios } from '../scenarios/seed';
import { startServer } from '../server/server';
import { startScenarioUI } from '../ui/scenario-ui';
import { createLogger } from '../utils/logger';

const createEvents = (enabled: boolean, mode: LogMode): EventLogger =>
  enabled ? createEventLogger({ mode, format: mode === 'ci' ? 'jsonl' : 'pretty' }) : createNullEventLogger();

const runValidate = async (dir: string, options: { logging?: boolean }): Promise<void> => {
  const logger = createLogger('mock-backend:cli');
  const eventLogger = createEvents(Boolean(options.logging), process.env.CI ? 'ci' : 'cli');

  try {
    const scenarios = await loadScenarios(dir, eventLogger);
    const mockCount = scenarios.reduce((total, scenario) => total + scenario.mocks.length, 0);
    logger.info(`${scenarios.length} scenario(s), ${mockCount} mock(s) valid`);
  } catch (error) {
    if (error instanceof ScenarioValidationError) {
      logger.error(error.message);
    } else {
      logger.error(errorMessage(error, 'Unknown validation error'));
    }
    process.exitCode = 1;
  }
};

const runServe = async (flags: ServeFlags): Promise<void> => {
  let eventLogger = createNullEventLogger();

  try {
    const config = resolveServeConfig(flags);
    eventLogger = createEvents(config.logging, config.mode);

    eventLogger.emitEvent({
      event: 'startup',
      mode: config.mode,
      port: config.port,
      database: config.database,
      sourceDir: config.sourceDir,
      providers: config.providers,
      ui: config.ui,
    });

    const backend = await MockBackend.create({ database: config.database, eventLogger });
    const scenarios = [
      ...(await loadProviderScenarios(config.providers)),
      ...(await loadScenarios(config.sourceDir, eventLogger)),
    ];
    await seedScenarios(backend, scenarios);

    if (config.scenario) {
      await backend.activateScenario(config.scenario);
    }

    if (config.ui) {
      startScenarioUI(
        scenarios.map((scenario) => ({ name: scenario.scenario, provider: scenario.provider })),
        backend.activeScenario(),
        (next) => {
          const switched = next ? backend.activateScenario(next) : backend.deactivateScenario();
          switched.catch((error: unknown) => {
            eventLogger.emitEvent({
              event: 'scenario-switch-failed',
              scenario: next,
              message: errorMessage(error),
            });
          });
        }
      );
    }

    await startServer({ backend, eventLogger, port: config.port });
  } catch (error) {
    eventLogger.emitEvent({
      event: 'startup-failed',
      message: errorMessage(error, 'Unknown startup error'),
    });
    process.exitCode = 1;
  }
};

export const createProgram = (): Command => {
  const program = new Command();

  program
    .name('mock-backend')
    .description('Scenario-driven mock backend for HTTP provider integrations')
    .version('0.1.0');

  program
    .command('validate')
    .description('Validate a directory of .yaml scenario files')
    .argument('<dir>', 'Directory containing scenario files')
    .option('--logging', 'Emit deterministic logs', false)
    .action(runValidate);

  program
    .command('serve')
    .description('Serve scenarios over HTTP')
    .option('--source <dir>', 'Directory containing .yaml scenario files')
    .option('--providers <list>', 'Built-in provider fixtures to load (comma separated, or all)')
    .option('--scenario <name>', 'Scenario to activate on startup')
    .option('--port <number>', 'Server port (default 4010, or MOCK_BACKEND_PORT)')
    .option('--db <path>', 'SQLite database file (default :memory:, or MOCK_BACKEND_DB)')
    .option('--ui', 'Interactive scenario selector', false)
    .option('--logging', 'Emit deterministic logs', false)
    .addHelpText(
      'after',
      `\nExamples:\n  mock-backend serve --providers plaid --scenario plaid_happy_path\n  mock-backend serve --source ./scenarios --ui\n`
    )
    .action(runServe);

  return program;
};
