import fs from 'node:fs/promises';
import type { MockBackend } from '../backend/mock-backend';
import type { MockRequestInput, MockResponseInput } from '../store/types';
import { resolveFrom } from '../utils/path';
import type { LoadedScenario, ScenarioMock } from './types';

const encode = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

const toRequestInput = (mock: ScenarioMock): MockRequestInput => ({
  method: mock.request.method,
  pathPattern: mock.request.path,
  bodyPattern: mock.request.body === undefined ? undefined : encode(mock.request.body),
  headersPattern: mock.request.headers ? JSON.stringify(mock.request.headers) : undefined,
  sequenceOrder: mock.request.sequence,
});

const readBody = async (scenario: LoadedScenario, mock: ScenarioMock): Promise<string> => {
  const { respond } = mock;
  if (respond.bodyFile) {
    return fs.readFile(resolveFrom(scenario.sourceDir, respond.bodyFile), 'utf-8');
  }
  return respond.body === undefined ? '' : encode(respond.body);
};

const toResponseInput = async (
  scenario: LoadedScenario,
  mock: ScenarioMock
): Promise<MockResponseInput> => ({
  statusCode: mock.respond.status,
  headers: mock.respond.headers ? JSON.stringify(mock.respond.headers) : undefined,
  body: await readBody(scenario, mock),
  delayMs: mock.respond.delayMs,
});

/**
 * Writes loaded scenario files into the backend: one scenario record each, then
 * its mocks in file order. A stored scenario of the same name is replaced, so a
 * file-backed store can be seeded again on every start.
 */
export const seedScenarios = async (
  backend: MockBackend,
  scenarios: LoadedScenario[]
): Promise<string[]> => {
  const names: string[] = [];

  for (const scenario of scenarios) {
    if (await backend.getScenario(scenario.scenario)) {
      await backend.deleteScenario(scenario.scenario);
    }
    await backend.createScenario({
      name: scenario.scenario,
      provider: scenario.provider,
      description: scenario.description,
    });

    for (const mock of scenario.mocks) {
      await backend.addMock(scenario.scenario, toRequestInput(mock), await toResponseInput(scenario, mock));
    }

    names.push(scenario.scenario);
  }

  return names;
};
