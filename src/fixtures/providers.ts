import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { MockBackend, type MockBackendOptions } from '../backend/mock-backend';
import { ConfigurationError } from '../errors';
import { loadScenarios } from '../scenarios/loader';
import { seedScenarios } from '../scenarios/seed';
import type { LoadedScenario } from '../scenarios/types';

export const PROVIDERS = ['plaid', 'truelayer', 'teller', 'gocardless', 'yapily', 'mx'] as const;

export type Provider = (typeof PROVIDERS)[number];

export type ProviderFixtureOptions = MockBackendOptions & {
  /** Directory holding one sub-directory of scenario files per provider. */
  fixturesDir?: string;
};

export const isProvider = (value: string): value is Provider =>
  PROVIDERS.some((provider) => provider === value);

export const happyPathScenario = (provider: Provider): string => `${provider}_happy_path`;

const FIXTURES_SUBDIR = path.join('fixtures', 'providers');

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

/**
 * Finds `fixtures/providers` by walking up from this module, so it resolves both
 * from the sources and from the bundled `dist/`.
 */
export const locateFixturesDir = async (): Promise<string> => {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = path.join(dir, FIXTURES_SUBDIR);
    if (await exists(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new ConfigurationError(`Could not locate ${FIXTURES_SUBDIR}`, 'fixturesDir');
    }
    dir = parent;
  }
};

export const loadProviderScenarios = async (
  providers: readonly Provider[],
  fixturesDir?: string
): Promise<LoadedScenario[]> => {
  if (providers.length === 0) return [];
  const baseDir = fixturesDir ?? (await locateFixturesDir());
  const loaded: LoadedScenario[] = [];
  for (const provider of providers) {
    loaded.push(...(await loadScenarios(path.join(baseDir, provider))));
  }
  return loaded;
};

/** A backend holding every scenario of `provider`, with its happy path active. */
export const createProviderHappyPath = async (
  provider: Provider,
  options: ProviderFixtureOptions = {}
): Promise<MockBackend> => {
  const backend = await MockBackend.create(options);
  await seedScenarios(backend, await loadProviderScenarios([provider], options.fixturesDir));
  await backend.activateScenario(happyPathScenario(provider));
  return backend;
};

/** Every provider's scenarios, none active. */
export const createAllProvidersBackend = async (
  options: ProviderFixtureOptions = {}
): Promise<MockBackend> => {
  const backend = await MockBackend.create(options);
  await seedScenarios(backend, await loadProviderScenarios(PROVIDERS, options.fixturesDir));
  return backend;
};
