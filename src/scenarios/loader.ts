import fs from 'node:fs/promises';
import path from 'node:path';
import type { EventLogger } from '../logging/event-logger';
import type { LoadedScenario } from './types';
import {
  formatValidationErrors,
  validateScenarioFile,
  validateScenarioSet,
  type ValidationError,
} from './validation';

const isScenarioFile = (name: string): boolean => {
  const lower = name.toLowerCase();
  return lower.endsWith('.yaml') || lower.endsWith('.yml');
};

const readDirRecursive = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await readDirRecursive(fullPath)));
    } else {
      files.push(fullPath);
    }
  }

  return files;
};

export class ScenarioValidationError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(formatValidationErrors(errors));
    this.name = 'ScenarioValidationError';
    this.errors = errors;
  }
}

/**
 * Reads and validates every `.yaml`/`.yml` scenario under `sourceDir`. Files are
 * processed in sorted order; any validation error fails the whole load.
 */
export const loadScenarios = async (
  sourceDir?: string,
  eventLogger?: EventLogger
): Promise<LoadedScenario[]> => {
  if (!sourceDir) {
    eventLogger?.emitEvent({
      event: 'scenarios-discovered',
      scenarios: [],
    });
    return [];
  }

  const files = await readDirRecursive(sourceDir);
  return loadScenarioFiles(files.filter((file) => isScenarioFile(file)).sort(), eventLogger);
};

export const loadScenarioFiles = async (
  scenarioFiles: string[],
  eventLogger?: EventLogger
): Promise<LoadedScenario[]> => {
  eventLogger?.emitEvent({
    event: 'config-files',
    files: scenarioFiles,
  });

  const scenarios: LoadedScenario[] = [];
  const validationErrors: ValidationError[] = [];

  for (const filePath of scenarioFiles) {
    const result = await validateScenarioFile(filePath);

    if (result.errors.some((entry) => entry.severity === 'error')) {
      const sortedErrors = [...result.errors].sort((a, b) =>
        `${a.path}:${a.message}`.localeCompare(`${b.path}:${b.message}`)
      );
      eventLogger?.emitEvent({
        event: 'validation-file',
        file: filePath,
        result: 'failed',
        errors: sortedErrors.map((error) => ({
          path: error.path,
          message: error.message,
          severity: error.severity,
          mockId: error.mockId,
          line: error.line,
          column: error.column,
        })),
      });
      validationErrors.push(...result.errors);
      continue;
    }

    eventLogger?.emitEvent({
      event: 'validation-file',
      file: filePath,
      result: 'ok',
    });
    validationErrors.push(...result.errors);

    if (result.scenario) {
      scenarios.push({
        ...result.scenario,
        sourcePath: filePath,
        sourceDir: path.dirname(filePath),
      });
    }
  }

  validationErrors.push(...validateScenarioSet(scenarios));

  eventLogger?.emitEvent({
    event: 'scenarios-discovered',
    scenarios: scenarios.map((scenario) => scenario.scenario).sort(),
  });

  const errorList = validationErrors.filter((entry) => entry.severity === 'error');
  const warningList = validationErrors.filter((entry) => entry.severity === 'warning');

  eventLogger?.emitEvent({
    event: 'validation-summary',
    errors: errorList.length,
    warnings: warningList.length,
  });

  if (errorList.length > 0) {
    throw new ScenarioValidationError(errorList);
  }

  return scenarios;
};
