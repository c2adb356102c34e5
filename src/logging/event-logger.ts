import { EventEmitter } from 'node:events';

export type LogMode = 'ci' | 'cli' | 'ui';

export type ValidationEventError = {
  path: string;
  message: string;
  severity: 'error' | 'warning';
  mockId?: string;
  line?: number;
  column?: number;
};

export type LogEvent =
  | {
      event: 'startup';
      mode: LogMode;
      port: number;
      database: string;
      sourceDir?: string;
      providers: string[];
      ui: boolean;
    }
  | {
      event: 'startup-failed';
      message: string;
    }
  | {
      event: 'scenario-switch-failed';
      scenario?: string;
      message: string;
    }
  | {
      event: 'config-files';
      files: string[];
    }
  | {
      event: 'validation-file';
      file: string;
      result: 'ok' | 'failed';
      errors?: ValidationEventError[];
    }
  | {
      event: 'validation-summary';
      errors: number;
      warnings: number;
    }
  | {
      event: 'scenarios-discovered';
      scenarios: string[];
    }
  | {
      event: 'scenario-created';
      scenario: string;
      provider: string;
    }
  | {
      event: 'mock-registered';
      scenario: string;
      requestId: number;
      method: string;
      path: string;
      sequenceOrder: number;
    }
  | {
      event: 'scenario-activated';
      scenario: string;
    }
  | {
      event: 'scenario-deactivated';
      previous?: string;
    }
  | {
      event: 'scenario-deleted';
      scenario: string;
    }
  | {
      event: 'store-reset';
    }
  | {
      event: 'mock-evaluated';
      scenario: string;
      requestId: number;
      sequenceOrder: number;
      request: {
        method: string;
        url: string;
        headers: string[];
      };
      result: 'matched' | 'not-matched';
      reason?: string;
    }
  | {
      event: 'mock-matched';
      scenario: string;
      requestId: number;
      delayMs?: number;
    }
  | {
      event: 'no-match';
      method: string;
      url: string;
      activeScenario?: string;
    }
  | {
      event: 'execution-complete';
      source: 'mock' | 'no-match' | 'error';
      status?: number;
    }
  | {
      event: 'server-ready';
      port: number;
    };

export type EventLogger = {
  emitEvent: (event: LogEvent) => void;
  onEvent: (handler: (event: LogEvent) => void) => void;
};

export type EventLoggerOptions = {
  mode: LogMode;
  format?: 'jsonl' | 'pretty';
  stream?: NodeJS.WritableStream;
};

export const stableStringify = (value: unknown): string => {
  if (value === undefined) {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));

  const body = entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',');
  return `{${body}}`;
};

const fieldLines = (fields: Record<string, unknown>): string[] =>
  Object.entries(fields).map(([key, value]) => ` ○ ${key}=${value ?? 'none'}`);

export const createEventLogger = ({ mode, stream, format }: EventLoggerOptions): EventLogger => {
  const emitter = new EventEmitter();
  const output = stream ?? (mode === 'ui' ? process.stderr : process.stdout);
  const activeFormat = format ?? (mode === 'ci' ? 'jsonl' : stream ? 'jsonl' : 'pretty');

  const colors = {
    reset: '\u001b[0m',
    green: '\u001b[32m',
    red: '\u001b[31m',
    lightBlue: '\u001b[94m',
  };

  const colorizeLine = (line: string): string => {
    if (activeFormat !== 'pretty' || mode === 'ci') {
      return line;
    }

    if (line.startsWith('✔')) {
      return `${colors.green}${line}${colors.reset}`;
    }

    if (line.startsWith('✖')) {
      return `${colors.red}${line}${colors.reset}`;
    }

    if (line.startsWith('▶') || line.startsWith('○')) {
      return `${colors.lightBlue}${line}${colors.reset}`;
    }

    return line;
  };

  const block = (title: string, fields: Record<string, unknown>): string =>
    [title, ...fieldLines(fields)].map(colorizeLine).join('\n');

  const formatPretty = (event: LogEvent): string => {
    switch (event.event) {
      case 'startup':
        return block('▶ Startup', {
          mode: event.mode,
          port: event.port,
          database: event.database,
          source: event.sourceDir,
          providers: event.providers.join(',') || undefined,
          ui: event.ui,
        });
      case 'startup-failed':
        return block('✖ Startup failed', { message: event.message });
      case 'scenario-switch-failed':
        return block('✖ Scenario switch failed', {
          scenario: event.scenario,
          message: event.message,
        });
      case 'config-files':
        return block('▶ Scenario files', { count: event.files.length });
      case 'validation-file':
        return block(`${event.result === 'ok' ? '✔' : '✖'} Validation file`, {
          file: event.file,
          result: event.result,
        });
      case 'validation-summary':
        return block('▶ Validation summary', {
          errors: event.errors,
          warnings: event.warnings,
        });
      case 'scenarios-discovered':
        return block('▶ Scenarios discovered', { count: event.scenarios.length });
      case 'scenario-created':
        return block('▶ Scenario created', {
          scenario: event.scenario,
          provider: event.provider,
        });
      case 'mock-registered':
        return block('▶ Mock registered', {
          scenario: event.scenario,
          mock: event.requestId,
          method: event.method,
          path: event.path,
          order: event.sequenceOrder,
        });
      case 'scenario-activated':
        return block('✔ Scenario activated', { scenario: event.scenario });
      case 'scenario-deactivated':
        return block('▶ Scenario deactivated', { previous: event.previous });
      case 'scenario-deleted':
        return block('▶ Scenario deleted', { scenario: event.scenario });
      case 'store-reset':
        return block('▶ Store reset', {});
      case 'mock-evaluated':
        return block(`${event.result === 'matched' ? '✔' : '✖'} Mock evaluated`, {
          scenario: event.scenario,
          mock: event.requestId,
          order: event.sequenceOrder,
          method: event.request.method,
          url: event.request.url,
          result: event.result,
          reason: event.reason,
        });
      case 'mock-matched':
        return block('✔ Matched mock', {
          scenario: event.scenario,
          mock: event.requestId,
          delayMs: event.delayMs,
        });
      case 'no-match':
        return block('✖ No mock matched', {
          method: event.method,
          url: event.url,
          scenario: event.activeScenario,
        });
      case 'execution-complete':
        return block('▶ Execution complete', {
          source: event.source,
          status: event.status,
        });
      case 'server-ready':
        return block('▶ Server ready', { port: event.port });
      default:
        return stableStringify(event);
    }
  };

  const emitEvent = (event: LogEvent) => {
    emitter.emit('event', event);
    const line = activeFormat === 'jsonl' ? stableStringify(event) : formatPretty(event);
    output.write(`${line}\n`);
  };

  const onEvent = (handler: (event: LogEvent) => void) => {
    emitter.on('event', handler);
  };

  return { emitEvent, onEvent };
};

export const createNullEventLogger = (): EventLogger => {
  return {
    emitEvent: () => undefined,
    onEvent: () => undefined,
  };
};

/**
 * Keeps events in memory; handy for asserting on what the engine did.
 */
export const createRecordingEventLogger = (): EventLogger & { events: LogEvent[] } => {
  const events: LogEvent[] = [];
  const handlers: Array<(event: LogEvent) => void> = [];
  return {
    events,
    emitEvent: (event) => {
      events.push(event);
      handlers.forEach((handler) => handler(event));
    },
    onEvent: (handler) => {
      handlers.push(handler);
    },
  };
};
