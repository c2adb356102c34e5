export type MockErrorKind = 'configuration' | 'no-match' | 'storage';

export class MockBackendError extends Error {
  readonly kind: MockErrorKind;

  constructor(kind: MockErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MockBackendError';
    this.kind = kind;
  }
}

/**
 * A mock or scenario is unusable as configured: a pattern that does not compile,
 * a headers pattern that is not a JSON string map, or a scenario that does not exist.
 */
export class ConfigurationError extends MockBackendError {
  readonly field?: string;

  constructor(message: string, field?: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

export class NoMatchError extends MockBackendError {
  readonly method: string;
  readonly url: string;

  constructor(method: string, url: string) {
    super('no-match', `No mock found for ${method} ${url}`);
    this.name = 'NoMatchError';
    this.method = method;
    this.url = url;
  }
}

export class StorageError extends MockBackendError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('storage', `Failed to ${operation}: ${detail}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export const isMockBackendError = (error: unknown): error is MockBackendError =>
  error instanceof MockBackendError;

export const errorMessage = (error: unknown, fallback = 'Unknown error'): string =>
  error instanceof Error ? error.message : fallback;
