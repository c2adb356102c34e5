import { ConfigurationError } from '../errors';
import type { HttpHeaders } from '../http/types';
import { MockBackend, type MockBackendOptions } from '../backend/mock-backend';
import type { MockRequestInput, MockResponseInput } from '../store/types';
import {
  MockRequests,
  MockResponses,
  withBodyPattern,
  withDelay,
  withHeadersPattern,
  withSequence,
  withStatus,
} from './definitions';

/**
 * Fluent setup for tests:
 *
 * ```ts
 * const builder = await MockBuilder.create();
 * await builder.scenario('happy-path', 'plaid');
 * await builder.onGet('/accounts/{id}').respondJson({ balance: 100 });
 * const backend = await builder.activate('happy-path');
 * ```
 *
 * Every `respond*` call writes one mock to the store and resolves to the same
 * builder.
 */
export class MockBuilder {
  private currentScenario?: string;

  constructor(private readonly backend: MockBackend) {}

  static async create(options?: MockBackendOptions): Promise<MockBuilder> {
    return new MockBuilder(await MockBackend.create(options));
  }

  async scenario(name: string, provider: string, description?: string): Promise<MockBuilder> {
    await this.backend.createScenario({ name, provider, description });
    this.currentScenario = name;
    return this;
  }

  onGet(path: string): MockRequestBuilder {
    return new MockRequestBuilder(this, MockRequests.get(path));
  }

  onPost(path: string): MockRequestBuilder {
    return new MockRequestBuilder(this, MockRequests.post(path));
  }

  onPut(path: string): MockRequestBuilder {
    return new MockRequestBuilder(this, MockRequests.put(path));
  }

  onPatch(path: string): MockRequestBuilder {
    return new MockRequestBuilder(this, MockRequests.patch(path));
  }

  onDelete(path: string): MockRequestBuilder {
    return new MockRequestBuilder(this, MockRequests.delete(path));
  }

  async addMock(request: MockRequestInput, response: MockResponseInput): Promise<MockBuilder> {
    if (!this.currentScenario) {
      throw new ConfigurationError('No scenario selected; call scenario() first', 'scenario');
    }
    await this.backend.addMock(this.currentScenario, request, response);
    return this;
  }

  async activate(name: string | undefined = this.currentScenario): Promise<MockBackend> {
    if (!name) {
      throw new ConfigurationError('No scenario to activate', 'scenario');
    }
    await this.backend.activateScenario(name);
    return this.backend;
  }

  build(): MockBackend {
    return this.backend;
  }
}

export class MockRequestBuilder {
  private delayMs?: number;

  constructor(
    private readonly builder: MockBuilder,
    private request: MockRequestInput
  ) {}

  /** JSON subset pattern, `*`, or a regular expression over the raw body. */
  withBodyContaining(pattern: string): MockRequestBuilder {
    this.request = withBodyPattern(this.request, pattern);
    return this;
  }

  withHeaders(headers: HttpHeaders): MockRequestBuilder {
    this.request = withHeadersPattern(this.request, headers);
    return this;
  }

  withSequence(order: number): MockRequestBuilder {
    this.request = withSequence(this.request, order);
    return this;
  }

  withDelay(delayMs: number): MockRequestBuilder {
    this.delayMs = delayMs;
    return this;
  }

  respond(response: MockResponseInput): Promise<MockBuilder> {
    const final = this.delayMs === undefined ? response : withDelay(response, this.delayMs);
    return this.builder.addMock(this.request, final);
  }

  respondOk(body: string): Promise<MockBuilder> {
    return this.respond(MockResponses.ok(body));
  }

  respondJson(data: unknown, status = 200): Promise<MockBuilder> {
    return this.respond(MockResponses.json(data, status));
  }

  respondError(status: number, body: string): Promise<MockBuilder> {
    return this.respond(withStatus(MockResponses.ok(body), status));
  }
}
