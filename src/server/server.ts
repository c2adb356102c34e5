import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { MockBackend } from '../backend/mock-backend';
import { ConfigurationError, isMockBackendError } from '../errors';
import type { HttpHeaders } from '../http/types';
import { parseHttpMethod } from '../http/types';
import type { EventLogger } from '../logging/event-logger';

export type ServerOptions = {
  backend: MockBackend;
  eventLogger: EventLogger;
};

export type StartServerOptions = ServerOptions & {
  port: number;
  host?: string;
};

export const ADMIN_PREFIX = '/__mock';

const STATUS_BY_KIND = {
  'no-match': 404,
  configuration: 500,
  storage: 500,
} as const;

const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

const collectRequestHeaders = (headers: FastifyRequest['headers']): HttpHeaders => {
  const result: HttpHeaders = {};
  Object.entries(headers).forEach(([key, value]) => {
    const normalized = key.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(normalized)) return;
    if (value === undefined) return;
    result[normalized] = Array.isArray(value) ? value.join(',') : String(value);
  });
  return result;
};

const sendError = (reply: FastifyReply, error: unknown): FastifyReply => {
  if (!isMockBackendError(error)) {
    throw error;
  }
  const status =
    error instanceof ConfigurationError && error.field === 'scenario' ? 404 : STATUS_BY_KIND[error.kind];
  return reply.code(status).send({ error: error.kind, message: error.message });
};

/**
 * Serves the backend over HTTP. Any request outside {@link ADMIN_PREFIX} is matched
 * against the active scenario; the admin routes switch and inspect scenarios.
 */
export const createServer = (options: ServerOptions): FastifyInstance => {
  const server = Fastify({ logger: false });
  const { backend } = options;

  // Bodies are matched as raw text, so no content type is parsed.
  server.removeAllContentTypeParsers();
  server.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  server.get(`${ADMIN_PREFIX}/scenarios`, async () => {
    const scenarios = await backend.listScenarios();
    const active = backend.activeScenario();
    return scenarios.map((scenario) => ({
      name: scenario.name,
      provider: scenario.provider,
      description: scenario.description,
      active: scenario.name === active,
    }));
  });

  server.get<{ Params: { name: string } }>(
    `${ADMIN_PREFIX}/scenarios/:name/mocks`,
    async (request, reply) => {
      try {
        const mocks = await backend.listMocks(request.params.name);
        return mocks.map(({ request: mock, response }) => ({
          id: mock.id,
          method: mock.method,
          path: mock.pathPattern,
          sequenceOrder: mock.sequenceOrder,
          status: response.statusCode,
          matches: backend.matchCount(mock.id),
        }));
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.put<{ Params: { name: string } }>(
    `${ADMIN_PREFIX}/scenarios/:name/active`,
    async (request, reply) => {
      try {
        await backend.activateScenario(request.params.name);
        return reply.code(204).send();
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get(`${ADMIN_PREFIX}/active`, async () => ({
    scenario: backend.activeScenario() ?? null,
    matches: Object.fromEntries(backend.matchCounts()),
  }));

  server.delete(`${ADMIN_PREFIX}/active`, async (_request, reply) => {
    await backend.deactivateScenario();
    return reply.code(204).send();
  });

  server.post(`${ADMIN_PREFIX}/reset`, async (_request, reply) => {
    await backend.reset();
    return reply.code(204).send();
  });

  server.setNotFoundHandler(async (request, reply) => {
    const method = parseHttpMethod(request.method);
    if (!method) {
      return reply.code(405).send({ error: 'method-not-allowed', message: `${request.method} is not supported` });
    }

    try {
      const response = await backend.execute({
        method,
        url: request.url,
        headers: collectRequestHeaders(request.headers),
        body: typeof request.body === 'string' && request.body.length > 0 ? request.body : undefined,
      });

      Object.entries(response.headers).forEach(([key, value]) => reply.header(key, value));
      return reply.code(response.status).send(response.body);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  return server;
};

export const startServer = async (options: StartServerOptions): Promise<FastifyInstance> => {
  const server = createServer(options);
  await server.listen({ port: options.port, host: options.host ?? '0.0.0.0' });
  options.eventLogger.emitEvent({
    event: 'server-ready',
    port: options.port,
  });
  return server;
};
