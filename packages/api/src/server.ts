import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { generateId, ValidationError, ConfigurationError } from '@switchboard/core';
import type { CacheBackendKind, SessionManager, SqlClient } from '@switchboard/core';
import type { Orchestrator } from '@switchboard/router';
import { registerChatRoutes } from './routes/chat.route.js';
import { registerSessionRoutes } from './routes/sessions.route.js';
import { registerHealthRoutes } from './routes/health.route.js';

export interface ServerDeps {
  orchestrator: Orchestrator;
  sessions: SessionManager;
  cacheBackend: CacheBackendKind;
  /** Checked by /health when the cache lives in postgres. */
  database?: SqlClient;
  logLevel?: string;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: { level: deps.logLevel ?? 'info' },
    genReqId: () => generateId(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : generateId();
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
  });

  app.addHook('onSend', async (request, reply) => {
    reply.header('x-correlation-id', request.headers['x-correlation-id']);
  });

  registerChatRoutes(app, deps.orchestrator, deps.sessions);
  registerSessionRoutes(app, deps.sessions);
  registerHealthRoutes(app, {
    database: deps.database,
    cacheBackend: deps.cacheBackend,
    orchestrator: deps.orchestrator,
  });

  // Global error handler
  app.setErrorHandler<Error>((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: error.message,
        field: error.field,
      });
    }

    // Fastify's own errors (malformed JSON, payload too large) carry a 4xx statusCode
    const statusCode =
      'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({
        error: 'Bad Request',
        message: error.message,
      });
    }

    request.log.error(
      { err: error },
      error instanceof ConfigurationError ? 'Misconfiguration' : 'Unhandled error',
    );
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
