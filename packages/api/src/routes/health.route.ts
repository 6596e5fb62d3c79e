import type { FastifyInstance } from 'fastify';
import type { CacheBackendKind, SqlClient } from '@switchboard/core';
import type { Orchestrator } from '@switchboard/router';

export interface HealthDeps {
  database?: SqlClient;
  cacheBackend: CacheBackendKind;
  orchestrator: Orchestrator;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  app.get('/health', async (request, reply) => {
    let dbStatus: 'ok' | 'error' | 'not_configured' = 'not_configured';

    if (deps.database) {
      let timer: NodeJS.Timeout | undefined;
      try {
        const timeoutPromise = new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new Error('timeout')), 3000);
        });
        await Promise.race([deps.database.query('SELECT 1'), timeoutPromise]);
        dbStatus = 'ok';
      } catch (error) {
        request.log.warn({ err: error }, 'Health check: database unreachable');
        dbStatus = 'error';
      } finally {
        clearTimeout(timer);
      }
    }

    const breakers = deps.orchestrator.breakerSnapshots();
    const healthy = dbStatus !== 'error' && breakers.every((b) => b.name !== 'general' || b.state !== 'open');

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        database: dbStatus,
        cache: deps.cacheBackend,
      },
      circuit_breakers: breakers,
    });
  });
}
