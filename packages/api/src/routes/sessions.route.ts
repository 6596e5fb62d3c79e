import type { FastifyInstance } from 'fastify';
import type { SessionManager } from '@switchboard/core';

export function registerSessionRoutes(app: FastifyInstance, sessions: SessionManager): void {
  app.post('/sessions', async (_request, reply) => {
    const sessionId = await sessions.createSession();
    return reply.status(201).send({ session_id: sessionId });
  });

  app.get<{ Params: { session_id: string } }>('/sessions/:session_id', async (request, reply) => {
    const { session_id } = request.params;
    const messages = await sessions.getHistory(session_id);
    return reply.send({ session_id, messages });
  });

  app.delete<{ Params: { session_id: string } }>('/sessions/:session_id', async (request, reply) => {
    const { session_id } = request.params;
    const cleared = await sessions.clear(session_id);
    return reply.send({ session_id, cleared });
  });
}
