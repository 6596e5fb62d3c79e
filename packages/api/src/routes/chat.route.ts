import type { FastifyInstance } from 'fastify';
import { ValidationError, buildEnrichedQuery } from '@switchboard/core';
import type { SessionManager } from '@switchboard/core';
import type { CapabilityResponse, Orchestrator } from '@switchboard/router';

interface ChatBody {
  message?: unknown;
  session_id?: unknown;
  max_results?: unknown;
}

const MAX_MESSAGE_LENGTH = 1000;
const DEFAULT_MAX_RESULTS = 5;

/** Text recorded as the assistant's side of the turn. */
export function assistantText(response: CapabilityResponse): string {
  const { answer, summary } = response.data;
  if (typeof answer === 'string') return answer;
  if (typeof summary === 'string') return summary;
  if (!response.success) return response.error ?? 'Request failed';
  return JSON.stringify(response.data);
}

function parseBody(body: ChatBody | undefined) {
  const message = typeof body?.message === 'string' ? body.message.trim() : '';
  if (message.length === 0 || message.length > MAX_MESSAGE_LENGTH) {
    throw new ValidationError(`message must be between 1 and ${MAX_MESSAGE_LENGTH} characters`, 'message');
  }

  const sessionId = body?.session_id;
  if (sessionId !== undefined && sessionId !== null && typeof sessionId !== 'string') {
    throw new ValidationError('session_id must be a string', 'session_id');
  }

  const maxResults = body?.max_results ?? DEFAULT_MAX_RESULTS;
  if (typeof maxResults !== 'number' || !Number.isInteger(maxResults) || maxResults < 1 || maxResults > 20) {
    throw new ValidationError('max_results must be an integer between 1 and 20', 'max_results');
  }

  return { message, sessionId: sessionId ?? undefined, maxResults };
}

export function registerChatRoutes(
  app: FastifyInstance,
  orchestrator: Orchestrator,
  sessions: SessionManager,
): void {
  app.post<{ Body: ChatBody }>('/chat', async (request, reply) => {
    const { message, sessionId: requested, maxResults } = parseBody(request.body);

    const sessionId = requested && (await sessions.exists(requested))
      ? requested
      : await sessions.createSession();

    const history = await sessions.getHistory(sessionId);
    const query = buildEnrichedQuery(message, history);

    const { response, intent, routed_to } = await orchestrator.handle(query, {
      session_id: sessionId,
      max_results: maxResults,
    });

    await sessions.appendTurn(sessionId, message, assistantText(response));

    request.log.info(
      { intent: intent.intent, routed_to, success: response.success },
      'Chat request handled',
    );

    const agent = response.data.agent;
    return reply.status(200).send({
      session_id: sessionId,
      message,
      intent: intent.intent,
      confidence: intent.confidence,
      entities: {
        product_name: intent.product_name ?? null,
        category: intent.category ?? null,
        max_price: intent.max_price ?? null,
        min_price: intent.min_price ?? null,
      },
      agent_used: typeof agent === 'string' ? agent : 'unknown',
      response: response.data,
      success: response.success,
      error: response.error ?? null,
    });
  });
}
