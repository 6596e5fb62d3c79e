import type { ExpiringCache } from '../cache/types.js';
import type { Logger } from '../shared/logger.js';
import { createLogger } from '../shared/logger.js';
import { generateId, isRecord } from '../shared/types.js';
import type { ChatMessage, SessionManagerOptions } from './types.js';

export const DEFAULT_MAX_PAIRS = 10;

const HISTORY_MARKER = '[CONVERSATION HISTORY]';
const QUERY_MARKER = '[CURRENT QUERY]';

function isChatMessage(value: unknown): value is ChatMessage {
  return (
    isRecord(value) &&
    (value.role === 'user' || value.role === 'assistant') &&
    typeof value.content === 'string'
  );
}

/**
 * Parses a persisted transcript. Returns `undefined` when the payload is not
 * a JSON array of messages.
 */
export function parseTranscript(payload: string): ChatMessage[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return undefined;
  }

  if (!Array.isArray(parsed) || !parsed.every(isChatMessage)) {
    return undefined;
  }

  return parsed.map((message) => ({
    role: message.role,
    content: message.content,
    timestamp: typeof message.timestamp === 'number' ? message.timestamp : 0,
  }));
}

/**
 * Conversation memory keyed by session id, kept as a JSON array in an
 * ExpiringCache so the store's TTL bounds a session's lifetime.
 *
 * Appends are read-modify-write with no per-session lock: two concurrent
 * turns on one session can overwrite each other and the later write wins.
 */
export class SessionManager {
  private readonly maxPairs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly store: ExpiringCache<string>,
    options: SessionManagerOptions = {},
    logger?: Logger,
  ) {
    this.maxPairs = options.maxPairs ?? DEFAULT_MAX_PAIRS;
    this.now = options.now ?? (() => Date.now());
    this.logger = logger ?? createLogger('session-manager');
  }

  async createSession(): Promise<string> {
    const sessionId = generateId();
    await this.save(sessionId, []);
    return sessionId;
  }

  async exists(sessionId: string): Promise<boolean> {
    return (await this.store.get(sessionId)) !== undefined;
  }

  /** Empty when the session is unknown, expired or its payload is unreadable. */
  async getHistory(sessionId: string): Promise<ChatMessage[]> {
    const payload = await this.store.get(sessionId);
    if (payload === undefined) return [];

    const messages = parseTranscript(payload);
    if (!messages) {
      this.logger.warn({ session_id: sessionId }, 'Failed to parse session; returning empty history');
      return [];
    }
    return messages;
  }

  async appendTurn(sessionId: string, userMessage: string, assistantMessage: string): Promise<void> {
    const messages = await this.getHistory(sessionId);
    const timestamp = this.now();

    messages.push(
      { role: 'user', content: userMessage, timestamp },
      { role: 'assistant', content: assistantMessage, timestamp },
    );

    const limit = this.maxPairs * 2;
    await this.save(sessionId, messages.length > limit ? messages.slice(-limit) : messages);
  }

  /** Empties the transcript. Resolves whether the session existed beforehand. */
  async clear(sessionId: string): Promise<boolean> {
    const existed = await this.exists(sessionId);
    await this.save(sessionId, []);
    return existed;
  }

  private async save(sessionId: string, messages: ChatMessage[]): Promise<void> {
    await this.store.set(sessionId, JSON.stringify(messages));
  }
}

/**
 * Flattens prior turns and the new query into one prompt:
 *
 *   [CONVERSATION HISTORY]
 *   user: ...
 *   assistant: ...
 *   [CURRENT QUERY]
 *   user: <query>
 */
export function buildEnrichedQuery(query: string, history: readonly ChatMessage[]): string {
  if (history.length === 0) return query;

  const lines = [HISTORY_MARKER];
  for (const message of history) {
    lines.push(`${message.role}: ${message.content}`);
  }
  lines.push(QUERY_MARKER, `user: ${query}`);
  return lines.join('\n');
}
