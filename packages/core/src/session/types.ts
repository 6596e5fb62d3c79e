export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface SessionManagerOptions {
  /** Most recent user/assistant pairs kept per session. */
  maxPairs?: number;
  now?: () => number;
}
