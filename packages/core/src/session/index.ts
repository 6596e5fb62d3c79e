export { SessionManager, buildEnrichedQuery, parseTranscript, DEFAULT_MAX_PAIRS } from './session-manager.js';
export type { ChatMessage, ChatRole, SessionManagerOptions } from './types.js';
