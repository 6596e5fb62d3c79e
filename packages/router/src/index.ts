export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, OrchestratorResult } from './orchestrator.js';
export {
  CircuitBreaker,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_RECOVERY_TIMEOUT_MS,
} from './circuit-breaker.js';
export type { CircuitState, CircuitBreakerOptions, CircuitBreakerSnapshot } from './circuit-breaker.js';
export { CapabilityRegistry } from './capability-registry.js';
export type { CapabilityRegistryInput } from './capability-registry.js';
export { SafeIntentResolver, clampConfidence } from './intent-resolvers/safe-intent-resolver.js';
export { KeywordIntentClassifier, extractHints } from './intent-resolvers/keyword-intent-classifier.js';
export { HttpIntentClassifier, toIntent } from './intent-resolvers/http-intent-classifier.js';
export { GeneralCapability, GENERAL_ANSWER } from './capabilities/general.capability.js';
export { HttpCapability } from './capabilities/http.capability.js';
export { CachedCapability, resultCacheKey } from './capabilities/cached.capability.js';
export {
  INTENT_CATEGORIES,
  CAPABILITY_NAMES,
  isIntentCategory,
  isCapabilityName,
  isCapabilityResponse,
  toCapabilityResponse,
  failureResponse,
} from './types.js';
export type {
  Intent,
  IntentCategory,
  IntentHints,
  IntentClassifier,
  IntentResolver,
  Capability,
  CapabilityName,
  CapabilityContext,
  CapabilityResponse,
  StructuredHints,
} from './types.js';
