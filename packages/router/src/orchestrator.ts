import { createLogger, errorMessage, startSpan, endSpan } from '@switchboard/core';
import type { Logger } from '@switchboard/core';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitBreakerOptions, CircuitBreakerSnapshot } from './circuit-breaker.js';
import type { CapabilityRegistry } from './capability-registry.js';
import type {
  Capability,
  CapabilityContext,
  CapabilityName,
  CapabilityResponse,
  Intent,
  IntentCategory,
  IntentResolver,
  StructuredHints,
} from './types.js';
import { failureResponse } from './types.js';

export interface OrchestratorOptions {
  breaker?: Omit<CircuitBreakerOptions, 'logger'>;
  logger?: Logger;
}

export interface OrchestratorResult {
  response: CapabilityResponse;
  /** What the resolver classified, regardless of who answered. */
  intent: Intent;
  /** Capability that produced `response`, or null for a synthesized failure. */
  routed_to: CapabilityName | null;
}

const INTENT_TO_CAPABILITY: Record<IntentCategory, CapabilityName> = {
  recommendation: 'recommendation',
  comparison: 'recommendation',
  review: 'review',
  policy: 'policy',
  price: 'price',
  general: 'general',
};

function extractHints(intent: Intent): StructuredHints | undefined {
  const hints: StructuredHints = {};
  if (intent.category) hints.category = intent.category;
  if (intent.min_price !== undefined) hints.min_price = intent.min_price;
  if (intent.max_price !== undefined) hints.max_price = intent.max_price;
  return Object.keys(hints).length > 0 ? hints : undefined;
}

/**
 * Classifies a query, picks the capability for it and runs it.
 *
 * A capability that is unregistered or behind an open breaker is replaced by
 * `general` before the call. A capability that throws is recorded as a
 * failure and `general` answers instead. Nothing is ever retried against the
 * same capability within one request.
 */
export class Orchestrator {
  private readonly breakers = new Map<CapabilityName, CircuitBreaker>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly resolver: IntentResolver,
    options: OrchestratorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('orchestrator');
    for (const name of registry.names()) {
      this.breakers.set(
        name,
        new CircuitBreaker(name, { ...options.breaker, logger: this.logger }),
      );
    }
  }

  breaker(name: CapabilityName): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  breakerSnapshots(): CircuitBreakerSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }

  async handle(query: string, context: CapabilityContext = {}): Promise<OrchestratorResult> {
    const intent = await this.resolver.classify(query);

    const ctx: CapabilityContext = { ...context };
    const hints = extractHints(intent);
    if (hints) ctx.structured_hints = hints;

    const target = INTENT_TO_CAPABILITY[intent.intent];
    if (intent.intent === 'comparison') ctx.compare_mode = true;

    let capabilityName = target;
    let capability = this.registry.get(target);
    let breaker = this.breakers.get(target);

    if (capability === null || (breaker && !breaker.isAvailable())) {
      this.logger.warn({ capability: target }, `Orchestrator: '${target}' unavailable -> general`);
      capabilityName = 'general';
      capability = this.registry.general();
      breaker = this.breakers.get('general');
    }

    const span = startSpan('orchestrator.handle', {
      'switchboard.intent': intent.intent,
      'switchboard.intent.confidence': intent.confidence,
      'switchboard.capability.target': target,
    });

    const result = await this.invoke(capabilityName, capability, breaker, query, ctx, context);
    span.setAttribute('switchboard.capability.routed_to', result.routed_to ?? 'none');
    span.setAttribute('switchboard.success', result.response.success);
    endSpan(
      span,
      result.response.success ? undefined : new Error(result.response.error ?? 'capability failed'),
    );

    return { ...result, intent };
  }

  private async invoke(
    capabilityName: CapabilityName,
    capability: Capability,
    breaker: CircuitBreaker | undefined,
    query: string,
    ctx: CapabilityContext,
    originalContext: CapabilityContext,
  ): Promise<Omit<OrchestratorResult, 'intent'>> {
    try {
      const response = await capability.process(query, ctx);
      if (response.success) {
        breaker?.recordSuccess();
      } else {
        breaker?.recordFailure();
      }
      return { response, routed_to: capabilityName };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        { capability: capabilityName, err: error },
        `Orchestrator: '${capabilityName}' raised: ${message}`,
      );
      breaker?.recordFailure();
      return this.fallback(capabilityName, query, originalContext, message);
    }
  }

  private async fallback(
    failed: CapabilityName,
    query: string,
    context: CapabilityContext,
    failureMessage: string,
  ): Promise<Omit<OrchestratorResult, 'intent'>> {
    const general = this.registry.get('general');
    if (!general || failed === 'general') {
      return { response: failureResponse(failureMessage), routed_to: null };
    }

    try {
      return { response: await general.process(query, context), routed_to: 'general' };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        { capability: 'general', err: error },
        `Orchestrator: fallback raised: ${message}`,
      );
      return { response: failureResponse(message), routed_to: null };
    }
  }
}
