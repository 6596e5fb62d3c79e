import { createLogger, errorMessage } from '@switchboard/core';
import type { Logger } from '@switchboard/core';
import type { Intent, IntentClassifier, IntentResolver } from '../types.js';

export function clampConfidence(confidence: number): number {
  if (Number.isNaN(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}

/**
 * Turns any classifier into a resolver that cannot fail: errors become a
 * `general` intent with zero confidence and the failure as its reasoning.
 */
export class SafeIntentResolver implements IntentResolver {
  private readonly logger: Logger;

  constructor(
    private readonly classifier: IntentClassifier,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('intent-resolver');
  }

  async classify(query: string): Promise<Intent> {
    try {
      const intent = await this.classifier.classify(query);
      this.logger.info(
        { intent: intent.intent, confidence: intent.confidence },
        `Intent: '${query.slice(0, 60)}' -> ${intent.intent}`,
      );
      return { ...intent, confidence: clampConfidence(intent.confidence) };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ err: error }, `Intent classification failed: ${message}; defaulting to general`);
      return {
        intent: 'general',
        confidence: 0,
        reasoning: `Classification failed: ${message}`,
      };
    }
  }
}
