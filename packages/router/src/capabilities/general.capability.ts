import type { Capability, CapabilityContext, CapabilityResponse } from '../types.js';

export const GENERAL_ANSWER =
  "I'm here to help with product recommendations, reviews, price comparisons, " +
  'and store policies. What can I help you with?';

/** Last-resort capability. Always answers, never fails. */
export class GeneralCapability implements Capability {
  readonly name = 'general';

  constructor(private readonly answer: string = GENERAL_ANSWER) {}

  async process(_query: string, context: CapabilityContext): Promise<CapabilityResponse> {
    return {
      success: true,
      data: { answer: this.answer, agent: this.name },
      metadata: context.session_id ? { session_id: context.session_id } : {},
    };
  }
}
