import { describe, it, expect } from 'vitest';
import { GeneralCapability, GENERAL_ANSWER } from './general.capability.js';

describe('GeneralCapability', () => {
  it('should always answer successfully', async () => {
    const general = new GeneralCapability();

    expect(await general.process('hi', {})).toEqual({
      success: true,
      data: { answer: GENERAL_ANSWER, agent: 'general' },
      metadata: {},
    });
  });

  it('should echo the session id in metadata', async () => {
    const general = new GeneralCapability('Ask me about products.');

    const response = await general.process('hi', { session_id: 's1' });

    expect(response.data.answer).toBe('Ask me about products.');
    expect(response.metadata).toEqual({ session_id: 's1' });
  });
});
