import { describe, it, expect } from 'vitest';
import { SafeIntentResolver, clampConfidence } from './safe-intent-resolver.js';

describe('SafeIntentResolver', () => {
  it('should pass a successful classification through', async () => {
    const resolver = new SafeIntentResolver({
      classify: async () => ({ intent: 'price', confidence: 0.75, reasoning: 'asks for prices', max_price: 300 }),
    });

    expect(await resolver.classify('cheapest tv under $300')).toEqual({
      intent: 'price',
      confidence: 0.75,
      reasoning: 'asks for prices',
      max_price: 300,
    });
  });

  it('should resolve a general intent with zero confidence when the classifier throws', async () => {
    const resolver = new SafeIntentResolver({
      classify: async () => {
        throw new Error('upstream 503');
      },
    });

    expect(await resolver.classify('anything')).toEqual({
      intent: 'general',
      confidence: 0,
      reasoning: 'Classification failed: upstream 503',
    });
  });

  it('should clamp an out-of-range confidence', async () => {
    const resolver = new SafeIntentResolver({
      classify: async () => ({ intent: 'review', confidence: 1.4, reasoning: 'reviews' }),
    });

    expect((await resolver.classify('reviews')).confidence).toBe(1);
  });
});

describe('clampConfidence', () => {
  it('should keep values inside [0, 1]', () => {
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(0.3)).toBe(0.3);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});
