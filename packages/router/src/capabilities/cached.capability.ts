import { createHash } from 'node:crypto';
import type { ExpiringCache } from '@switchboard/core';
import type { Capability, CapabilityContext, CapabilityResponse } from '../types.js';

export function resultCacheKey(capability: string, query: string, context: CapabilityContext): string {
  const material = JSON.stringify({
    query: query.trim().toLowerCase(),
    hints: context.structured_hints ?? null,
    compare: context.compare_mode === true,
    max_results: context.max_results ?? null,
  });
  return `${capability}:${createHash('sha256').update(material).digest('hex')}`;
}

/**
 * Memoizes successful responses of the wrapped capability. Failures are never
 * cached so the next request reaches the capability again.
 */
export class CachedCapability implements Capability {
  readonly name: string;

  constructor(
    private readonly inner: Capability,
    private readonly cache: ExpiringCache<CapabilityResponse>,
    private readonly ttlSeconds?: number,
  ) {
    this.name = inner.name;
  }

  async process(query: string, context: CapabilityContext): Promise<CapabilityResponse> {
    const key = resultCacheKey(this.name, query, context);

    const cached = await this.cache.get(key);
    if (cached) {
      return { ...cached, metadata: { ...cached.metadata, cached: true } };
    }

    const response = await this.inner.process(query, context);
    if (response.success) {
      await this.cache.set(key, response, this.ttlSeconds);
    }
    return response;
  }
}
