import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@switchboard/core';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.cache).toEqual({ mode: 'auto', ttlSeconds: 3600, maxSize: 1000, probeTimeoutMs: 2000 });
    expect(config.session).toEqual({ ttlSeconds: 1800, maxSize: 200, maxPairs: 10 });
    expect(config.breaker).toEqual({ failureThreshold: 3, recoveryTimeoutMs: 30_000 });
    expect(config.classifierUrl).toBeUndefined();
    expect(config.capabilityUrls).toEqual({});
  });

  it('should read overrides and capability urls', () => {
    const config = loadConfig({
      PORT: '8080',
      CACHE_BACKEND: 'memory',
      SESSION_MAX_PAIRS: '4',
      BREAKER_FAILURE_THRESHOLD: '5',
      CLASSIFIER_URL: 'http://classifier.test/classify',
      CAPABILITY_REVIEW_URL: 'http://review.test/process',
      CAPABILITY_POLICY_URL: '  ',
    });

    expect(config.port).toBe(8080);
    expect(config.cache.mode).toBe('memory');
    expect(config.session.maxPairs).toBe(4);
    expect(config.breaker.failureThreshold).toBe(5);
    expect(config.classifierUrl).toBe('http://classifier.test/classify');
    expect(config.capabilityUrls).toEqual({ review: 'http://review.test/process' });
  });

  it('should reject a malformed number', () => {
    expect(() => loadConfig({ CACHE_MAX_SIZE: 'lots' })).toThrow(
      'CACHE_MAX_SIZE must be an integer >= 1, got "lots"',
    );
  });

  it('should reject an unknown cache backend', () => {
    expect(() => loadConfig({ CACHE_BACKEND: 'redis' })).toThrow(ConfigurationError);
  });
});
