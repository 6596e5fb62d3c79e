import { describe, it, expect } from 'vitest';
import * as core from './index.js';

describe('@switchboard/core entry point', () => {
  it('should export the runtime services', () => {
    expect(typeof core.SessionManager).toBe('function');
    expect(typeof core.CacheProvider).toBe('function');
    expect(typeof core.runMigrations).toBe('function');
  });

  it('should leave the SQL test double to the testing subpath', () => {
    expect(Object.keys(core)).not.toContain('FakeSqlClient');
  });
});
