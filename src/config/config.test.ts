import { describe, it, expect } from 'vitest';
import { loadAccessConfig, DEFAULT_CACHE_TTL_MS, DEFAULT_BCRYPT_COST } from './index.js';
import { ValidationError } from '../utils/errors.js';

describe('loadAccessConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadAccessConfig({});

    expect(config.cache).toEqual({ ttlMs: DEFAULT_CACHE_TTL_MS, maxEntries: 1000 });
    expect(config.cache.ttlMs).toBe(300000);
    expect(config.grants.defaultDurationMs).toBeNull();
    expect(config.credentials.bcryptCost).toBe(DEFAULT_BCRYPT_COST);
    expect(config.audit.recordAllowed).toBe(false);
    expect(config.logLevel).toBe('info');
    expect(config.db.database).toBe('access_core');
  });

  it('should read every supported key', () => {
    const config = loadAccessConfig({
      ACCESS_CACHE_TTL_MS: '60000',
      ACCESS_CACHE_MAX_ENTRIES: '50',
      ACCESS_DEFAULT_GRANT_DURATION_MS: '86400000',
      ACCESS_BCRYPT_COST: '10',
      ACCESS_AUDIT_ALLOWED: 'true',
      LOG_LEVEL: 'debug',
      DB_NAME: 'access_test',
    });

    expect(config.cache).toEqual({ ttlMs: 60000, maxEntries: 50 });
    expect(config.grants.defaultDurationMs).toBe(86400000);
    expect(config.credentials.bcryptCost).toBe(10);
    expect(config.audit.recordAllowed).toBe(true);
    expect(config.logLevel).toBe('debug');
    expect(config.db.database).toBe('access_test');
  });

  it('should report every invalid key in one error', () => {
    let failure: unknown;
    try {
      loadAccessConfig({
        ACCESS_CACHE_TTL_MS: 'soon',
        ACCESS_BCRYPT_COST: '31',
        ACCESS_AUDIT_ALLOWED: 'yes',
        LOG_LEVEL: 'trace',
        DB_PORT: 'five',
      });
    } catch (err) {
      failure = err;
    }

    expect(failure).toBeInstanceOf(ValidationError);
    expect((failure as ValidationError).errors).toEqual([
      'ACCESS_CACHE_TTL_MS must be an integer between 0 and 86400000',
      'ACCESS_BCRYPT_COST must be an integer between 4 and 15',
      "ACCESS_AUDIT_ALLOWED must be 'true' or 'false'",
      'LOG_LEVEL must be one of debug, info, warn, error, fatal',
      'DB_PORT must be a non-negative integer',
    ]);
  });

  it('should reject a zero default grant duration', () => {
    expect(() => loadAccessConfig({ ACCESS_DEFAULT_GRANT_DURATION_MS: '0' })).toThrow(
      ValidationError,
    );
  });
});
