import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.urlPrefix).toBe('');
    expect(config.redisUrl).toBeUndefined();
    expect(config.syncTimeoutMs).toBe(30000);
    expect(config.syncMaxPayloadBytes).toBe(1024 * 1024);
    expect(config.visibilityTimeoutMs).toBe(60000);
    expect(config.maxDeliveries).toBe(2);
    expect(config.jobTimeoutMs).toBe(45000);
    expect(config.embeddedWorkers).toBe(false);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      URL_PREFIX: '/dispatch/api/v1/',
      REDIS_URL: 'redis://localhost:6379',
      VISIBILITY_TIMEOUT_MS: '120000',
      JOB_TIMEOUT_MS: '90000',
      ADMIN_API_KEY: 'test-secret',
      EMBEDDED_WORKERS: 'true'
    });

    expect(config.port).toBe(8080);
    expect(config.urlPrefix).toBe('/dispatch/api/v1');
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.visibilityTimeoutMs).toBe(120000);
    expect(config.adminApiKey).toBe('test-secret');
    expect(config.embeddedWorkers).toBe(true);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ SYNC_TIMEOUT_MS: '-1' })).toThrow(ConfigError);
  });

  it('requires at least one delivery', () => {
    expect(() => loadConfig({ MAX_DELIVERIES: '0' })).toThrow(ConfigError);
  });

  it('requires the job time limit to fit inside the visibility timeout', () => {
    expect(() => loadConfig({ JOB_TIMEOUT_MS: '60000' })).toThrow(ConfigError);
    expect(() => loadConfig({ VISIBILITY_TIMEOUT_MS: '30000' })).toThrow(ConfigError);
  });
});
