import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      maxFileSizeBytes: 10 * 1024 * 1024,
      rateLimit: { limit: 30, windowMs: 60_000 },
      logLevel: 'debug',
      isProduction: false,
    });
  });

  it('picks the log level from the environment name', () => {
    expect(loadConfig({ NODE_ENV: 'production' })).toMatchObject({ logLevel: 'info', isProduction: true });
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ATS_MAX_FILE_SIZE_MB: '2',
      ATS_RATE_LIMIT: '5',
      ATS_RATE_LIMIT_WINDOW_MS: '1000',
      LOG_LEVEL: 'warn',
    });

    expect(config).toEqual({
      maxFileSizeBytes: 2 * 1024 * 1024,
      rateLimit: { limit: 5, windowMs: 1000 },
      logLevel: 'warn',
      isProduction: false,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ ATS_RATE_LIMIT: 'many' })).toThrow(/^Invalid configuration: ATS_RATE_LIMIT/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
