import { describe, it, expect } from 'vitest';
import { loadSettings } from '../config/settings.js';
import { DEFAULT_CSW_URL } from '../constants.js';
import { ConfigError } from '../errors.js';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual({
      cswUrl: DEFAULT_CSW_URL,
      serviceOwner: 'Beheer PDOK',
      concurrency: 10,
      maxAttempts: 3,
      retryDelayMs: 5000,
      requestTimeoutMs: 30000,
      userAgent: 'geoharvest/0.1.0',
      logLevel: 'info',
      awsRegion: undefined,
    });
  });

  it('reads overrides and treats empty values as unset', () => {
    const s = loadSettings({
      CSW_URL: 'https://catalogue.example.org/csw',
      HARVEST_CONCURRENCY: '4',
      HARVEST_RETRY_DELAY_MS: '0',
      SERVICE_OWNER: '',
      AWS_REGION: 'eu-west-1',
    });
    expect(s.cswUrl).toBe('https://catalogue.example.org/csw');
    expect(s.concurrency).toBe(4);
    expect(s.retryDelayMs).toBe(0);
    expect(s.serviceOwner).toBe('Beheer PDOK');
    expect(s.awsRegion).toBe('eu-west-1');
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ HARVEST_CONCURRENCY: '0' })).toThrow(ConfigError);
    expect(() => loadSettings({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    expect(() => loadSettings({ CSW_URL: 'not a url' })).toThrow(/CSW_URL/);
  });
});
