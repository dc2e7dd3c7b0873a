/**
 * Tests for runtime settings
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../errors';
import { loadSettings } from '../settings';

const BASE_ENV = { SOURCE_API_KEY: 'test-source-key' };

describe('loadSettings', () => {
  it('should apply defaults', () => {
    const settings = loadSettings({ ...BASE_ENV });

    expect(settings.tiers).toEqual({ bulkMin: 4, premiumMin: 7, urgentMin: 9 });
    expect(settings.urgent).toEqual({
      cooldownMs: 15 * 60 * 1000,
      maxQueueSize: 10,
      drainIntervalMs: 30 * 1000,
    });
    expect(settings.scheduler.checkIntervalMs).toBe(300 * 1000);
    expect(settings.scheduler.maxConcurrentAccounts).toBe(10);
    expect(settings.scheduler.skipReposts).toBe(true);
    expect(settings.supabase).toBeUndefined();
    expect(settings.scoring.apiKey).toBeUndefined();
  });

  it('should coerce numeric and boolean values', () => {
    const settings = loadSettings({
      ...BASE_ENV,
      CHECK_INTERVAL_SECONDS: '60',
      URGENT_COOLDOWN_MINUTES: '1.5',
      SKIP_REPOSTS: 'false',
    });

    expect(settings.scheduler.checkIntervalMs).toBe(60_000);
    expect(settings.urgent.cooldownMs).toBe(90_000);
    expect(settings.scheduler.skipReposts).toBe(false);
  });

  it('should enable Supabase only when both keys are present', () => {
    expect(loadSettings({ ...BASE_ENV, SUPABASE_URL: 'https://db.example.test' }).supabase).toBeUndefined();

    const settings = loadSettings({
      ...BASE_ENV,
      SUPABASE_URL: 'https://db.example.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
    });
    expect(settings.supabase).toEqual({
      url: 'https://db.example.test',
      serviceRoleKey: 'test-service-key',
    });
  });

  it('should read Gmail credentials for the gmail provider', () => {
    const settings = loadSettings({
      ...BASE_ENV,
      EMAIL_PROVIDER: 'gmail',
      GMAIL_USER: 'ops@example.test',
      GMAIL_APP_PASSWORD: 'test-password',
      SMTP_USER: 'ignored@example.test',
    });

    expect(settings.email.user).toBe('ops@example.test');
    expect(settings.email.password).toBe('test-password');
  });

  it('should treat blank optional values as unset', () => {
    expect(loadSettings({ ...BASE_ENV, SCORING_API_KEY: '   ' }).scoring.apiKey).toBeUndefined();
  });

  it('should list every invalid key', () => {
    try {
      loadSettings({ MAX_CONCURRENT_ACCOUNTS: '0' });
      expect.fail('expected ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.map((i) => i.split(':')[0])).toEqual([
        'SOURCE_API_KEY',
        'MAX_CONCURRENT_ACCOUNTS',
      ]);
    }
  });
});
