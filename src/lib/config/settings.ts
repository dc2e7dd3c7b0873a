/**
 * Runtime Settings
 * Parses process.env into a typed settings object with defaults
 */

import { z } from 'zod';
import { ConfigError } from '../errors';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1'));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),

  SOURCE_API_KEY: z.string().min(1, 'SOURCE_API_KEY is required'),
  SOURCE_API_BASE_URL: z.string().url().default('https://api.twitterapi.io'),
  MAX_ITEMS_PER_FETCH: z.coerce.number().int().positive().default(20),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  SCORING_API_KEY: optionalString,
  SCORING_BASE_URL: z.string().url().default('https://api.deepseek.com/v1'),
  SCORING_MODEL: z.string().default('deepseek-chat'),
  SCORE_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),

  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  PREMIUM_CHANNEL_ID: z.string().default('premium'),
  INTERESTING_CHANNEL_ID: z.string().default('interesting'),
  SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  EMAIL_PROVIDER: z.enum(['smtp', 'gmail', 'resend']).default('smtp'),
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  GMAIL_USER: optionalString,
  GMAIL_APP_PASSWORD: optionalString,
  RESEND_API_KEY: optionalString,
  EMAIL_FROM: z.string().default('Feed Alerts <alerts@localhost>'),
  ALERT_RECIPIENT: optionalString,

  BUILD_SERVICE_URL: optionalString,
  BUILD_TIMEOUT_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),

  CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  MAX_CONCURRENT_ACCOUNTS: z.coerce.number().int().positive().default(10),
  URGENT_COOLDOWN_MINUTES: z.coerce.number().positive().default(15),
  URGENT_MAX_QUEUE_SIZE: z.coerce.number().int().positive().default(10),
  DRAIN_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),
  SKIP_REPOSTS: flag(true),

  TIER_BULK_MIN: z.coerce.number().int().default(4),
  TIER_PREMIUM_MIN: z.coerce.number().int().default(7),
  TIER_URGENT_MIN: z.coerce.number().int().default(9),

  PENDING_TTL_HOURS: z.coerce.number().positive().default(48),
  LEDGER_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  MAINTENANCE_CRON: z.string().default('0 3 * * *'),

  HTTP_PORT: z.coerce.number().int().nonnegative().default(8080),
});

export type EmailProvider = 'smtp' | 'gmail' | 'resend';

export interface Settings {
  env: 'development' | 'production' | 'test';
  source: {
    apiKey: string;
    baseUrl: string;
    maxItemsPerFetch: number;
    fetchTimeoutMs: number;
  };
  scoring: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
  channels: {
    premiumChannelId: string;
    interestingChannelId: string;
    sendTimeoutMs: number;
  };
  email: {
    provider: EmailProvider;
    smtpHost?: string;
    smtpPort: number;
    user?: string;
    password?: string;
    resendApiKey?: string;
    from: string;
    alertRecipient?: string;
  };
  build: {
    serviceUrl?: string;
    timeoutMs: number;
  };
  scheduler: {
    checkIntervalMs: number;
    maxConcurrentAccounts: number;
    skipReposts: boolean;
    maintenanceCron: string;
    pendingTtlHours: number;
    ledgerRetentionDays: number;
  };
  urgent: {
    cooldownMs: number;
    maxQueueSize: number;
    drainIntervalMs: number;
  };
  tiers: {
    bulkMin: number;
    premiumMin: number;
    urgentMin: number;
  };
  http: {
    port: number;
  };
}

/**
 * Parse an environment map into Settings.
 * Throws ConfigError listing every invalid key.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const useGmail = e.EMAIL_PROVIDER === 'gmail';

  return {
    env: e.NODE_ENV,
    source: {
      apiKey: e.SOURCE_API_KEY,
      baseUrl: e.SOURCE_API_BASE_URL,
      maxItemsPerFetch: e.MAX_ITEMS_PER_FETCH,
      fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    },
    scoring: {
      apiKey: e.SCORING_API_KEY,
      baseUrl: e.SCORING_BASE_URL,
      model: e.SCORING_MODEL,
      timeoutMs: e.SCORE_TIMEOUT_MS,
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
    channels: {
      premiumChannelId: e.PREMIUM_CHANNEL_ID,
      interestingChannelId: e.INTERESTING_CHANNEL_ID,
      sendTimeoutMs: e.SEND_TIMEOUT_MS,
    },
    email: {
      provider: e.EMAIL_PROVIDER,
      smtpHost: e.SMTP_HOST,
      smtpPort: e.SMTP_PORT,
      user: useGmail ? e.GMAIL_USER : e.SMTP_USER,
      password: useGmail ? e.GMAIL_APP_PASSWORD : e.SMTP_PASSWORD,
      resendApiKey: e.RESEND_API_KEY,
      from: e.EMAIL_FROM,
      alertRecipient: e.ALERT_RECIPIENT,
    },
    build: {
      serviceUrl: e.BUILD_SERVICE_URL,
      timeoutMs: e.BUILD_TIMEOUT_MS,
    },
    scheduler: {
      checkIntervalMs: e.CHECK_INTERVAL_SECONDS * 1000,
      maxConcurrentAccounts: e.MAX_CONCURRENT_ACCOUNTS,
      skipReposts: e.SKIP_REPOSTS,
      maintenanceCron: e.MAINTENANCE_CRON,
      pendingTtlHours: e.PENDING_TTL_HOURS,
      ledgerRetentionDays: e.LEDGER_RETENTION_DAYS,
    },
    urgent: {
      cooldownMs: e.URGENT_COOLDOWN_MINUTES * 60 * 1000,
      maxQueueSize: e.URGENT_MAX_QUEUE_SIZE,
      drainIntervalMs: e.DRAIN_INTERVAL_SECONDS * 1000,
    },
    tiers: {
      bulkMin: e.TIER_BULK_MIN,
      premiumMin: e.TIER_PREMIUM_MIN,
      urgentMin: e.TIER_URGENT_MIN,
    },
    http: {
      port: e.HTTP_PORT,
    },
  };
}
