import { config as dotenvConfig } from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOGS_DIR: z.string().default('./logs'),
  DB_PATH: z.string().default('./data/license.db'),

  API_HOST: z.string().default('127.0.0.1'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3017),

  REGISTRY_URL: z.string().url().default('https://registry.example.com/api'),
  REGISTRY_WEBHOOK_URL: z.string().url().default('https://registry.example.com/api/webhook'),
  REGISTRY_API_KEY: z.string().optional(),
  REGISTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  OFFLINE_GRACE_DAYS: z.coerce.number().int().min(0).default(7),
  MAX_TRANSFERS: z.coerce.number().int().min(0).default(3),
  HARDWARE_MATCH_THRESHOLD: z.coerce.number().int().min(1).max(3).default(2),
  MANUAL_VERIFICATION_LIMIT: z.coerce.number().int().min(1).default(3),
  CHECK_INTERVAL_TRIAL_HOURS: z.coerce.number().positive().max(596).default(1),
  CHECK_INTERVAL_STANDARD_HOURS: z.coerce.number().positive().max(596).default(24),
  CHECK_INTERVAL_PREMIUM_HOURS: z.coerce.number().positive().max(596).default(168),
  CLOCK_SKEW_TOLERANCE_SECONDS: z.coerce.number().int().min(0).default(300),
  EXPIRY_WARNING_DAYS: z.coerce.number().int().min(0).default(7),

  MAIL_API_URL: z.string().url().optional().or(z.literal('')),
  MAIL_API_KEY: z.string().optional(),
  MAIL_FROM: z.string().default('Water Balance Licensing <licensing@example.com>'),
  SUPPORT_EMAIL: z.string().email().default('support@example.com'),

  INTEGRITY_SECRET: z.string().min(8).default('water-balance-local-integrity'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env = parsed.data;

const HOUR_MS = 60 * 60 * 1000;

function readVersion(): string {
  try {
    const pkgPath = path.resolve(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '1.0.0';
  } catch {
    return '1.0.0';
  }
}

export const config = {
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'debug' : 'info'),

  api: {
    host: env.API_HOST,
    port: env.API_PORT,
  },

  db: {
    path: path.resolve(env.DB_PATH),
  },

  paths: {
    logs: path.resolve(env.LOGS_DIR),
    data: path.dirname(path.resolve(env.DB_PATH)),
  },

  registry: {
    url: env.REGISTRY_URL.replace(/\/+$/, ''),
    webhookUrl: env.REGISTRY_WEBHOOK_URL,
    apiKey: env.REGISTRY_API_KEY || '',
    timeoutMs: env.REGISTRY_TIMEOUT_MS,
  },

  licensing: {
    offlineGraceDays: env.OFFLINE_GRACE_DAYS,
    maxTransfers: env.MAX_TRANSFERS,
    hardwareMatchThreshold: env.HARDWARE_MATCH_THRESHOLD,
    manualVerificationLimit: env.MANUAL_VERIFICATION_LIMIT,
    checkIntervalsMs: {
      trial: env.CHECK_INTERVAL_TRIAL_HOURS * HOUR_MS,
      standard: env.CHECK_INTERVAL_STANDARD_HOURS * HOUR_MS,
      premium: env.CHECK_INTERVAL_PREMIUM_HOURS * HOUR_MS,
    },
    clockSkewToleranceMs: env.CLOCK_SKEW_TOLERANCE_SECONDS * 1000,
    expiryWarningDays: env.EXPIRY_WARNING_DAYS,
    supportEmail: env.SUPPORT_EMAIL,
  },

  mail: {
    apiUrl: env.MAIL_API_URL || '',
    apiKey: env.MAIL_API_KEY || '',
    from: env.MAIL_FROM,
  },

  integrity: {
    secret: env.INTEGRITY_SECRET,
  },

  version: readVersion(),
} as const;

export type Config = typeof config;
export type LicensingSettings = Config['licensing'];
export type RegistrySettings = Config['registry'];
export type MailSettings = Config['mail'];
