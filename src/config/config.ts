/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - MAIN CONFIGURATION
 * ============================================================================
 */

import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const booleanString = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false']).default(defaultValue).transform((value) => value === 'true');

const numberString = (defaultValue: string) =>
  z.string().default(defaultValue).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Environment validation schema
 */
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberString('3001'),
  API_VERSION: z.string().default('v1'),
  APP_NAME: z.string().default('Telehealth Scheduler'),

  // Database
  DATABASE_URL: z.string().min(1, 'Database URL is required'),
  DATABASE_SSL: booleanString('false'),
  DATABASE_POOL_MAX: numberString('10'),
  DATABASE_TIMEOUT: numberString('30000'),

  // JWT
  JWT_SECRET: z.string().min(32, 'JWT secret must be at least 32 characters'),
  JWT_ISSUER: z.string().default('telehealth-scheduler'),
  JWT_AUDIENCE: z.string().default('telehealth-scheduler-users'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: numberString('900000'), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: numberString('1000'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE_ENABLED: booleanString('true'),
  LOG_FILE_PATH: z.string().default('./logs'),
  LOG_MAX_SIZE: z.string().default('20m'),
  LOG_MAX_FILES: z.string().default('14d'),

  // Email (SMTP)
  SMTP_HOST: z.string().default('localhost'),
  SMTP_PORT: numberString('587'),
  SMTP_SECURE: booleanString('false'),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM_NAME: z.string().default('Telehealth Scheduler'),
  SMTP_FROM_EMAIL: z.string().email().default('noreply@telehealth.local'),
  SMTP_TIMEOUT_MS: numberString('10000'),

  // Meeting provider (Zoom-compatible REST API)
  MEETING_API_URL: z.string().url().default('https://api.zoom.us/v2'),
  MEETING_API_KEY: z.string().default(''),
  MEETING_API_SECRET: z.string().default(''),
  MEETING_API_TIMEOUT_MS: numberString('10000'),
  MEETING_TOKEN_TTL_SECONDS: numberString('300'),

  // Scheduling
  SLOT_DURATION_MINUTES: numberString('30'),
  ACCESS_CODE_LENGTH: numberString('6'),
  ACCESS_CODE_TTL_MINUTES: numberString('15'),
  REMINDER_LEAD_HOURS: numberString('24'),
  REMINDER_CRON: z.string().default('*/15 * * * *'),
  REMINDERS_ENABLED: booleanString('true'),
  OUTBOX_CRON: z.string().default('* * * * *'),
  OUTBOX_BATCH_SIZE: numberString('50'),
  OUTBOX_MAX_ATTEMPTS: numberString('5'),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Validate and parse environment variables
 */
const env = envSchema.parse(process.env);

/**
 * Application configuration object
 */
export const config = {
  env: env.NODE_ENV,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',

  app: {
    name: env.APP_NAME,
    version: env.API_VERSION,
  },

  server: {
    port: env.PORT,
  },

  database: {
    url: env.DATABASE_URL,
    ssl: env.DATABASE_SSL,
    poolMax: env.DATABASE_POOL_MAX,
    timeout: env.DATABASE_TIMEOUT,
  },

  jwt: {
    secret: env.JWT_SECRET,
    issuer: env.JWT_ISSUER,
    audience: env.JWT_AUDIENCE,
  },

  cors: {
    allowedOrigins: env.CORS_ORIGIN.split(',').map((origin) => origin.trim()),
  },

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: {
      enabled: env.LOG_FILE_ENABLED,
      path: env.LOG_FILE_PATH,
      maxSize: env.LOG_MAX_SIZE,
      maxFiles: env.LOG_MAX_FILES,
    },
  },

  email: {
    from: `"${env.SMTP_FROM_NAME}" <${env.SMTP_FROM_EMAIL}>`,
    timeout: env.SMTP_TIMEOUT_MS,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_SECURE,
      user: env.SMTP_USER,
      password: env.SMTP_PASS,
    },
  },

  meeting: {
    baseUrl: env.MEETING_API_URL,
    apiKey: env.MEETING_API_KEY,
    apiSecret: env.MEETING_API_SECRET,
    timeout: env.MEETING_API_TIMEOUT_MS,
    tokenTtlSeconds: env.MEETING_TOKEN_TTL_SECONDS,
  },

  scheduling: {
    slotMinutes: env.SLOT_DURATION_MINUTES,
    accessCode: {
      length: env.ACCESS_CODE_LENGTH,
      ttlMinutes: env.ACCESS_CODE_TTL_MINUTES,
    },
    reminders: {
      enabled: env.REMINDERS_ENABLED,
      leadHours: env.REMINDER_LEAD_HOURS,
      cron: env.REMINDER_CRON,
    },
    outbox: {
      cron: env.OUTBOX_CRON,
      batchSize: env.OUTBOX_BATCH_SIZE,
      maxAttempts: env.OUTBOX_MAX_ATTEMPTS,
    },
  },
} as const;

export type AppConfig = typeof config;

export default config;
