// src/config/app.config.ts
import { z } from 'zod';

const BoolFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  CORS_ORIGIN: z.string().trim().default('http://localhost:3001'),

  DB_TYPE: z.enum(['postgres', 'sqlite']).default('postgres'),
  DATABASE_URL: z.string().trim().optional(),
  DB_DATABASE: z.string().trim().default(':memory:'),
  DB_SYNCHRONIZE: BoolFlag,
  DB_LOGGING: BoolFlag,

  SMTP_HOST: z.string().trim().default('localhost'),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_SECURE: BoolFlag,
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),

  FROM_EMAIL: z.string().trim().email().default('noreply@example.com'),
  FROM_NAME: z.string().trim().min(1).default('CRM System'),

  SEND_THROTTLE_MS: z.coerce.number().int().min(0).max(60_000).default(100),

  CRON_TZ: z.string().trim().default('UTC'),
  SCHEDULER_DISABLED: BoolFlag,
  METRICS_SNAPSHOT_DISABLED: BoolFlag,
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  database: {
    type: 'postgres' | 'sqlite';
    url?: string;
    database: string;
    synchronize: boolean;
    logging: boolean;
  };
  smtp: {
    host: string;
    port: number;
    secure: boolean;
    user?: string;
    pass?: string;
  };
  mail: { fromEmail: string; fromName: string };
  sendThrottleMs: number;
  cron: {
    timeZone: string;
    schedulerDisabled: boolean;
    metricsSnapshotDisabled: boolean;
  };
}

export const APP_CONFIG = Symbol('APP_CONFIG');

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration -> ${keys.join('; ')}`);
  }
  const e = parsed.data;

  if (e.DB_TYPE === 'postgres' && !e.DATABASE_URL) {
    throw new Error('Invalid configuration -> DATABASE_URL: required when DB_TYPE=postgres');
  }

  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    database: {
      type: e.DB_TYPE,
      url: e.DATABASE_URL,
      database: e.DB_DATABASE,
      synchronize: e.DB_SYNCHRONIZE,
      logging: e.DB_LOGGING,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER || undefined,
      pass: e.SMTP_PASS || undefined,
    },
    mail: { fromEmail: e.FROM_EMAIL, fromName: e.FROM_NAME },
    sendThrottleMs: e.SEND_THROTTLE_MS,
    cron: {
      timeZone: e.CRON_TZ,
      schedulerDisabled: e.SCHEDULER_DISABLED,
      metricsSnapshotDisabled: e.METRICS_SNAPSHOT_DISABLED,
    },
  };
}
