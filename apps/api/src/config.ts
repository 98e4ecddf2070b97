/**
 * Service configuration.
 *
 * Parsed once from the environment. Invalid values fail fast at startup
 * with the list of offending variables.
 */

import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform(v => (v ?? '').toLowerCase() === 'true');

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  JWT_SECRET: z.string().min(1).default('dev-secret-change-in-production'),

  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().default(5432),
  DB_NAME: z.string().default('circulation'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_SSL: booleanFlag,

  LOAN_PERIOD_DAYS: z.coerce.number().int().min(1).default(14),
  RENEWAL_PERIOD_DAYS: z.coerce.number().int().min(1).default(14),
  MAX_RENEWALS: z.coerce.number().int().min(0).default(2),

  IDEMPOTENCY_RETENTION_HOURS: z.coerce.number().int().min(1).default(24),
  IDEMPOTENCY_LEASE_MS: z.coerce.number().int().min(100).default(30_000),
  IDEMPOTENCY_POLL_MS: z.coerce.number().int().min(1).default(50),

  REQUEST_DEADLINE_MS: z.coerce.number().int().min(1).default(5_000),
  MAX_REQUEST_DEADLINE_MS: z.coerce.number().int().min(1).default(30_000),
});

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface CirculationPolicy {
  loanPeriodDays: number;
  renewalPeriodDays: number;
  maxRenewals: number;
}

export interface IdempotencyPolicy {
  retentionMs: number;
  leaseMs: number;
  pollIntervalMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: EnvConfig['LOG_LEVEL'];
  corsOrigin: string;
  jwtSecret: string;
  storeDriver: EnvConfig['STORE_DRIVER'];
  db: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
  };
  circulation: CirculationPolicy;
  idempotency: IdempotencyPolicy;
  deadline: {
    defaultMs: number;
    maxMs: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment map (defaults to process.env).
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const c = result.data;

  if (c.REQUEST_DEADLINE_MS > c.MAX_REQUEST_DEADLINE_MS) {
    throw new ConfigError(['REQUEST_DEADLINE_MS: must not exceed MAX_REQUEST_DEADLINE_MS']);
  }

  return {
    port: c.PORT,
    host: c.HOST,
    nodeEnv: c.NODE_ENV,
    logLevel: c.LOG_LEVEL,
    corsOrigin: c.CORS_ORIGIN,
    jwtSecret: c.JWT_SECRET,
    storeDriver: c.STORE_DRIVER,
    db: {
      host: c.DB_HOST,
      port: c.DB_PORT,
      database: c.DB_NAME,
      user: c.DB_USER,
      password: c.DB_PASSWORD,
      ssl: c.DB_SSL,
    },
    circulation: {
      loanPeriodDays: c.LOAN_PERIOD_DAYS,
      renewalPeriodDays: c.RENEWAL_PERIOD_DAYS,
      maxRenewals: c.MAX_RENEWALS,
    },
    idempotency: {
      retentionMs: c.IDEMPOTENCY_RETENTION_HOURS * 60 * 60 * 1000,
      leaseMs: c.IDEMPOTENCY_LEASE_MS,
      pollIntervalMs: c.IDEMPOTENCY_POLL_MS,
    },
    deadline: {
      defaultMs: c.REQUEST_DEADLINE_MS,
      maxMs: c.MAX_REQUEST_DEADLINE_MS,
    },
  };
}
