import { z } from 'zod';
import { ValidationError } from '../errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  DATABASE_URL: z.string().min(1).optional(),
  REHAB_STORE: z.enum(['postgres', 'memory']).optional(),
  PREDICTOR_URL: z.string().url().default('http://localhost:8001/api/v1'),
  PREDICTOR_TIMEOUT_MS: z.coerce.number().int().min(100).max(10_000).default(1500),
  AUTO_CREATE_PROFILES: booleanFlag.default('true'),
  EVENTS_DRIVER: z.enum(['bullmq', 'log']).default('bullmq'),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),
});

export interface RehabConfig {
  port: number;
  host: string;
  frontendUrl: string;
  store: 'postgres' | 'memory';
  databaseUrl: string | null;
  predictor: {
    baseUrl: string;
    timeoutMs: number;
  };
  autoCreateProfiles: boolean;
  events: {
    driver: 'bullmq' | 'log';
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
}

let cachedConfig: RehabConfig | undefined;

/**
 * Parse and validate the service's environment.
 * Throws ValidationError naming every invalid variable.
 */
export function parseRehabConfig(env: NodeJS.ProcessEnv): RehabConfig {
  // Empty strings from .env files mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(
      `Invalid service configuration: ${invalid.join(', ')}`,
      { invalid }
    );
  }

  const parsed = result.data;
  const store = parsed.REHAB_STORE ?? (parsed.DATABASE_URL ? 'postgres' : 'memory');

  if (store === 'postgres' && !parsed.DATABASE_URL) {
    throw new ValidationError('REHAB_STORE=postgres requires DATABASE_URL', {
      invalid: ['DATABASE_URL'],
    });
  }

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    frontendUrl: parsed.FRONTEND_URL,
    store,
    databaseUrl: parsed.DATABASE_URL ?? null,
    predictor: {
      baseUrl: parsed.PREDICTOR_URL.replace(/\/+$/, ''),
      timeoutMs: parsed.PREDICTOR_TIMEOUT_MS,
    },
    autoCreateProfiles: parsed.AUTO_CREATE_PROFILES,
    events: { driver: parsed.EVENTS_DRIVER },
    redis: {
      host: parsed.REDIS_HOST,
      port: parsed.REDIS_PORT,
      password: parsed.REDIS_PASSWORD,
      db: parsed.REDIS_DB,
    },
  };
}

export function getRehabConfig(): RehabConfig {
  if (cachedConfig === undefined) {
    cachedConfig = parseRehabConfig(process.env);
  }
  return cachedConfig;
}
