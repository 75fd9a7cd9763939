// Runtime configuration, read from environment variables.

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULTS = {
  storeDriver: 'memory' as const,
  maxConnections: 10,
  logLevel: 'info' as const,
};

export const StoreDriverSchema = z.enum(['memory', 'postgres']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const EnvSchema = z
  .object({
    STORE_DRIVER: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(StoreDriverSchema)
      .default(DEFAULTS.storeDriver),
    DATABASE_URL: z.string().trim().min(1).optional(),
    DATABASE_MAX_CONNECTIONS: z.coerce
      .number()
      .int()
      .min(1)
      .max(100)
      .default(DEFAULTS.maxConnections),
    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(LogLevelSchema)
      .default(DEFAULTS.logLevel),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORE_DRIVER is postgres',
      });
    }
  });

export type RuntimeConfig =
  | {
      store: { driver: 'memory' };
      logging: { level: z.infer<typeof LogLevelSchema> };
    }
  | {
      store: { driver: 'postgres'; databaseUrl: string; maxConnections: number };
      logging: { level: z.infer<typeof LogLevelSchema> };
    };

/**
 * Parse runtime configuration from an environment map.
 *
 * Recognized variables: STORE_DRIVER (memory | postgres), DATABASE_URL,
 * DATABASE_MAX_CONNECTIONS, LOG_LEVEL. Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): RuntimeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { STORE_DRIVER, DATABASE_URL, DATABASE_MAX_CONNECTIONS, LOG_LEVEL } = parsed.data;
  const logging = { level: LOG_LEVEL };

  if (STORE_DRIVER === 'postgres' && DATABASE_URL) {
    return {
      store: {
        driver: 'postgres',
        databaseUrl: DATABASE_URL,
        maxConnections: DATABASE_MAX_CONNECTIONS,
      },
      logging,
    };
  }

  return { store: { driver: 'memory' }, logging };
}
