import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';

export const env = createEnv({
  server: {
    PORT: z.coerce.number().default(8080),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    // Comma separated. Any localhost origin is always allowed.
    CORS_ALLOWED_ORIGINS: z
      .string()
      .default('')
      .transform(value =>
        value
          .split(',')
          .map(origin => origin.trim())
          .filter(origin => origin.length > 0)
      ),

    DATABASE_HOST: z.string().default('localhost'),
    DATABASE_PORT: z.coerce.number().default(5432),
    DATABASE_NAME: z.string().default('campaigns'),
    DATABASE_USER: z.string().default('campaigns'),
    DATABASE_PASSWORD: z.string().default(''),

    // Pool sizing and recycling. The store may sit behind a proxy that drops idle connections.
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(5),
    DATABASE_IDLE_TIMEOUT_SECONDS: z.coerce.number().int().nonnegative().default(10),
    DATABASE_MAX_LIFETIME_SECONDS: z.coerce.number().int().positive().default(30 * 60),
    DATABASE_CONNECT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(10),

    // Bounded retry for bootstrap and metadata probes
    STORE_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
    STORE_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
    STORE_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
