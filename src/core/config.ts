/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * All settings go through this file; nothing else reads process.env.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates it at
 * startup. If anything is missing or invalid the process exits with the tree
 * of errors instead of failing on the first stored-procedure call. The result
 * is exported `as const`.
 *
 * DATABASE_URL accepts either a mysql:// URL or the key/value form
 * (Server=…;Database=…;Uid=…;Pwd=…); it is only parsed when a session opens.
 */
import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Connection string handed to the data source adapter. */
  DATABASE_URL: z.string().min(1).default('mysql://root@localhost:3306/app'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    url: env.DATABASE_URL,
  },

  log: {
    level: env.LOG_LEVEL,
  },
} as const;

export type AppConfig = typeof config;
