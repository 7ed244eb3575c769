/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * All settings (port, log level, error boundary switches) are funnelled
 * through this file. Every other module imports `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * at startup. If anything is missing or invalid, the process exits immediately.
 * The result is a nested `config` object exported with `as const`.
 *
 * Booleans are parsed from the literal strings "true"/"false" rather than with
 * `z.coerce.boolean()`, which would read "false" as true.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

import { RENDERER_NAMES } from '@shared/constants';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Render stack traces and messages into client-visible error bodies. Never enable in production. */
  DISPLAY_ERROR_DETAILS: booleanFlag('false'),
  /** Write one diagnostic entry per handled error. */
  LOG_ERRORS: booleanFlag('true'),
  /** Include type, message and trace in the diagnostic entry. */
  LOG_ERROR_DETAILS: booleanFlag('true'),
  /** Force a single error representation regardless of the Accept header. */
  ERROR_RENDERER: z.enum(RENDERER_NAMES).optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  errors: {
    displayErrorDetails: env.DISPLAY_ERROR_DETAILS,
    logErrors: env.LOG_ERRORS,
    logErrorDetails: env.LOG_ERROR_DETAILS,
    renderer: env.ERROR_RENDERER,
  },
} as const;

export type AppConfig = typeof config;
