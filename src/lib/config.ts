import { existsSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './Logger.js';
import { NOTIFICATION_TYPES, type NotificationType } from './types.js';

export const DEFAULT_YANDEX_API_BASE = 'https://api.webmaster.yandex.net/v4';
export const DEFAULT_GOOGLE_INDEXING_API_BASE = 'https://indexing.googleapis.com/v3';

const required = z
  .string({ required_error: 'not set' })
  .trim()
  .min(1, 'not set');

const apiBase = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

const EnvSchema = z.object({
  YANDEX_API_TOKEN: required,
  SITE_URL: required,
  SERVICE_ACCOUNT_FILE: required,
  YANDEX_API_BASE: apiBase.default(DEFAULT_YANDEX_API_BASE),
  GOOGLE_INDEXING_API_BASE: apiBase.default(DEFAULT_GOOGLE_INDEXING_API_BASE),
  NOTIFICATION_TYPE: z.enum(NOTIFICATION_TYPES).default('URL_UPDATED'),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  // 0 disables the timeout.
  REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
  LOG_FILE: z.string().trim().min(1).default('reindex.log'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  yandex: {
    apiBase: string;
    token: string;
  };
  siteUrl: string;
  google: {
    apiBase: string;
    serviceAccountFile: string;
    notificationType: NotificationType;
  };
  requestDelayMs: number;
  requestTimeoutMs: number;
  logFile: string;
  logLevel: LogLevel;
}

/**
 * Validates the environment. Every problem is reported at once in a single
 * {@link ConfigurationError}.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  fileExists: (path: string) => boolean = existsSync
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  if (!fileExists(vars.SERVICE_ACCOUNT_FILE)) {
    throw new ConfigurationError(
      `Service account file not found: ${vars.SERVICE_ACCOUNT_FILE}`
    );
  }

  return {
    yandex: {
      apiBase: vars.YANDEX_API_BASE,
      token: vars.YANDEX_API_TOKEN,
    },
    siteUrl: vars.SITE_URL,
    google: {
      apiBase: vars.GOOGLE_INDEXING_API_BASE,
      serviceAccountFile: vars.SERVICE_ACCOUNT_FILE,
      notificationType: vars.NOTIFICATION_TYPE,
    },
    requestDelayMs: vars.REQUEST_DELAY_MS,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    logFile: vars.LOG_FILE,
    logLevel: vars.LOG_LEVEL,
  };
}
