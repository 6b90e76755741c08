import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import * as Sentry from '@sentry/node';
import { z } from 'zod';
import { FetchConfig } from '../types';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const integer = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

/**
 * Environment schema. Every variable is optional and falls back to a default.
 */
const EnvSchema = z.object({
  DOWNLOAD_DIRECTORY: z.string().min(1).default('./downloads'),
  DOWNLOAD_CHUNK_SIZE: integer(DEFAULT_CHUNK_SIZE, 1),
  DOWNLOAD_MAX_RETRIES: integer(3, 0),
  DOWNLOAD_RETRY_BASE_DELAY: integer(1000, 0),
  DOWNLOAD_RETRY_MAX_DELAY: integer(30000, 0),
  DOWNLOAD_TIMEOUT: integer(0, 0),
  DOWNLOAD_CONNECT_TIMEOUT: integer(30000, 1),
  DOWNLOAD_READ_TIMEOUT: integer(30000, 1),
  DOWNLOAD_USER_AGENT: z.string().min(1).default('Mozilla/5.0'),
  DOWNLOAD_CACHE_DIRECTORY: z
    .string()
    .min(1)
    .default(path.join(os.tmpdir(), 'filefetch-downloadcache')),
  DISABLE_DOWNLOAD_CACHE: booleanFlag,
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  SENTRY_DSN: z.string().url().optional(),
});

/**
 * Load configuration from environment variables (and a .env file if present)
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: { dotenv?: boolean } = {},
): FetchConfig {
  if (options.dotenv !== false) {
    dotenv.config();
  }

  // Blank values count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  if (vars.DOWNLOAD_RETRY_MAX_DELAY < vars.DOWNLOAD_RETRY_BASE_DELAY) {
    throw new Error(
      'Invalid configuration: DOWNLOAD_RETRY_MAX_DELAY must not be lower than DOWNLOAD_RETRY_BASE_DELAY',
    );
  }

  return {
    downloadDirectory: vars.DOWNLOAD_DIRECTORY,
    chunkSize: vars.DOWNLOAD_CHUNK_SIZE,
    retry: {
      maxRetries: vars.DOWNLOAD_MAX_RETRIES,
      baseDelay: vars.DOWNLOAD_RETRY_BASE_DELAY,
      maxDelay: vars.DOWNLOAD_RETRY_MAX_DELAY,
    },
    downloadTimeout: vars.DOWNLOAD_TIMEOUT,
    connectTimeout: vars.DOWNLOAD_CONNECT_TIMEOUT,
    readTimeout: vars.DOWNLOAD_READ_TIMEOUT,
    userAgent: vars.DOWNLOAD_USER_AGENT,
    cacheDirectory: vars.DOWNLOAD_CACHE_DIRECTORY,
    cacheDisabled: vars.DISABLE_DOWNLOAD_CACHE,
    logLevel: vars.LOG_LEVEL,
    sentryDsn: vars.SENTRY_DSN,
  };
}

/**
 * Initialize Sentry error reporting when a DSN is configured
 */
export function initMonitoring(config: FetchConfig): boolean {
  if (!config.sentryDsn) {
    return false;
  }
  Sentry.init({
    dsn: config.sentryDsn,
    environment: process.env.NODE_ENV || 'production',
  });
  return true;
}
