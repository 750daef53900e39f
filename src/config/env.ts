// src/config/env.ts

import type { HarvesterConfigInput } from './ConfigValidator';

type Env = Record<string, string | undefined>;

function num(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for the schema to reject with a field path
  return Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function str(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Map HARVEST_* environment variables onto the config schema.
 * Unset variables are left out so schema defaults apply.
 */
export function loadConfigFromEnv(env: Env = process.env): HarvesterConfigInput {
  return {
    http: {
      timeoutMs: num(env.HARVEST_HTTP_TIMEOUT_MS),
      userAgent: str(env.HARVEST_USER_AGENT),
      requestsPerSecond: num(env.HARVEST_REQUESTS_PER_SECOND),
      retry: {
        maxAttempts: num(env.HARVEST_RETRY_MAX_ATTEMPTS),
        multiplierMs: num(env.HARVEST_RETRY_MULTIPLIER_MS),
        minDelayMs: num(env.HARVEST_RETRY_MIN_DELAY_MS),
        maxDelayMs: num(env.HARVEST_RETRY_MAX_DELAY_MS),
      },
    },
    run: {
      concurrency: num(env.HARVEST_CONCURRENCY),
      cancelGraceMs: num(env.HARVEST_CANCEL_GRACE_MS),
    },
    render: {
      enabled: bool(env.HARVEST_RENDER_ENABLED),
      headless: bool(env.HARVEST_RENDER_HEADLESS),
      timeoutMs: num(env.HARVEST_RENDER_TIMEOUT_MS),
      settleMs: num(env.HARVEST_RENDER_SETTLE_MS),
    },
    logging: {
      level: logLevel(env.LOG_LEVEL),
      format: env.LOG_FORMAT === 'json' ? 'json' : env.LOG_FORMAT === 'pretty' ? 'pretty' : undefined,
    },
    metrics: {
      enabled: bool(env.HARVEST_METRICS_ENABLED),
    },
  };
}

function logLevel(value: string | undefined): 'debug' | 'info' | 'warn' | 'error' | undefined {
  switch (str(value)?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}
