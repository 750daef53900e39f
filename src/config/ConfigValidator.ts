// src/config/ConfigValidator.ts

import { z } from 'zod';

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    multiplierMs: z.number().positive().default(1000),
    minDelayMs: z.number().min(0).default(1000),
    maxDelayMs: z.number().positive().default(8000),
  })
  .refine((data) => data.maxDelayMs >= data.minDelayMs, {
    message: 'maxDelayMs must be greater than or equal to minDelayMs',
  });

// HTTP Configuration Schema
const HttpConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).optional(),
  requestsPerSecond: z.number().positive().optional(),
  retry: RetryConfigSchema.default({}),
});

// Run Configuration Schema
const RunConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(32).default(1),
  cancelGraceMs: z.number().int().min(0).default(5000),
});

// Rendering Configuration Schema
const RenderConfigSchema = z.object({
  enabled: z.boolean().default(true),
  headless: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30000),
  settleMs: z.number().int().min(0).default(3000),
});

// Logger Configuration Schema
const LoggerConfigSchema = z.object({
  level: z
    .enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: "Log level must be 'debug', 'info', 'warn', or 'error'" }),
    })
    .default('info'),
  format: z.enum(['json', 'pretty']).default('pretty'),
  silent: z.boolean().default(false),
});

// Metrics Configuration Schema
const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

// Complete Harvester Configuration Schema
export const HarvesterConfigSchema = z.object({
  http: HttpConfigSchema.default({}),
  run: RunConfigSchema.default({}),
  render: RenderConfigSchema.default({}),
  logging: LoggerConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
});

export type HarvesterConfig = z.output<typeof HarvesterConfigSchema>;
export type HarvesterConfigInput = z.input<typeof HarvesterConfigSchema>;
export type HttpConfig = HarvesterConfig['http'];
export type RetryConfig = HttpConfig['retry'];
export type RunConfig = HarvesterConfig['run'];
export type RenderConfig = HarvesterConfig['render'];

/**
 * Validate harvester configuration and fill in defaults
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): HarvesterConfig {
  return HarvesterConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: HarvesterConfig } | { success: false; errors: string[] } {
  const result = HarvesterConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
