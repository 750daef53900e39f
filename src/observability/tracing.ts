/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for HTTP fetches and source runs. The harvester only talks to
 * `@opentelemetry/api`; exporting is up to whichever tracer provider the host
 * process registers. No-op unless OTEL_ENABLED is set.
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'course-harvester';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Unique id for one harvest run; attached to every run log line.
 */
export function generateRunId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span around one source's extraction
 *
 * @param source - Source key
 * @param runId - Harvest run id
 */
export async function withSourceSpan<T>(
  source: string,
  runId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Harvest ${source}`, fn, {
    'harvest.source': source,
    'harvest.run_id': runId,
  });
}
