// src/utils/errors.ts

export class HarvestError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Fetch errors
export type FetchFailureKind = 'status' | 'network' | 'timeout' | 'aborted';

export class FetchError extends HarvestError {
  constructor(
    message: string,
    public url: string,
    public kind: FetchFailureKind,
    public attempts: number,
    public status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'FETCH_ERROR', { ...details, url, kind, attempts, status });
  }

  /**
   * Status >= 400, network failures and timeouts are transient; cancellation is not.
   */
  get retryable(): boolean {
    return this.kind !== 'aborted';
  }
}

// Extraction errors
export class ExtractionError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', details);
  }
}

export class AdapterError extends HarvestError {
  constructor(
    message: string,
    public source: string,
    public cause?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 'ADAPTER_ERROR', { ...details, source });
  }

  static wrap(source: string, error: unknown, displayName = source): AdapterError {
    if (error instanceof AdapterError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new AdapterError(`${displayName}: ${message}`, source, error);
  }
}

// Selection / usage errors
export class UnknownSourceError extends HarvestError {
  constructor(
    public key: string,
    details?: Record<string, unknown>
  ) {
    super(`Unknown site key: ${key}. Use --list-sites to see options.`, 'UNKNOWN_SOURCE', {
      ...details,
      key,
    });
  }
}

export class UsageError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', details);
  }
}

// Configuration errors
export class ConfigurationError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class DuplicateSourceError extends ConfigurationError {
  constructor(
    public key: string,
    details?: Record<string, unknown>
  ) {
    super(`Source key registered twice: ${key}`, { ...details, key });
    this.code = 'DUPLICATE_SOURCE';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
