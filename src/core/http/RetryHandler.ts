// src/core/http/RetryHandler.ts

import type { RetryConfig } from '../../config/ConfigValidator';
import type { Logger } from '../../observability/Logger';
import type { Sleep } from './types';
import { FetchError } from '../../utils/errors';

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RetryContext {
  url: string;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: FetchError) => void;
}

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private wait: Sleep = sleep
  ) {}

  /**
   * Wait before the attempt that follows `attempt` (1-based):
   * multiplier * 2^(attempt-1), clamped to [minDelay, maxDelay].
   */
  delayFor(attempt: number): number {
    const exponential = this.config.multiplierMs * Math.pow(2, attempt - 1);
    return Math.max(this.config.minDelayMs, Math.min(exponential, this.config.maxDelayMs));
  }

  async execute<T>(task: (attempt: number) => Promise<T>, context: RetryContext): Promise<T> {
    const maxAttempts = this.config.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      try {
        return await task(attempt);
      } catch (error: unknown) {
        if (!(error instanceof FetchError)) {
          throw error;
        }

        if (!error.retryable || attempt >= maxAttempts) {
          error.attempts = attempt;
          throw error;
        }

        const delay = this.delayFor(attempt);
        this.logger.warn('Retrying request', {
          url: context.url,
          attempt,
          nextAttempt: attempt + 1,
          delay,
          kind: error.kind,
          status: error.status,
        });
        context.onRetry?.(attempt, error);

        try {
          await this.wait(delay, context.signal);
        } catch {
          throw new FetchError(`GET ${context.url} aborted`, context.url, 'aborted', attempt);
        }
      }
    }
  }
}
