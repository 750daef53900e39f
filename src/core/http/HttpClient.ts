// src/core/http/HttpClient.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpConfig } from '../../config/ConfigValidator';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import type { FetchOptions, Fetcher, RawResponse, Sleep } from './types';
import { RetryHandler, sleep } from './RetryHandler';
import { buildHeaders } from './userAgent';
import { FetchError } from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export interface HttpClientOptions {
  sleep?: Sleep;
}

/**
 * Retrying GET client shared by every adapter of a run.
 *
 * Headers (User-Agent included) are fixed when the client is built and never
 * change afterwards, so concurrent adapters can share one instance.
 */
export class HttpClient implements Fetcher {
  readonly headers: Readonly<Record<string, string>>;
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, PQueue> = new Map();
  private retryHandler: RetryHandler;

  constructor(
    private config: HttpConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    options: HttpClientOptions = {}
  ) {
    this.headers = buildHeaders(config.userAgent);
    this.retryHandler = new RetryHandler(config.retry, logger, options.sleep ?? sleep);

    this.axiosInstance = axios.create({
      timeout: config.timeoutMs,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      // Status classification happens here, not in axios
      validateStatus: () => true,
      maxRedirects: 5,
    });

    this.logger.debug('HTTP client initialized', {
      userAgent: this.headers['User-Agent'],
      timeoutMs: config.timeoutMs,
      maxAttempts: config.retry.maxAttempts,
    });
  }

  async get(url: string, options: FetchOptions = {}): Promise<RawResponse> {
    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      throw new FetchError(`Invalid URL: ${url}`, url, 'network', 0);
    }

    const task = () =>
      withHttpSpan('GET', url, () =>
        this.retryHandler.execute((attempt) => this.attempt(url, origin, attempt, options), {
          url,
          signal: options.signal,
          onRetry: () => this.metrics.incrementCounter('http_retries', { origin }),
        })
      );

    return this.runThroughRateLimiter(origin, task);
  }

  private async attempt(
    url: string,
    origin: string,
    attempt: number,
    options: FetchOptions
  ): Promise<RawResponse> {
    const startTime = Date.now();
    this.logger.debug('HTTP request', { url, attempt });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.get<unknown>(url, {
        headers: { ...this.headers, ...options.headers },
        timeout: options.timeoutMs ?? this.config.timeoutMs,
        signal: options.signal,
      });
    } catch (error: unknown) {
      const fetchError = this.transformError(error, url, attempt);
      this.metrics.incrementCounter('http_requests_total', { origin, status: fetchError.kind });
      throw fetchError;
    }

    const status = response.status;
    this.metrics.incrementCounter('http_requests_total', { origin, status: String(status) });
    this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
      origin,
      status,
    });

    if (status >= 400) {
      throw new FetchError(`GET ${url} -> ${status}`, url, 'status', attempt, status);
    }

    const data = response.data;
    return {
      url,
      status,
      body: typeof data === 'string' ? data : data == null ? '' : String(data),
      headers: this.toHeaderRecord(response.headers),
    };
  }

  private async runThroughRateLimiter<T>(origin: string, task: () => Promise<T>): Promise<T> {
    const queue = this.getRateLimiter(origin);

    if (!queue) {
      return task();
    }

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { origin });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { origin });
    return queue.add(wrappedTask);
  }

  private getRateLimiter(origin: string): PQueue | undefined {
    const qps = this.config.requestsPerSecond;
    if (qps === undefined) return undefined;

    const existing = this.rateLimiters.get(origin);
    if (existing) return existing;

    // Fractional rates become one request per longer interval (0.5 qps = 1 per 2000ms)
    let intervalCap: number;
    let interval: number;
    if (qps >= 1) {
      intervalCap = Math.floor(qps);
      interval = 1000;
    } else {
      intervalCap = 1;
      interval = Math.floor(1000 / qps);
    }

    const queue = new PQueue({ intervalCap, interval, concurrency: 1 });
    this.rateLimiters.set(origin, queue);
    this.logger.debug('Rate limiter initialized', { origin, qps, intervalCap, interval });
    return queue;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string, attempt: number): FetchError {
    if (error instanceof FetchError) return error;

    if (axios.isCancel(error)) {
      return new FetchError(`GET ${url} aborted`, url, 'aborted', attempt);
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new FetchError(`GET ${url} timed out`, url, 'timeout', attempt, undefined, {
          code: error.code,
        });
      }
      return new FetchError(`GET ${url} failed: ${error.message}`, url, 'network', attempt, undefined, {
        code: error.code,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(`GET ${url} failed: ${message}`, url, 'network', attempt);
  }
}
