// src/core/http/types.ts

export interface FetchOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RawResponse {
  url: string;
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * The slice of the HTTP client adapters depend on.
 */
export interface Fetcher {
  get(url: string, options?: FetchOptions): Promise<RawResponse>;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
