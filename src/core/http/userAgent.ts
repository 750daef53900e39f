// src/core/http/userAgent.ts

import userAgents from './user-agents.json';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0';

export const BASE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
});

/**
 * Pick one User-Agent from the pool. Any failure yields the static default.
 */
export function pickUserAgent(
  pool: readonly unknown[] = userAgents,
  random: () => number = Math.random
): string {
  try {
    if (pool.length === 0) return DEFAULT_USER_AGENT;
    const candidate = pool[Math.floor(random() * pool.length)];
    return typeof candidate === 'string' && candidate.trim() !== ''
      ? candidate
      : DEFAULT_USER_AGENT;
  } catch {
    return DEFAULT_USER_AGENT;
  }
}

/**
 * Header set shared by every request of one client, chosen once.
 */
export function buildHeaders(userAgent?: string): Readonly<Record<string, string>> {
  return Object.freeze({
    ...BASE_HEADERS,
    'User-Agent': userAgent ?? pickUserAgent(),
  });
}
