// src/sources/catalog.ts

import type { AdapterDeps, HarvestContext } from './types';
import type { SourceProfile } from './profiles';
import { parseHtml, type HtmlDocument } from '../core/extract/html';
import { AdapterError, errorMessage } from '../utils/errors';

export interface CatalogPage {
  url: string;
  $: HtmlDocument;
}

/**
 * Fetch each catalog page in turn. Unreachable pages are skipped; when none
 * of them can be fetched the whole source fails.
 */
export async function* fetchCatalogPages(
  profile: SourceProfile,
  urls: readonly string[],
  deps: AdapterDeps,
  context: HarvestContext
): AsyncGenerator<CatalogPage> {
  let reached = 0;
  let lastError: unknown;

  for (const url of urls) {
    let body: string;
    try {
      body = (await deps.http.get(url, { signal: context.signal })).body;
    } catch (error: unknown) {
      if (context.signal?.aborted) throw error;
      lastError = error;
      deps.logger.warn('Catalog page unreachable', {
        source: profile.key,
        url,
        error: errorMessage(error),
      });
      continue;
    }

    reached++;
    yield { url, $: parseHtml(body) };
  }

  if (reached === 0) {
    throw new AdapterError(
      `${profile.displayName}: no catalog page reachable (${errorMessage(lastError)})`,
      profile.key,
      lastError,
      { urls }
    );
  }
}

/**
 * Optional text fields a profile fills in when the page did not provide them.
 */
export function applyDefaults<T extends { subject?: string | null; language?: string | null; level?: string | null }>(
  profile: SourceProfile,
  fields: T
): T {
  return {
    ...fields,
    subject: fields.subject ?? profile.defaults.subject ?? null,
    language: fields.language ?? profile.defaults.language ?? null,
    level: fields.level ?? profile.defaults.level ?? null,
  };
}
