// src/sources/LinkDiscoveryAdapter.ts

import type { AdapterDeps, HarvestContext, SourceAdapter } from './types';
import type { LinkDiscoveryProfile } from './profiles';
import type { CourseDraft, CourseRecord } from '../core/record/types';
import { createRecordFactory, type RecordFactory } from '../core/record/CourseRecord';
import {
  DEFAULT_TITLE_SELECTORS,
  discoverLinks,
  firstText,
  parseHtml,
  resolveTitle,
  type DiscoveredLink,
} from '../core/extract/html';
import { extractFields } from '../core/extract/fields';
import { applyDefaults, fetchCatalogPages } from './catalog';
import { catalogUrl } from './profiles';
import { errorMessage } from '../utils/errors';

/**
 * Crawls catalog pages of a site whose markup is not known in advance and
 * keeps same-site links whose path looks like a course.
 *
 * @example
 * ```typescript
 * const adapter = new LinkDiscoveryAdapter(
 *   {
 *     kind: 'link-discovery',
 *     key: 'acme',
 *     displayName: 'Acme Academy',
 *     baseUrl: 'https://academy.example.org',
 *     linkPattern: 'course|training',
 *     catalogPaths: [''],
 *     followDetail: true,
 *     placeholder: false,
 *     defaults: {},
 *     fields: {},
 *   },
 *   deps
 * );
 * for await (const record of adapter.iterCourses()) console.log(record.title);
 * ```
 */
export class LinkDiscoveryAdapter implements SourceAdapter {
  readonly key: string;
  readonly displayName: string;
  private build: RecordFactory;
  private pattern: RegExp;

  constructor(
    private profile: LinkDiscoveryProfile,
    private deps: AdapterDeps
  ) {
    this.key = profile.key;
    this.displayName = profile.displayName;
    this.build = createRecordFactory(profile.displayName);
    this.pattern = new RegExp(profile.linkPattern, 'i');
  }

  isAllowed(): boolean {
    return !this.profile.placeholder;
  }

  async *iterCourses(context: HarvestContext = {}): AsyncGenerator<CourseRecord> {
    const urls = this.profile.catalogPaths.map((path) => catalogUrl(this.profile.baseUrl, path));
    const seen = new Set<string>();

    for await (const page of fetchCatalogPages(this.profile, urls, this.deps, context)) {
      const links = discoverLinks(page.$, this.profile.baseUrl, this.pattern);
      this.deps.logger.debug('Candidate course links', {
        source: this.key,
        page: page.url,
        count: links.length,
      });

      for (const link of links) {
        if (seen.has(link.url)) continue;
        seen.add(link.url);
        yield await this.toRecord(link, context);
      }
    }
  }

  private async toRecord(link: DiscoveredLink, context: HarvestContext): Promise<CourseRecord> {
    const fallback = () =>
      this.build(applyDefaults<CourseDraft>(this.profile, { url: link.url, title: resolveTitle(null, link.text, link.url) }));

    if (!this.profile.followDetail) {
      return fallback();
    }

    try {
      const response = await this.deps.http.get(link.url, { signal: context.signal });
      const $ = parseHtml(response.body);
      const heading = firstText($, this.profile.titleSelectors ?? DEFAULT_TITLE_SELECTORS);
      const fields = extractFields($, this.profile.fields, this.deps.logger, {
        source: this.key,
        url: link.url,
      });

      return this.build(
        applyDefaults(this.profile, {
          ...fields,
          url: link.url,
          title: resolveTitle(heading, link.text, link.url),
        })
      );
    } catch (error: unknown) {
      if (context.signal?.aborted) throw error;
      this.deps.logger.warn('Detail page failed, using link text', {
        source: this.key,
        url: link.url,
        error: errorMessage(error),
      });
      return fallback();
    }
  }
}
