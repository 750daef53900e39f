// src/sources/RenderedCatalogAdapter.ts

import type { AdapterDeps, HarvestContext, SourceAdapter } from './types';
import type { RenderedProfile } from './profiles';
import type { CourseDraft, CourseRecord } from '../core/record/types';
import { createRecordFactory, type RecordFactory } from '../core/record/CourseRecord';
import { cleanText, parseHtml, resolveHref } from '../core/extract/html';
import { applyDefaults } from './catalog';
import { catalogUrl } from './profiles';
import { AdapterError, ExtractionError, errorMessage } from '../utils/errors';

/**
 * Lowercase, dash-separated form of a title, used to tell apart cards that
 * carry no link of their own.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * `page#slug`, suffixed `-2`, `-3`... when another card already took it.
 */
function cardId(pageUrl: string, slug: string, taken: ReadonlySet<string>): string {
  const base = `${pageUrl}#${slug}`;
  let id = base;
  for (let n = 2; taken.has(id); n++) {
    id = `${base}-${n}`;
  }
  return id;
}

/**
 * Catalog built client-side: the page is rendered in a browser, then each
 * course card becomes one record.
 */
export class RenderedCatalogAdapter implements SourceAdapter {
  readonly key: string;
  readonly displayName: string;
  private build: RecordFactory;

  constructor(
    private profile: RenderedProfile,
    private deps: AdapterDeps
  ) {
    this.key = profile.key;
    this.displayName = profile.displayName;
    this.build = createRecordFactory(profile.displayName);
  }

  isAllowed(): boolean {
    return !this.profile.placeholder;
  }

  async *iterCourses(context: HarvestContext = {}): AsyncGenerator<CourseRecord> {
    const pageUrl = catalogUrl(this.profile.baseUrl, this.profile.catalogPath);

    let html: string;
    try {
      html = await this.deps.renderer.render(pageUrl, {
        waitFor: this.profile.waitFor,
        settleMs: this.profile.settleMs,
        signal: context.signal,
      });
    } catch (error: unknown) {
      if (context.signal?.aborted) throw error;
      throw new AdapterError(`${this.displayName}: render failed (${errorMessage(error)})`, this.key, error, {
        url: pageUrl,
      });
    }

    const $ = parseHtml(html);
    const ids = new Set<string>();
    const linklessTitles = new Set<string>();

    for (const [index, element] of $(this.profile.cardSelector).toArray().entries()) {
      const card = $(element);
      try {
        const title = cleanText(card.find(this.profile.titleSelector).first().text());
        if (!title) {
          throw new ExtractionError('Course card has no title', {
            selector: this.profile.titleSelector,
          });
        }

        const href = resolveHref(card.find('a[href]').first().attr('href') ?? '', pageUrl);
        const repeated = href ? ids.has(href) : linklessTitles.has(title);
        if (repeated) {
          this.deps.logger.debug('Repeated course card', { source: this.key, title, url: href ?? pageUrl });
          continue;
        }

        let id: string;
        if (href) {
          id = href;
        } else {
          linklessTitles.add(title);
          id = cardId(pageUrl, slugify(title) || `card-${index + 1}`, ids);
        }
        ids.add(id);

        yield this.build(applyDefaults<CourseDraft>(this.profile, { id, title, url: href ?? pageUrl }));
      } catch (error: unknown) {
        if (!(error instanceof ExtractionError)) throw error;
        this.deps.logger.warn('Skipping course card', {
          source: this.key,
          url: pageUrl,
          error: error.message,
        });
      }
    }
  }
}
