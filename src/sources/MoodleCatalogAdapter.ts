// src/sources/MoodleCatalogAdapter.ts

import type { AdapterDeps, HarvestContext, SourceAdapter } from './types';
import type { MoodleProfile } from './profiles';
import type { CourseDraft, CourseRecord } from '../core/record/types';
import { createRecordFactory, type RecordFactory } from '../core/record/CourseRecord';
import { cleanText, resolveHref, resolveTitle } from '../core/extract/html';
import { applyDefaults, fetchCatalogPages } from './catalog';
import { catalogUrl } from './profiles';

/**
 * Moodle installs list courses on /course/index.php with stable class names,
 * so anchors are picked by selector rather than by keyword.
 */
export class MoodleCatalogAdapter implements SourceAdapter {
  readonly key: string;
  readonly displayName: string;
  private build: RecordFactory;

  constructor(
    private profile: MoodleProfile,
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
    const urls = this.profile.indexPaths.map((path) => catalogUrl(this.profile.baseUrl, path));
    const seen = new Set<string>();

    for await (const page of fetchCatalogPages(this.profile, urls, this.deps, context)) {
      const anchors = page.$(this.profile.linkSelector).toArray();

      for (const element of anchors) {
        const anchor = page.$(element);
        const url = resolveHref(anchor.attr('href') ?? '', page.url);
        if (!url || seen.has(url)) continue;
        seen.add(url);

        yield this.build(
          applyDefaults<CourseDraft>(this.profile, {
            url,
            title: resolveTitle(null, cleanText(anchor.text()), url),
          })
        );
      }
    }
  }
}
