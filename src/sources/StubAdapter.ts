// src/sources/StubAdapter.ts

import type { HarvestContext, SourceAdapter } from './types';
import type { StubProfile } from './profiles';
import type { CourseRecord } from '../core/record/types';

/**
 * Registered so the key is known, but the site has no extraction yet.
 */
export class StubAdapter implements SourceAdapter {
  readonly key: string;
  readonly displayName: string;

  constructor(private profile: StubProfile) {
    this.key = profile.key;
    this.displayName = profile.displayName;
  }

  isAllowed(): boolean {
    return !this.profile.placeholder;
  }

  async *iterCourses(_context: HarvestContext = {}): AsyncGenerator<CourseRecord> {
    return;
  }
}
