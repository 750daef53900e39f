// src/sources/types.ts

import type { CourseRecord } from '../core/record/types';
import type { Fetcher } from '../core/http/types';
import type { Renderer } from '../core/render/Renderer';
import type { Logger } from '../observability/Logger';

export interface HarvestContext {
  signal?: AbortSignal;
}

/**
 * One source's extraction strategy.
 */
export interface SourceAdapter {
  readonly key: string; // lowercase, unique within a registry
  readonly displayName: string; // copied into every record's `provider`
  readonly internal?: boolean; // hidden from listings and --all runs

  isAllowed(): boolean;
  /**
   * Finite and not restartable: call again for a fresh pass.
   */
  iterCourses(context?: HarvestContext): AsyncIterable<CourseRecord>;
}

export interface SourceSummary {
  key: string;
  displayName: string;
}

export interface AdapterDeps {
  http: Fetcher;
  renderer: Renderer;
  logger: Logger;
}
