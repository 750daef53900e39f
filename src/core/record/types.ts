// src/core/record/types.ts

export interface CourseRecord {
  readonly id: string; // Stable within its source, usually the canonical URL
  readonly title: string | null;
  readonly url: string;
  readonly isPaid: boolean | null;
  readonly price: string | null;
  readonly numSubscribers: number | null;
  readonly numReviews: number | null;
  readonly numLectures: number | null;
  readonly level: string | null;
  readonly contentDuration: string | null;
  readonly publishedTimestamp: string | null;
  readonly subject: string | null;
  readonly provider: string; // Adapter displayName, never set by callers
  readonly language: string | null;
}

export type OptionalCourseField = Exclude<keyof CourseRecord, 'id' | 'title' | 'url' | 'provider'>;

/**
 * What an adapter hands to its record factory. `provider` is not part of it.
 */
export type CourseDraft = {
  id?: string;
  title: string | null;
  url: string;
} & Partial<Pick<CourseRecord, OptionalCourseField>>;
