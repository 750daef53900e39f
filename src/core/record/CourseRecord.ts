// src/core/record/CourseRecord.ts

import { z } from 'zod';
import type { CourseDraft, CourseRecord } from './types';

export const CourseRecordSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  url: z.string().min(1),
  isPaid: z.boolean().nullable(),
  price: z.string().nullable(),
  numSubscribers: z.number().int().nonnegative().nullable(),
  numReviews: z.number().int().nonnegative().nullable(),
  numLectures: z.number().int().nonnegative().nullable(),
  level: z.string().nullable(),
  contentDuration: z.string().nullable(),
  publishedTimestamp: z.string().nullable(),
  subject: z.string().nullable(),
  provider: z.string().min(1),
  language: z.string().nullable(),
});

export type RecordFactory = (draft: CourseDraft) => CourseRecord;

/**
 * Bind record construction to one source: every record it builds carries
 * `provider` and comes out frozen.
 */
export function createRecordFactory(provider: string): RecordFactory {
  return (draft) =>
    Object.freeze({
      id: draft.id ?? draft.url,
      title: draft.title,
      url: draft.url,
      isPaid: draft.isPaid ?? null,
      price: draft.price ?? null,
      numSubscribers: draft.numSubscribers ?? null,
      numReviews: draft.numReviews ?? null,
      numLectures: draft.numLectures ?? null,
      level: draft.level ?? null,
      contentDuration: draft.contentDuration ?? null,
      publishedTimestamp: draft.publishedTimestamp ?? null,
      subject: draft.subject ?? null,
      provider,
      language: draft.language ?? null,
    });
}

/**
 * A record the sink accepts: non-empty provider and url.
 */
export function isValidRecord(record: CourseRecord): boolean {
  return record.provider.trim() !== '' && record.url.trim() !== '';
}
