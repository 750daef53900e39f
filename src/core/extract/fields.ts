// src/core/extract/fields.ts

import type { Logger } from '../../observability/Logger';
import type { OptionalCourseField } from '../record/types';
import { cleanText, type HtmlDocument } from './html';

export type FieldResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type FieldSelectors = Partial<Record<OptionalCourseField, string>>;

export type ExtractedFields = {
  isPaid?: boolean | null;
  price?: string | null;
  numSubscribers?: number | null;
  numReviews?: number | null;
  numLectures?: number | null;
  level?: string | null;
  contentDuration?: string | null;
  publishedTimestamp?: string | null;
  subject?: string | null;
  language?: string | null;
};

const TEXT_FIELDS = [
  'price',
  'level',
  'contentDuration',
  'publishedTimestamp',
  'subject',
  'language',
] as const;
const COUNT_FIELDS = ['numSubscribers', 'numReviews', 'numLectures'] as const;

export function selectText($: HtmlDocument, selector: string): FieldResult<string> {
  let text: string;
  try {
    text = cleanText($(selector).first().text());
  } catch (error: unknown) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
  return text ? { ok: true, value: text } : { ok: false, reason: `no match for ${selector}` };
}

/**
 * First integer in `text`, thousands separators allowed ("1,204 students").
 */
export function parseCount(text: string): FieldResult<number> {
  const match = /\d[\d,\s]*/.exec(text);
  if (!match) return { ok: false, reason: `no number in "${text}"` };
  const value = Number.parseInt(match[0].replace(/[,\s]/g, ''), 10);
  return Number.isFinite(value) ? { ok: true, value } : { ok: false, reason: `bad number "${text}"` };
}

/**
 * Free/paid from a price label. Unknown labels stay unknown.
 */
export function parseIsPaid(price: string): FieldResult<boolean> {
  if (/\bfree\b/i.test(price)) return { ok: true, value: false };
  if (/\d/.test(price)) return { ok: true, value: !/^\D*0+([.,]0+)?\D*$/.test(price) };
  return { ok: false, reason: `unrecognised price "${price}"` };
}

/**
 * Read every configured field on its own; a miss leaves that field null.
 */
export function extractFields(
  $: HtmlDocument,
  selectors: FieldSelectors,
  logger: Logger,
  context: Record<string, unknown>
): ExtractedFields {
  const fields: ExtractedFields = {};

  const settle = <T>(field: OptionalCourseField, result: FieldResult<T>): T | null => {
    if (result.ok) return result.value;
    logger.debug('Optional field not extracted', { ...context, field, reason: result.reason });
    return null;
  };

  for (const field of TEXT_FIELDS) {
    const selector = selectors[field];
    if (!selector) continue;
    fields[field] = settle(field, selectText($, selector));
  }

  for (const field of COUNT_FIELDS) {
    const selector = selectors[field];
    if (!selector) continue;
    const text = selectText($, selector);
    fields[field] = settle(field, text.ok ? parseCount(text.value) : text);
  }

  if (fields.price) {
    fields.isPaid = settle('isPaid', parseIsPaid(fields.price));
  }

  return fields;
}
