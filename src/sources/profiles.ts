// src/sources/profiles.ts

import { z } from 'zod';
import rawProfiles from './profiles.json';
import { ConfigurationError } from '../utils/errors';

const SOURCE_KEY = /^[a-z0-9_]+$/;

const DefaultsSchema = z
  .object({
    subject: z.string().min(1).optional(),
    language: z.string().min(1).optional(),
    level: z.string().min(1).optional(),
  })
  .default({});

const FieldSelectorsSchema = z
  .object({
    price: z.string().min(1).optional(),
    level: z.string().min(1).optional(),
    contentDuration: z.string().min(1).optional(),
    publishedTimestamp: z.string().min(1).optional(),
    subject: z.string().min(1).optional(),
    language: z.string().min(1).optional(),
    numSubscribers: z.string().min(1).optional(),
    numReviews: z.string().min(1).optional(),
    numLectures: z.string().min(1).optional(),
  })
  .default({});

const BaseProfileSchema = z.object({
  key: z.string().regex(SOURCE_KEY, 'Source keys are lowercase letters, digits and underscores'),
  displayName: z.string().min(1),
  baseUrl: z.string().url(),
  // Domain not confirmed yet: registered, never fetched
  placeholder: z.boolean().default(false),
  defaults: DefaultsSchema,
});

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const LinkDiscoveryProfileSchema = BaseProfileSchema.extend({
  kind: z.literal('link-discovery'),
  linkPattern: z.string().min(1).refine(isValidPattern, 'Link pattern is not a valid regular expression'),
  catalogPaths: z.array(z.string()).min(1).default(['']),
  followDetail: z.boolean().default(false),
  titleSelectors: z.array(z.string().min(1)).min(1).optional(),
  fields: FieldSelectorsSchema,
});

const MoodleProfileSchema = BaseProfileSchema.extend({
  kind: z.literal('moodle'),
  indexPaths: z.array(z.string()).min(1).default(['/course/index.php', '']),
  linkSelector: z.string().min(1).default('.coursebox a[href], .course-title a[href], a.coursename'),
});

const RenderedProfileSchema = BaseProfileSchema.extend({
  kind: z.literal('rendered'),
  catalogPath: z.string().default(''),
  waitFor: z.string().min(1).default('#root'),
  cardSelector: z.string().min(1).default('div.course-box'),
  titleSelector: z.string().min(1).default('h4'),
  settleMs: z.number().int().min(0).optional(),
});

const StubProfileSchema = BaseProfileSchema.extend({
  kind: z.literal('stub'),
});

export const SourceProfileSchema = z.discriminatedUnion('kind', [
  LinkDiscoveryProfileSchema,
  MoodleProfileSchema,
  RenderedProfileSchema,
  StubProfileSchema,
]);

export type SourceProfile = z.output<typeof SourceProfileSchema>;
export type LinkDiscoveryProfile = z.output<typeof LinkDiscoveryProfileSchema>;
export type MoodleProfile = z.output<typeof MoodleProfileSchema>;
export type RenderedProfile = z.output<typeof RenderedProfileSchema>;
export type StubProfile = z.output<typeof StubProfileSchema>;
export type SourceProfileInput = z.input<typeof SourceProfileSchema>;

/**
 * Validate source profiles. Key uniqueness is the registry's concern.
 */
export function parseProfiles(input: unknown): SourceProfile[] {
  const result = z.array(SourceProfileSchema).safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid source profiles', {
      errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }
  return result.data;
}

export function loadBundledProfiles(): SourceProfile[] {
  return parseProfiles(rawProfiles);
}

/**
 * Join a catalog path onto the profile's base URL ('' is the base itself).
 */
export function catalogUrl(baseUrl: string, path: string): string {
  if (!path) return baseUrl;
  // Paths stay under the base, so sites installed in a subdirectory keep it
  const relative = path.replace(/^\/+/, '');
  return new URL(relative, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`).toString();
}
