// src/core/extract/html.ts

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export type HtmlDocument = CheerioAPI;

export interface DiscoveredLink {
  url: string;
  text: string;
}

export const DEFAULT_TITLE_SELECTORS = ['h1', 'h2', 'title'];

export function parseHtml(html: string): HtmlDocument {
  return cheerio.load(html);
}

/**
 * Visible text with runs of whitespace collapsed.
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Resolve `href` against `base`, without the fragment. Null for hrefs that do
 * not resolve to an http(s) URL.
 */
export function resolveHref(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;

  let resolved: URL;
  try {
    resolved = new URL(trimmed, base);
  } catch {
    return null;
  }
  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;

  resolved.hash = '';
  return resolved.toString();
}

/**
 * Anchors that stay on `baseUrl`'s origin and whose path (plus query) matches
 * `pattern`, de-duplicated in document order. The host is not matched, so a
 * keyword in the domain name does not admit every link.
 */
export function discoverLinks(
  $: HtmlDocument,
  baseUrl: string,
  pattern: RegExp,
  selector = 'a[href]'
): DiscoveredLink[] {
  const origin = new URL(baseUrl).origin;
  const seen = new Set<string>();
  const links: DiscoveredLink[] = [];

  $(selector).each((_, element) => {
    const anchor = $(element);
    const url = resolveHref(anchor.attr('href') ?? '', baseUrl);
    if (!url || seen.has(url)) return;
    const parsed = new URL(url);
    if (parsed.origin !== origin) return;
    if (!pattern.test(parsed.pathname + parsed.search)) return;

    seen.add(url);
    links.push({ url, text: cleanText(anchor.text()) });
  });

  return links;
}

/**
 * Text of the first selector that matches a non-empty element.
 */
export function firstText($: HtmlDocument, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = cleanText($(selector).first().text());
    if (text) return text;
  }
  return null;
}

/**
 * Heading from the detail page, else the anchor's text, else the URL itself.
 */
export function resolveTitle(
  heading: string | null | undefined,
  anchorText: string | null | undefined,
  url: string
): string {
  if (heading && heading.trim()) return heading.trim();
  if (anchorText && anchorText.trim()) return anchorText.trim();
  return url;
}
