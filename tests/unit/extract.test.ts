// tests/unit/extract.test.ts

import { describe, it, expect, vi } from 'vitest';
import { cleanText, discoverLinks, firstText, parseHtml, resolveHref, resolveTitle } from '../../src/core/extract/html';
import { extractFields, parseCount, parseIsPaid } from '../../src/core/extract/fields';
import { Logger } from '../../src/observability/Logger';

describe('html helpers', () => {
  it('should collapse whitespace', () => {
    expect(cleanText('  Intro \n\t to   Go ')).toBe('Intro to Go');
  });

  it('should resolve relative hrefs and drop fragments', () => {
    expect(resolveHref('../b/c#part', 'https://x.test/a/index.html')).toBe('https://x.test/b/c');
    expect(resolveHref('?page=2', 'https://x.test/courses')).toBe('https://x.test/courses?page=2');
  });

  it('should ignore non-http hrefs', () => {
    expect(resolveHref('javascript:void(0)', 'https://x.test')).toBeNull();
    expect(resolveHref('mailto:info@x.test', 'https://x.test')).toBeNull();
    expect(resolveHref('   ', 'https://x.test')).toBeNull();
  });

  it('should match the keyword pattern against the query string as well', () => {
    const $ = parseHtml('<a href="/index.php?type=course&id=9">Nine</a><a href="/index.php?type=news">News</a>');

    expect(discoverLinks($, 'https://x.test', /course/i)).toEqual([
      { url: 'https://x.test/index.php?type=course&id=9', text: 'Nine' },
    ]);
  });

  it('should take the first non-empty selector', () => {
    const $ = parseHtml('<h1>  </h1><h2>Second heading</h2><title>Page</title>');

    expect(firstText($, ['h1', 'h2', 'title'])).toBe('Second heading');
    expect(firstText($, ['h3'])).toBeNull();
  });

  it('should fall back from heading to anchor text to url', () => {
    expect(resolveTitle('Heading', 'Anchor', 'https://x.test/c')).toBe('Heading');
    expect(resolveTitle(null, ' Anchor ', 'https://x.test/c')).toBe('Anchor');
    expect(resolveTitle('', '', 'https://x.test/c')).toBe('https://x.test/c');
  });
});

describe('field parsing', () => {
  it('should read counts with thousands separators', () => {
    expect(parseCount('1,204 students')).toEqual({ ok: true, value: 1204 });
    expect(parseCount('Lessons: 36')).toEqual({ ok: true, value: 36 });
    expect(parseCount('many').ok).toBe(false);
  });

  it('should derive paid status from the price label', () => {
    expect(parseIsPaid('Free')).toEqual({ ok: true, value: false });
    expect(parseIsPaid('ETB 0.00')).toEqual({ ok: true, value: false });
    expect(parseIsPaid('$49.99')).toEqual({ ok: true, value: true });
    expect(parseIsPaid('Contact us').ok).toBe(false);
  });

  it('should extract each configured field on its own', () => {
    const logger = new Logger({ silent: true });
    const debugSpy = vi.spyOn(logger, 'debug');
    const $ = parseHtml(
      '<span class="price">Free</span><span class="students">2,500 enrolled</span><span class="lectures">soon</span>'
    );

    const fields = extractFields(
      $,
      { price: '.price', numSubscribers: '.students', numLectures: '.lectures', level: '.level' },
      logger,
      { source: 'test' }
    );

    expect(fields).toEqual({
      price: 'Free',
      isPaid: false,
      numSubscribers: 2500,
      numLectures: null,
      level: null,
    });
    expect(debugSpy).toHaveBeenCalledWith(
      'Optional field not extracted',
      expect.objectContaining({ source: 'test', field: 'level' })
    );
  });
});
