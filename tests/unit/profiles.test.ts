// tests/unit/profiles.test.ts

import { describe, it, expect } from 'vitest';
import { catalogUrl, loadBundledProfiles, parseProfiles } from '../../src/sources/profiles';
import { defaultSources } from '../../src/sources';
import { createRegistry } from '../../src/core/registry/SourceRegistry';
import { DisabledRenderer } from '../../src/core/render/Renderer';
import { Logger } from '../../src/observability/Logger';
import { ConfigurationError } from '../../src/utils/errors';
import { FakeFetcher } from '../helpers/fakes';

describe('bundled profiles', () => {
  const profiles = loadBundledProfiles();

  it('should register every known site once', () => {
    const keys = profiles.map((profile) => profile.key);

    expect(keys).toHaveLength(23);
    expect(new Set(keys).size).toBe(23);
    expect(keys.slice(0, 3)).toEqual(['learninggov', 'learnethiopia', 'eduhubplc']);
  });

  it('should mark unresolved domains as placeholders', () => {
    const placeholders = profiles.filter((profile) => profile.placeholder).map((profile) => profile.key);

    expect(placeholders).toEqual([
      'elearneth',
      'aau_elearnafrica',
      'infonet',
      'ennlite',
      'gxcamp',
      'learnup',
      '5mec',
      'hagerly',
      'haleta',
      'zementechnologies',
    ]);
  });

  it('should fill in defaults for optional profile settings', () => {
    const kubaya = profiles.find((profile) => profile.key === 'kubaya');
    const ethernet = profiles.find((profile) => profile.key === 'ethernet');

    expect(kubaya).toMatchObject({
      kind: 'link-discovery',
      catalogPaths: [''],
      followDetail: false,
      defaults: { language: 'Amharic' },
      fields: {},
    });
    expect(ethernet).toMatchObject({
      kind: 'rendered',
      waitFor: '#root',
      cardSelector: 'div.course-box',
      titleSelector: 'h4',
    });
  });

  it('should build a registry listing every bundled site', () => {
    const registry = createRegistry(
      defaultSources({
        http: new FakeFetcher({}),
        renderer: new DisabledRenderer(),
        logger: new Logger({ silent: true }),
      })
    );

    expect(registry.list()).toHaveLength(23);
    expect(registry.get('smartethio')?.displayName).toBe('SmartEthio');
    expect(registry.get('gxcamp')?.isAllowed()).toBe(false);
  });
});

describe('parseProfiles', () => {
  it('should reject an unknown kind', () => {
    expect(() =>
      parseProfiles([{ kind: 'ftp', key: 'x', displayName: 'X', baseUrl: 'https://x.test' }])
    ).toThrow(ConfigurationError);
  });

  it('should reject keys with uppercase letters', () => {
    expect(() =>
      parseProfiles([{ kind: 'stub', key: 'Bad-Key', displayName: 'X', baseUrl: 'https://x.test' }])
    ).toThrow('Invalid source profiles');
  });

  it('should reject a link-discovery profile without a pattern', () => {
    expect(() =>
      parseProfiles([{ kind: 'link-discovery', key: 'x', displayName: 'X', baseUrl: 'https://x.test' }])
    ).toThrow(ConfigurationError);
  });
});

describe('parseProfiles link patterns', () => {
  it('should name the field of a pattern that does not compile', () => {
    let caught: unknown;
    try {
      parseProfiles([
        { kind: 'link-discovery', key: 'x', displayName: 'X', baseUrl: 'https://x.test', linkPattern: '[course' },
      ]);
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      details: { errors: ['0.linkPattern: Link pattern is not a valid regular expression'] },
    });
  });
});

describe('catalogUrl', () => {
  it('should return the base URL for an empty path', () => {
    expect(catalogUrl('https://x.test', '')).toBe('https://x.test');
  });

  it('should join a path onto the base', () => {
    expect(catalogUrl('https://x.test', '/courses')).toBe('https://x.test/courses');
    expect(catalogUrl('https://x.test/lms', 'course/index.php')).toBe('https://x.test/lms/course/index.php');
  });

  it('should keep the base path when the catalog path starts with a slash', () => {
    expect(catalogUrl('https://uni.test/moodle', '/course/index.php')).toBe(
      'https://uni.test/moodle/course/index.php'
    );
    expect(catalogUrl('https://uni.test/moodle/', '//course/index.php')).toBe(
      'https://uni.test/moodle/course/index.php'
    );
  });
});
