// tests/unit/harvester.test.ts

import { describe, it, expect } from 'vitest';
import { CourseHarvester } from '../../src/harvester';
import { ConfigurationError, DuplicateSourceError } from '../../src/utils/errors';
import { FakeRenderer, buildRecords, listAdapter } from '../helpers/fakes';

const quiet = { logging: { silent: true } };

describe('CourseHarvester', () => {
  it('should list the bundled sites by default', () => {
    const harvester = CourseHarvester.create(quiet, { renderer: new FakeRenderer('') });

    expect(harvester.listSources()[0]).toEqual({ key: 'learninggov', displayName: 'Learning.gov.et' });
  });

  it('should harvest a single selected source', async () => {
    const records = buildRecords('Alpha Site', ['https://alpha.test/1']);
    const harvester = CourseHarvester.create(quiet, {
      adapters: () => [listAdapter('alpha', 'Alpha Site', records), listAdapter('beta', 'Beta', [])],
      renderer: new FakeRenderer(''),
    });

    const report = await harvester.harvest({ kind: 'single', key: 'alpha' });

    expect(report.records).toEqual(records);
    expect(report.outcomes.map((outcome) => outcome.key)).toEqual(['alpha']);
  });

  it('should hand adapters the shared dependencies', () => {
    const renderer = new FakeRenderer('');
    let received: unknown;

    CourseHarvester.create(quiet, {
      renderer,
      adapters: (deps) => {
        received = deps.renderer;
        return [];
      },
    });

    expect(received).toBe(renderer);
  });

  it('should refuse duplicate source keys', () => {
    expect(() =>
      CourseHarvester.create(quiet, {
        adapters: () => [listAdapter('alpha', 'One', []), listAdapter('alpha', 'Two', [])],
        renderer: new FakeRenderer(''),
      })
    ).toThrow(DuplicateSourceError);
  });

  it('should wrap schema failures in a configuration error', () => {
    expect(() => CourseHarvester.create({ run: { concurrency: -2 } })).toThrow(ConfigurationError);
  });

  it('should reject a profile whose link pattern does not compile', () => {
    const create = () =>
      CourseHarvester.create(quiet, {
        renderer: new FakeRenderer(''),
        profiles: [
          {
            kind: 'link-discovery',
            key: 'broken',
            displayName: 'Broken',
            baseUrl: 'https://broken.test',
            linkPattern: 'course(',
          },
        ],
      });

    expect(create).toThrow(ConfigurationError);
    expect(create).toThrow('Invalid source profiles');
  });

  it('should close the renderer', async () => {
    const renderer = new FakeRenderer('');
    const harvester = CourseHarvester.create(quiet, { renderer, adapters: () => [] });

    await harvester.close();

    expect(renderer.closed).toBe(true);
  });
});
