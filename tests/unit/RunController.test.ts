// tests/unit/RunController.test.ts

import { describe, it, expect, vi } from 'vitest';
import { RunController } from '../../src/core/run/RunController';
import { createRegistry } from '../../src/core/registry/SourceRegistry';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { AdapterError, UnknownSourceError } from '../../src/utils/errors';
import type { HarvestContext, SourceAdapter } from '../../src/sources/types';
import type { CourseRecord } from '../../src/core/record/types';
import { buildRecords, delay, failingAdapter, listAdapter } from '../helpers/fakes';

function createController(adapters: SourceAdapter[], run: { concurrency?: number; cancelGraceMs?: number } = {}) {
  const logger = new Logger({ silent: true });
  const metrics = new MetricsCollector();
  const controller = new RunController(
    createRegistry(adapters),
    { concurrency: run.concurrency ?? 1, cancelGraceMs: run.cancelGraceMs ?? 5000 },
    metrics,
    logger
  );
  return { controller, logger, metrics };
}

/** Never yields; settles only when its signal aborts. */
function hangingAdapter(key: string, displayName: string): SourceAdapter {
  return {
    key,
    displayName,
    isAllowed: () => true,
    async *iterCourses(context: HarvestContext = {}): AsyncGenerator<CourseRecord> {
      await new Promise<void>((_, reject) => {
        context.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    },
  };
}

describe('RunController', () => {
  const recordsA = buildRecords('Site A', ['https://a.test/c/1', 'https://a.test/c/2']);

  describe('runAll', () => {
    it('should isolate a failing source and keep the others', async () => {
      const { controller, logger } = createController([
        listAdapter('a', 'Site A', recordsA),
        failingAdapter('b', 'Site B', new AdapterError('B broke', 'b')),
        listAdapter('c', 'Site C', []),
      ]);
      const errorSpy = vi.spyOn(logger, 'error');

      const report = await controller.runAll();

      expect(report.records).toEqual(recordsA);
      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['succeeded', 'failed', 'succeeded']);
      expect(errorSpy).toHaveBeenCalledWith(
        'Source failed',
        expect.objectContaining({ source: 'b', provider: 'Site B', error: 'B broke' })
      );
    });

    it('should stamp every record with its source display name', async () => {
      const { controller } = createController([
        listAdapter('a', 'Site A', recordsA),
        listAdapter('d', 'Site D', buildRecords('Site D', ['https://d.test/x'])),
      ]);

      const report = await controller.runAll();

      expect(report.records.map((record) => record.provider)).toEqual(['Site A', 'Site A', 'Site D']);
      expect(report.records.every((record) => record.url !== '')).toBe(true);
    });

    it('should skip sources that are not allowed without iterating them', async () => {
      const blocked = listAdapter('p', 'Placeholder', recordsA, { allowed: false });
      const iterSpy = vi.spyOn(blocked, 'iterCourses');
      const { controller } = createController([blocked]);

      const report = await controller.runAll();

      expect(report.records).toEqual([]);
      expect(report.outcomes[0]).toMatchObject({ key: 'p', status: 'skipped' });
      expect(iterSpy).not.toHaveBeenCalled();
    });

    it('should keep registration order when sources run concurrently', async () => {
      const recordsB = buildRecords('Site B', ['https://b.test/1']);
      const recordsC = buildRecords('Site C', ['https://c.test/1']);
      const { controller } = createController(
        [
          listAdapter('a', 'Site A', recordsA, { delayMs: 40 }),
          listAdapter('b', 'Site B', recordsB),
          listAdapter('c', 'Site C', recordsC, { delayMs: 10 }),
        ],
        { concurrency: 3 }
      );

      const report = await controller.runAll();

      expect(report.records).toEqual([...recordsA, ...recordsB, ...recordsC]);
    });

    it('should run at most `concurrency` sources at once', async () => {
      let active = 0;
      let peak = 0;
      const tracked = (key: string): SourceAdapter => ({
        key,
        displayName: key,
        isAllowed: () => true,
        async *iterCourses(): AsyncGenerator<CourseRecord> {
          active++;
          peak = Math.max(peak, active);
          await delay(15);
          active--;
        },
      });
      const { controller } = createController(['a', 'b', 'c', 'd'].map(tracked), { concurrency: 2 });

      await controller.runAll();

      expect(peak).toBe(2);
    });

    it('should give every run its own id', async () => {
      const { controller } = createController([listAdapter('a', 'Site A', [])]);

      const first = await controller.runAll();
      const second = await controller.runAll();

      expect(first.runId).not.toBe(second.runId);
      expect(first.finishedAt.getTime()).toBeGreaterThanOrEqual(first.startedAt.getTime());
    });
  });

  describe('cancellation', () => {
    it('should launch nothing when cancelled before the run', async () => {
      const adapter = listAdapter('a', 'Site A', recordsA);
      const iterSpy = vi.spyOn(adapter, 'iterCourses');
      const { controller } = createController([adapter, listAdapter('b', 'Site B', [])]);
      const abort = new AbortController();
      abort.abort();

      const report = await controller.runAll({ signal: abort.signal });

      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['cancelled', 'cancelled']);
      expect(iterSpy).not.toHaveBeenCalled();
    });

    it('should let a running source finish within the grace period', async () => {
      const { controller } = createController(
        [listAdapter('a', 'Site A', recordsA, { delayMs: 30 }), listAdapter('b', 'Site B', [])],
        { cancelGraceMs: 1000 }
      );
      const abort = new AbortController();
      setTimeout(() => abort.abort(), 5);

      const report = await controller.runAll({ signal: abort.signal });

      expect(report.records).toEqual(recordsA);
      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['succeeded', 'cancelled']);
    });

    it('should abandon sources still running when the grace period ends', async () => {
      const { controller } = createController(
        [hangingAdapter('a', 'Site A'), listAdapter('b', 'Site B', recordsA)],
        { cancelGraceMs: 20 }
      );
      const abort = new AbortController();
      setTimeout(() => abort.abort(), 5);

      const report = await controller.runAll({ signal: abort.signal });

      expect(report.records).toEqual([]);
      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['abandoned', 'cancelled']);
    });

    it('should abandon a source that ignores the abort signal', async () => {
      const stuck: SourceAdapter = {
        key: 'stuck',
        displayName: 'Stuck',
        isAllowed: () => true,
        async *iterCourses(): AsyncGenerator<CourseRecord> {
          await new Promise<void>(() => {});
        },
      };
      const { controller } = createController([stuck], { cancelGraceMs: 10 });
      const abort = new AbortController();
      setTimeout(() => abort.abort(), 5);

      const report = await controller.runAll({ signal: abort.signal });

      expect(report.outcomes[0]).toMatchObject({ key: 'stuck', status: 'abandoned' });
    });
  });

  describe('runSource', () => {
    it('should run only the selected source', async () => {
      const other = listAdapter('b', 'Site B', buildRecords('Site B', ['https://b.test/1']));
      const iterSpy = vi.spyOn(other, 'iterCourses');
      const { controller } = createController([listAdapter('a', 'Site A', recordsA), other]);

      const report = await controller.runSource('a');

      expect(report.records).toEqual(recordsA);
      expect(iterSpy).not.toHaveBeenCalled();
    });

    it('should reject an unknown key', async () => {
      const { controller } = createController([listAdapter('a', 'Site A', recordsA)]);

      await expect(controller.runSource('nonexistent')).rejects.toBeInstanceOf(UnknownSourceError);
    });

    it('should surface a failure as an AdapterError with the cause attached', async () => {
      const cause = new Error('boom');
      const { controller } = createController([failingAdapter('b', 'Site B', cause)]);

      const error = await controller.runSource('b').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AdapterError);
      expect(error).toMatchObject({ message: 'Site B: boom', source: 'b', cause });
    });

    it('should report a skipped source with no records', async () => {
      const { controller } = createController([listAdapter('p', 'Placeholder', recordsA, { allowed: false })]);

      const report = await controller.runSource('p');

      expect(report.records).toEqual([]);
      expect(report.outcomes).toEqual([
        { key: 'p', displayName: 'Placeholder', status: 'skipped', reason: 'source is not enabled for harvesting' },
      ]);
    });
  });
});
