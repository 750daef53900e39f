// src/core/run/RunController.ts

import PQueue from 'p-queue';
import type { SourceAdapter } from '../../sources/types';
import type { CourseRecord } from '../record/types';
import type { RunConfig } from '../../config/ConfigValidator';
import type { RunOptions, RunReport, SourceOutcome } from './types';
import type { SourceRegistry } from '../registry/SourceRegistry';
import { Logger } from '../../observability/Logger';
import { MetricsCollector } from '../../observability/MetricsCollector';
import { generateRunId, withSourceSpan } from '../../observability/tracing';
import { AdapterError } from '../../utils/errors';

interface SourceResult {
  outcome: SourceOutcome;
  records: CourseRecord[];
}

const ABANDONED = Symbol('abandoned');

/**
 * Runs adapters, isolates their failures and aggregates their records in
 * registration order.
 */
export class RunController {
  constructor(
    private registry: SourceRegistry,
    private config: RunConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  /**
   * Run one source.
   *
   * @throws {UnknownSourceError} If `key` is not registered
   * @throws {AdapterError} If the adapter fails
   */
  async runSource(key: string, options: RunOptions = {}): Promise<RunReport> {
    const adapter = this.registry.require(key);
    const report = await this.execute([adapter], options);

    for (const outcome of report.outcomes) {
      if (outcome.status === 'failed') throw outcome.error;
    }
    return report;
  }

  /**
   * Run every runnable source. A failing source contributes no records and
   * does not stop the others.
   */
  async runAll(options: RunOptions = {}): Promise<RunReport> {
    return this.execute(this.registry.runnable(), options);
  }

  private async execute(adapters: SourceAdapter[], options: RunOptions): Promise<RunReport> {
    const runId = generateRunId();
    const startedAt = new Date();
    const external = options.signal;
    const inFlight = new AbortController();
    const queue = new PQueue({ concurrency: this.config.concurrency });

    let graceTimer: NodeJS.Timeout | undefined;
    const onCancel = () => {
      this.logger.warn('Run cancelled, waiting for running sources', {
        runId,
        graceMs: this.config.cancelGraceMs,
      });
      graceTimer = setTimeout(() => inFlight.abort(), this.config.cancelGraceMs);
    };

    if (external?.aborted) {
      inFlight.abort();
    } else {
      external?.addEventListener('abort', onCancel, { once: true });
    }

    this.logger.info('Harvest started', {
      runId,
      sources: adapters.length,
      concurrency: this.config.concurrency,
    });

    let results: SourceResult[];
    try {
      results = await Promise.all(
        adapters.map((adapter) => queue.add(() => this.runOne(adapter, runId, external, inFlight.signal)))
      );
    } finally {
      external?.removeEventListener('abort', onCancel);
      if (graceTimer) clearTimeout(graceTimer);
    }

    const report: RunReport = {
      runId,
      records: results.flatMap((result) => result.records),
      outcomes: results.map((result) => result.outcome),
      startedAt,
      finishedAt: new Date(),
    };

    this.logger.info('Harvest finished', {
      runId,
      records: report.records.length,
      durationMs: report.finishedAt.getTime() - startedAt.getTime(),
      ...countOutcomes(report.outcomes),
    });

    return report;
  }

  private async runOne(
    adapter: SourceAdapter,
    runId: string,
    external: AbortSignal | undefined,
    inFlight: AbortSignal
  ): Promise<SourceResult> {
    const { key, displayName } = adapter;

    if (external?.aborted) {
      return this.finish({ key, displayName, status: 'cancelled' }, [], runId);
    }

    const startTime = Date.now();
    try {
      if (!adapter.isAllowed()) {
        return this.finish(
          { key, displayName, status: 'skipped', reason: 'source is not enabled for harvesting' },
          [],
          runId
        );
      }

      this.logger.info('Source started', { runId, source: key });

      const result = await Promise.race([this.collect(adapter, runId, inFlight), abandonment(inFlight)]);
      const durationMs = Date.now() - startTime;
      if (result === ABANDONED) {
        return this.finish({ key, displayName, status: 'abandoned', durationMs }, [], runId);
      }

      return this.finish(
        { key, displayName, status: 'succeeded', recordCount: result.length, durationMs },
        result,
        runId
      );
    } catch (error: unknown) {
      const durationMs = Date.now() - startTime;
      if (inFlight.aborted) {
        return this.finish({ key, displayName, status: 'abandoned', durationMs }, [], runId);
      }

      const wrapped = AdapterError.wrap(key, error, displayName);
      this.logger.error('Source failed', {
        runId,
        source: key,
        provider: displayName,
        error: wrapped.message,
      });
      return this.finish({ key, displayName, status: 'failed', error: wrapped, durationMs }, [], runId);
    }
  }

  private async collect(adapter: SourceAdapter, runId: string, signal: AbortSignal): Promise<CourseRecord[]> {
    return withSourceSpan(adapter.key, runId, async (span) => {
      const records: CourseRecord[] = [];
      for await (const record of adapter.iterCourses({ signal })) {
        records.push(record);
      }
      span?.setAttribute('harvest.records', records.length);
      return records;
    });
  }

  private finish(outcome: SourceOutcome, records: CourseRecord[], runId: string): SourceResult {
    const labels = { source: outcome.key };
    this.metrics.incrementCounter('source_runs_total', { ...labels, outcome: outcome.status });
    this.metrics.recordGauge('records_harvested', records.length, labels);
    if ('durationMs' in outcome) {
      this.metrics.recordLatency('source_run_duration', outcome.durationMs, labels);
    }

    switch (outcome.status) {
      case 'succeeded':
        this.logger.info('Source finished', {
          runId,
          source: outcome.key,
          records: outcome.recordCount,
          durationMs: outcome.durationMs,
        });
        break;
      case 'skipped':
        this.logger.info('Source skipped', { runId, source: outcome.key, reason: outcome.reason });
        break;
      case 'abandoned':
        this.logger.warn('Source abandoned after cancellation', { runId, source: outcome.key });
        break;
      case 'cancelled':
        this.logger.debug('Source not started, run cancelled', { runId, source: outcome.key });
        break;
      case 'failed':
        break;
    }

    return { outcome, records };
  }
}

function abandonment(signal: AbortSignal): Promise<typeof ABANDONED> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(ABANDONED);
      return;
    }
    signal.addEventListener('abort', () => resolve(ABANDONED), { once: true });
  });
}

export function countOutcomes(outcomes: SourceOutcome[]): Record<SourceOutcome['status'], number> {
  const counts = { succeeded: 0, skipped: 0, failed: 0, abandoned: 0, cancelled: 0 };
  for (const outcome of outcomes) counts[outcome.status]++;
  return counts;
}
