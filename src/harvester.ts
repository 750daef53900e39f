// src/harvester.ts

import type { HarvesterConfig, HarvesterConfigInput } from './config/ConfigValidator';
import type { Fetcher, Sleep } from './core/http/types';
import type { Renderer } from './core/render/Renderer';
import type { RunOptions, RunReport } from './core/run/types';
import type { AdapterDeps, SourceAdapter, SourceSummary } from './sources/types';
import { parseProfiles, type SourceProfileInput } from './sources/profiles';
import { validateConfigSafe } from './config/ConfigValidator';
import { HttpClient } from './core/http/HttpClient';
import { DisabledRenderer } from './core/render/Renderer';
import { PlaywrightRenderer } from './core/render/PlaywrightRenderer';
import { SourceRegistry, createRegistry } from './core/registry/SourceRegistry';
import { RunController } from './core/run/RunController';
import { CsvSink, type SinkResult } from './sink/CsvSink';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { defaultSources } from './sources';
import { ConfigurationError } from './utils/errors';
import type { CourseRecord } from './core/record/types';

export type SourceSelection = { kind: 'single'; key: string } | { kind: 'all' };

export interface HarvesterOptions {
  /** Replaces the bundled source profiles */
  profiles?: SourceProfileInput[];
  /** Replaces profile-built adapters altogether */
  adapters?: (deps: AdapterDeps) => SourceAdapter[];
  fetcher?: Fetcher;
  renderer?: Renderer;
  /** Backoff wait used by the default HTTP client */
  sleep?: Sleep;
}

/**
 * Entry point for harvesting course catalogs.
 *
 * @example
 * ```typescript
 * const harvester = CourseHarvester.create({ run: { concurrency: 4 } });
 * try {
 *   const report = await harvester.harvest({ kind: 'all' });
 *   await harvester.writeCsv(report.records, 'data/courses.csv');
 * } finally {
 *   await harvester.close();
 * }
 * ```
 */
export class CourseHarvester {
  readonly config: HarvesterConfig;
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  private registry: SourceRegistry;
  private runner: RunController;
  private renderer: Renderer;

  private constructor(config: HarvesterConfig, options: HarvesterOptions) {
    // Build every dependency before any adapter sees it
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const http = options.fetcher ?? new HttpClient(config.http, metrics, logger, { sleep: options.sleep });
    const renderer =
      options.renderer ??
      (config.render.enabled ? new PlaywrightRenderer(config.render, logger) : new DisabledRenderer());

    const deps: AdapterDeps = { http, renderer, logger };
    const profiles = options.profiles ? parseProfiles(options.profiles) : undefined;
    const adapters = options.adapters ? options.adapters(deps) : defaultSources(deps, profiles);

    this.config = config;
    this.logger = logger;
    this.metrics = metrics;
    this.renderer = renderer;
    this.registry = createRegistry(adapters);
    this.runner = new RunController(this.registry, config.run, metrics, logger);
  }

  /**
   * Validate configuration and wire the harvester. Nothing touches the
   * network until {@link harvest} is called.
   *
   * @throws {ConfigurationError} If the configuration or a source profile is invalid
   * @throws {DuplicateSourceError} If two adapters share a key
   */
  static create(config: HarvesterConfigInput = {}, options: HarvesterOptions = {}): CourseHarvester {
    const result = validateConfigSafe(config);
    if (!result.success) {
      throw new ConfigurationError(`Invalid configuration: ${result.errors.join('; ')}`, {
        errors: result.errors,
      });
    }
    return new CourseHarvester(result.data, options);
  }

  listSources(): SourceSummary[] {
    return this.registry.list();
  }

  /**
   * @throws {UnknownSourceError} If a single source is selected by an unregistered key
   * @throws {AdapterError} If the single selected source fails
   */
  async harvest(selection: SourceSelection, options: RunOptions = {}): Promise<RunReport> {
    return selection.kind === 'single'
      ? this.runner.runSource(selection.key, options)
      : this.runner.runAll(options);
  }

  async writeCsv(records: readonly CourseRecord[], outPath: string): Promise<SinkResult> {
    return new CsvSink(outPath, this.logger, this.metrics).write(records);
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.renderer.close();
  }
}
