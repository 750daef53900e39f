// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['origin', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['origin', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'HTTP attempts that were retried',
        labelNames: ['origin'],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Requests waiting on the per-origin throttle',
        labelNames: ['origin'],
        registers: [this.registry],
      })
    );

    // Source run metrics
    this.counters.set(
      'source_runs_total',
      new Counter({
        name: 'source_runs_total',
        help: 'Source runs by outcome',
        labelNames: ['source', 'outcome'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'source_run_duration',
      new Histogram({
        name: 'source_run_duration_seconds',
        help: 'Source run duration',
        labelNames: ['source'],
        buckets: [1, 5, 15, 30, 60, 120, 300],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'records_harvested',
      new Gauge({
        name: 'records_harvested',
        help: 'Records produced by the last run of a source',
        labelNames: ['source'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'sink_rejected_records',
      new Counter({
        name: 'sink_rejected_records_total',
        help: 'Records rejected by the sink',
        labelNames: ['provider'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
