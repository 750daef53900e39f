// src/index.ts

export { CourseHarvester } from './harvester';
export type { HarvesterOptions, SourceSelection } from './harvester';
export { runCli, parseCliArgs } from './cli';
export type { CourseRecord, CourseDraft } from './core/record/types';
export { CourseRecordSchema, createRecordFactory, isValidRecord } from './core/record/CourseRecord';
export type { RunReport, SourceOutcome, RunOptions } from './core/run/types';
export { RunController } from './core/run/RunController';
export { SourceRegistry, createRegistry } from './core/registry/SourceRegistry';
export { HttpClient } from './core/http/HttpClient';
export type { Fetcher, FetchOptions, RawResponse } from './core/http/types';
export type { Renderer, RenderOptions } from './core/render/Renderer';
export { CsvSink, readCsv } from './sink/CsvSink';
export type { RecordSink, SinkResult } from './sink/CsvSink';
export type { SourceAdapter, SourceSummary, HarvestContext, AdapterDeps } from './sources/types';
export { createAdapter, defaultSources, parseProfiles, loadBundledProfiles } from './sources';
export type { SourceProfile, SourceProfileInput } from './sources/profiles';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { HarvesterConfig, HarvesterConfigInput } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

// Export error classes for error handling
export {
  HarvestError,
  FetchError,
  ExtractionError,
  AdapterError,
  UnknownSourceError,
  UsageError,
  ConfigurationError,
  DuplicateSourceError,
} from './utils/errors';
