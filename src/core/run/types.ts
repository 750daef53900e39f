// src/core/run/types.ts

import type { CourseRecord } from '../record/types';
import type { AdapterError } from '../../utils/errors';

interface OutcomeBase {
  key: string;
  displayName: string;
}

export type SourceOutcome =
  | (OutcomeBase & { status: 'succeeded'; recordCount: number; durationMs: number })
  | (OutcomeBase & { status: 'skipped'; reason: string })
  | (OutcomeBase & { status: 'failed'; error: AdapterError; durationMs: number })
  | (OutcomeBase & { status: 'abandoned'; durationMs: number }) // still running when the grace period ran out
  | (OutcomeBase & { status: 'cancelled' }); // never launched

export type SourceStatus = SourceOutcome['status'];

export interface RunReport {
  runId: string;
  records: CourseRecord[];
  outcomes: SourceOutcome[];
  startedAt: Date;
  finishedAt: Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}
