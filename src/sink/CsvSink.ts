// src/sink/CsvSink.ts

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { CourseRecord } from '../core/record/types';
import { CourseRecordSchema, isValidRecord } from '../core/record/CourseRecord';
import { Logger } from '../observability/Logger';
import { MetricsCollector } from '../observability/MetricsCollector';
import { HarvestError } from '../utils/errors';

export interface SinkResult {
  path: string;
  written: number;
  rejected: number;
}

export interface RecordSink {
  write(records: readonly CourseRecord[]): Promise<SinkResult>;
}

type Cell = string | number | boolean | null;

export const COLUMNS = [
  ['course_id', 'id'],
  ['course_title', 'title'],
  ['url', 'url'],
  ['is_paid', 'isPaid'],
  ['price', 'price'],
  ['num_subscribers', 'numSubscribers'],
  ['num_reviews', 'numReviews'],
  ['num_lectures', 'numLectures'],
  ['level', 'level'],
  ['content_duration', 'contentDuration'],
  ['published_timestamp', 'publishedTimestamp'],
  ['subject', 'subject'],
  ['provider', 'provider'],
  ['language', 'language'],
] as const satisfies ReadonlyArray<readonly [string, keyof CourseRecord]>;

export const HEADER = COLUMNS.map(([column]) => column);

/**
 * RFC 4180 field: quoted when it holds a comma, quote, CR or LF.
 */
export function formatCell(value: Cell): string {
  if (value === null) return '';
  const text = typeof value === 'boolean' ? (value ? 'true' : 'false') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatRow(record: CourseRecord): string {
  return COLUMNS.map(([, field]) => formatCell(record[field])).join(',');
}

/**
 * Writes records as CSV. The file is written beside its destination and
 * renamed into place, so readers never see a partial file.
 */
export class CsvSink implements RecordSink {
  constructor(
    private outPath: string,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async write(records: readonly CourseRecord[]): Promise<SinkResult> {
    const lines = [HEADER.join(',')];
    let rejected = 0;

    for (const record of records) {
      if (!isValidRecord(record)) {
        rejected++;
        this.metrics.incrementCounter('sink_rejected_records', { provider: record.provider || 'unknown' });
        this.logger.warn('Rejected record without provider or url', {
          provider: record.provider,
          id: record.id,
        });
        continue;
      }
      lines.push(formatRow(record));
    }

    const dir = path.dirname(this.outPath);
    await fs.mkdir(dir, { recursive: true });

    const tempPath = path.join(dir, `.${path.basename(this.outPath)}.${uuidv4()}.tmp`);
    try {
      await fs.writeFile(tempPath, `${lines.join('\n')}\n`, 'utf8');
      await fs.rename(tempPath, this.outPath);
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    const written = lines.length - 1;
    this.logger.info('CSV written', { path: this.outPath, written, rejected });
    return { path: this.outPath, written, rejected };
  }
}

/**
 * Split CSV text into rows of raw fields. Quoted fields may contain
 * separators, doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
    i++;
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

function toNullable(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

function toCount(value: string | undefined): number | null {
  const text = toNullable(value);
  return text === null ? null : Number(text);
}

function toBoolean(value: string | undefined): boolean | null {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

/**
 * Read a file written by {@link CsvSink} back into records.
 *
 * @throws {HarvestError} If the header does not match or a row is not a valid record
 */
export async function readCsv(filePath: string): Promise<CourseRecord[]> {
  const [header, ...rows] = parseCsv(await fs.readFile(filePath, 'utf8'));

  if (!header || header.join(',') !== HEADER.join(',')) {
    throw new HarvestError(`Unexpected CSV header in ${filePath}`, 'CSV_FORMAT_ERROR', {
      header,
    });
  }

  return rows.map((cells, index) => {
    const cell = (column: (typeof HEADER)[number]) => cells[HEADER.indexOf(column)];
    const parsed = CourseRecordSchema.safeParse({
      id: cell('course_id') ?? '',
      title: toNullable(cell('course_title')),
      url: cell('url') ?? '',
      isPaid: toBoolean(cell('is_paid')),
      price: toNullable(cell('price')),
      numSubscribers: toCount(cell('num_subscribers')),
      numReviews: toCount(cell('num_reviews')),
      numLectures: toCount(cell('num_lectures')),
      level: toNullable(cell('level')),
      contentDuration: toNullable(cell('content_duration')),
      publishedTimestamp: toNullable(cell('published_timestamp')),
      subject: toNullable(cell('subject')),
      provider: cell('provider') ?? '',
      language: toNullable(cell('language')),
    });

    if (!parsed.success) {
      throw new HarvestError(`Invalid record in CSV row ${index + 1}`, 'CSV_FORMAT_ERROR', {
        errors: parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }
    return Object.freeze(parsed.data);
  });
}
