// src/cli.ts

import { promises as fs } from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import type { HarvesterConfigInput } from './config/ConfigValidator';
import type { LogLevel } from './observability/Logger';
import { loadConfigFromEnv } from './config/env';
import { CourseHarvester, type HarvesterOptions, type SourceSelection } from './harvester';
import { countOutcomes } from './core/run/RunController';
import { UsageError, errorMessage } from './utils/errors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

export const DEFAULT_OUT = 'data/courses.csv';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const USAGE = `Usage: course-harvester (--list-sites | --site <key> | --all) [options]

  --list-sites            print every site key and name, then exit
  --site <key>            harvest one site
  --all                   harvest every site
  --out <path>            CSV output path (default: ${DEFAULT_OUT})
  --concurrency <n>       sites harvested at once (default: 1)
  --metrics-out <path>    write Prometheus metrics after the run
  --log-level <level>     debug, info, warn or error
  --help                  show this message
`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list'; logLevel?: LogLevel }
  | {
      kind: 'harvest';
      selection: SourceSelection;
      out: string;
      concurrency?: number;
      metricsOut?: string;
      logLevel?: LogLevel;
    };

interface Output {
  write(chunk: string): unknown;
}

export interface CliContext {
  stdout: Output;
  stderr: Output;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
  createHarvester?: (config: HarvesterConfigInput, options?: HarvesterOptions) => CourseHarvester;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'list-sites': { type: 'boolean' },
        site: { type: 'string' },
        all: { type: 'boolean' },
        out: { type: 'string' },
        concurrency: { type: 'string' },
        'metrics-out': { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error: unknown) {
    throw new UsageError(errorMessage(error));
  }
}

/**
 * Turn argv (without the node and script entries) into a command.
 *
 * @throws {UsageError} On unknown flags, conflicting or missing selection, or bad values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const values = readArgs(argv);

  if (values.help) return { kind: 'help' };

  const level = values['log-level'];
  if (level !== undefined && !isLogLevel(level)) {
    throw new UsageError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`);
  }
  const logLevel = level;

  if (values['list-sites']) return { kind: 'list', logLevel };

  if (values.site !== undefined && values.all) {
    throw new UsageError('Use either --site or --all, not both');
  }
  if (values.site === undefined && !values.all) {
    throw new UsageError('Choose --site <key> or --all (or --list-sites)');
  }

  let concurrency: number | undefined;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new UsageError(`--concurrency must be a positive integer, got "${values.concurrency}"`);
    }
  }

  const selection: SourceSelection =
    values.site !== undefined ? { kind: 'single', key: values.site.trim().toLowerCase() } : { kind: 'all' };

  return {
    kind: 'harvest',
    selection,
    out: values.out ?? DEFAULT_OUT,
    concurrency,
    metricsOut: values['metrics-out'],
    logLevel,
  };
}

function buildConfig(
  env: Record<string, string | undefined>,
  overrides: { concurrency?: number; logLevel?: LogLevel }
): HarvesterConfigInput {
  const config = loadConfigFromEnv(env);
  return {
    ...config,
    run: { ...config.run, concurrency: overrides.concurrency ?? config.run?.concurrency },
    logging: { ...config.logging, level: overrides.logLevel ?? config.logging?.level },
  };
}

/**
 * Run the command line and resolve to the process exit code.
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const { stdout, stderr } = context;
  const createHarvester = context.createHarvester ?? CourseHarvester.create;

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error: unknown) {
    stderr.write(`error: ${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    stdout.write(USAGE);
    return EXIT_OK;
  }

  let harvester: CourseHarvester;
  try {
    harvester = createHarvester(
      buildConfig(context.env ?? process.env, {
        logLevel: command.logLevel,
        concurrency: command.kind === 'harvest' ? command.concurrency : undefined,
      })
    );
  } catch (error: unknown) {
    stderr.write(`error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }

  try {
    if (command.kind === 'list') {
      stdout.write('Available site keys:\n');
      for (const { key, displayName } of harvester.listSources()) {
        stdout.write(`  ${key.padEnd(20)} -> ${displayName}\n`);
      }
      return EXIT_OK;
    }

    const report = await harvester.harvest(command.selection, { signal: context.signal });
    const counts = countOutcomes(report.outcomes);
    const cancelled = context.signal?.aborted ?? false;

    if (command.selection.kind === 'all') {
      stderr.write(
        `Sources: ${counts.succeeded} succeeded, ${counts.skipped} skipped, ${counts.failed} failed` +
          (cancelled ? `, ${counts.abandoned} abandoned, ${counts.cancelled} not started` : '') +
          '\n'
      );
    } else {
      for (const outcome of report.outcomes) {
        if (outcome.status === 'skipped') {
          stderr.write(`Skipped ${outcome.displayName}: ${outcome.reason}\n`);
        }
      }
    }
    if (cancelled) {
      stderr.write('Run cancelled; keeping records from sources that finished\n');
    }

    const result = await harvester.writeCsv(report.records, command.out);
    stdout.write(`Wrote ${result.written} rows -> ${command.out}\n`);

    if (command.metricsOut) {
      await fs.mkdir(path.dirname(command.metricsOut), { recursive: true });
      await fs.writeFile(command.metricsOut, await harvester.getMetrics(), 'utf8');
    }

    return cancelled ? EXIT_CANCELLED : EXIT_OK;
  } catch (error: unknown) {
    stderr.write(`error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  } finally {
    await harvester.close();
  }
}
