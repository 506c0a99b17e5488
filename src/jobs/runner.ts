import { join } from 'node:path';
import type { QueryPageSource, QueryResponse } from '../client/types.js';
import { QUERY_DEFAULTS, EXPORT_DEFAULTS } from '../config/constants.js';
import { OtherError, QuerySyntaxError, classifyError } from '../errors/index.js';
import { CsvStreamWriter } from '../export/csv-writer.js';
import { JsonStreamWriter } from '../export/json-writer.js';
import { buildOutputDirectory } from '../export/paths.js';
import type { StreamWriter, WriterSummary } from '../export/types.js';
import { PaginationWalker } from '../execution/pagination.js';
import { RetryExecutor } from '../execution/retry.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { errorMessage } from '../utils/type-guards.js';
import type { Job, JobOutcome, JobSuccess } from './types.js';

export interface JobRunnerOptions {
  source: QueryPageSource;
  /** Per-attempt and per-page deadline */
  timeoutMs?: number;
  /** Extra attempts for the first page */
  retryCount?: number;
  pageBufferSize?: number;
  maxPages?: number;
  /** Supply one with an injected sleep in tests */
  retryExecutor?: RetryExecutor;
  logger?: StructuredLogger;
}

/**
 * Executes one job end to end: first page with retry, every continuation
 * page into the writers, then publish. Never throws; failures come back
 * as a classified outcome.
 */
export class JobRunner {
  private readonly source: QueryPageSource;
  private readonly timeoutMs: number;
  private readonly retryCount: number;
  private readonly pageBufferSize: number;
  private readonly maxPages: number;
  private readonly retry: RetryExecutor;
  private readonly logger: StructuredLogger;

  constructor(options: JobRunnerOptions) {
    this.source = options.source;
    this.timeoutMs = options.timeoutMs ?? QUERY_DEFAULTS.TIMEOUT_SECONDS * 1000;
    this.retryCount = options.retryCount ?? QUERY_DEFAULTS.RETRY_COUNT;
    this.pageBufferSize = options.pageBufferSize ?? EXPORT_DEFAULTS.PAGE_BUFFER_SIZE;
    this.maxPages = options.maxPages ?? QUERY_DEFAULTS.MAX_PAGES;
    this.logger = options.logger ?? silentLogger();
    this.retry = options.retryExecutor ?? new RetryExecutor({ logger: this.logger });
  }

  async run(job: Job): Promise<JobOutcome> {
    const log = this.logger.child({ jobId: job.id, target: job.target.name });

    try {
      const value = await this.execute(job, log);
      log.info('Job completed', { rows: value.rowCount, pages: value.pageCount, bytes: value.fileSize });
      return { ok: true, value };
    } catch (error) {
      const classified = classifyError(error, { target: job.target.name, timeoutMs: this.timeoutMs });
      log.warn('Job failed', { error: classified.shortLabel(), message: classified.message });
      return { ok: false, error: classified };
    }
  }

  private async execute(job: Job, log: StructuredLogger): Promise<JobSuccess> {
    const { target, settings } = job;
    if (!settings.exportCsv && !settings.exportJson) {
      throw new OtherError('No export format enabled (CSV or JSON required)');
    }

    const first = await this.retry.execute(
      (signal) => this.source.query(target.id, job.query, { signal, timeoutMs: this.timeoutMs }),
      { retryCount: this.retryCount, timeoutMs: this.timeoutMs, target: target.name }
    );

    const firstTable = first.tables[0];
    if (!firstTable) {
      throw new QuerySyntaxError('Query returned no tables');
    }

    const writers = this.createWriters(job);
    const finalized = new Set<StreamWriter>();

    try {
      for (const writer of writers) {
        await writer.open(firstTable.columns);
      }

      const walker = new PaginationWalker(this.source, {
        timeoutMs: this.timeoutMs,
        target: target.name,
        maxPages: this.maxPages,
        logger: log,
      });
      const pageCount = await walker.walk(first, (page) => this.writePage(page, writers));

      const summaries: WriterSummary[] = [];
      for (const writer of writers) {
        summaries.push(await writer.finalize());
        finalized.add(writer);
      }

      return summarize(summaries, pageCount);
    } catch (error) {
      await this.cleanup(writers.filter((writer) => !finalized.has(writer)), log);
      throw error;
    }
  }

  /** A page without tables still counts as a page in every writer */
  private async writePage(page: QueryResponse, writers: StreamWriter[]): Promise<void> {
    const table = page.tables[0] ?? { name: '', columns: [], rows: [] };

    for (const writer of writers) {
      writer.addPage(table);
      await writer.flushIfNeeded();
    }
  }

  private createWriters(job: Job): StreamWriter[] {
    const { settings, target } = job;
    const directory = buildOutputDirectory(settings.outputFolder, target, job.runTimestamp);
    const writers: StreamWriter[] = [];

    if (settings.exportCsv) {
      writers.push(
        new CsvStreamWriter(join(directory, `${settings.jobName}.csv`), { bufferSize: this.pageBufferSize })
      );
    }
    if (settings.exportJson) {
      writers.push(
        new JsonStreamWriter(join(directory, `${settings.jobName}.json`), {
          bufferSize: this.pageBufferSize,
          parseDynamics: settings.parseDynamics,
          metadata: {
            target: target.name,
            target_id: target.id,
            group: target.group,
            timestamp: job.runTimestamp,
            query: job.query,
          },
        })
      );
    }

    return writers;
  }

  private async cleanup(writers: StreamWriter[], log: StructuredLogger): Promise<void> {
    for (const writer of writers) {
      try {
        await writer.cleanup();
      } catch (error) {
        log.error('Failed to remove temp files', { path: writer.tempPath, error: errorMessage(error) });
      }
    }
  }
}

function summarize(summaries: WriterSummary[], pageCount: number): JobSuccess {
  const primary = summaries.find((summary) => summary.format === 'csv') ?? summaries[0];
  if (!primary) {
    throw new OtherError('No export format enabled (CSV or JSON required)');
  }

  return {
    rowCount: primary.rowCount,
    pageCount,
    outputPath: primary.path,
    outputPaths: summaries.map((summary) => summary.path),
    fileSize: summaries.reduce((total, summary) => total + summary.fileSize, 0),
  };
}
