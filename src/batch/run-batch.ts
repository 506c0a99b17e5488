import type { RemoteQueryService, Target } from '../client/types.js';
import { toJobSettings, type Settings } from '../config/settings.js';
import { ConfigurationError } from '../errors/index.js';
import { JobRunner } from '../jobs/runner.js';
import { QueryEngine } from '../jobs/engine.js';
import type { Job } from '../jobs/types.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';

/**
 * A query in a batch. A name replaces the configured job name in output file names.
 */
export interface BatchQuery {
  name?: string;
  query: string;
}

export interface BatchCallbacks {
  /** Group-level listing problems that did not stop the run */
  onWarning?: (message: string) => void;
  /** Called once targets are known and before any job starts */
  onStart?: (info: { queries: number; targets: Target[] }) => void;
  onJobStarted?: (job: Job) => void;
  onJobFinished?: (job: Job) => void;
}

export interface BatchOptions {
  service: RemoteQueryService;
  queries: BatchQuery[];
  /** 'all', comma-separated id or name fragments, or a '*' glob on names */
  selection?: string;
  settings: Settings;
  callbacks?: BatchCallbacks;
  logger?: StructuredLogger;
  now?: () => Date;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  /** Every job, in submission order */
  results: Job[];
  targets: Target[];
  warnings: string[];
  /** 0 once the run has started, whatever individual jobs did */
  exitCode: number;
}

/** One entry of the machine-readable report */
export interface JsonReportEntry {
  target: string;
  target_id: string;
  query: string;
  success: boolean;
  elapsed_ms: number;
  data: { row_count: number; page_count: number; output_path: string; file_size: number } | null;
  error: string | null;
}

/**
 * Run every query across the selected targets and wait for all of them.
 *
 * Throws only when the run cannot start: credentials rejected, no targets
 * listed or selected, no queries.
 */
export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const { service, settings, callbacks = {} } = options;
  const logger = options.logger ?? silentLogger();

  if (options.queries.length === 0) {
    throw new ConfigurationError('Nothing to run', ['at least one query is required']);
  }

  logger.info('Validating credentials');
  await service.forceValidateAuth();

  logger.info('Listing targets');
  const listing = await service.listTargets();
  for (const warning of listing.warnings) {
    logger.warn(warning);
    callbacks.onWarning?.(warning);
  }

  const selection = options.selection ?? 'all';
  const targets = selectTargets(listing.targets, selection);
  if (targets.length === 0) {
    throw new ConfigurationError('No targets selected for execution', [
      `'${selection}' matched none of ${listing.targets.length} targets`,
    ]);
  }
  callbacks.onStart?.({ queries: options.queries.length, targets });

  const engine = new QueryEngine({
    runner: new JobRunner({
      source: service,
      timeoutMs: settings.query_timeout * 1000,
      retryCount: settings.retry_count,
      pageBufferSize: settings.page_buffer_size,
      logger,
    }),
    concurrencyLimit: settings.concurrency_limit,
    logger,
    now: options.now,
    callbacks: {
      onJobStarted: callbacks.onJobStarted,
      onJobFinished: callbacks.onJobFinished,
    },
  });

  engine.submit(targets, options.queries, toJobSettings(settings));
  await engine.runUntilIdle();
  engine.registry.sortBy('submission');

  const results = [...engine.registry.list()];
  const succeeded = results.filter((job) => job.status === 'completed').length;

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    results,
    targets,
    warnings: listing.warnings,
    exitCode: 0,
  };
}

/**
 * Narrow the listed targets to a selection.
 * A glob matches the whole target name; fragments match anywhere in the id or name.
 */
export function selectTargets(targets: readonly Target[], selection: string): Target[] {
  const spec = selection.trim();
  if (spec === '' || spec === 'all') {
    return [...targets];
  }

  if (spec.includes('*')) {
    const pattern = new RegExp(`^${spec.split('*').map(escapeRegExp).join('.*')}$`);
    return targets.filter((target) => pattern.test(target.name));
  }

  const fragments = spec
    .split(',')
    .map((fragment) => fragment.trim())
    .filter((fragment) => fragment.length > 0);
  return targets.filter((target) =>
    fragments.some((fragment) => target.id.includes(fragment) || target.name.includes(fragment))
  );
}

/**
 * Human-readable end-of-run summary
 */
export function formatSummary(result: BatchResult): string {
  const lines = [
    '--- Summary ---',
    `Total executions: ${result.total}`,
    `Succeeded: ${result.succeeded}`,
    `Failed: ${result.failed}`,
  ];

  const failures = result.results.filter((job) => job.status === 'failed');
  if (failures.length > 0) {
    lines.push('', 'Failed executions:');
    for (const job of failures) {
      lines.push(`  - ${job.target.name} [${job.settings.jobName}]: ${job.error?.message ?? 'unknown error'}`);
    }
  }

  return lines.join('\n');
}

export function toJsonReport(jobs: readonly Job[]): JsonReportEntry[] {
  return jobs.map((job) => ({
    target: job.target.name,
    target_id: job.target.id,
    query: job.settings.jobName,
    success: job.status === 'completed',
    elapsed_ms: job.elapsedMs ?? 0,
    data: job.result
      ? {
          row_count: job.result.rowCount,
          page_count: job.result.pageCount,
          output_path: job.result.outputPath,
          file_size: job.result.fileSize,
        }
      : null,
    error: job.error?.message ?? null,
  }));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
