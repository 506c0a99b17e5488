import type { QueryError } from '../errors/index.js';
import type { Target } from '../client/types.js';

/**
 * Export settings captured when a job is created. Never changes afterwards.
 */
export interface JobSettings {
  readonly outputFolder: string;
  readonly jobName: string;
  readonly exportCsv: boolean;
  readonly exportJson: boolean;
  /** Expand JSON embedded in `dynamic` columns (JSON export only) */
  readonly parseDynamics: boolean;
}

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

/**
 * What a successful job produced
 */
export interface JobSuccess {
  rowCount: number;
  pageCount: number;
  /** Primary output; the CSV file when both formats are written */
  outputPath: string;
  /** Every file written */
  outputPaths: string[];
  /** Sum of the sizes of every file written, in bytes */
  fileSize: number;
}

export type JobOutcome = { ok: true; value: JobSuccess } | { ok: false; error: QueryError };

/**
 * One (target, query) execution unit. `id` is the only valid lookup key.
 */
export interface Job {
  readonly id: number;
  readonly target: Target;
  readonly query: string;
  readonly settings: JobSettings;
  /** Shared by every job of one submission; names the output directory */
  readonly runTimestamp: string;
  readonly createdAt: Date;
  /** Id of the job this one retries */
  readonly retryOf?: number;
  status: JobStatus;
  result?: JobSuccess;
  error?: QueryError;
  startedAt?: Date;
  completedAt?: Date;
  elapsedMs?: number;
}

/**
 * A query to run on every target, optionally named.
 * A name replaces the configured job name for its output files.
 */
export interface PlannedQuery {
  query: string;
  name?: string;
}

export interface JobStartedMessage {
  type: 'started';
  jobId: number;
  startedAt: Date;
}

export interface JobCompletedMessage {
  type: 'completed';
  jobId: number;
  outcome: JobOutcome;
  elapsedMs: number;
  completedAt: Date;
}

export type JobMessage = JobStartedMessage | JobCompletedMessage;

export type JobSortOrder = 'submission' | 'completion';

export interface JobCounts {
  queued: number;
  running: number;
  completed: number;
  failed: number;
  total: number;
}
