import { join } from 'node:path';
import type { Target } from '../client/types.js';
import { ConfigurationError } from '../errors/index.js';
import { buildOutputDirectory, formatRunTimestamp, sanitizeJobName } from '../export/paths.js';
import type { Job, JobSettings, PlannedQuery } from './types.js';

export interface JobPlannerOptions {
  /** First id handed out */
  firstId?: number;
  now?: () => Date;
}

/**
 * Expands targets × queries into Jobs.
 * Ids come from one counter per planner and are never reused.
 */
export class JobPlanner {
  private nextId: number;
  private readonly now: () => Date;
  /** Destinations handed out for `claimedTimestamp` */
  private readonly claimed = new Set<string>();
  private claimedTimestamp: string | undefined;

  constructor(options: JobPlannerOptions = {}) {
    this.nextId = options.firstId ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * One job per (target, query), ordered by target then query.
   * Every job of one call shares a run timestamp.
   * A job whose output file would coincide with one already planned for the
   * same run timestamp gets a `-2`, `-3`, ... suffix on its job name.
   */
  plan(targets: readonly Target[], queries: readonly PlannedQuery[], settings: JobSettings): Job[] {
    if (targets.length === 0) {
      throw new ConfigurationError('Nothing to run', ['no targets selected']);
    }
    if (queries.length === 0 || queries.some((planned) => planned.query.trim().length === 0)) {
      throw new ConfigurationError('Nothing to run', ['every query must be non-empty']);
    }

    const createdAt = this.now();
    const runTimestamp = formatRunTimestamp(createdAt);
    const jobs: Job[] = [];

    for (const target of targets) {
      for (const planned of queries) {
        jobs.push({
          id: this.takeId(),
          target,
          query: planned.query,
          settings: Object.freeze({
            ...settings,
            jobName: this.claimJobName(settings.outputFolder, target, runTimestamp, jobNameFor(planned, settings)),
          }),
          runTimestamp,
          createdAt,
          status: 'queued',
        });
      }
    }

    return jobs;
  }

  /**
   * A fresh Queued job repeating `job`'s target, query and settings
   */
  retryOf(job: Job): Job {
    const createdAt = this.now();
    return {
      id: this.takeId(),
      target: job.target,
      query: job.query,
      settings: job.settings,
      runTimestamp: formatRunTimestamp(createdAt),
      createdAt,
      retryOf: job.id,
      status: 'queued',
    };
  }

  private claimJobName(outputFolder: string, target: Target, runTimestamp: string, base: string): string {
    if (runTimestamp !== this.claimedTimestamp) {
      this.claimed.clear();
      this.claimedTimestamp = runTimestamp;
    }

    const directory = buildOutputDirectory(outputFolder, target, runTimestamp);
    let name = base;
    for (let suffix = 2; this.claimed.has(join(directory, name)); suffix += 1) {
      name = `${base}-${suffix}`;
    }
    this.claimed.add(join(directory, name));
    return name;
  }

  private takeId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}

function jobNameFor(planned: PlannedQuery, settings: JobSettings): string {
  if (planned.name === undefined) return settings.jobName;
  const sanitized = sanitizeJobName(planned.name);
  return sanitized.length > 0 ? sanitized : settings.jobName;
}
