import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import type { Job, JobCounts, JobMessage, JobSortOrder } from './types.js';

/**
 * The observable list of jobs. Display order can change at any time,
 * so every lookup and mutation goes through the job id.
 */
export class JobRegistry {
  private jobs: Job[] = [];
  private selectedId: number | undefined;
  private readonly logger: StructuredLogger;

  constructor(options: { logger?: StructuredLogger } = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  add(job: Job): void {
    if (this.get(job.id)) {
      throw new Error(`Job ${job.id} is already registered`);
    }
    this.jobs.push(job);
  }

  get(id: number): Job | undefined {
    return this.jobs.find((job) => job.id === id);
  }

  /** Jobs in their current display order */
  list(): readonly Job[] {
    return this.jobs;
  }

  /**
   * Queued → Running. Returns false when the job is unknown or not queued.
   */
  markRunning(id: number, startedAt: Date = new Date()): boolean {
    const job = this.get(id);
    if (!job) {
      this.logger.warn('Start for unknown job ignored', { jobId: id });
      return false;
    }
    if (job.status !== 'queued') {
      this.logger.debug('Start ignored; job is not queued', { jobId: id, status: job.status });
      return false;
    }

    job.status = 'running';
    job.startedAt = startedAt;
    return true;
  }

  /**
   * Apply one bus message to the job it names.
   * Returns the updated job, or undefined when the message changed nothing.
   */
  apply(message: JobMessage): Job | undefined {
    if (message.type === 'started') {
      return this.markRunning(message.jobId, message.startedAt) ? this.get(message.jobId) : undefined;
    }

    const job = this.get(message.jobId);
    if (!job) {
      this.logger.warn('Completion for unknown job ignored', { jobId: message.jobId });
      return undefined;
    }
    if (isTerminal(job)) {
      this.logger.warn('Completion for finished job ignored', { jobId: job.id, status: job.status });
      return undefined;
    }

    job.elapsedMs = message.elapsedMs;
    job.completedAt = message.completedAt;
    if (message.outcome.ok) {
      job.status = 'completed';
      job.result = message.outcome.value;
    } else {
      job.status = 'failed';
      job.error = message.outcome.error;
    }
    return job;
  }

  /**
   * Reorder the list in place.
   * `submission` is id order; `completion` puts finished jobs first, by completion time.
   */
  sortBy(order: JobSortOrder): void {
    if (order === 'submission') {
      this.jobs.sort((a, b) => a.id - b.id);
      return;
    }

    this.jobs.sort((a, b) => {
      const aDone = a.completedAt?.getTime();
      const bDone = b.completedAt?.getTime();
      if (aDone !== undefined && bDone !== undefined) return aDone - bDone || a.id - b.id;
      if (aDone !== undefined) return -1;
      if (bDone !== undefined) return 1;
      return a.id - b.id;
    });
  }

  /** Select a job for detail views; false when the id is unknown */
  select(id: number | undefined): boolean {
    if (id === undefined) {
      this.selectedId = undefined;
      return true;
    }
    if (!this.get(id)) return false;
    this.selectedId = id;
    return true;
  }

  selected(): Job | undefined {
    return this.selectedId === undefined ? undefined : this.get(this.selectedId);
  }

  /**
   * Drop completed and failed jobs. Returns how many were removed.
   */
  pruneTerminal(): number {
    const before = this.jobs.length;
    this.jobs = this.jobs.filter((job) => !isTerminal(job));
    if (this.selectedId !== undefined && !this.get(this.selectedId)) {
      this.selectedId = undefined;
    }
    return before - this.jobs.length;
  }

  counts(): JobCounts {
    const counts: JobCounts = { queued: 0, running: 0, completed: 0, failed: 0, total: this.jobs.length };
    for (const job of this.jobs) {
      counts[job.status] += 1;
    }
    return counts;
  }
}

export function isTerminal(job: Job): boolean {
  return job.status === 'completed' || job.status === 'failed';
}
