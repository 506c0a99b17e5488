import type { Target } from '../client/types.js';
import { OtherError, RetryRefusedError } from '../errors/index.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { errorMessage } from '../utils/type-guards.js';
import { CompletionBus } from './completion-bus.js';
import { ConcurrencyLimiter } from './limiter.js';
import { JobPlanner } from './planner.js';
import { JobRegistry, isTerminal } from './registry.js';
import type { JobRunner } from './runner.js';
import type { Job, JobMessage, JobOutcome, JobSettings, PlannedQuery } from './types.js';

/**
 * Engine lifecycle hooks, called from the consumer side (drain / nextUpdate)
 */
export interface EngineCallbacks {
  onJobStarted?: (job: Job) => void;
  onJobFinished?: (job: Job) => void;
}

export interface QueryEngineOptions {
  runner: Pick<JobRunner, 'run'>;
  concurrencyLimit?: number;
  planner?: JobPlanner;
  logger?: StructuredLogger;
  callbacks?: EngineCallbacks;
  now?: () => Date;
}

/**
 * Runs jobs concurrently under a permit limit.
 *
 * Tasks never touch the registry; they report through the completion bus and
 * the owner applies those reports with drain() or nextUpdate().
 */
export class QueryEngine {
  readonly registry: JobRegistry;
  readonly limiter: ConcurrencyLimiter;
  private readonly bus = new CompletionBus();
  private readonly planner: JobPlanner;
  private readonly runner: Pick<JobRunner, 'run'>;
  private readonly logger: StructuredLogger;
  private readonly callbacks: EngineCallbacks;
  private readonly now: () => Date;
  private readonly tasks = new Set<Promise<void>>();

  constructor(options: QueryEngineOptions) {
    this.runner = options.runner;
    this.limiter = new ConcurrencyLimiter(options.concurrencyLimit);
    this.now = options.now ?? (() => new Date());
    this.planner = options.planner ?? new JobPlanner({ now: this.now });
    this.logger = options.logger ?? silentLogger();
    this.callbacks = options.callbacks ?? {};
    this.registry = new JobRegistry({ logger: this.logger });
  }

  /**
   * Plan one job per (target, query) and start them all
   */
  submit(targets: readonly Target[], queries: readonly PlannedQuery[], settings: JobSettings): Job[] {
    const jobs = this.planner.plan(targets, queries, settings);
    for (const job of jobs) {
      this.registry.add(job);
    }
    this.logger.info('Submitted jobs', { count: jobs.length, targets: targets.length, queries: queries.length });

    for (const job of jobs) {
      this.spawn(job);
    }
    return jobs;
  }

  /**
   * Resubmit a failed job as a new job. The original is left untouched.
   */
  retry(jobId: number): Job {
    const job = this.registry.get(jobId);
    if (!job) {
      throw new RetryRefusedError(jobId, `Job ${jobId} does not exist`);
    }
    if (!isTerminal(job)) {
      throw new RetryRefusedError(jobId, `Job ${jobId} is still ${job.status}`);
    }
    if (job.status === 'completed') {
      throw new RetryRefusedError(jobId, `Job ${jobId} already completed`);
    }
    if (job.error && !job.error.retryable) {
      throw new RetryRefusedError(
        jobId,
        `Job ${jobId} failed with a non-retryable error (${job.error.shortLabel()}); fix the query before running it again`
      );
    }

    const next = this.planner.retryOf(job);
    this.registry.add(next);
    this.logger.info('Retrying job', { jobId: next.id, retryOf: jobId });
    this.spawn(next);
    return next;
  }

  /**
   * Apply every message that has arrived, without waiting.
   * Returns the jobs that changed.
   */
  drain(): Job[] {
    const updated: Job[] = [];
    for (const message of this.bus.drain()) {
      const job = this.apply(message);
      if (job) updated.push(job);
    }
    return updated;
  }

  /**
   * Wait for at least one message, then apply everything pending.
   * Resolves with an empty list straight away when no job is unfinished.
   */
  async nextUpdate(): Promise<Job[]> {
    if (this.bus.size === 0 && !this.hasUnfinishedJobs()) {
      return [];
    }

    const message = await this.bus.next();
    if (!message) return [];

    const first = this.apply(message);
    const rest = this.drain();
    return first ? [first, ...rest] : rest;
  }

  /**
   * Apply updates as they arrive until every job is finished
   */
  async runUntilIdle(): Promise<void> {
    while (this.hasUnfinishedJobs() || this.bus.size > 0) {
      await this.nextUpdate();
    }
  }

  /**
   * Resolves once every spawned task has sent its completion.
   * Messages still need drain() to reach the registry.
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }

  private hasUnfinishedJobs(): boolean {
    return this.registry.list().some((job) => !isTerminal(job));
  }

  private apply(message: JobMessage): Job | undefined {
    const job = this.registry.apply(message);
    if (!job) return undefined;

    if (message.type === 'started') {
      this.callbacks.onJobStarted?.(job);
    } else {
      this.callbacks.onJobFinished?.(job);
    }
    return job;
  }

  private spawn(job: Job): void {
    let startedAt: number | undefined;

    const task: Promise<void> = this.limiter
      .run(async () => {
        const start = this.now();
        startedAt = start.getTime();
        this.bus.send({ type: 'started', jobId: job.id, startedAt: start });
        return this.runner.run(job);
      })
      .catch(
        (error: unknown): JobOutcome => ({
          ok: false,
          error: new OtherError(`Job task failed unexpectedly: ${errorMessage(error)}`, { cause: error }),
        })
      )
      .then((outcome) => {
        const completedAt = this.now();
        this.bus.send({
          type: 'completed',
          jobId: job.id,
          outcome,
          elapsedMs: startedAt === undefined ? 0 : completedAt.getTime() - startedAt,
          completedAt,
        });
      })
      .catch((error: unknown) => {
        this.logger.error('Could not report job completion', { jobId: job.id, error: errorMessage(error) });
      })
      .finally(() => {
        this.tasks.delete(task);
      });

    this.tasks.add(task);
  }
}
