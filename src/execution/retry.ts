import { QUERY_DEFAULTS } from '../config/constants.js';
import {
  OtherError,
  RateLimitExceededError,
  classifyError,
  type QueryError,
} from '../errors/index.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { sleep as defaultSleep, withDeadline } from '../utils/async.js';

/**
 * Per-job retry parameters
 */
export interface RetryPolicy {
  /** Extra attempts after the first */
  retryCount: number;
  /** Deadline for each attempt */
  timeoutMs: number;
  /** Target name, used in timeout errors and logs */
  target: string;
}

export interface RetryExecutorOptions {
  /** First backoff delay; doubled for every further attempt */
  baseDelayMs?: number;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
}

/** One attempt; `signal` aborts when the attempt's deadline fires */
export type Attempt<T> = (signal: AbortSignal, attempt: number) => Promise<T>;

/**
 * Delay before a given retry: 1s, 2s, 4s, ... for attempts 1, 2, 3, ...
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number = QUERY_DEFAULTS.BACKOFF_BASE_MS): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Bounded retry with exponential backoff and a deadline per attempt.
 * A rate-limit error ends the sequence immediately.
 */
export class RetryExecutor {
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger;

  constructor(options: RetryExecutorOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? QUERY_DEFAULTS.BACKOFF_BASE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger();
  }

  async execute<T>(attempt: Attempt<T>, policy: RetryPolicy): Promise<T> {
    const attempts = policy.retryCount + 1;
    let lastError: QueryError | undefined;

    for (let n = 0; n < attempts; n++) {
      if (n > 0) {
        const delay = backoffDelayMs(n, this.baseDelayMs);
        this.logger.info('Retrying query', {
          target: policy.target,
          attempt: n + 1,
          of: attempts,
          delayMs: delay,
          lastError: lastError?.shortLabel(),
        });
        await this.sleep(delay);
      }

      try {
        return await withDeadline((signal) => attempt(signal, n), policy.timeoutMs);
      } catch (error) {
        if (error instanceof RateLimitExceededError) {
          this.logger.warn('Rate limited; not retrying', {
            target: policy.target,
            retryAfterSeconds: error.retryAfterSeconds,
          });
          throw error;
        }

        lastError = classifyError(error, { target: policy.target, timeoutMs: policy.timeoutMs });
        this.logger.debug('Attempt failed', {
          target: policy.target,
          attempt: n + 1,
          error: lastError.shortLabel(),
        });
      }
    }

    throw lastError ?? new OtherError('Query was never attempted');
  }
}
