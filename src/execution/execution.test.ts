import { describe, it, expect, vi, afterEach } from 'vitest';
import { RetryExecutor, backoffDelayMs } from './retry.js';
import { PaginationWalker } from './pagination.js';
import type { QueryPageSource, QueryResponse } from '../client/types.js';
import {
  NetworkError,
  OtherError,
  QuerySyntaxError,
  RateLimitExceededError,
  TimeoutError,
} from '../errors/index.js';
import { DeadlineExceededError } from '../utils/async.js';

function page(rows: unknown[][], nextLink?: string): QueryResponse {
  return {
    tables: [{ name: 'PrimaryResult', columns: [{ name: 'n', type: 'int' }], rows }],
    ...(nextLink ? { nextLink } : {}),
  };
}

describe('backoffDelayMs', () => {
  it('doubles from one second', () => {
    expect(backoffDelayMs(1)).toBe(1000);
    expect(backoffDelayMs(2)).toBe(2000);
    expect(backoffDelayMs(3)).toBe(4000);
    expect(backoffDelayMs(2, 10)).toBe(20);
  });
});

describe('RetryExecutor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new RetryExecutor({ sleep });
    const work = vi.fn(async () => 'first page');

    const result = await executor.execute(work, { retryCount: 3, timeoutMs: 1000, target: 'a' });

    expect(result).toBe('first page');
    expect(work).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes retry_count + 1 attempts against a target that always times out', async () => {
    vi.useFakeTimers();
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new RetryExecutor({ sleep });
    const signals: AbortSignal[] = [];
    const work = vi.fn((signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<never>(() => {});
    });

    const outcome = executor
      .execute(work, { retryCount: 2, timeoutMs: 30_000, target: 'slow-logs' })
      .catch((error: unknown) => error);
    await vi.runAllTimersAsync();
    const error = await outcome;

    expect(work).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.message).toBe(
      "Query timed out after 30s on target 'slow-logs'"
    );
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    expect(signals[0].reason).toBeInstanceOf(DeadlineExceededError);
  });

  it('does not retry when rate limited', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new RetryExecutor({ sleep });
    const work = vi.fn().mockRejectedValue(new RateLimitExceededError(60));

    const error = await executor
      .execute(work, { retryCount: 3, timeoutMs: 1000, target: 'a' })
      .catch((e: unknown) => e);

    expect(work).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(error instanceof RateLimitExceededError && error.retryAfterSeconds).toBe(60);
  });

  it('recovers after a transient failure', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new RetryExecutor({ sleep });
    const work = vi
      .fn()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValueOnce('second try');

    const result = await executor.execute(work, { retryCount: 1, timeoutMs: 1000, target: 'a' });

    expect(result).toBe('second try');
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('throws the last error once attempts are exhausted', async () => {
    const executor = new RetryExecutor({ sleep: async () => {} });
    const work = vi
      .fn()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockRejectedValueOnce(new QuerySyntaxError('Bad query'));

    await expect(
      executor.execute(work, { retryCount: 1, timeoutMs: 1000, target: 'a' })
    ).rejects.toThrow(QuerySyntaxError);
    expect(work).toHaveBeenCalledTimes(2);
  });

  it('classifies unexpected errors', async () => {
    const executor = new RetryExecutor({ sleep: async () => {} });
    const work = vi.fn().mockRejectedValue(new Error('disk full'));

    await expect(
      executor.execute(work, { retryCount: 0, timeoutMs: 1000, target: 'a' })
    ).rejects.toThrow(OtherError);
  });
});

describe('PaginationWalker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function sourceWith(pages: Record<string, QueryResponse | Error>) {
    const queryNextPage = vi.fn(async (link: string) => {
      const next = pages[link];
      if (next === undefined) throw new Error(`unexpected link ${link}`);
      if (next instanceof Error) throw next;
      return next;
    });
    const source: QueryPageSource = {
      query: vi.fn(async () => page([])),
      queryNextPage,
    };
    return { source, queryNextPage };
  }

  it('hands every page to the handler in order', async () => {
    const { source } = sourceWith({
      'link-2': page([[2]], 'link-3'),
      'link-3': page([[3]]),
    });
    const walker = new PaginationWalker(source, { timeoutMs: 1000, target: 't' });
    const seen: Array<[number, unknown[][]]> = [];

    const fetched = await walker.walk(page([[1]], 'link-2'), async (response, pageNumber) => {
      seen.push([pageNumber, response.tables[0].rows]);
    });

    expect(fetched).toBe(3);
    expect(seen).toEqual([
      [1, [[1]]],
      [2, [[2]]],
      [3, [[3]]],
    ]);
  });

  it('aborts on the first failing page without retrying it', async () => {
    const { source, queryNextPage } = sourceWith({ 'link-2': new NetworkError('reset') });
    const walker = new PaginationWalker(source, { timeoutMs: 1000, target: 't' });
    const onPage = vi.fn(async () => {});

    await expect(walker.walk(page([[1]], 'link-2'), onPage)).rejects.toThrow(NetworkError);
    expect(queryNextPage).toHaveBeenCalledTimes(1);
    expect(onPage).toHaveBeenCalledTimes(1);
  });

  it('turns a page that outlives its deadline into a timeout', async () => {
    vi.useFakeTimers();
    const source: QueryPageSource = {
      query: vi.fn(async () => page([])),
      queryNextPage: vi.fn(() => new Promise<never>(() => {})),
    };
    const walker = new PaginationWalker(source, { timeoutMs: 5000, target: 'slow' });

    const outcome = walker.walk(page([[1]], 'link-2'), async () => {}).catch((e: unknown) => e);
    await vi.runAllTimersAsync();
    const error = await outcome;

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.shortLabel()).toBe('Timeout (5s)');
  });

  it('stops a server that never stops paginating', async () => {
    const source: QueryPageSource = {
      query: vi.fn(async () => page([])),
      queryNextPage: vi.fn(async () => page([[0]], 'again')),
    };
    const walker = new PaginationWalker(source, { timeoutMs: 1000, target: 'loop', maxPages: 3 });
    const onPage = vi.fn(async () => {});

    await expect(walker.walk(page([[0]], 'again'), onPage)).rejects.toThrow(
      "Pagination exceeded 3 pages for target 'loop'"
    );
    expect(onPage).toHaveBeenCalledTimes(3);
  });
});
