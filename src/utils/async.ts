/**
 * Promise helpers shared by the retry and pagination paths
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Raised when a unit of work outlives its deadline
 */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `work` under a deadline. The signal handed to `work` is aborted when
 * the deadline fires so an in-flight request can be torn down.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
