export {
  RetryExecutor,
  backoffDelayMs,
  type RetryPolicy,
  type RetryExecutorOptions,
  type Attempt,
} from './retry.js';
export { PaginationWalker, type PaginationOptions, type PageHandler } from './pagination.js';
