import type { QueryPageSource, QueryResponse } from '../client/types.js';
import { QUERY_DEFAULTS } from '../config/constants.js';
import { OtherError, classifyError } from '../errors/index.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { withDeadline } from '../utils/async.js';

export interface PaginationOptions {
  /** Deadline for each page request */
  timeoutMs: number;
  /** Target name, used in timeout errors and logs */
  target: string;
  /** Abort when a server keeps returning links past this many pages */
  maxPages?: number;
  logger?: StructuredLogger;
}

/** Receives every page in order; the next page is requested only after it resolves */
export type PageHandler = (page: QueryResponse, pageNumber: number) => Promise<void>;

/**
 * Follows continuation links from a first page to the end.
 *
 * A failed page aborts the walk; pages are never retried individually.
 */
export class PaginationWalker {
  private readonly source: QueryPageSource;
  private readonly timeoutMs: number;
  private readonly target: string;
  private readonly maxPages: number;
  private readonly logger: StructuredLogger;

  constructor(source: QueryPageSource, options: PaginationOptions) {
    this.source = source;
    this.timeoutMs = options.timeoutMs;
    this.target = options.target;
    this.maxPages = options.maxPages ?? QUERY_DEFAULTS.MAX_PAGES;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Hand `first` and every following page to `onPage`.
   * Returns the number of pages fetched, the first included.
   */
  async walk(first: QueryResponse, onPage: PageHandler): Promise<number> {
    let pageNumber = 1;
    await onPage(first, pageNumber);

    let nextLink = first.nextLink;
    while (nextLink) {
      if (pageNumber >= this.maxPages) {
        throw new OtherError(`Pagination exceeded ${this.maxPages} pages for target '${this.target}'`);
      }

      const link = nextLink;
      pageNumber += 1;
      this.logger.debug('Fetching next page', { target: this.target, page: pageNumber });

      let page: QueryResponse;
      try {
        page = await withDeadline(
          (signal) => this.source.queryNextPage(link, { signal, timeoutMs: this.timeoutMs }),
          this.timeoutMs
        );
      } catch (error) {
        throw classifyError(error, { target: this.target, timeoutMs: this.timeoutMs });
      }

      await onPage(page, pageNumber);
      nextLink = page.nextLink;
    }

    return pageNumber;
  }
}
