/**
 * A remote data source queries run against
 */
export interface Target {
  /** Query key (workspace customer id) */
  id: string;
  name: string;
  /** Display name of the group (subscription) the target belongs to */
  group: string;
  groupId?: string;
  resourceId?: string;
  resourceGroup?: string;
  location?: string;
  tenantId?: string;
}

export interface Column {
  name: string;
  type: string;
}

export interface ResultTable {
  name: string;
  columns: Column[];
  rows: unknown[][];
}

/**
 * One page of query results
 */
export interface QueryResponse {
  tables: ResultTable[];
  /** Continuation link; present while more pages remain */
  nextLink?: string;
}

export interface RequestOptions {
  /** Aborted when the caller's deadline fires */
  signal?: AbortSignal;
  /** Deadline in effect, used to label remote gateway timeouts */
  timeoutMs?: number;
}

export interface QueryOptions extends RequestOptions {
  /** ISO 8601 duration limiting the time range, e.g. P1D */
  timespan?: string;
}

export interface TargetListing {
  targets: Target[];
  /** Per-group failures that did not stop the listing */
  warnings: string[];
}

/**
 * The part of the remote service a job needs: the first page and its continuations
 */
export interface QueryPageSource {
  query(targetId: string, queryText: string, options?: QueryOptions): Promise<QueryResponse>;
  queryNextPage(nextLink: string, options?: RequestOptions): Promise<QueryResponse>;
}

/**
 * Remote analytic endpoint. Methods throw classified QueryErrors.
 */
export interface RemoteQueryService extends QueryPageSource {
  /** List every target across every group the credentials can see */
  listTargets(): Promise<TargetListing>;
  /** Check credentials unless they were validated within the interval */
  validateAuth(): Promise<void>;
  /** Check credentials now, ignoring the interval */
  forceValidateAuth(): Promise<void>;
}
