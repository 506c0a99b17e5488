/**
 * Classified failures for query jobs.
 *
 * Raw transport and remote errors are mapped into this closed set exactly
 * once, at the boundary where they happen (see ./classify.ts). Everything
 * downstream (retry, registry, retry tooling, reports) reads `kind` and
 * `retryable` instead of inspecting messages.
 */

export type QueryErrorKind =
  | 'timeout'
  | 'authentication'
  | 'query_syntax'
  | 'network'
  | 'remote_api'
  | 'rate_limit'
  | 'other';

/** Plain-data form of a classified error, for reports and persisted records */
export interface SerializedQueryError {
  kind: QueryErrorKind;
  label: string;
  message: string;
  retryable: boolean;
  status?: number;
  durationMs?: number;
  target?: string;
  details?: string;
  retryAfterSeconds?: number;
}

/**
 * Base class for every classified job failure
 */
export abstract class QueryError extends Error {
  abstract readonly kind: QueryErrorKind;
  abstract readonly retryable: boolean;

  /** Short label for list views */
  abstract shortLabel(): string;

  /** Full description for detail views */
  describe(): string {
    return `${this.shortLabel()}: ${this.message}`;
  }

  toJSON(): SerializedQueryError {
    return {
      kind: this.kind,
      label: this.shortLabel(),
      message: this.message,
      retryable: this.retryable,
    };
  }
}

export class TimeoutError extends QueryError {
  readonly kind = 'timeout';
  readonly retryable = true;

  constructor(
    public readonly durationMs: number,
    public readonly target: string,
    message?: string
  ) {
    super(message ?? `Query timed out after ${formatSeconds(durationMs)} on target '${target}'`);
    this.name = 'TimeoutError';
  }

  shortLabel(): string {
    return `Timeout (${formatSeconds(this.durationMs)})`;
  }

  describe(): string {
    return `${this.message}. Raise the query timeout or narrow the query's time range.`;
  }

  toJSON(): SerializedQueryError {
    return { ...super.toJSON(), durationMs: this.durationMs, target: this.target };
  }
}

export class AuthenticationError extends QueryError {
  readonly kind = 'authentication';
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }

  shortLabel(): string {
    return 'Auth failed';
  }
}

export class QuerySyntaxError extends QueryError {
  readonly kind = 'query_syntax';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly details?: string
  ) {
    super(message);
    this.name = 'QuerySyntaxError';
  }

  shortLabel(): string {
    return 'Query error';
  }

  describe(): string {
    return this.details ? `${super.describe()}\n${this.details}` : super.describe();
  }

  toJSON(): SerializedQueryError {
    return { ...super.toJSON(), details: this.details };
  }
}

export class NetworkError extends QueryError {
  readonly kind = 'network';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NetworkError';
  }

  shortLabel(): string {
    return 'Network error';
  }

  toJSON(): SerializedQueryError {
    return { ...super.toJSON(), status: this.status };
  }
}

export class RemoteApiError extends QueryError {
  readonly kind = 'remote_api';

  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'RemoteApiError';
  }

  get retryable(): boolean {
    return this.status >= 500;
  }

  shortLabel(): string {
    return `HTTP ${this.status}`;
  }

  describe(): string {
    return `Remote API error (status ${this.status}): ${this.message}`;
  }

  toJSON(): SerializedQueryError {
    return { ...super.toJSON(), status: this.status };
  }
}

export class RateLimitExceededError extends QueryError {
  readonly kind = 'rate_limit';
  readonly retryable = true;

  constructor(
    public readonly retryAfterSeconds: number,
    message?: string
  ) {
    super(message || `Rate limited; retry after ${retryAfterSeconds}s`);
    this.name = 'RateLimitExceededError';
  }

  shortLabel(): string {
    return `Rate limited (${this.retryAfterSeconds}s)`;
  }

  describe(): string {
    return `Rate limit exceeded, retry after ${this.retryAfterSeconds}s: ${this.message}`;
  }

  toJSON(): SerializedQueryError {
    return { ...super.toJSON(), retryAfterSeconds: this.retryAfterSeconds };
  }
}

export class OtherError extends QueryError {
  readonly kind = 'other';
  readonly retryable = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OtherError';
  }

  shortLabel(): string {
    return 'Error';
  }
}

/**
 * Raised by a CredentialBroker that cannot produce a token
 */
export class AuthFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthFailure';
  }
}

/**
 * Invalid settings or inputs detected before any job runs
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by retry tooling when a job must not be resubmitted
 */
export class RetryRefusedError extends Error {
  constructor(
    public readonly jobId: number,
    reason: string
  ) {
    super(reason);
    this.name = 'RetryRefusedError';
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}
