import {
  QueryError,
  TimeoutError,
  AuthenticationError,
  QuerySyntaxError,
  NetworkError,
  RemoteApiError,
  RateLimitExceededError,
  OtherError,
  AuthFailure,
  ConfigurationError,
} from './query-errors.js';
import { DeadlineExceededError } from '../utils/async.js';
import { errorMessage, getProperty, isRecord, isString } from '../utils/type-guards.js';

/** Seconds to wait when a 429 carries no usable Retry-After */
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

/** Longest raw body excerpt kept in an error message */
const MAX_BODY_EXCERPT = 500;

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export interface ClassifyContext {
  /** Target name, used by timeout errors */
  target?: string;
  /** Per-attempt deadline in effect */
  timeoutMs?: number;
  /** Prepended to remote messages, e.g. "Query failed for target x" */
  prefix?: string;
  /** Raw Retry-After header value for 429 responses */
  retryAfter?: string | null;
}

/**
 * Parse a Retry-After header given in whole seconds.
 * Absent or unparsable values fall back to 60 seconds.
 */
export function parseRetryAfter(value: string | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  return parseInt(trimmed, 10);
}

/**
 * Map a non-2xx HTTP response to a classified error
 */
export function classifyStatus(status: number, body: string, context: ClassifyContext = {}): QueryError {
  const { message: remoteMessage, details } = summarizeBody(body);
  const message = context.prefix ? `${context.prefix}: ${remoteMessage}` : remoteMessage;

  if (status === 429) {
    return new RateLimitExceededError(parseRetryAfter(context.retryAfter), message);
  }
  if (status === 504) {
    return new TimeoutError(
      context.timeoutMs ?? 0,
      context.target ?? 'unknown',
      `Remote gateway timed out (status 504): ${message}`
    );
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(`Remote rejected credentials (status ${status}): ${message}`);
  }
  if (status === 400) {
    return new QuerySyntaxError(message, details);
  }
  return new RemoteApiError(status, message);
}

/**
 * Classify an arbitrary thrown value. Already-classified errors pass through.
 */
export function classifyError(error: unknown, context: ClassifyContext = {}): QueryError {
  if (error instanceof QueryError) {
    return error;
  }

  if (error instanceof DeadlineExceededError) {
    return new TimeoutError(error.timeoutMs, context.target ?? 'unknown');
  }

  if (error instanceof AuthFailure) {
    return new AuthenticationError(`Authentication failed: ${error.message}`, { cause: error });
  }

  if (error instanceof ConfigurationError) {
    return new OtherError(error.message, { cause: error });
  }

  const code = getProperty(error, 'code');
  if (isString(code) && NETWORK_ERROR_CODES.has(code)) {
    return new NetworkError(errorMessage(error), undefined, { cause: error });
  }

  return new OtherError(errorMessage(error), { cause: error });
}

/**
 * Rebuild a classified error from a message that was persisted as text.
 * Only for restoring old records; live errors are classified at the origin.
 */
export function reconstructError(
  message: string,
  context: { target?: string; durationMs?: number } = {}
): QueryError {
  const lower = message.toLowerCase();

  if (lower.includes('rate limit') || lower.includes('status 429')) {
    const match = /retry after (\d+)/.exec(lower);
    return new RateLimitExceededError(
      match ? parseInt(match[1], 10) : DEFAULT_RETRY_AFTER_SECONDS,
      message
    );
  }

  if (lower.includes('timed out') || lower.includes('timeout')) {
    return new TimeoutError(context.durationMs ?? 0, context.target ?? 'unknown', message);
  }

  const status = /status (\d{3})/.exec(lower);
  if (status) {
    return classifyStatus(parseInt(status[1], 10), message);
  }

  if (
    lower.includes('authentication') ||
    lower.includes('unauthorized') ||
    lower.includes('forbidden') ||
    lower.includes('token')
  ) {
    return new AuthenticationError(message);
  }

  if (lower.includes('network') || lower.includes('http request failed') || lower.includes('connection')) {
    return new NetworkError(message);
  }

  // Any remaining execution failure is one the remote refused to run
  if (lower.includes('query execution failed') || lower.includes('syntax') || lower.includes('no tables')) {
    return new QuerySyntaxError(message);
  }

  return new OtherError(message);
}

/**
 * Pull a readable message (and nested details) out of an error body.
 * Analytic endpoints answer `{ error: { message, innererror: { message, innererror } } }`.
 */
function summarizeBody(body: string): { message: string; details?: string } {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return { message: 'empty response body' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { message: excerpt(trimmed) };
  }

  const error = getProperty(parsed, 'error');
  const topMessage = getProperty(error, 'message');
  if (!isString(topMessage)) {
    return { message: excerpt(trimmed) };
  }

  const details: string[] = [];
  let inner = getProperty(error, 'innererror');
  while (isRecord(inner)) {
    const innerMessage = inner.message;
    if (isString(innerMessage)) {
      details.push(innerMessage);
    }
    inner = inner.innererror;
  }

  return {
    message: topMessage,
    details: details.length > 0 ? details.join('\n') : undefined,
  };
}

function excerpt(text: string): string {
  return text.length > MAX_BODY_EXCERPT ? `${text.slice(0, MAX_BODY_EXCERPT)}…` : text;
}
