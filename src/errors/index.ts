export {
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
  RetryRefusedError,
  type QueryErrorKind,
  type SerializedQueryError,
} from './query-errors.js';
export {
  classifyError,
  classifyStatus,
  parseRetryAfter,
  reconstructError,
  DEFAULT_RETRY_AFTER_SECONDS,
  type ClassifyContext,
} from './classify.js';
