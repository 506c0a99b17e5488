/**
 * Centralized Configuration Constants
 *
 * Default values used throughout fleetquery. User-facing options are
 * validated and merged over these in ./settings.ts.
 */

// ============================================
// Query Execution Configuration
// ============================================

/**
 * Default per-job execution settings
 */
export const QUERY_DEFAULTS = {
  /** Per-attempt deadline in seconds */
  TIMEOUT_SECONDS: 30,
  /** Extra attempts after the first one */
  RETRY_COUNT: 0,
  /** First backoff delay; doubles on every further attempt */
  BACKOFF_BASE_MS: 1000,
  /** Jobs allowed to hold a network permit at once */
  CONCURRENCY_LIMIT: 15,
  /** Hard stop for servers that never stop returning continuation links */
  MAX_PAGES: 10_000,
} as const;

// ============================================
// Export Configuration
// ============================================

/**
 * Default export settings
 */
export const EXPORT_DEFAULTS = {
  OUTPUT_FOLDER: './output',
  JOB_NAME: 'query',
  EXPORT_CSV: true,
  EXPORT_JSON: false,
  PARSE_DYNAMICS: true,
  /** Buffered pages before a writer flushes to its temp file */
  PAGE_BUFFER_SIZE: 100,
  /** Column type whose values are expanded from embedded JSON */
  DYNAMIC_COLUMN_TYPE: 'dynamic',
} as const;

// ============================================
// Authentication Configuration
// ============================================

/**
 * Default token handling
 */
export const AUTH_DEFAULTS = {
  /** Tokens this close to expiry are refreshed before use (5 minutes in ms) */
  REFRESH_BUFFER_MS: 5 * 60 * 1000,
  /** Interval between credential validations (5 minutes in ms) */
  VALIDATION_INTERVAL_MS: 5 * 60 * 1000,
  /** Lifetime assumed for static tokens that carry no expiry (1 hour in ms) */
  STATIC_TOKEN_LIFETIME_MS: 60 * 60 * 1000,
  /** Command used by the CLI credential broker */
  CLI_COMMAND: 'az',
} as const;

// ============================================
// Remote Endpoint Configuration
// ============================================

/**
 * Remote endpoints and token scopes
 */
export const REMOTE_DEFAULTS = {
  /** Base URL for query requests */
  QUERY_BASE_URL: 'https://api.loganalytics.io',
  /** Base URL for listing groups and targets */
  MANAGEMENT_BASE_URL: 'https://management.azure.com',
  /** Token scope for query requests */
  QUERY_SCOPE: 'https://api.loganalytics.io/.default',
  /** Token scope for administrative requests */
  MANAGEMENT_SCOPE: 'https://management.azure.com/.default',
  SUBSCRIPTIONS_API_VERSION: '2020-01-01',
  WORKSPACES_API_VERSION: '2021-06-01',
} as const;

/**
 * Default HTTP headers
 */
export const HTTP_DEFAULT_HEADERS = {
  CONTENT_TYPE: 'application/json',
  ACCEPT: 'application/json',
} as const;

// ============================================
// Environment Configuration
// ============================================

/**
 * Prefix for settings read from the environment, e.g. FLEETQUERY_RETRY_COUNT
 */
export const ENV_PREFIX = 'FLEETQUERY_';

